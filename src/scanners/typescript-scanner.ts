import { WorkflowGraph } from '../core/graph.js';
import { WorkflowType } from '../core/model.js';
import type { SchemaRegistry } from '../core/schema-registry.js';
import { BaseScanner } from './base-scanner.js';
import { tableFromSql } from './csharp-scanner.js';
import { runDetection, type DetectionCategory, type LineMatch } from './detection.js';

const HTTP_RULES = [
  { pattern: /http\.get/i, label: 'http' },
  { pattern: /http\.post/i, label: 'http' },
  { pattern: /http\.put/i, label: 'http' },
  { pattern: /http\.delete/i, label: 'http' },
  { pattern: /http\.patch/i, label: 'http' },
  { pattern: /fetch\s*\(/i, label: 'fetch' },
  { pattern: /axios\./i, label: 'axios' },
];

const STORAGE_RULES = [
  { pattern: /localStorage\.setItem/, label: 'localStorage' },
  { pattern: /localStorage\.getItem/, label: 'localStorage' },
  { pattern: /sessionStorage\.setItem/, label: 'sessionStorage' },
  { pattern: /sessionStorage\.getItem/, label: 'sessionStorage' },
  { pattern: /indexedDB/, label: 'indexedDB' },
];

const FILE_RULES = [
  { pattern: /FileReader/ },
  { pattern: /\.readAsText/ },
  { pattern: /\.readAsDataURL/ },
  { pattern: /Blob/ },
  { pattern: /fs\.(?:readFile|writeFile|appendFile)(?:Sync)?\s*\(/ },
  { pattern: /create(?:Read|Write)Stream\s*\(/ },
];

const TRANSFORM_RULES = [
  { pattern: /\.pipe\s*\(/ },
  { pattern: /\.map\s*\(/ },
  { pattern: /\.filter\s*\(/ },
  { pattern: /\.reduce\s*\(/ },
  { pattern: /\.switchMap\s*\(/ },
  { pattern: /\.mergeMap\s*\(/ },
  { pattern: /\.concatMap\s*\(/ },
];

const ORM_READ_RULES = [
  {
    pattern:
      /prisma\.(\w+)\.(?:findMany|findUnique|findFirst|findUniqueOrThrow|findFirstOrThrow|count|aggregate|groupBy)\s*\(/,
    label: 'prisma',
  },
  { pattern: /(\w*)[Rr]epository\.(?:find\w*|count\w*)\s*\(/, label: 'repository' },
  { pattern: /\.query\s*\(\s*['"`]\s*SELECT\b/i, label: 'sql' },
];

const ORM_WRITE_RULES = [
  {
    pattern: /prisma\.(\w+)\.(?:create|createMany|update|updateMany|upsert|delete|deleteMany)\s*\(/,
    label: 'prisma',
  },
  {
    pattern: /(\w*)[Rr]epository\.(?:save|insert|update|delete|remove|softDelete)\s*\(/,
    label: 'repository',
  },
  { pattern: /\.query\s*\(\s*['"`]\s*(?:INSERT|UPDATE|DELETE)\b/i, label: 'sql' },
];

const MESSAGE_RULES = [
  { pattern: /\.sendToQueue\s*\(/, label: 'amqplib' },
  { pattern: /producer\.send\s*\(/, label: 'kafkajs' },
  { pattern: /\.publish\s*\(/, label: 'pubsub' },
  { pattern: /\.consume\s*\(/, label: 'amqplib' },
  { pattern: /consumer\.run\s*\(/, label: 'kafkajs' },
  { pattern: /\.subscribe\s*\(\s*['"`]/, label: 'pubsub' },
];

const TRANSFORM_OPERATOR = /\.(pipe|map|filter|reduce|switchMap|mergeMap|concatMap)/;

/**
 * Endpoint of an HTTP call: a URL or path literal on the line, a template
 * literal, or an `/api/` literal up to three lines above
 */
export function extractEndpoint(
  line: string,
  lines: readonly string[],
  lineNumber: number
): string | undefined {
  const literal = /['"`](https?:\/\/[^'"`]+|\/[^'"`]*)['"`]/.exec(line);
  if (literal) return literal[1];

  const template = /`([^`]*)`/.exec(line);
  if (template) return template[1];

  for (let i = Math.max(0, lineNumber - 4); i < Math.min(lines.length, lineNumber + 1); i++) {
    const nearby = /['"`](https?:\/\/[^'"`]+|\/api\/[^'"`]*)['"`]/.exec(lines[i]);
    if (nearby) return nearby[1];
  }
  return undefined;
}

/**
 * HTTP verb of a call. `fetch` defaults to GET unless a `method:` option
 * appears within a few lines.
 */
export function extractHttpMethod(line: string, lines: readonly string[], lineNumber: number): string {
  const verb = /\.(get|post|put|delete|patch)\s*\(/i.exec(line);
  if (verb) return verb[1].toUpperCase();

  if (/fetch\s*\(/i.test(line)) {
    const context = lines.slice(Math.max(0, lineNumber - 3), lineNumber + 3).join(' ');
    const option = /method\s*:\s*['"](\w+)['"]/i.exec(context);
    return option ? option[1].toUpperCase() : 'GET';
  }
  return 'HTTP';
}

function extractStorageKey(line: string): string | undefined {
  return /(?:getItem|setItem)\s*\(\s*['"]([^'"]+)['"]/.exec(line)?.[1];
}

function firstLiteral(line: string): string | undefined {
  return /['"`]([^'"`]+)['"`]/.exec(line)?.[1];
}

function ormTable(m: LineMatch): string | undefined {
  let name: string | undefined;
  if (m.rule.label === 'sql') {
    const literal = /['"`]([^'"`]+)['"`]/.exec(m.line);
    name = literal ? tableFromSql(literal[1]) : undefined;
  } else {
    // prisma.order / orderRepository name the entity in camelCase
    name = m.match[1] || /getRepository\s*\(\s*(\w+)\s*\)/.exec(m.line)?.[1];
    if (name) {
      name = name.charAt(0).toUpperCase() + name.slice(1);
    }
  }
  if (name && m.registry) return m.registry.tableNameFor(name);
  return name;
}

function ormNode(kind: 'read' | 'write', m: LineMatch) {
  const tableName = ormTable(m);
  return {
    type: kind === 'read' ? WorkflowType.DatabaseRead : WorkflowType.DatabaseWrite,
    name: `${kind === 'read' ? 'DB Query' : 'DB Write'}: ${tableName ?? 'Unknown'}`,
    description: `Database ${kind === 'read' ? 'query' : 'write'} from TypeScript`,
    tableName,
    metadata: { library: m.rule.label },
  };
}

export const TYPESCRIPT_CATEGORIES: readonly DetectionCategory[] = [
  {
    idSegment: 'api',
    toggle: 'apiCalls',
    rules: HTTP_RULES,
    emit: (m) => {
      const endpoint = extractEndpoint(m.line, m.lines, m.lineNumber);
      const method = extractHttpMethod(m.line, m.lines, m.lineNumber);
      return {
        type: WorkflowType.ApiCall,
        name: `API ${method}: ${endpoint ?? 'Unknown'}`,
        description: 'HTTP API call from TypeScript',
        endpoint,
        method,
        metadata: { library: m.rule.label },
      };
    },
  },
  {
    idSegment: 'file',
    toggle: 'fileIo',
    rules: FILE_RULES,
    emit: (m) => {
      const isRead = /read|Reader/i.test(m.line);
      return {
        type: isRead ? WorkflowType.FileRead : WorkflowType.FileWrite,
        name: `File ${isRead ? 'Read' : 'Write'}`,
        description: 'File API operation',
        filePath: /['"`]([^'"`]*\.[a-zA-Z]{2,4})['"`]/.exec(m.line)?.[1],
      };
    },
  },
  {
    idSegment: 'cache',
    rules: STORAGE_RULES,
    emit: (m) => {
      const isRead = /getItem|\.get\s*\(/.test(m.line);
      const key = extractStorageKey(m.line);
      return {
        type: isRead ? WorkflowType.CacheRead : WorkflowType.CacheWrite,
        name: `Cache ${isRead ? 'Read' : 'Write'}: ${key ?? 'Unknown'}`,
        description: 'Browser storage operation',
        metadata: { key, storage: m.rule.label },
      };
    },
  },
  {
    idSegment: 'transform',
    toggle: 'dataTransforms',
    rules: TRANSFORM_RULES,
    emit: (m) => {
      const operator = TRANSFORM_OPERATOR.exec(m.line)?.[1] ?? 'transform';
      return {
        type: WorkflowType.DataTransform,
        name: `Data Transform: ${operator}`,
        description: `Data transformation using ${operator}`,
        metadata: { operator },
      };
    },
  },
  {
    idSegment: 'db_read',
    toggle: 'database',
    rules: ORM_READ_RULES,
    emit: (m) => ormNode('read', m),
  },
  {
    idSegment: 'db_write',
    toggle: 'database',
    rules: ORM_WRITE_RULES,
    emit: (m) => ormNode('write', m),
  },
  {
    idSegment: 'msg',
    toggle: 'messageQueues',
    rules: MESSAGE_RULES,
    emit: (m) => {
      const isSend = /sendToQueue|send|publish/i.test(m.match[0]);
      return {
        type: isSend ? WorkflowType.MessageSend : WorkflowType.MessageReceive,
        name: `Message ${isSend ? 'Send' : 'Receive'}`,
        description: `${m.rule.label ?? 'Message queue'} message operation`,
        queueName: firstLiteral(m.line),
        metadata: { platform: m.rule.label },
      };
    },
  },
];

/**
 * Scanner for TypeScript and JavaScript: HTTP clients, browser storage, file
 * APIs, RxJS/array transforms, ORM access and message queues
 */
export class TypeScriptScanner extends BaseScanner {
  getName(): string {
    return 'TypeScriptScanner';
  }

  canScan(filePath: string): boolean {
    return /\.(?:ts|mts|cts|js|mjs|cjs)$/.test(filePath) && !filePath.endsWith('.d.ts');
  }

  async scanFile(filePath: string, registry?: SchemaRegistry): Promise<WorkflowGraph> {
    const content = await this.readFile(filePath);
    return this.scanContent(filePath, content, registry);
  }

  /**
   * Detect operations in already-read source. Dialect scanners call this
   * first and add their UI triggers to the returned graph.
   */
  scanContent(
    filePath: string,
    content: string,
    registry?: SchemaRegistry,
    graph: WorkflowGraph = new WorkflowGraph()
  ): WorkflowGraph {
    return runDetection(
      TYPESCRIPT_CATEGORIES,
      this.detectionContext(filePath, content, registry),
      graph
    );
  }
}
