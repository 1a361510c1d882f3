import { WorkflowGraph } from '../core/graph.js';
import { WorkflowType } from '../core/model.js';
import type { SchemaRegistry } from '../core/schema-registry.js';
import { BaseScanner } from './base-scanner.js';
import { runDetection, type DetectionCategory, type LineMatch } from './detection.js';

/**
 * Entity Framework query calls
 */
const EF_QUERY_RULES = [
  { pattern: /\.Where\s*\(/ },
  { pattern: /\.Select\s*\(/ },
  { pattern: /\.FirstOrDefault\s*\(/ },
  { pattern: /\.ToList\s*\(/ },
  { pattern: /\.Include\s*\(/ },
  { pattern: /\.FromSql/ },
];

const EF_WRITE_RULES = [
  { pattern: /\.Add\s*\(/ },
  { pattern: /\.Update\s*\(/ },
  { pattern: /\.Remove\s*\(/ },
  { pattern: /\.SaveChanges/ },
];

const RAW_SQL_RULES = [
  { pattern: /SqlCommand|SqlDataAdapter|ExecuteReader|ExecuteScalar|ExecuteNonQuery/ },
];

const HTTP_RULES = [
  { pattern: /HttpClient/ },
  { pattern: /\.GetAsync\s*\(/ },
  { pattern: /\.PostAsync\s*\(/ },
  { pattern: /\.PutAsync\s*\(/ },
  { pattern: /\.DeleteAsync\s*\(/ },
  { pattern: /\.SendAsync\s*\(/ },
];

const FILE_IO_RULES = [
  { pattern: /File\.ReadAllText/ },
  { pattern: /File\.WriteAllText/ },
  { pattern: /File\.ReadAllLines/ },
  { pattern: /File\.WriteAllLines/ },
  { pattern: /StreamReader/ },
  { pattern: /StreamWriter/ },
  { pattern: /FileStream/ },
];

const MESSAGE_RULES = [
  { pattern: /ServiceBusSender/, label: 'Azure Service Bus' },
  { pattern: /ServiceBusReceiver/, label: 'Azure Service Bus' },
  { pattern: /SendMessageAsync/, label: 'Azure Service Bus' },
  { pattern: /ReceiveMessageAsync/, label: 'Azure Service Bus' },
  { pattern: /\.BasicPublish\s*\(/, label: 'RabbitMQ' },
  { pattern: /\.BasicConsume\s*\(/, label: 'RabbitMQ' },
  { pattern: /QueueDeclare/, label: 'RabbitMQ' },
];

const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH'] as const;

/**
 * Entity name referenced by an EF call: `DbSet<X>`, `_context.X` or `_db.X` on
 * the line, else a `var y = ctx.X` declaration up to five lines above.
 * A registry hit turns the entity name into its table name.
 */
export function extractTableName(
  line: string,
  lines: readonly string[],
  lineNumber: number,
  registry?: SchemaRegistry
): string | undefined {
  let entityName: string | undefined;

  const direct = /DbSet<(\w+)>|(?:_context|_dbContext|_db)\.(\w+)\b(?!\s*\()/.exec(line);
  if (direct) {
    entityName = direct[1] ?? direct[2];
  }

  if (!entityName) {
    for (let i = lineNumber - 2; i >= Math.max(0, lineNumber - 6); i--) {
      const declared = /var\s+\w+\s*=\s*\w+\.(\w+)/.exec(lines[i]);
      if (declared) {
        entityName = declared[1];
        break;
      }
    }
  }

  if (entityName && registry) {
    return registry.tableNameFor(entityName);
  }
  return entityName;
}

/**
 * SQL literal within a few lines of a raw ADO.NET call
 */
export function extractSqlQuery(lines: readonly string[], lineNumber: number): string | undefined {
  const context = lines.slice(Math.max(0, lineNumber - 3), lineNumber + 3).join('\n');
  const match = /"((?:SELECT|INSERT|UPDATE|DELETE)\b[\s\S]*?)"/i.exec(context);
  return match?.[1];
}

/**
 * Table named by a SQL statement (`FROM x`, `INTO x`, `UPDATE x`)
 */
export function tableFromSql(query: string): string | undefined {
  const match = /\b(?:FROM|INTO|UPDATE|JOIN)\s+\[?(\w+)\]?/i.exec(query);
  return match?.[1];
}

export function extractEndpoint(
  line: string,
  lines: readonly string[],
  lineNumber: number
): string | undefined {
  const direct = /"(https?:\/\/[^"]+|\/[^"]*)"/.exec(line);
  if (direct) return direct[1];

  for (let i = lineNumber - 2; i >= Math.max(0, lineNumber - 4); i--) {
    const nearby = /"(https?:\/\/[^"]+|\/api\/[^"]*)"/.exec(lines[i]);
    if (nearby) return nearby[1];
  }
  return undefined;
}

export function extractHttpMethod(line: string): string {
  for (const method of HTTP_METHODS) {
    if (new RegExp(`${method}Async|\\.${method}\\(`, 'i').test(line)) {
      return method;
    }
  }
  return 'HTTP';
}

function extractFileTarget(line: string): string | undefined {
  return /"([^"]*\.[a-zA-Z]{2,4})"/.exec(line)?.[1];
}

function extractQueueName(
  line: string,
  lines: readonly string[],
  lineNumber: number
): string | undefined {
  const literal = /"([^"]+)"/.exec(line);
  if (literal) return literal[1];

  for (let i = Math.max(0, lineNumber - 6); i < lineNumber - 1; i++) {
    const declared = /queueName\s*=\s*"([^"]+)"|CreateQueue\("([^"]+)"/.exec(lines[i]);
    if (declared) return declared[1] ?? declared[2];
  }
  return undefined;
}

function efNode(kind: 'read' | 'write', m: LineMatch) {
  const tableName = extractTableName(m.line, m.lines, m.lineNumber, m.registry);
  return {
    type: kind === 'read' ? WorkflowType.DatabaseRead : WorkflowType.DatabaseWrite,
    name: `${kind === 'read' ? 'DB Query' : 'DB Write'}: ${tableName ?? 'Unknown'}`,
    description: `Database ${kind === 'read' ? 'query' : 'write'} operation`,
    tableName,
    metadata: { pattern: m.rule.pattern.source },
  };
}

export const CSHARP_CATEGORIES: readonly DetectionCategory[] = [
  {
    idSegment: 'db_read',
    toggle: 'database',
    rules: EF_QUERY_RULES,
    emit: (m) => efNode('read', m),
  },
  {
    idSegment: 'db_write',
    toggle: 'database',
    rules: EF_WRITE_RULES,
    emit: (m) => efNode('write', m),
  },
  {
    idSegment: 'sql',
    toggle: 'database',
    rules: RAW_SQL_RULES,
    emit: (m) => {
      const query = extractSqlQuery(m.lines, m.lineNumber);
      const isWrite =
        /ExecuteNonQuery/.test(m.line) || (query !== undefined && !/^SELECT\b/i.test(query));
      const tableName = query ? tableFromSql(query) : undefined;
      return {
        type: isWrite ? WorkflowType.DatabaseWrite : WorkflowType.DatabaseRead,
        name: 'SQL Query',
        description: 'Raw SQL query execution',
        query,
        tableName: tableName && m.registry ? m.registry.tableNameFor(tableName) : tableName,
        metadata: { pattern: m.rule.pattern.source },
      };
    },
  },
  {
    idSegment: 'api',
    toggle: 'apiCalls',
    rules: HTTP_RULES,
    emit: (m) => {
      const method = extractHttpMethod(m.line);
      return {
        type: WorkflowType.ApiCall,
        name: `API Call: ${method}`,
        description: 'HTTP API call',
        endpoint: extractEndpoint(m.line, m.lines, m.lineNumber),
        method,
        metadata: { library: 'HttpClient' },
      };
    },
  },
  {
    idSegment: 'file',
    toggle: 'fileIo',
    rules: FILE_IO_RULES,
    emit: (m) => {
      const isRead = /Read|Reader/.test(m.line);
      return {
        type: isRead ? WorkflowType.FileRead : WorkflowType.FileWrite,
        name: `File ${isRead ? 'Read' : 'Write'}`,
        description: `File ${isRead ? 'read' : 'write'} operation`,
        filePath: extractFileTarget(m.line),
      };
    },
  },
  {
    idSegment: 'msg',
    toggle: 'messageQueues',
    rules: MESSAGE_RULES,
    emit: (m) => {
      const platform = m.rule.label ?? 'Message queue';
      const isRabbit = platform === 'RabbitMQ';
      const isSend = isRabbit ? /Publish/.test(m.line) : /Send|Sender/.test(m.line);
      const verb = isRabbit ? (isSend ? 'Publish' : 'Consume') : isSend ? 'Send' : 'Receive';
      return {
        type: isSend ? WorkflowType.MessageSend : WorkflowType.MessageReceive,
        name: `Message ${verb}`,
        description: `${platform} message operation`,
        queueName: extractQueueName(m.line, m.lines, m.lineNumber),
        metadata: { platform },
      };
    },
  },
];

/**
 * Scanner for C# backend code: Entity Framework, ADO.NET, HttpClient, file
 * streams, Service Bus and RabbitMQ
 */
export class CSharpScanner extends BaseScanner {
  getName(): string {
    return 'CSharpScanner';
  }

  canScan(filePath: string): boolean {
    return filePath.endsWith('.cs');
  }

  async scanFile(filePath: string, registry?: SchemaRegistry): Promise<WorkflowGraph> {
    const content = await this.readFile(filePath);
    return this.scanContent(filePath, content, registry);
  }

  /**
   * Detect operations in already-read C# source
   */
  scanContent(
    filePath: string,
    content: string,
    registry?: SchemaRegistry,
    graph: WorkflowGraph = new WorkflowGraph()
  ): WorkflowGraph {
    return runDetection(CSHARP_CATEGORIES, this.detectionContext(filePath, content, registry), graph);
  }
}
