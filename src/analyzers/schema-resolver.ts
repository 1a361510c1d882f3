import * as fs from 'fs/promises';
import { SchemaRegistry, type TableSchema } from '../core/schema-registry.js';
import { decodeSource } from '../scanners/base-scanner.js';
import type { SchemaConfig } from '../types.js';
import { parallelMapSafe } from '../utils/parallel.js';
import { BaseAnalyzer } from './base-analyzer.js';

const DBCONTEXT_PATTERN = /class\s+\w+\s*:\s*[\w.]*DbContext\b/;
const DBSET_PATTERN = /DbSet<(\w+)>\s+(\w+)/;
const TABLE_ATTRIBUTE_PATTERN = /\[Table\(\s*"([^"]+)"/;
const CLASS_PATTERN = /\bclass\s+(\w+)/;
const PROPERTY_PATTERN =
  /public\s+(?:virtual\s+|required\s+|override\s+)*[\w.<>,?[\]]+\s+(\w+)\s*\{\s*get;/;

const COMMON_ENTITY_FIELDS = new Set(['Id', 'ID', 'Name', 'CreatedAt', 'UpdatedAt', 'Created', 'Modified']);

export interface SchemaResolution {
  registry: SchemaRegistry;
  warnings: string[];
  filesRead: number;
}

function countChar(line: string, char: string): number {
  let count = 0;
  for (const c of line) if (c === char) count++;
  return count;
}

/**
 * Two or more properties, and either an identity/audit field or a third property
 */
export function looksLikeEntity(properties: readonly string[]): boolean {
  if (properties.length < 2) return false;
  return properties.length >= 3 || properties.some((p) => COMMON_ENTITY_FIELDS.has(p));
}

/**
 * `DbSet<Entity> Property` members of DbContext classes. The class body is
 * tracked by brace depth.
 */
export function detectDbSets(filePath: string, lines: readonly string[]): TableSchema[] {
  const schemas: TableSchema[] = [];
  let depth = 0;
  let contextDepth: number | null = null;
  let entered = false;

  lines.forEach((line, index) => {
    if (contextDepth === null && DBCONTEXT_PATTERN.test(line)) {
      contextDepth = depth;
      entered = false;
    }

    if (contextDepth !== null) {
      const dbset = DBSET_PATTERN.exec(line);
      if (dbset) {
        schemas.push({
          entityName: dbset[1],
          tableName: dbset[2],
          filePath,
          lineNumber: index + 1,
          dbsetName: dbset[2],
          metadata: { source: 'DbContext', detectedFrom: 'DbSet' },
        });
      }
    }

    depth += countChar(line, '{') - countChar(line, '}');
    if (contextDepth !== null) {
      if (depth > contextDepth) {
        entered = true;
      } else if (entered) {
        contextDepth = null;
      }
    }
  });

  return schemas;
}

/**
 * Entity classes. `[Table("x")]` before a class names its table; otherwise the
 * table is the class name. DbContext classes are never entities.
 */
export function detectEntityClasses(filePath: string, lines: readonly string[]): TableSchema[] {
  const schemas: TableSchema[] = [];
  let pendingTable: string | undefined;
  let current: {
    name: string;
    lineNumber: number;
    tableAttribute?: string;
    isContext: boolean;
    properties: string[];
  } | null = null;

  const flush = (): void => {
    if (!current || current.isContext || !looksLikeEntity(current.properties)) return;
    schemas.push({
      entityName: current.name,
      tableName: current.tableAttribute ?? current.name,
      filePath,
      lineNumber: current.lineNumber,
      properties: current.properties,
      metadata: { source: 'Entity', hasTableAttribute: current.tableAttribute !== undefined },
    });
  };

  lines.forEach((line, index) => {
    const table = TABLE_ATTRIBUTE_PATTERN.exec(line);
    if (table) pendingTable = table[1];

    const cls = CLASS_PATTERN.exec(line);
    if (cls) {
      flush();
      current = {
        name: cls[1],
        lineNumber: index + 1,
        tableAttribute: pendingTable,
        isContext: DBCONTEXT_PATTERN.test(line),
        properties: [],
      };
      pendingTable = undefined;
      return;
    }

    const property = current ? PROPERTY_PATTERN.exec(line) : null;
    if (current && property) current.properties.push(property[1]);
  });
  flush();

  return schemas;
}

/**
 * Registration rank: explicit `[Table]` names first, then DbSet mappings, then
 * class-name defaults. The registry keeps the first schema per name.
 */
function rank(schema: TableSchema): number {
  if (schema.metadata.hasTableAttribute === true) return 0;
  if (isDbSet(schema)) return 1;
  return 2;
}

function isDbSet(schema: TableSchema): boolean {
  return schema.metadata.source === 'DbContext';
}

/**
 * Pre-pass over backend files that builds the entity → table registry used by
 * the main scan
 */
export class SchemaResolver extends BaseAnalyzer {
  constructor(private readonly config: SchemaConfig) {
    super();
  }

  getName(): string {
    return 'SchemaResolver';
  }

  async resolve(files: readonly string[], concurrency = 8): Promise<SchemaResolution> {
    const warnings: string[] = [];

    let targets = files;
    if (files.length > this.config.maxFiles) {
      targets = files.slice(0, this.config.maxFiles);
      warnings.push(
        `Schema resolution limited to ${this.config.maxFiles} of ${files.length} backend files`
      );
    }

    const perFile = await parallelMapSafe(
      targets,
      async (filePath) => {
        const { text } = decodeSource(await fs.readFile(filePath));
        const lines = text.split('\n');
        return [...detectDbSets(filePath, lines), ...detectEntityClasses(filePath, lines)];
      },
      (error, filePath) => {
        warnings.push(`Error detecting schemas in ${filePath}: ${(error as Error).message}`);
      },
      concurrency
    );

    const found = perFile.flat();
    const ordered = found
      .map((schema, order) => ({ schema, order }))
      .sort((a, b) => rank(a.schema) - rank(b.schema) || a.order - b.order)
      .map(({ schema }) => schema);

    const registry = new SchemaRegistry();
    for (const schema of ordered) {
      // A later schema for a mapped entity only adds its name as an alias.
      // Several DbSets of one entity stay separate tables.
      const known = registry.resolve(schema.entityName);
      const bothDbSets = known !== undefined && isDbSet(known) && isDbSet(schema);
      if (known && known.entityName === schema.entityName && !bothDbSets) {
        registry.alias(schema.tableName, known);
        continue;
      }
      if (registry.size >= this.config.maxSchemas) {
        warnings.push(`Schema registry capped at ${this.config.maxSchemas} schemas`);
        break;
      }
      registry.register(schema);
    }

    for (const warning of warnings) this.warn(warning);
    this.log(`Discovered ${registry.size} schemas in ${targets.length} files`);
    return { registry, warnings, filesRead: targets.length };
  }
}
