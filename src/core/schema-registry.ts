/**
 * A table discovered by the schema resolver
 */
export interface TableSchema {
  entityName: string;
  tableName: string;
  filePath: string;
  lineNumber: number;
  dbsetName?: string;
  properties?: string[];
  metadata: Record<string, unknown>;
}

/**
 * Entity/table lookup built before the main scan pass.
 * Every schema is reachable by both its entity name and its table name.
 */
export class SchemaRegistry {
  private readonly byName = new Map<string, TableSchema>();
  private readonly ordered: TableSchema[] = [];

  /**
   * Register a schema. Names already taken keep their first schema.
   */
  register(schema: TableSchema): void {
    this.ordered.push(schema);
    if (!this.byName.has(schema.entityName)) this.byName.set(schema.entityName, schema);
    if (!this.byName.has(schema.tableName)) this.byName.set(schema.tableName, schema);
  }

  /**
   * Point another name at an already registered schema. Taken names are left alone.
   */
  alias(name: string, schema: TableSchema): void {
    if (!this.byName.has(name)) this.byName.set(name, schema);
  }

  resolve(name: string): TableSchema | undefined {
    return this.byName.get(name);
  }

  /**
   * Canonical table name for an entity or table name, or the name itself
   */
  tableNameFor(name: string): string {
    return this.byName.get(name)?.tableName ?? name;
  }

  schemas(): readonly TableSchema[] {
    return this.ordered;
  }

  get size(): number {
    return this.ordered.length;
  }
}
