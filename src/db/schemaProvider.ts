import { QueryPool } from './connection';
import { ColumnDescriptor, SchemaDescriptor } from '../types';
import { componentLogger } from '../config/logger';

const log = componentLogger('schema-provider');

const COLUMNS_QUERY = `
SELECT c.TABLE_NAME AS tableName,
       c.COLUMN_NAME AS columnName,
       c.DATA_TYPE AS dataType,
       c.CHARACTER_MAXIMUM_LENGTH AS maxLength,
       c.NUMERIC_PRECISION AS numericPrecision,
       c.NUMERIC_SCALE AS numericScale
FROM INFORMATION_SCHEMA.COLUMNS c
INNER JOIN INFORMATION_SCHEMA.TABLES t
  ON t.TABLE_SCHEMA = c.TABLE_SCHEMA AND t.TABLE_NAME = c.TABLE_NAME
WHERE t.TABLE_TYPE = 'BASE TABLE'
ORDER BY c.TABLE_NAME, c.ORDINAL_POSITION`.trim();

function asNumber(value: unknown): number | null {
  return typeof value === 'number' ? value : null;
}

/**
 * Render a type the way SQL Server spells it in DDL, e.g. NVARCHAR(255),
 * DECIMAL(10, 2), NVARCHAR(MAX).
 */
export function describeType(dataType: string, maxLength: number | null, precision: number | null, scale: number | null): string {
  const type = dataType.toUpperCase();
  if (maxLength !== null && /CHAR|BINARY/.test(type)) {
    return `${type}(${maxLength === -1 ? 'MAX' : maxLength})`;
  }
  if (precision !== null && (type === 'DECIMAL' || type === 'NUMERIC')) {
    return `${type}(${precision}, ${scale ?? 0})`;
  }
  return type;
}

/**
 * Build a frozen SchemaDescriptor from introspection rows, keeping only the
 * allowed tables when a list is given.
 */
export function buildSchemaDescriptor(
  rows: Record<string, unknown>[],
  includeTables: string[] = []
): SchemaDescriptor {
  const allowed = new Set(includeTables.map((table) => table.toLowerCase()));
  const tables = new Map<string, ColumnDescriptor[]>();

  for (const row of rows) {
    const tableName = row.tableName;
    const columnName = row.columnName;
    const dataType = row.dataType;
    if (typeof tableName !== 'string' || typeof columnName !== 'string' || typeof dataType !== 'string') {
      continue;
    }
    if (allowed.size > 0 && !allowed.has(tableName.toLowerCase())) {
      continue;
    }

    const columns = tables.get(tableName) ?? [];
    columns.push(Object.freeze({
      name: columnName,
      type: describeType(dataType, asNumber(row.maxLength), asNumber(row.numericPrecision), asNumber(row.numericScale))
    }));
    tables.set(tableName, columns);
  }

  const frozen = new Map<string, readonly ColumnDescriptor[]>();
  for (const [table, columns] of tables) {
    frozen.set(table, Object.freeze(columns));
  }
  return frozen;
}

/**
 * Render the schema for prompts as CREATE TABLE blocks.
 */
export function renderSchema(schema: SchemaDescriptor): string {
  const blocks: string[] = [];
  for (const [table, columns] of schema) {
    const body = columns.map((column) => `  [${column.name}] ${column.type}`).join(',\n');
    blocks.push(`CREATE TABLE [${table}] (\n${body}\n)`);
  }
  return blocks.join('\n\n');
}

export class SchemaProvider {
  private readonly pool: QueryPool;
  private readonly includeTables: string[];
  private schema: SchemaDescriptor | null = null;

  constructor(pool: QueryPool, includeTables: string[] = []) {
    this.pool = pool;
    this.includeTables = includeTables;
  }

  /**
   * Introspect once. Later calls return the cached descriptor; a refresh only
   * happens on process restart.
   */
  async load(): Promise<SchemaDescriptor> {
    if (this.schema) {
      return this.schema;
    }

    log.info('Loading database schema...');
    const result = await this.pool.request().query(COLUMNS_QUERY);
    const schema = buildSchemaDescriptor(result.recordset, this.includeTables);

    const missing = this.includeTables.filter(
      (table) => !Array.from(schema.keys()).some((name) => name.toLowerCase() === table.toLowerCase())
    );
    if (missing.length > 0) {
      log.warn('Configured tables not found in database', { missing });
    }

    log.info('Database schema loaded', { tables: Array.from(schema.keys()) });
    this.schema = schema;
    return schema;
  }

  get(): SchemaDescriptor {
    if (!this.schema) {
      throw new Error('Schema not loaded. Call load() first.');
    }
    return this.schema;
  }
}
