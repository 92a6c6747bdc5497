import { ColumnMetadata, QueryPool } from './connection';
import { QueryValidator } from '../safety/validator';
import { ResultRow, ResultSet, ScalarValue } from '../types';
import { ExecutionError, UnsafeQueryError, errorMessage } from '../types/errors';
import { withTimeout } from '../utils/timeout';
import { componentLogger } from '../config/logger';

const log = componentLogger('query-executor');

export interface QueryExecutorOptions {
  timeoutMs: number;
}

export function toScalar(value: unknown): ScalarValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;
  if (typeof value === 'bigint') return value.toString();
  if (Buffer.isBuffer(value)) return value.toString('base64');
  return JSON.stringify(value);
}

function orderedColumns(rows: Record<string, unknown>[], metadata?: ColumnMetadata): string[] {
  if (metadata && Object.keys(metadata).length > 0) {
    return Object.entries(metadata)
      .sort(([, a], [, b]) => a.index - b.index)
      .map(([name]) => name);
  }
  return rows.length > 0 ? Object.keys(rows[0]) : [];
}

/**
 * Runs one generated statement against the shared pool. One call is one
 * attempt: failures are reported, never retried here.
 */
export class QueryExecutor {
  private readonly pool: QueryPool;
  private readonly options: QueryExecutorOptions;

  constructor(pool: QueryPool, options: QueryExecutorOptions) {
    this.pool = pool;
    this.options = options;
  }

  async execute(sql: string): Promise<ResultSet> {
    const validation = QueryValidator.validateReadOnly(sql);
    if (!validation.isValid) {
      log.warn('Rejected statement before execution', { errors: validation.errors });
      throw new UnsafeQueryError(validation.errors);
    }

    const startTime = Date.now();
    const request = this.pool.request();

    try {
      const result = await withTimeout(
        async (signal) => {
          signal.addEventListener('abort', () => request.cancel(), { once: true });
          return request.query(sql);
        },
        this.options.timeoutMs,
        () => new ExecutionError(`Query timed out after ${this.options.timeoutMs}ms`)
      );

      const columns = orderedColumns(result.recordset, result.recordset.columns);
      const rows: ResultRow[] = result.recordset.map((record) => {
        const row: ResultRow = {};
        for (const column of columns) {
          row[column] = toScalar(record[column]);
        }
        return row;
      });

      log.debug('Query executed', { rowCount: rows.length, executionTime: Date.now() - startTime });
      return { columns, rows, rowCount: rows.length };
    } catch (error) {
      if (error instanceof ExecutionError) {
        throw error;
      }
      throw new ExecutionError(`Database error: ${errorMessage(error)}`, { cause: error });
    }
  }
}
