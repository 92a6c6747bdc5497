import sql from 'mssql';
import { Config } from '../config';
import { componentLogger } from '../config/logger';

const log = componentLogger('database');

export interface ColumnMetadata {
  [name: string]: { index: number };
}

export interface QueryResult {
  recordset: Record<string, unknown>[] & { columns?: ColumnMetadata };
}

/**
 * The slice of an mssql pool the pipeline uses. `pool.request()` borrows a
 * connection for one query and returns it when the query settles.
 */
export interface QueryRequest {
  query(command: string): Promise<QueryResult>;
  cancel(): void;
}

export interface QueryPool {
  request(): QueryRequest;
}

export async function connectDatabase(config: Config): Promise<sql.ConnectionPool> {
  log.info('Connecting to SQL Server database...', {
    server: config.database.server,
    database: config.database.database
  });

  const dbConfig: sql.config = {
    server: config.database.server,
    database: config.database.database,
    user: config.database.user,
    password: config.database.password,
    port: config.database.port,
    pool: config.database.pool,
    options: {
      encrypt: config.database.options.encrypt,
      trustServerCertificate: config.database.options.trustServerCertificate,
      enableArithAbort: true,
    },
    requestTimeout: config.database.options.requestTimeout,
  };

  try {
    const pool = new sql.ConnectionPool(dbConfig);
    pool.on('error', (error: Error) => {
      log.error('Database pool error', { error: error.message });
    });
    await pool.connect();

    log.info('Successfully connected to SQL Server database');
    return pool;
  } catch (error) {
    log.error('Failed to connect to SQL Server database', {
      error: error instanceof Error ? error.message : String(error)
    });
    throw error;
  }
}

export async function closeDatabaseConnection(pool: sql.ConnectionPool): Promise<void> {
  try {
    await pool.close();
    log.info('Database connection closed');
  } catch (error) {
    log.error('Error closing database connection', {
      error: error instanceof Error ? error.message : String(error)
    });
  }
}

// Health check function
export async function checkDatabaseHealth(pool: QueryPool): Promise<{ status: 'healthy' | 'error'; message: string }> {
  try {
    const result = await pool.request().query('SELECT 1 AS test');

    if (result.recordset.length > 0 && result.recordset[0].test === 1) {
      return { status: 'healthy', message: 'Database connection is working' };
    }
    return { status: 'error', message: 'Database query returned unexpected result' };
  } catch (error) {
    return {
      status: 'error',
      message: `Database health check failed: ${error instanceof Error ? error.message : 'Unknown error'}`
    };
  }
}
