import { Pool, type PoolConfig, type PoolClient } from 'pg';
import { createLogger } from '@epistat/shared';

const logger = createLogger({ name: 'db' });

export interface SqlResult {
  rows: Record<string, unknown>[];
  rowCount: number | null;
}

/** The slice of a pg client the repositories and the migrator rely on. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) throw new Error('Database pool not initialized. Call initPool first.');
  return pool;
}

export function initPool(config: PoolConfig): Pool {
  pool = new Pool(config);
  pool.on('error', (err) => {
    logger.error({ err: err.message }, 'Unexpected database pool error');
  });
  logger.info({ max: config.max }, 'Database pool initialized');
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info({}, 'Database pool closed');
  }
}

export function toSqlClient(client: PoolClient): SqlClient {
  return {
    async query(text, values) {
      const result = await client.query(text, values);
      return { rows: result.rows, rowCount: result.rowCount };
    },
  };
}

export async function withTransaction<T>(fn: (client: SqlClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await fn(toSqlClient(client));
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}
