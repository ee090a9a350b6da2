import { PGlite } from '@electric-sql/pglite';
import { type WithTransaction } from '@epistat/domain';
import { type SqlClient } from '../client';
import { runMigrations } from '../migrator';

export interface TestDatabase {
  client: SqlClient;
  withTransaction: WithTransaction;
  /** Drops every session and puts `users` back to its freshly migrated rows. */
  reset(): Promise<void>;
  close(): Promise<void>;
}

/** pg-shaped client over an in-memory PGlite instance. */
export function toPgliteClient(pg: PGlite): SqlClient {
  return {
    async query(text, values) {
      if (values === undefined || values.length === 0) {
        const results = await pg.exec(text);
        const last = results[results.length - 1];
        return {
          rows: last ? last.rows : [],
          rowCount: last?.affectedRows ?? null,
        };
      }
      const result = await pg.query<Record<string, unknown>>(text, values);
      return { rows: result.rows, rowCount: result.affectedRows ?? null };
    },
  };
}

export async function createTestDatabase(): Promise<TestDatabase> {
  const pg = new PGlite({
    parsers: {
      // int8 as strings, as pg returns them
      20: (value: string) => value,
    },
  });
  const client = toPgliteClient(pg);
  await runMigrations(client);
  await client.query('CREATE TABLE _seeded_users AS SELECT * FROM users');

  // PGlite has a single connection, so transactions are queued.
  let queue: Promise<unknown> = Promise.resolve();

  const withTransaction: WithTransaction = <T>(fn: (tx: unknown) => Promise<T>): Promise<T> => {
    const run = async (): Promise<T> => {
      await client.query('BEGIN');
      try {
        const result = await fn(client);
        await client.query('COMMIT');
        return result;
      } catch (err) {
        await client.query('ROLLBACK');
        throw err;
      }
    };
    const next = queue.then(run, run);
    queue = next.catch(() => undefined);
    return next;
  };

  return {
    client,
    withTransaction,
    async reset() {
      await client.query(`
        DELETE FROM sessions;
        DELETE FROM users;
        INSERT INTO users SELECT * FROM _seeded_users;
      `);
    },
    async close() {
      await pg.close();
    },
  };
}
