import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { type SafeLogger } from '@epistat/shared';
import { type SqlClient } from './client';

export const MIGRATIONS_DIR = join(__dirname, '..', 'migrations');

export async function listMigrations(dir: string = MIGRATIONS_DIR): Promise<string[]> {
  return (await readdir(dir)).filter((f) => f.endsWith('.sql')).sort();
}

/**
 * Applies pending `.sql` files in name order, each in its own transaction,
 * and returns the names it applied.
 */
export async function runMigrations(
  client: SqlClient,
  opts: { dir?: string; logger?: SafeLogger } = {},
): Promise<string[]> {
  const dir = opts.dir ?? MIGRATIONS_DIR;

  await client.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name VARCHAR(255) PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const applied = await client.query('SELECT name FROM _migrations ORDER BY name');
  const appliedSet = new Set(applied.rows.map((r) => String(r.name)));
  const newlyApplied: string[] = [];

  for (const file of await listMigrations(dir)) {
    if (appliedSet.has(file)) continue;

    const sql = await readFile(join(dir, file), 'utf-8');

    await client.query('BEGIN');
    try {
      await client.query(sql);
      await client.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    }
    newlyApplied.push(file);
    opts.logger?.info({ migration: file }, 'Applied migration');
  }

  return newlyApplied;
}
