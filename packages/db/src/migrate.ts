import { Pool } from 'pg';
import { createLogger, loadConfig, BaseConfigSchema, DatabaseConfigSchema } from '@epistat/shared';
import { toSqlClient } from './client';
import { runMigrations } from './migrator';

const logger = createLogger({ name: 'db:migrate' });

async function migrate() {
  const config = loadConfig(BaseConfigSchema.merge(DatabaseConfigSchema));

  const pool = new Pool({ connectionString: config.DATABASE_URL });
  const client = await pool.connect();

  try {
    const applied = await runMigrations(toSqlClient(client), { logger });
    logger.info({ count: applied.length }, 'All migrations applied');
  } finally {
    client.release();
    await pool.end();
  }
}

migrate().catch((err: unknown) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Migration failed');
  process.exit(1);
});
