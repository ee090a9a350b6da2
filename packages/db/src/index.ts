export {
  initPool,
  closePool,
  getPool,
  withTransaction,
  toSqlClient,
  type SqlClient,
  type SqlResult,
} from './client';
export { runMigrations, listMigrations, MIGRATIONS_DIR } from './migrator';
export { PgUserRepository } from './repositories/user-repository';
export { PgSessionRepository } from './repositories/session-repository';
export { createAccessLayer, type AccessLayer, type AccessLayerOptions } from './access-layer';
