export {
  createLogger,
  redactSensitive,
  errorMeta,
  type SafeLogger,
  type LogLevel,
} from './logger';
export {
  loadConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  SessionConfigSchema,
  AccessConfigSchema,
  WorkerConfigSchema,
  type BaseConfig,
  type SessionConfig,
  type AccessConfig,
  type WorkerConfig,
} from './config';
export {
  Argon2PasswordHasher,
  DEFAULT_ARGON2_COST,
  type Argon2Cost,
} from './auth/password-hasher';
export { RandomSessionTokenGenerator } from './auth/session-token';
export { touchHealthFile, startHealthBeat } from './healthcheck';
