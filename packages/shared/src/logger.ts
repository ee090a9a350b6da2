import pino from 'pino';

const SENSITIVE_KEYS = new Set([
  'password',
  'passwordhash',
  'token',
  'tokenhash',
  'secret',
  'authorization',
  'cookie',
  'email',
  'fullname',
  'ip',
  'ipaddress',
  'sourceaddress',
  'useragent',
  'clientdescriptor',
  'databaseurl',
  'connectionstring',
]);

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase().replace(/[_-]/g, ''));
}

export function redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveKey(key)) {
      result[key] = '[REDACTED]';
    } else if (Array.isArray(value)) {
      result[key] = value.map((item) => (isPlainObject(item) ? redactSensitive(item) : item));
    } else if (isPlainObject(value)) {
      result[key] = redactSensitive(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface SafeLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
  fatal(meta: Record<string, unknown>, msg: string): void;
  child(bindings: Record<string, unknown>): SafeLogger;
}

function wrapPino(logger: pino.Logger): SafeLogger {
  return {
    info(meta, msg) {
      logger.info(redactSensitive(meta), msg);
    },
    warn(meta, msg) {
      logger.warn(redactSensitive(meta), msg);
    },
    error(meta, msg) {
      logger.error(redactSensitive(meta), msg);
    },
    debug(meta, msg) {
      logger.debug(redactSensitive(meta), msg);
    },
    fatal(meta, msg) {
      logger.fatal(redactSensitive(meta), msg);
    },
    child(bindings) {
      return wrapPino(logger.child(redactSensitive(bindings)));
    },
  };
}

export function createLogger(opts: { name: string; level?: LogLevel }): SafeLogger {
  const pinoInstance = pino({
    name: opts.name,
    level: opts.level ?? process.env.LOG_LEVEL ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  return wrapPino(pinoInstance);
}

/** Loggable fields for a thrown value. */
export function errorMeta(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return { err: err.message, errName: err.name };
  }
  return { err: String(err) };
}
