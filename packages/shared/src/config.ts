import { z } from 'zod';
import { COUNTRIES } from '@epistat/domain';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export const DatabaseConfigSchema = z.object({
  DATABASE_URL: z.string().min(1),
  DATABASE_POOL_MAX: z.coerce.number().int().positive().default(10),
});

export const SessionConfigSchema = z.object({
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(86_400),
  SESSION_CHECK_ACTIVE_USER: booleanFlag.default('true'),
  SESSION_MAX_ISSUE_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  INSTANCE_COUNTRY: z.enum(COUNTRIES).optional(),
});

export type SessionConfig = z.infer<typeof SessionConfigSchema>;

export const AccessConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema).merge(
  SessionConfigSchema,
);

export type AccessConfig = z.infer<typeof AccessConfigSchema>;

export const WorkerConfigSchema = AccessConfigSchema.extend({
  SESSION_SWEEP_INTERVAL_MS: z.coerce.number().int().min(1000).default(300_000),
  WORKER_HEALTHCHECK_PATH: z.string().default('/tmp/.epistat-worker-healthy'),
  WORKER_HEALTHCHECK_INTERVAL_MS: z.coerce.number().int().positive().default(5000),
});

export type WorkerConfig = z.infer<typeof WorkerConfigSchema>;

export function loadConfig<T extends z.ZodType>(
  schema: T,
  env: Record<string, string | undefined> = process.env,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }
  return result.data;
}
