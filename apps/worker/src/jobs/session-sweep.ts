import { createLogger, errorMeta, type SafeLogger } from '@epistat/shared';
import { type SessionReaper } from '@epistat/domain';

const defaultLogger = createLogger({ name: 'worker:session-sweep' });

export type SweepSource = Pick<SessionReaper, 'sweep'>;

export async function runSessionSweepJob(
  reaper: SweepSource,
  logger: SafeLogger = defaultLogger,
): Promise<number> {
  const started = Date.now();
  const count = await reaper.sweep();
  if (count > 0) {
    logger.info({ count, durationMs: Date.now() - started }, 'Purged expired sessions');
  } else {
    logger.debug({ durationMs: Date.now() - started }, 'No expired sessions');
  }
  return count;
}

export interface SessionSweeper {
  /** Resolves when the current run, if any, has settled. */
  idle(): Promise<void>;
  stop(): void;
}

/**
 * Sweeps once immediately, then every `intervalMs`. A tick that lands while
 * a sweep is still running is skipped; a failed sweep is logged and the next
 * tick tries again.
 */
export function startSessionSweeper(
  reaper: SweepSource,
  opts: { intervalMs: number; logger?: SafeLogger },
): SessionSweeper {
  const logger = opts.logger ?? defaultLogger;
  let inFlight: Promise<void> | null = null;

  const tick = () => {
    if (inFlight) {
      logger.warn({ intervalMs: opts.intervalMs }, 'Previous session sweep still running, skipping');
      return;
    }
    inFlight = runSessionSweepJob(reaper, logger)
      .then(
        () => undefined,
        (err: unknown) => {
          logger.error({ ...errorMeta(err), job: 'session-sweep' }, 'Job failed');
        },
      )
      .finally(() => {
        inFlight = null;
      });
  };

  tick();
  const timer = setInterval(tick, opts.intervalMs);

  return {
    idle: async () => {
      await inFlight;
    },
    stop: () => clearInterval(timer),
  };
}
