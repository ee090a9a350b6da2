import { writeFile } from 'node:fs/promises';
import { type SafeLogger } from './logger';

export async function touchHealthFile(path: string): Promise<void> {
  await writeFile(path, new Date().toISOString(), 'utf-8');
}

/** Rewrites `path` every `intervalMs` so a container probe can check its age. */
export function startHealthBeat(opts: {
  path: string;
  intervalMs: number;
  logger: SafeLogger;
}): { stop: () => void } {
  let warned = false;
  const tick = () => {
    void touchHealthFile(opts.path).then(
      () => {
        warned = false;
      },
      (err: unknown) => {
        if (warned) return;
        warned = true;
        opts.logger.warn(
          { path: opts.path, err: err instanceof Error ? err.message : String(err) },
          'Health file could not be written',
        );
      },
    );
  };
  tick();
  const timer = setInterval(tick, opts.intervalMs);
  timer.unref();
  return {
    stop: () => clearInterval(timer),
  };
}
