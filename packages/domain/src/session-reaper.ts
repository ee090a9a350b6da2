import { type SessionRepository, type WithTransaction, type Clock } from './ports';

export interface SessionReaperDeps {
  sessionRepo: SessionRepository;
  withTransaction: WithTransaction;
  now: Clock;
}

/**
 * Reclaims rows of sessions that are already expired. Validation ignores
 * expired rows on its own, so sweeping is maintenance only.
 */
export class SessionReaper {
  constructor(private readonly deps: SessionReaperDeps) {}

  /** Deletes every session with `expiresAt <= now` and returns how many went. */
  async sweep(): Promise<number> {
    const cutoff = this.deps.now();
    return this.deps.withTransaction((tx) => this.deps.sessionRepo.deleteExpired(tx, cutoff));
  }
}
