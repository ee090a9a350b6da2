import { isSessionExpired, sessionExpiry } from './auth';
import { AuthError } from './errors';
import { type ClientMetadata } from './user';
import {
  type UserRepository,
  type SessionRepository,
  type SessionTokenGenerator,
  type WithTransaction,
  type Clock,
} from './ports';

export const DEFAULT_MAX_ISSUE_ATTEMPTS = 3;

export interface SessionServiceDeps {
  userRepo: UserRepository;
  sessionRepo: SessionRepository;
  tokenGenerator: SessionTokenGenerator;
  withTransaction: WithTransaction;
  now: Clock;
  defaultTtlSeconds: number;
  /** Reject sessions whose owner has been deactivated since issuance. Defaults to true. */
  checkActiveUser?: boolean;
  maxIssueAttempts?: number;
}

export type SessionInvalidReason = 'NOT_FOUND' | 'EXPIRED' | 'INACTIVE';

export type SessionCheck =
  | { valid: true; userId: string; expiresAt: Date }
  | { valid: false; reason: SessionInvalidReason };

export class SessionService {
  constructor(private readonly deps: SessionServiceDeps) {}

  async issue(
    userId: string,
    ttlSeconds: number = this.deps.defaultTtlSeconds,
    metadata: ClientMetadata = {},
  ): Promise<string> {
    if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) {
      throw new AuthError('VALIDATION', 'Session TTL must be a positive number of seconds', {
        ttlSeconds,
      });
    }

    const { userRepo, sessionRepo, tokenGenerator, now } = this.deps;
    const maxAttempts = this.deps.maxIssueAttempts ?? DEFAULT_MAX_ISSUE_ATTEMPTS;

    return this.deps.withTransaction(async (tx) => {
      const user = await userRepo.findById(tx, userId);
      if (!user) {
        throw new AuthError('NOT_FOUND', 'User not found', { userId });
      }
      if (!user.isActive) {
        throw new AuthError('INACTIVE', 'User is deactivated', { userId });
      }

      const issuedAt = now();
      const expiresAt = sessionExpiry(issuedAt, ttlSeconds);

      for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        const token = tokenGenerator.generate();
        const session = await sessionRepo.create(tx, {
          userId,
          tokenHash: tokenGenerator.hash(token),
          expiresAt,
          createdAt: issuedAt,
          sourceAddress: metadata.sourceAddress ?? null,
          clientDescriptor: metadata.clientDescriptor ?? null,
        });
        if (session) return token;
      }

      throw new AuthError('CONSTRAINT_VIOLATION', 'Session token collided with an existing session', {
        userId,
        attempts: maxAttempts,
      });
    });
  }

  /** Read-only: never extends the expiry of the session it checks. */
  async validate(token: string): Promise<SessionCheck> {
    if (token.length === 0) return { valid: false, reason: 'NOT_FOUND' };

    const { sessionRepo, tokenGenerator, now } = this.deps;
    const checkActiveUser = this.deps.checkActiveUser ?? true;

    return this.deps.withTransaction<SessionCheck>(async (tx) => {
      const session = await sessionRepo.findByTokenHash(tx, tokenGenerator.hash(token));
      if (!session) {
        return { valid: false, reason: 'NOT_FOUND' };
      }
      if (isSessionExpired(session.expiresAt, now())) {
        return { valid: false, reason: 'EXPIRED' };
      }
      if (checkActiveUser && !session.ownerActive) {
        return { valid: false, reason: 'INACTIVE' };
      }
      return { valid: true, userId: session.userId, expiresAt: session.expiresAt };
    });
  }

  async authenticate(token: string): Promise<string> {
    const check = await this.validate(token);
    if (!check.valid) {
      throw AuthError.invalidSession(check.reason, `Session rejected: ${check.reason}`);
    }
    return check.userId;
  }

  /** Deleting a token that does not exist is a no-op and resolves to false. */
  async revoke(token: string): Promise<boolean> {
    if (token.length === 0) return false;
    const { sessionRepo, tokenGenerator } = this.deps;
    return this.deps.withTransaction((tx) =>
      sessionRepo.deleteByTokenHash(tx, tokenGenerator.hash(token)),
    );
  }

  async revokeAllForUser(userId: string): Promise<number> {
    return this.deps.withTransaction((tx) => this.deps.sessionRepo.deleteAllForUser(tx, userId));
  }
}
