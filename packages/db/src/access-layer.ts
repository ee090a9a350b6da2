import {
  Argon2PasswordHasher,
  RandomSessionTokenGenerator,
  createLogger,
  type SessionConfig,
} from '@epistat/shared';
import {
  AuthService,
  SessionReaper,
  SessionService,
  UserService,
  type Clock,
  type PasswordHasher,
  type SessionTokenGenerator,
  type WithTransaction,
} from '@epistat/domain';
import { withTransaction as poolTransaction } from './client';
import { PgSessionRepository } from './repositories/session-repository';
import { PgUserRepository } from './repositories/user-repository';

const logger = createLogger({ name: 'access-layer' });

export interface AccessLayerOptions {
  config: SessionConfig;
  /** Defaults to a transaction on the shared pool; `initPool` must run first. */
  withTransaction?: WithTransaction;
  now?: Clock;
  passwordHasher?: PasswordHasher;
  tokenGenerator?: SessionTokenGenerator;
}

export interface AccessLayer {
  sessions: SessionService;
  reaper: SessionReaper;
  auth: AuthService;
  users: UserService;
}

export function createAccessLayer(options: AccessLayerOptions): AccessLayer {
  const { config } = options;
  const withTransaction: WithTransaction = options.withTransaction ?? poolTransaction;
  const now: Clock = options.now ?? (() => new Date());
  const passwordHasher = options.passwordHasher ?? new Argon2PasswordHasher();
  const tokenGenerator = options.tokenGenerator ?? new RandomSessionTokenGenerator();

  const userRepo = new PgUserRepository();
  const sessionRepo = new PgSessionRepository();

  const sessions = new SessionService({
    userRepo,
    sessionRepo,
    tokenGenerator,
    withTransaction,
    now,
    defaultTtlSeconds: config.SESSION_TTL_SECONDS,
    checkActiveUser: config.SESSION_CHECK_ACTIVE_USER,
    maxIssueAttempts: config.SESSION_MAX_ISSUE_ATTEMPTS,
  });

  const reaper = new SessionReaper({ sessionRepo, withTransaction, now });

  const auth = new AuthService({
    userRepo,
    passwordHasher,
    sessions,
    withTransaction,
    now,
    instanceCountry: config.INSTANCE_COUNTRY,
  });

  const users = new UserService({ userRepo, sessionRepo, passwordHasher, withTransaction });

  logger.debug(
    {
      ttlSeconds: config.SESSION_TTL_SECONDS,
      checkActiveUser: config.SESSION_CHECK_ACTIVE_USER,
      instanceCountry: config.INSTANCE_COUNTRY ?? null,
    },
    'Access layer ready',
  );

  return { sessions, reaper, auth, users };
}
