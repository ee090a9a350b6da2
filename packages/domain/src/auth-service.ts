import { type Country } from './country';
import { AuthError } from './errors';
import { canAccessInstance } from './permissions';
import { type UserRepository, type PasswordHasher, type WithTransaction, type Clock } from './ports';
import { type SessionService } from './session-service';
import { type ClientMetadata, type PublicUser, toPublicUser } from './user';

export interface AuthServiceDeps {
  userRepo: UserRepository;
  passwordHasher: PasswordHasher;
  sessions: SessionService;
  withTransaction: WithTransaction;
  now: Clock;
  /** When set, only users of this country may log in. */
  instanceCountry?: Country;
}

export interface LoginResult {
  token: string;
  user: PublicUser;
}

const TIMING_PASSWORD = 'timing-equalizer';

export class AuthService {
  private timingHash: Promise<string> | null = null;

  constructor(private readonly deps: AuthServiceDeps) {}

  /**
   * The password hash is checked outside any transaction. The session is
   * issued before `lastLogin` moves, so a login that yields no session
   * leaves the account untouched.
   */
  async login(
    input: { username: string; password: string; country: Country },
    metadata: ClientMetadata = {},
  ): Promise<LoginResult> {
    const { userRepo, passwordHasher, now, instanceCountry } = this.deps;

    const found = await this.deps.withTransaction((tx) =>
      userRepo.findByUsername(tx, input.username),
    );
    if (!found) {
      // Unknown usernames pay for a hash too.
      await passwordHasher.verify(input.password, await this.hashForTiming());
      throw AuthError.invalidCredentials('NOT_FOUND', 'Unknown username');
    }
    if (found.country !== input.country) {
      throw AuthError.invalidCredentials('UNAUTHORIZED', 'Country does not match account', {
        userId: found.id,
        country: input.country,
      });
    }
    if (instanceCountry && !canAccessInstance(found, instanceCountry)) {
      throw AuthError.invalidCredentials('UNAUTHORIZED', 'Account belongs to another instance', {
        userId: found.id,
        instanceCountry,
      });
    }
    if (!found.isActive) {
      throw AuthError.invalidCredentials('INACTIVE', 'Account is deactivated', {
        userId: found.id,
      });
    }

    const valid = await passwordHasher.verify(input.password, found.passwordHash);
    if (!valid) {
      throw AuthError.invalidCredentials('UNAUTHORIZED', 'Wrong password', { userId: found.id });
    }

    const token = await this.deps.sessions.issue(found.id, undefined, metadata);

    const loginAt = now();
    await this.deps.withTransaction((tx) => userRepo.recordLogin(tx, found.id, loginAt));
    return { token, user: toPublicUser({ ...found, lastLogin: loginAt }) };
  }

  async logout(token: string): Promise<void> {
    await this.deps.sessions.revoke(token);
  }

  private hashForTiming(): Promise<string> {
    if (!this.timingHash) {
      this.timingHash = this.deps.passwordHasher.hash(TIMING_PASSWORD);
    }
    return this.timingHash;
  }

  async currentUser(token: string): Promise<PublicUser> {
    const userId = await this.deps.sessions.authenticate(token);
    const user = await this.deps.withTransaction((tx) => this.deps.userRepo.findById(tx, userId));
    if (!user) {
      throw AuthError.invalidSession('NOT_FOUND', 'Session owner no longer exists', { userId });
    }
    return toPublicUser(user);
  }
}
