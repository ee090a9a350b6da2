import { type Country, isRoleOf, parseCountry } from './country';
import { AuthError } from './errors';
import { canDeleteUser } from './permissions';
import {
  type UserRepository,
  type SessionRepository,
  type PasswordHasher,
  type WithTransaction,
} from './ports';
import { type PublicUser, type User, toPublicUser } from './user';

const USERNAME_MAX_LENGTH = 50;
const PASSWORD_MIN_LENGTH = 8;

export interface UserServiceDeps {
  userRepo: UserRepository;
  sessionRepo: SessionRepository;
  passwordHasher: PasswordHasher;
  withTransaction: WithTransaction;
}

export interface CreateUserInput {
  username: string;
  password: string;
  country: string;
  role: string;
  email?: string | null;
  fullName?: string | null;
}

export class UserService {
  constructor(private readonly deps: UserServiceDeps) {}

  async createUser(input: CreateUserInput): Promise<PublicUser> {
    const { userRepo, passwordHasher } = this.deps;

    const country = parseCountry(input.country);
    if (input.username.length === 0 || input.username.length > USERNAME_MAX_LENGTH) {
      throw new AuthError('VALIDATION', `Username must be 1-${USERNAME_MAX_LENGTH} characters`);
    }
    if (!isRoleOf(input.role, country)) {
      throw new AuthError('VALIDATION', `Role '${input.role}' does not belong to ${country}`, {
        role: input.role,
        country,
      });
    }
    assertPassword(input.password);

    const passwordHash = await passwordHasher.hash(input.password);

    return this.deps.withTransaction(async (tx) => {
      const user = await userRepo.create(tx, {
        username: input.username,
        passwordHash,
        country,
        role: input.role,
        email: input.email ?? null,
        fullName: input.fullName ?? null,
      });
      if (!user) {
        throw new AuthError('CONSTRAINT_VIOLATION', 'Username is not available');
      }
      return toPublicUser(user);
    });
  }

  async listByCountry(country: Country, role?: string): Promise<PublicUser[]> {
    const users = await this.deps.withTransaction((tx) =>
      this.deps.userRepo.listByCountry(tx, country, role),
    );
    return users.map(toPublicUser);
  }

  async setActive(userId: string, active: boolean): Promise<void> {
    const updated = await this.deps.withTransaction((tx) =>
      this.deps.userRepo.setActive(tx, userId, active),
    );
    if (!updated) {
      throw new AuthError('NOT_FOUND', 'User not found', { userId });
    }
  }

  /** Stores a new password hash and ends every session of the user. */
  async resetPassword(userId: string, password: string): Promise<number> {
    assertPassword(password);
    const passwordHash = await this.deps.passwordHasher.hash(password);

    return this.deps.withTransaction(async (tx) => {
      const updated = await this.deps.userRepo.setPasswordHash(tx, userId, passwordHash);
      if (!updated) {
        throw new AuthError('NOT_FOUND', 'User not found', { userId });
      }
      return this.deps.sessionRepo.deleteAllForUser(tx, userId);
    });
  }

  async deleteUser(actor: Pick<User, 'id' | 'country' | 'role'>, userId: string): Promise<void> {
    const { userRepo } = this.deps;

    await this.deps.withTransaction(async (tx) => {
      const target = await userRepo.findById(tx, userId);
      if (!target) {
        throw new AuthError('NOT_FOUND', 'User not found', { userId });
      }
      if (!canDeleteUser(actor, target)) {
        throw new AuthError('FORBIDDEN', 'Not allowed to delete this user', {
          actorId: actor.id,
          userId,
        });
      }
      await userRepo.delete(tx, userId);
    });
  }
}

function assertPassword(password: string): void {
  if (password.length < PASSWORD_MIN_LENGTH) {
    throw new AuthError('VALIDATION', `Password must be at least ${PASSWORD_MIN_LENGTH} characters`);
  }
}
