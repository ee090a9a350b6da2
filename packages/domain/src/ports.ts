import { type Country } from './country';
import { type User, type Session, type SessionWithOwner } from './user';

export interface UserRepository {
  /** Returns null when the username is already taken. */
  create(
    tx: unknown,
    user: {
      username: string;
      passwordHash: string;
      country: Country;
      role: string;
      email: string | null;
      fullName: string | null;
    },
  ): Promise<User | null>;
  findByUsername(tx: unknown, username: string): Promise<User | null>;
  findById(tx: unknown, id: string): Promise<User | null>;
  listByCountry(tx: unknown, country: Country, role?: string): Promise<User[]>;
  recordLogin(tx: unknown, id: string, at: Date): Promise<void>;
  setActive(tx: unknown, id: string, active: boolean): Promise<boolean>;
  setPasswordHash(tx: unknown, id: string, passwordHash: string): Promise<boolean>;
  delete(tx: unknown, id: string): Promise<boolean>;
}

export interface SessionRepository {
  /** Returns null when the token hash collides with an existing row. */
  create(
    tx: unknown,
    session: {
      userId: string;
      tokenHash: string;
      expiresAt: Date;
      createdAt: Date;
      sourceAddress: string | null;
      clientDescriptor: string | null;
    },
  ): Promise<Session | null>;
  findByTokenHash(tx: unknown, tokenHash: string): Promise<SessionWithOwner | null>;
  deleteByTokenHash(tx: unknown, tokenHash: string): Promise<boolean>;
  deleteAllForUser(tx: unknown, userId: string): Promise<number>;
  deleteExpired(tx: unknown, now: Date): Promise<number>;
}

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, hash: string): Promise<boolean>;
}

export interface SessionTokenGenerator {
  generate(): string;
  hash(token: string): string;
}

export type WithTransaction = <T>(fn: (tx: unknown) => Promise<T>) => Promise<T>;

export type Clock = () => Date;
