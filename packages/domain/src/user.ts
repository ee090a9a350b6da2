import { type Country } from './country';

export interface User {
  id: string;
  username: string;
  passwordHash: string;
  country: Country;
  role: string;
  email: string | null;
  fullName: string | null;
  isActive: boolean;
  createdAt: Date;
  lastLogin: Date | null;
}

export type PublicUser = Omit<User, 'passwordHash'>;

export interface Session {
  id: string;
  userId: string;
  tokenHash: string;
  expiresAt: Date;
  createdAt: Date;
  sourceAddress: string | null;
  clientDescriptor: string | null;
}

/** A session row joined with the owner's active flag. */
export interface SessionWithOwner extends Session {
  ownerActive: boolean;
}

export interface ClientMetadata {
  sourceAddress?: string | null;
  clientDescriptor?: string | null;
}

export function toPublicUser(user: User): PublicUser {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}
