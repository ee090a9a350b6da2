/** Stored in place of a hash for accounts that cannot log in until a password is set. */
export const LOCKED_PASSWORD_HASH = '!';

export function isSessionExpired(expiresAt: Date, now: Date): boolean {
  return expiresAt.getTime() <= now.getTime();
}

export function sessionExpiry(issuedAt: Date, ttlSeconds: number): Date {
  return new Date(issuedAt.getTime() + ttlSeconds * 1000);
}

export function isLockedPasswordHash(passwordHash: string): boolean {
  return passwordHash === LOCKED_PASSWORD_HASH;
}
