import { hash, verify } from '@node-rs/argon2';
import { type PasswordHasher, isLockedPasswordHash } from '@epistat/domain';

export interface Argon2Cost {
  /** KiB of memory per hash. */
  memoryCost: number;
  timeCost: number;
  parallelism: number;
}

// OWASP baseline for argon2id.
export const DEFAULT_ARGON2_COST: Argon2Cost = {
  memoryCost: 19_456,
  timeCost: 2,
  parallelism: 1,
};

const ARGON2_PREFIX = '$argon2';

export class Argon2PasswordHasher implements PasswordHasher {
  private readonly cost: Argon2Cost;

  constructor(cost: Partial<Argon2Cost> = {}) {
    this.cost = { ...DEFAULT_ARGON2_COST, ...cost };
  }

  async hash(password: string): Promise<string> {
    return hash(password, { ...this.cost, outputLen: 32 });
  }

  /**
   * Locked accounts (`'!'`) and values that are not well-formed argon2
   * hashes never verify. The cost parameters are read from the stored hash.
   */
  async verify(password: string, passwordHash: string): Promise<boolean> {
    if (isLockedPasswordHash(passwordHash) || !passwordHash.startsWith(ARGON2_PREFIX)) {
      return false;
    }
    try {
      return await verify(passwordHash, password);
    } catch {
      // undecodable stored hash
      return false;
    }
  }
}
