import { randomBytes, createHash } from 'node:crypto';
import { type SessionTokenGenerator } from '@epistat/domain';

const DEFAULT_TOKEN_BYTES = 32;

/**
 * Opaque bearer tokens: `byteLength` random bytes, base64url encoded.
 * Only the SHA-256 hex digest of a token is ever persisted.
 */
export class RandomSessionTokenGenerator implements SessionTokenGenerator {
  private readonly byteLength: number;

  constructor(opts: { byteLength?: number } = {}) {
    this.byteLength = opts.byteLength ?? DEFAULT_TOKEN_BYTES;
    if (!Number.isInteger(this.byteLength) || this.byteLength < 16) {
      throw new Error('Session tokens need at least 16 random bytes');
    }
  }

  generate(): string {
    return randomBytes(this.byteLength).toString('base64url');
  }

  hash(token: string): string {
    return createHash('sha256').update(token).digest('hex');
  }
}
