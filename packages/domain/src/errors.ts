export type AuthErrorKind =
  | 'NOT_FOUND'
  | 'INACTIVE'
  | 'EXPIRED'
  | 'UNAUTHORIZED'
  | 'CONSTRAINT_VIOLATION'
  | 'FORBIDDEN'
  | 'VALIDATION';

export type PublicErrorCode = 'UNAUTHORIZED' | 'CONFLICT' | 'FORBIDDEN' | 'VALIDATION';

const PUBLIC_CODE: Record<AuthErrorKind, PublicErrorCode> = {
  NOT_FOUND: 'UNAUTHORIZED',
  INACTIVE: 'UNAUTHORIZED',
  EXPIRED: 'UNAUTHORIZED',
  UNAUTHORIZED: 'UNAUTHORIZED',
  CONSTRAINT_VIOLATION: 'CONFLICT',
  FORBIDDEN: 'FORBIDDEN',
  VALIDATION: 'VALIDATION',
};

export const INVALID_CREDENTIALS = 'Invalid credentials';
export const INVALID_SESSION = 'Invalid session';

/**
 * Recoverable failure of an access operation.
 *
 * `message` and `safeMeta` name the precise condition and are meant for logs.
 * Callers facing a client use {@link AuthError.toPublic}, which reports every
 * authentication failure with one uniform message.
 */
export class AuthError extends Error {
  public readonly publicMessage: string | null;

  constructor(
    public readonly kind: AuthErrorKind,
    message: string,
    public readonly safeMeta: Record<string, unknown> = {},
    publicMessage?: string,
  ) {
    super(message);
    this.name = 'AuthError';
    this.publicMessage = publicMessage ?? null;
  }

  static invalidCredentials(
    kind: AuthErrorKind,
    message: string,
    safeMeta: Record<string, unknown> = {},
  ): AuthError {
    return new AuthError(kind, message, safeMeta, INVALID_CREDENTIALS);
  }

  static invalidSession(
    kind: AuthErrorKind,
    message: string,
    safeMeta: Record<string, unknown> = {},
  ): AuthError {
    return new AuthError(kind, message, safeMeta, INVALID_SESSION);
  }

  get code(): PublicErrorCode {
    return PUBLIC_CODE[this.kind];
  }

  toPublic(): { code: PublicErrorCode; message: string } {
    if (this.publicMessage !== null) {
      return { code: this.code, message: this.publicMessage };
    }
    if (this.code === 'UNAUTHORIZED') {
      return { code: this.code, message: INVALID_CREDENTIALS };
    }
    return { code: this.code, message: this.message };
  }
}
