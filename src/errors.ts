import type { AuthErrorKind, OAuthError } from './types.js';

/**
 * Error thrown by every public operation of this library.
 * `kind` is the stable discriminator callers should branch on.
 */
export class AuthError extends Error implements OAuthError {
  public readonly kind: AuthErrorKind;
  public readonly statusCode: number;
  public readonly error: string;
  public readonly error_description?: string;
  public readonly endpoint?: string;
  public readonly source?: string;

  constructor(init: OAuthError, options?: { cause?: unknown }) {
    super(init.error_description ?? init.error, options);
    this.name = 'AuthError';
    this.kind = init.kind;
    this.statusCode = init.statusCode;
    this.error = init.error;
    if (init.error_description !== undefined) {
      this.error_description = init.error_description;
    }
    if (init.endpoint !== undefined) {
      this.endpoint = init.endpoint;
    }
    if (init.source !== undefined) {
      this.source = init.source;
    }
  }

  toJSON(): OAuthError {
    const json: OAuthError = {
      kind: this.kind,
      statusCode: this.statusCode,
      error: this.error,
    };
    if (this.error_description !== undefined) {
      json.error_description = this.error_description;
    }
    if (this.endpoint !== undefined) json.endpoint = this.endpoint;
    if (this.source !== undefined) json.source = this.source;
    return json;
  }
}

export function isAuthError(
  value: unknown,
  kind?: AuthErrorKind
): value is AuthError {
  return (
    value instanceof AuthError && (kind === undefined || value.kind === kind)
  );
}
