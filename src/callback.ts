import type { AuthCallback } from './types.js';
import { asString } from './utils/guards.js';

/**
 * Raw callback parameters: a parsed query object (string or string[]
 * values, as Express and friends produce) or URLSearchParams.
 */
export type CallbackParams = URLSearchParams | Record<string, unknown>;

/** Alternative names providers use for the authorization code */
const CODE_ALIASES = ['code', 'auth_code', 'authorization_code'] as const;

function firstString(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    for (const item of value) {
      const text = asString(item);
      if (text !== undefined) return text;
    }
    return undefined;
  }
  return asString(value);
}

/**
 * Flatten callback parameters into an {@link AuthCallback}. Empty values are
 * treated as absent; unknown parameters are kept in `params`.
 */
export function normalizeCallback(input: CallbackParams): AuthCallback {
  const params: Record<string, string> = {};
  const entries: Iterable<[string, unknown]> =
    input instanceof URLSearchParams ? input.entries() : Object.entries(input);

  for (const [key, value] of entries) {
    if (key in params) continue;
    const text = firstString(value);
    if (text !== undefined) {
      params[key] = text;
    }
  }

  const callback: AuthCallback = { params };
  for (const alias of CODE_ALIASES) {
    const code = params[alias];
    if (code !== undefined) {
      callback.code = code;
      break;
    }
  }
  if (params.state !== undefined) callback.state = params.state;
  if (params.oauth_token !== undefined) callback.oauth_token = params.oauth_token;
  if (params.oauth_verifier !== undefined) {
    callback.oauth_verifier = params.oauth_verifier;
  }
  if (params.error !== undefined) callback.error = params.error;
  if (params.error_description !== undefined) {
    callback.error_description = params.error_description;
  }
  return callback;
}
