/**
 * Environment variable config resolver
 */

import type { AuthConfig, ConfigResolver } from '../types.js';
import { validate } from './schema.js';

export interface FromEnvironmentOptions {
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Variable prefix; defaults to `OAUTH` */
  prefix?: string;
}

/**
 * `github` -> `GITHUB`, `wechat-open` -> `WECHAT_OPEN`
 */
export function environmentKey(sourceKey: string): string {
  return sourceKey
    .trim()
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, '_');
}

/**
 * Build a resolver that reads a source's config from environment variables:
 * - `<PREFIX>_<KEY>_CLIENT_ID` -> clientId
 * - `<PREFIX>_<KEY>_CLIENT_SECRET` -> clientSecret
 * - `<PREFIX>_<KEY>_REDIRECT_URI` -> redirectUri
 * - `<PREFIX>_<KEY>_SCOPE` -> scopes (split by spaces and commas)
 *
 * The resolver throws when a required variable is missing or the result
 * fails validation.
 */
export function fromEnvironment(
  options: FromEnvironmentOptions = {}
): ConfigResolver {
  const env = options.env ?? process.env;
  const prefix = options.prefix ?? 'OAUTH';

  return (sourceKey: string): AuthConfig => {
    const name = `${prefix}_${environmentKey(sourceKey)}`;
    const clientId = env[`${name}_CLIENT_ID`] ?? '';
    const clientSecret = env[`${name}_CLIENT_SECRET`] ?? '';
    const redirectUri = env[`${name}_REDIRECT_URI`] ?? '';
    const scopeString = env[`${name}_SCOPE`] ?? '';

    const missing = [
      clientId ? undefined : `${name}_CLIENT_ID`,
      clientSecret ? undefined : `${name}_CLIENT_SECRET`,
    ].filter((variable): variable is string => variable !== undefined);
    if (missing.length > 0) {
      throw new Error(`Missing environment variables: ${missing.join(', ')}`);
    }

    const config: {
      clientId: string;
      clientSecret: string;
      redirectUri?: string;
      scopes?: string[];
    } = { clientId, clientSecret };
    if (redirectUri) {
      config.redirectUri = redirectUri;
    }
    // Parse scopes: split by spaces and commas, filter empty strings
    const scopes = scopeString.split(/[, ]+/).filter(Boolean);
    if (scopes.length > 0) {
      config.scopes = scopes;
    }

    return validate(config);
  };
}
