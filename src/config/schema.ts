/**
 * AuthConfig schema and validation
 */

import { z } from 'zod';
import type { AuthConfig } from '../types.js';
import { deepFreeze } from '../utils/freeze.js';

const EndpointOverridesSchema = z
  .object({
    authorize: z.string().url('Invalid authorize endpoint URL').optional(),
    token: z.string().url('Invalid token endpoint URL').optional(),
    profile: z.string().url('Invalid profile endpoint URL').optional(),
    refresh: z.string().url('Invalid refresh endpoint URL').optional(),
    revoke: z.string().url('Invalid revoke endpoint URL').optional(),
    requestToken: z
      .string()
      .url('Invalid request-token endpoint URL')
      .optional(),
  })
  .strict();

export const AuthConfigSchema = z.object({
  clientId: z.string().min(1, 'clientId is required'),
  clientSecret: z.string().min(1, 'clientSecret is required'),
  redirectUri: z.string().url('Invalid redirect URI').optional(),
  scopes: z.array(z.string().min(1)).optional(),
  extras: z.record(z.string(), z.unknown()).optional(),
  endpoints: EndpointOverridesSchema.optional(),
});

/**
 * Validate a config and freeze the result.
 * @throws ZodError with detailed validation messages
 */
export function validate(config: unknown): AuthConfig {
  return deepFreeze(AuthConfigSchema.parse(config));
}

/**
 * Safe validation that returns validation result instead of throwing
 */
export function safeValidate(config: unknown): {
  success: boolean;
  data?: AuthConfig;
  error?: z.ZodError;
} {
  const result = AuthConfigSchema.safeParse(config);
  if (result.success) {
    return {
      success: true,
      data: deepFreeze(result.data),
    };
  } else {
    return {
      success: false,
      error: result.error,
    };
  }
}

/**
 * One line per issue, e.g. `clientId: clientId is required`.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    )
    .join('; ');
}
