/**
 * Unified OAuth client
 * Main entry point: one call contract over many identity providers
 */

export const version = '0.1.0';

export { OAuthClient, type OAuthClientOptions } from './client.js';
export {
  buildAuthRequest,
  type BuildAuthRequestOptions,
} from './builder.js';
export {
  SourceRegistry,
  isSourceDescriptor,
  type SourceExtension,
} from './registry.js';
export {
  AuthRequest,
  DEFAULT_TIMEOUT_MS,
  renderAuthorizeUrl,
  type AttemptInfo,
  type AuthRequestOptions,
  type AuthStage,
  type CallOptions,
  type PhaseListener,
} from './auth-request.js';
export {
  AuthPhase,
  AuthStateSchema,
  DEFAULT_STATE_TTL_SECONDS,
  type AuthState,
} from './auth-state.js';
export { normalizeCallback, type CallbackParams } from './callback.js';

export type {
  AuthCallback,
  AuthConfig,
  AuthErrorKind,
  AuthGender,
  ConfigResolver,
  EndpointOverrides,
  NormalizedIdentity,
  OAuthError,
  TokenResponse,
} from './types.js';
export { AuthError, isAuthError } from './errors.js';
export { ErrorNormalizer } from './utils/error-normalizer.js';

export * from './config/index.js';
export * from './cache/index.js';
export * from './http/index.js';
export * from './sources/index.js';

// Export logging utilities
export type { LogMeta, LogStage, LogTransport, Logger } from './logging/types.js';
export { DefaultLogger, LogDestination, LogLevel } from './logging/logger.js';

export default {
  version,
};
