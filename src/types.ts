/**
 * Endpoint overrides a caller may supply on top of a source's defaults
 */
export type EndpointOverrides = {
  authorize?: string;
  token?: string;
  profile?: string;
  refresh?: string;
  revoke?: string;
  requestToken?: string;
};

/**
 * Per-provider credentials. Frozen once validated.
 */
export type AuthConfig = {
  /** OAuth client identifier (consumer key for OAuth 1.0a, app id for some providers) */
  readonly clientId: string;
  /** OAuth client secret (consumer secret for OAuth 1.0a, RSA private key for Alipay) */
  readonly clientSecret: string;
  /** Callback URL registered with the provider */
  readonly redirectUri?: string;
  /** Scopes to request; falls back to the source's defaults when absent */
  readonly scopes?: readonly string[];
  /** Provider-specific values, e.g. an Alipay public key or a Stack Exchange key */
  readonly extras?: Readonly<Record<string, unknown>>;
  /** Endpoint overrides, e.g. a self-hosted GitLab */
  readonly endpoints?: Readonly<EndpointOverrides>;
};

/**
 * Looks up the config for a source key when a request is built. Called
 * synchronously; throwing fails the build with `ConfigResolutionFailed`.
 */
export type ConfigResolver = (sourceKey: string) => AuthConfig;

/**
 * Callback parameters as received by the redirect handler, after normalisation
 */
export type AuthCallback = {
  code?: string;
  state?: string;
  oauth_token?: string;
  oauth_verifier?: string;
  error?: string;
  error_description?: string;
  /** Any other string parameter the provider sent */
  params: Record<string, string>;
};

/**
 * Standardized token response from a token exchange or refresh
 */
export type TokenResponse = {
  /** OAuth access token */
  accessToken: string;
  /** OAuth refresh token (if supported by provider) */
  refreshToken?: string;
  /** Token lifetime in seconds */
  expiresIn?: number;
  tokenType?: string;
  /** Granted scopes as reported by the provider */
  scope?: string;
  /** OpenID Connect ID token (if requested) */
  idToken?: string;
  openId?: string;
  unionId?: string;
  uid?: string;
  /** OAuth 1.0a token secret */
  tokenSecret?: string;
  /** Provider fields the token mapping does not cover */
  extras?: Record<string, unknown>;
};

export type AuthGender = 'male' | 'female' | 'unknown';

/**
 * Provider-agnostic identity returned by a successful login
 */
export type NormalizedIdentity = {
  /** Source name, e.g. `github` */
  source: string;
  /** Provider-native user id */
  uuid: string;
  username?: string;
  nickname?: string;
  avatar?: string;
  email?: string;
  mobile?: string;
  blog?: string;
  company?: string;
  location?: string;
  remark?: string;
  gender: AuthGender;
  token: TokenResponse;
  /** The complete provider payload the identity was mapped from */
  rawUserInfo: Record<string, unknown>;
};

export type AuthErrorKind =
  | 'StateMismatch'
  | 'TokenExchangeFailed'
  | 'ProfileFetchFailed'
  | 'Timeout'
  | 'UnknownSource'
  | 'ConfigResolutionFailed'
  | 'NotSupported'
  | 'CacheFailure';

/**
 * Standardized OAuth error shape for consistent error handling
 */
export type OAuthError = {
  kind: AuthErrorKind;
  /** HTTP status code */
  statusCode: number;
  /** OAuth error code */
  error: string;
  /** Human-readable error description */
  error_description?: string;
  /** Endpoint that generated the error */
  endpoint?: string;
  /** Source name the failing request was bound to */
  source?: string;
};
