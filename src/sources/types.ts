import type {
  AuthCallback,
  AuthConfig,
  AuthGender,
  TokenResponse,
} from '../types.js';
import type { HttpRequestDescriptor } from '../http/types.js';

export type GrantType = 'authorization_code' | 'oauth1a';

export type SourceEndpoints = {
  authorize: string;
  token: string;
  profile?: string;
  refresh?: string;
  revoke?: string;
  /** OAuth 1.0a temporary credential endpoint */
  requestToken?: string;
};

/**
 * Everything a source function may read. Built fresh for each call, so
 * source functions stay pure.
 */
export type SourceContext = {
  config: AuthConfig;
  /** Source endpoints with the config's overrides applied */
  endpoints: SourceEndpoints;
  /** Requested scopes, already joined with the source's delimiter */
  scope: string;
  /** Wall-clock time in milliseconds, for providers that sign timestamps */
  now: number;
};

export type AuthorizeInput = {
  state: string;
  /** OAuth 1.0a temporary token returned by the request-token step */
  oauthToken?: string;
};

export type AuthorizeTemplate = {
  endpoint: string;
  params: Record<string, string>;
  /** URL fragment without `#`, e.g. `wechat_redirect` */
  fragment?: string;
};

/**
 * What the token step knows about the attempt being completed.
 */
export type ExchangeInput = {
  callback: AuthCallback;
  code: string;
  /** OAuth 1.0a temporary credentials recovered from the cache */
  oauthToken?: string;
  oauthTokenSecret?: string;
};

/**
 * Provider-reported failure found inside an otherwise successful response.
 */
export type ProviderFailure = {
  error: string;
  description?: string;
};

/**
 * Identity fields a source extracts from a profile payload.
 */
export type IdentityFields = {
  uuid?: string;
  username?: string;
  nickname?: string;
  avatar?: string;
  email?: string;
  mobile?: string;
  blog?: string;
  company?: string;
  location?: string;
  remark?: string;
  gender?: AuthGender;
};

export type TokenField = Exclude<keyof TokenResponse, 'extras'>;
export type IdentityField = keyof IdentityFields;

/**
 * Maps normalised token fields to dot paths in the provider's token response.
 */
export type TokenFieldMap = { accessToken: string } & Partial<
  Record<Exclude<TokenField, 'accessToken'>, string>
>;

/**
 * Maps identity fields to dot paths in the profile payload. A path starting
 * with `@token.` reads from the TokenResponse instead, e.g. `@token.openId`.
 */
export type IdentityFieldMap = { uuid: string } & Partial<
  Record<Exclude<IdentityField, 'uuid'>, string>
>;

/**
 * Flags that change how the state machine drives a source.
 */
export type SourceQuirks = {
  /**
   * No browser redirect precedes the code exchange (mini-program login), so
   * there is no authorize URL and callbacks carry no state.
   */
  stateless?: boolean;
  /** The token response already carries the identity; no profile call */
  identityInTokenResponse?: boolean;
  /** Gateway calls are signed with the client's RSA private key (SHA256withRSA) */
  signature?: 'rsa2';
};

/**
 * Pure description of one identity provider. Shared by every request for
 * that provider and never mutated.
 */
export interface SourceDescriptor {
  readonly name: string;
  readonly grant: GrantType;
  readonly endpoints: Readonly<SourceEndpoints>;
  readonly defaultScopes: readonly string[];
  readonly scopeDelimiter: string;
  readonly quirks: Readonly<SourceQuirks>;
  /** Mapping tables, exposed for table-driven verification */
  readonly tokenFields: Readonly<TokenFieldMap>;
  readonly identityFields: Readonly<IdentityFieldMap>;
  /** Path of the record `identityFields` apply to inside the profile payload */
  readonly profileRoot?: string;

  authorizeUrl(ctx: SourceContext, input: AuthorizeInput): AuthorizeTemplate;
  tokenRequest(ctx: SourceContext, input: ExchangeInput): HttpRequestDescriptor;
  parseTokenResponse(raw: Record<string, unknown>): TokenResponse;
  profileRequest?(
    ctx: SourceContext,
    token: TokenResponse
  ): HttpRequestDescriptor;
  parseProfileResponse(
    raw: Record<string, unknown>,
    token: TokenResponse
  ): IdentityFields;
  detectError(raw: Record<string, unknown>): ProviderFailure | undefined;

  /** OAuth 1.0a: obtain temporary credentials before redirecting */
  requestTokenRequest?(
    ctx: SourceContext,
    callbackUrl: string
  ): HttpRequestDescriptor;
  /** Follow-up call that completes the token, e.g. QQ's openid lookup */
  augmentToken?: TokenAugmentation;
  refreshRequest?(
    ctx: SourceContext,
    refreshToken: string
  ): HttpRequestDescriptor;
  revokeRequest?(ctx: SourceContext, token: TokenResponse): HttpRequestDescriptor;
}

/**
 * A second call made right after the code exchange. `input` is the exchange
 * the token came from, for providers that resolve the user from the code.
 */
export interface TokenAugmentation {
  request(
    ctx: SourceContext,
    token: TokenResponse,
    input: ExchangeInput
  ): HttpRequestDescriptor;
  apply(raw: Record<string, unknown>, token: TokenResponse): TokenResponse;
}
