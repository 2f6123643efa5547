import { randomState } from 'openid-client';
import type {
  AuthCallback,
  AuthConfig,
  AuthErrorKind,
  NormalizedIdentity,
  TokenResponse,
} from './types.js';
import type { CacheStore } from './cache/types.js';
import { takeFromCache } from './cache/types.js';
import type {
  HttpRequestDescriptor,
  HttpResponse,
  HttpTransport,
} from './http/types.js';
import { decodeBody } from './http/codec.js';
import { FetchTransport } from './http/fetch-transport.js';
import type {
  AuthorizeTemplate,
  ExchangeInput,
  SourceContext,
  SourceDescriptor,
  SourceEndpoints,
} from './sources/types.js';
import { signOAuth1Request } from './sources/oauth1.js';
import {
  AuthPhase,
  DEFAULT_STATE_TTL_SECONDS,
  canTransition,
  isTerminalPhase,
  oauth1TokenKey,
  parseAuthState,
  serializeAuthState,
  stateKey,
  type AuthState,
} from './auth-state.js';
import { normalizeCallback, type CallbackParams } from './callback.js';
import { AuthError } from './errors.js';
import {
  ErrorNormalizer,
  createStandardError,
} from './utils/error-normalizer.js';
import { asString } from './utils/guards.js';
import { withTimeout } from './utils/timeout.js';
import type { AuthStage, Logger } from './logging/types.js';
import { DefaultLogger } from './logging/logger.js';

export const DEFAULT_TIMEOUT_MS = 10_000;

const AUTH_REDACTION_PATHS = [
  'clientSecret',
  'accessToken',
  'refreshToken',
  'tokenSecret',
  'oauthTokenSecret',
  'code',
  'oauth_verifier',
  'config.clientSecret',
  '*.access_token',
  '*.refresh_token',
  '*.oauth_token_secret',
  '*.session_key',
];

const ENDPOINT_KEYS = [
  'authorize',
  'token',
  'profile',
  'refresh',
  'revoke',
  'requestToken',
] as const;

export type { AuthStage };

/**
 * The attempt a phase change belongs to.
 */
export type AttemptInfo = {
  source: string;
  operation: 'authorize' | 'login';
  state?: string;
};

export type PhaseListener = (
  from: AuthPhase,
  to: AuthPhase,
  attempt: AttemptInfo
) => void;

export interface AuthRequestOptions {
  source: SourceDescriptor;
  config: AuthConfig;
  cacheStore: CacheStore;
  transport?: HttpTransport;
  logger?: Logger;
  /** Deadline for each public call; defaults to {@link DEFAULT_TIMEOUT_MS} */
  timeoutMs?: number;
  stateTtlSeconds?: number;
  onPhaseChange?: PhaseListener;
  /** Clock in milliseconds, for state timestamps and signed requests */
  now?: () => number;
}

export interface CallOptions {
  timeoutMs?: number;
}

/**
 * Tracks the phase of one `authorize` or `login` call.
 */
class Attempt {
  public phase: AuthPhase;
  public stage: AuthStage;

  constructor(
    public readonly info: AttemptInfo,
    initial: AuthPhase,
    stage: AuthStage,
    private readonly listener?: PhaseListener
  ) {
    this.phase = initial;
    this.stage = stage;
  }

  advance(to: AuthPhase): void {
    if (!canTransition(this.phase, to)) {
      throw new Error(`Invalid auth phase transition ${this.phase} -> ${to}`);
    }
    const from = this.phase;
    this.phase = to;
    this.listener?.(from, to, this.info);
  }

  fail(): void {
    if (!isTerminalPhase(this.phase)) {
      this.advance(AuthPhase.Failed);
    }
  }
}

/**
 * Render a source's authorize template as a URL.
 */
export function renderAuthorizeUrl(template: AuthorizeTemplate): string {
  const url = new URL(template.endpoint);
  for (const [key, value] of Object.entries(template.params)) {
    url.searchParams.set(key, value);
  }
  if (template.fragment) {
    url.hash = template.fragment;
  }
  return url.toString();
}

/**
 * Drives one source through authorize, state validation, code exchange and
 * profile fetch. Holds no per-attempt state: pending attempts live in the
 * CacheStore, so one instance can serve concurrent callers.
 */
export class AuthRequest {
  public readonly source: SourceDescriptor;
  public readonly config: AuthConfig;

  private readonly cacheStore: CacheStore;
  private readonly transport: HttpTransport;
  private readonly timeoutMs: number;
  private readonly stateTtlSeconds: number;
  private readonly onPhaseChange: PhaseListener | undefined;
  private readonly now: () => number;

  /**
   * Stores our lazily instantiated implementation of Logger.
   */
  private loggerImpl?: Logger;

  constructor(options: AuthRequestOptions) {
    this.source = options.source;
    this.config = options.config;
    this.cacheStore = options.cacheStore;
    this.transport = options.transport ?? new FetchTransport();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.stateTtlSeconds = options.stateTtlSeconds ?? DEFAULT_STATE_TTL_SECONDS;
    this.onPhaseChange = options.onPhaseChange;
    this.now = options.now ?? Date.now;
    if (options.logger) {
      this.loggerImpl = options.logger;
    }
  }

  public get logger(): Logger {
    if (this.loggerImpl === undefined) {
      this.loggerImpl = DefaultLogger.fromEnvironment(
        { source: this.source.name, clientId: this.config.clientId },
        { redactPaths: AUTH_REDACTION_PATHS }
      );
    }
    return this.loggerImpl;
  }

  /**
   * Start an authorization attempt and return the provider URL to redirect
   * the user to.
   *
   * @param state - Caller-supplied state; a random one is generated when omitted or empty
   * @throws {AuthError} `NotSupported` for stateless sources, `TokenExchangeFailed`
   * when the OAuth 1.0a request-token call fails, `CacheFailure`, `Timeout`, or
   * `ConfigResolutionFailed` when the source renders an unusable URL
   */
  public async authorize(
    state?: string,
    options: CallOptions = {}
  ): Promise<string> {
    if (this.source.quirks.stateless) {
      throw createStandardError(
        'NotSupported',
        'unsupported_response_type',
        `${this.source.name} has no authorization redirect`,
        { source: this.source.name }
      );
    }

    const attemptState = state || randomState();
    const attempt = new Attempt(
      { source: this.source.name, operation: 'authorize', state: attemptState },
      AuthPhase.Created,
      'authorize',
      this.onPhaseChange
    );

    try {
      attempt.advance(AuthPhase.Authorizing);
      this.logger.info('Generating authorization URL', {
        stage: 'authorize',
        grant: this.source.grant,
      });

      const url = await withTimeout(
        (signal) => this.runAuthorize(attemptState, attempt, signal),
        options.timeoutMs ?? this.timeoutMs,
        `${this.source.name} authorize`
      );

      this.logger.info('Authorization URL generated successfully', {
        stage: 'authorize',
        ttlSeconds: this.stateTtlSeconds,
      });
      return url;
    } catch (error) {
      throw this.fail(attempt, error, 'ConfigResolutionFailed');
    }
  }

  /**
   * Complete an attempt from the provider's callback parameters.
   *
   * The pending state is consumed before anything else, so a replayed,
   * expired or forged callback fails with `StateMismatch` without any
   * network call.
   *
   * @throws {AuthError} `StateMismatch`, `TokenExchangeFailed`,
   * `ProfileFetchFailed`, `CacheFailure` or `Timeout`
   */
  public async login(
    params: CallbackParams,
    options: CallOptions = {}
  ): Promise<NormalizedIdentity> {
    const callback = normalizeCallback(params);
    const info: AttemptInfo = { source: this.source.name, operation: 'login' };
    if (callback.state !== undefined) info.state = callback.state;
    const attempt = new Attempt(
      info,
      AuthPhase.Authorizing,
      'validateState',
      this.onPhaseChange
    );

    try {
      const identity = await withTimeout(
        (signal) => this.runLogin(callback, attempt, signal),
        options.timeoutMs ?? this.timeoutMs,
        `${this.source.name} login`
      );

      this.logger.info('Login completed successfully', {
        stage: 'fetchProfile',
        uuid: identity.uuid,
        hasRefreshToken: Boolean(identity.token.refreshToken),
      });
      return identity;
    } catch (error) {
      throw this.fail(attempt, error, 'TokenExchangeFailed');
    }
  }

  /**
   * Exchange a refresh token for a new token set. When the provider omits a
   * new refresh token the one passed in is carried over.
   *
   * @throws {AuthError} `NotSupported` when the source has no refresh endpoint
   */
  public async refresh(
    refreshToken: string,
    options: CallOptions = {}
  ): Promise<TokenResponse> {
    const build = this.source.refreshRequest;
    if (!build) {
      throw createStandardError(
        'NotSupported',
        'unsupported_grant_type',
        `${this.source.name} does not support token refresh`,
        { source: this.source.name }
      );
    }

    try {
      this.logger.info('Refreshing access token', { stage: 'refreshToken' });
      const token = await withTimeout(
        async (signal) => {
          const request = build.call(this.source, this.context(), refreshToken);
          const raw = await this.callProvider(
            request,
            signal,
            'TokenExchangeFailed'
          );
          return this.parseToken(raw, request.url);
        },
        options.timeoutMs ?? this.timeoutMs,
        `${this.source.name} refresh`
      );
      if (token.refreshToken === undefined) {
        token.refreshToken = refreshToken;
      }

      this.logger.info('Token refresh completed successfully', {
        stage: 'refreshToken',
        expiresIn: token.expiresIn,
      });
      return token;
    } catch (error) {
      const normalized = ErrorNormalizer.normalizeError(
        error,
        'TokenExchangeFailed',
        { source: this.source.name }
      );
      this.logFailure('Token refresh failed', 'refreshToken', normalized);
      throw normalized;
    }
  }

  /**
   * Revoke an access token at the provider.
   *
   * @throws {AuthError} `NotSupported` when the source has no revoke endpoint
   */
  public async revoke(
    accessToken: string,
    options: CallOptions = {}
  ): Promise<void> {
    const build = this.source.revokeRequest;
    if (!build) {
      throw createStandardError(
        'NotSupported',
        'unsupported_token_type',
        `${this.source.name} does not support token revocation`,
        { source: this.source.name }
      );
    }

    try {
      this.logger.info('Revoking access token', { stage: 'revokeToken' });
      await withTimeout(
        async (signal) => {
          const request = build.call(this.source, this.context(), {
            accessToken,
          });
          const response = await this.send(request, signal, 'TokenExchangeFailed');
          const body = this.tryDecode(response, request);
          const failure = body ? this.source.detectError(body) : undefined;
          if (!this.isSuccess(response) || failure) {
            throw this.providerError(
              'TokenExchangeFailed',
              request,
              response,
              failure?.error,
              failure?.description
            );
          }
        },
        options.timeoutMs ?? this.timeoutMs,
        `${this.source.name} revoke`
      );
      this.logger.info('Token revoked', { stage: 'revokeToken' });
    } catch (error) {
      const normalized = ErrorNormalizer.normalizeError(
        error,
        'TokenExchangeFailed',
        { source: this.source.name }
      );
      this.logFailure('Token revocation failed', 'revokeToken', normalized);
      throw normalized;
    }
  }

  private async runAuthorize(
    state: string,
    attempt: Attempt,
    signal: AbortSignal
  ): Promise<string> {
    const ctx = this.context();
    const record: AuthState = {
      state,
      source: this.source.name,
      createdAt: ctx.now,
    };

    if (this.source.grant === 'oauth1a') {
      attempt.stage = 'requestToken';
      const temporary = await this.requestTemporaryCredentials(ctx, state, signal);
      record.oauthToken = temporary.oauthToken;
      record.oauthTokenSecret = temporary.oauthTokenSecret;
      attempt.stage = 'authorize';
    }

    await this.cacheCall(() =>
      this.cacheStore.set(
        stateKey(state),
        serializeAuthState(record),
        this.stateTtlSeconds
      )
    );
    const oauthToken = record.oauthToken;
    if (oauthToken !== undefined) {
      await this.cacheCall(() =>
        this.cacheStore.set(
          oauth1TokenKey(oauthToken),
          state,
          this.stateTtlSeconds
        )
      );
    }

    const template = this.source.authorizeUrl(
      ctx,
      oauthToken === undefined ? { state } : { state, oauthToken }
    );
    return renderAuthorizeUrl(template);
  }

  /**
   * OAuth 1.0a step one: the oauth_callback is the redirect URI with our
   * state appended, so the callback can be bound to the attempt.
   */
  private async requestTemporaryCredentials(
    ctx: SourceContext,
    state: string,
    signal: AbortSignal
  ): Promise<{ oauthToken: string; oauthTokenSecret: string }> {
    const build = this.source.requestTokenRequest;
    if (!build || !ctx.endpoints.requestToken) {
      throw createStandardError(
        'NotSupported',
        'invalid_request',
        `${this.source.name} has no request-token endpoint`,
        { source: this.source.name }
      );
    }

    let callbackUrl = 'oob';
    if (this.config.redirectUri) {
      const url = new URL(this.config.redirectUri);
      url.searchParams.set('state', state);
      callbackUrl = url.toString();
    }

    this.logger.info('Requesting temporary credentials', {
      stage: 'requestToken',
      endpoint: ctx.endpoints.requestToken,
    });
    const request = build.call(this.source, ctx, callbackUrl);
    const raw = await this.callProvider(request, signal, 'TokenExchangeFailed');
    const oauthToken = asString(raw.oauth_token);
    const oauthTokenSecret = asString(raw.oauth_token_secret);
    if (oauthToken === undefined || oauthTokenSecret === undefined) {
      throw createStandardError(
        'TokenExchangeFailed',
        'invalid_response',
        'Request-token response lacks oauth_token or oauth_token_secret',
        { endpoint: request.url, source: this.source.name },
        502
      );
    }
    return { oauthToken, oauthTokenSecret };
  }

  private async runLogin(
    callback: AuthCallback,
    attempt: Attempt,
    signal: AbortSignal
  ): Promise<NormalizedIdentity> {
    const stored = await this.consumeState(callback);
    attempt.advance(AuthPhase.Validated);

    if (callback.error !== undefined) {
      throw createStandardError(
        'TokenExchangeFailed',
        callback.error,
        callback.error_description ?? 'The provider reported an authorization error',
        { source: this.source.name }
      );
    }
    const oauth1 = this.source.grant === 'oauth1a';
    const code = oauth1 ? callback.oauth_verifier : callback.code;
    if (code === undefined) {
      throw createStandardError(
        'TokenExchangeFailed',
        'invalid_request',
        oauth1
          ? 'Callback is missing oauth_verifier'
          : 'Callback is missing the authorization code',
        { source: this.source.name }
      );
    }

    const ctx = this.context();
    const input: ExchangeInput = { callback, code };
    if (stored?.oauthToken !== undefined) input.oauthToken = stored.oauthToken;
    if (stored?.oauthTokenSecret !== undefined) {
      input.oauthTokenSecret = stored.oauthTokenSecret;
    }

    attempt.stage = 'exchangeCode';
    this.logger.info('Exchanging authorization code for tokens', {
      stage: 'exchangeCode',
      endpoint: ctx.endpoints.token,
    });
    const tokenRequest = this.source.tokenRequest(ctx, input);
    const tokenRaw = await this.callProvider(
      tokenRequest,
      signal,
      'TokenExchangeFailed'
    );
    let token = this.parseToken(tokenRaw, tokenRequest.url);

    const augmentation = this.source.augmentToken;
    if (augmentation) {
      attempt.stage = 'augmentToken';
      const request = augmentation.request(ctx, token, input);
      const raw = await this.callProvider(request, signal, 'TokenExchangeFailed');
      token = augmentation.apply(raw, token);
    }
    attempt.advance(AuthPhase.Exchanged);

    attempt.stage = 'fetchProfile';
    let profileRaw = tokenRaw;
    let profileEndpoint = tokenRequest.url;
    const buildProfile = this.source.profileRequest;
    if (buildProfile && !this.source.quirks.identityInTokenResponse) {
      const request = buildProfile.call(this.source, ctx, token);
      profileEndpoint = request.url;
      this.logger.info('Fetching user profile', {
        stage: 'fetchProfile',
        endpoint: request.url,
      });
      profileRaw = await this.callProvider(request, signal, 'ProfileFetchFailed');
    }

    const fields = this.source.parseProfileResponse(profileRaw, token);
    if (fields.uuid === undefined) {
      throw createStandardError(
        'ProfileFetchFailed',
        'invalid_response',
        'Profile response lacks a user id',
        { endpoint: profileEndpoint, source: this.source.name },
        502
      );
    }

    const identity: NormalizedIdentity = {
      ...fields,
      source: this.source.name,
      uuid: fields.uuid,
      gender: fields.gender ?? 'unknown',
      token,
      rawUserInfo: profileRaw,
    };
    attempt.advance(AuthPhase.ProfileFetched);
    return identity;
  }

  /**
   * Take the pending AuthState for a callback. The entry is gone afterwards
   * whatever the outcome.
   */
  private async consumeState(
    callback: AuthCallback
  ): Promise<AuthState | undefined> {
    const oauth1 = this.source.grant === 'oauth1a';
    let state = callback.state;
    const callbackToken = callback.oauth_token;

    if (state === undefined && oauth1 && callbackToken !== undefined) {
      state = await this.cacheCall(() =>
        takeFromCache(this.cacheStore, oauth1TokenKey(callbackToken))
      );
    }
    if (state === undefined) {
      if (this.source.quirks.stateless) {
        return undefined;
      }
      throw this.stateMismatch('Callback carries no state');
    }

    const key = stateKey(state);
    const record = parseAuthState(
      await this.cacheCall(() => takeFromCache(this.cacheStore, key))
    );
    if (!record) {
      throw this.stateMismatch('Unknown, expired or already used state');
    }

    const pendingToken = record.oauthToken;
    if (pendingToken !== undefined) {
      await this.cacheCall(() =>
        this.cacheStore.delete(oauth1TokenKey(pendingToken))
      );
    }
    if (record.source !== this.source.name || record.state !== state) {
      throw this.stateMismatch('State was issued for a different source');
    }
    if (oauth1 && pendingToken !== callbackToken) {
      throw this.stateMismatch('oauth_token does not match the pending request');
    }

    this.logger.debug('State validated', {
      stage: 'validateState',
      ageMs: this.now() - record.createdAt,
    });
    return record;
  }

  private context(): SourceContext {
    const endpoints: SourceEndpoints = { ...this.source.endpoints };
    const overrides = this.config.endpoints ?? {};
    for (const key of ENDPOINT_KEYS) {
      const url = overrides[key];
      if (url) endpoints[key] = url;
    }
    const scopes = this.config.scopes ?? this.source.defaultScopes;
    return {
      config: this.config,
      endpoints,
      scope: scopes.join(this.source.scopeDelimiter),
      now: this.now(),
    };
  }

  /**
   * Send a request and decode a successful, error-free body.
   */
  private async callProvider(
    request: HttpRequestDescriptor,
    signal: AbortSignal,
    kind: AuthErrorKind
  ): Promise<Record<string, unknown>> {
    const response = await this.send(request, signal, kind);
    const body = this.tryDecode(response, request);

    if (!this.isSuccess(response)) {
      const failure = body ? this.source.detectError(body) : undefined;
      throw this.providerError(
        kind,
        request,
        response,
        failure?.error,
        failure?.description
      );
    }
    if (!body) {
      throw createStandardError(
        kind,
        'invalid_response',
        'Provider response body could not be decoded',
        { endpoint: request.url, source: this.source.name },
        502
      );
    }
    const failure = this.source.detectError(body);
    if (failure) {
      throw createStandardError(
        kind,
        failure.error,
        failure.description ?? `Provider reported ${failure.error}`,
        { endpoint: request.url, source: this.source.name }
      );
    }
    return body;
  }

  private async send(
    request: HttpRequestDescriptor,
    signal: AbortSignal,
    kind: AuthErrorKind
  ): Promise<HttpResponse> {
    const outgoing = request.oauth1
      ? signOAuth1Request(
          request,
          { key: this.config.clientId, secret: this.config.clientSecret },
          { timestamp: Math.floor(this.now() / 1000) }
        )
      : request;
    try {
      return await this.transport.send(outgoing, { signal });
    } catch (error) {
      throw ErrorNormalizer.normalizeError(error, kind, {
        endpoint: request.url,
        source: this.source.name,
      });
    }
  }

  private tryDecode(
    response: HttpResponse,
    request: HttpRequestDescriptor
  ): Record<string, unknown> | undefined {
    if (response.body.trim() === '') return undefined;
    try {
      return decodeBody(response.body, request.responseFormat);
    } catch (error) {
      this.logger.debug('Response body could not be decoded', {
        endpoint: request.url,
        status: response.status,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  private isSuccess(response: HttpResponse): boolean {
    return response.status >= 200 && response.status < 300;
  }

  private providerError(
    kind: AuthErrorKind,
    request: HttpRequestDescriptor,
    response: HttpResponse,
    error?: string,
    description?: string
  ): AuthError {
    const status = this.isSuccess(response) ? 400 : response.status;
    return createStandardError(
      kind,
      error ?? ErrorNormalizer.mapStatusToOAuthError(status),
      description ??
        `Provider responded with ${response.status} ${response.statusText}`.trim(),
      { endpoint: request.url, source: this.source.name },
      status
    );
  }

  private parseToken(
    raw: Record<string, unknown>,
    endpoint: string
  ): TokenResponse {
    const token = this.source.parseTokenResponse(raw);
    if (!token.accessToken) {
      throw createStandardError(
        'TokenExchangeFailed',
        'invalid_response',
        'Token response lacks an access token',
        { endpoint, source: this.source.name },
        502
      );
    }
    return token;
  }

  private async cacheCall<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw ErrorNormalizer.normalizeError(error, 'CacheFailure', {
        source: this.source.name,
      });
    }
  }

  private stateMismatch(description: string): AuthError {
    return createStandardError('StateMismatch', 'invalid_state', description, {
      source: this.source.name,
    });
  }

  private fail(
    attempt: Attempt,
    error: unknown,
    fallback: AuthErrorKind
  ): AuthError {
    const normalized = ErrorNormalizer.normalizeError(error, fallback, {
      source: this.source.name,
    });
    attempt.fail();
    this.logFailure(
      attempt.info.operation === 'authorize'
        ? 'Failed to generate authorization URL'
        : 'Login failed',
      attempt.stage,
      normalized
    );
    return normalized;
  }

  private logFailure(message: string, stage: AuthStage, error: AuthError): void {
    this.logger.error(message, {
      stage,
      kind: error.kind,
      endpoint: error.endpoint,
      error: error.message,
    });
  }
}
