import type {
  AuthConfig,
  ConfigResolver,
  NormalizedIdentity,
  TokenResponse,
} from './types.js';
import type { CacheStore } from './cache/types.js';
import type { HttpTransport } from './http/types.js';
import type { Logger } from './logging/types.js';
import type { CallbackParams } from './callback.js';
import type { AuthRequest, CallOptions, PhaseListener } from './auth-request.js';
import { buildAuthRequest, type BuildAuthRequestOptions } from './builder.js';
import { SourceRegistry, type SourceExtension } from './registry.js';

export interface OAuthClientOptions {
  /** Used whenever a call passes no config */
  config?: ConfigResolver;
  cacheStore?: CacheStore;
  registry?: SourceRegistry;
  /** Custom sources added on top of the registry */
  sources?: SourceExtension;
  transport?: HttpTransport;
  logger?: Logger;
  timeoutMs?: number;
  stateTtlSeconds?: number;
  onPhaseChange?: PhaseListener;
}

/**
 * One entry point for every provider. Each call builds a fresh AuthRequest,
 * so a client can be shared across requests and tenants.
 *
 * @example
 * const client = new OAuthClient({ config: fromEnvironment() });
 * const url = await client.authorize('github');
 * // ... later, in the callback handler
 * const identity = await client.login('github', undefined, req.query);
 */
export class OAuthClient {
  public readonly registry: SourceRegistry;
  private readonly options: OAuthClientOptions;

  constructor(options: OAuthClientOptions = {}) {
    this.options = options;
    const registry = options.registry ?? SourceRegistry.withBuiltins();
    this.registry = options.sources ? registry.extend(options.sources) : registry;
  }

  /**
   * Bind a provider key to an AuthRequest. An explicit `config` wins over
   * the client's resolver.
   */
  request(providerKey: string, config?: AuthConfig | ConfigResolver): AuthRequest {
    const build: BuildAuthRequestOptions = {
      source: providerKey,
      registry: this.registry,
    };
    const resolved = config ?? this.options.config;
    if (resolved) build.config = resolved;
    if (this.options.cacheStore) build.cacheStore = this.options.cacheStore;
    if (this.options.transport) build.transport = this.options.transport;
    if (this.options.logger) build.logger = this.options.logger;
    if (this.options.timeoutMs !== undefined) {
      build.timeoutMs = this.options.timeoutMs;
    }
    if (this.options.stateTtlSeconds !== undefined) {
      build.stateTtlSeconds = this.options.stateTtlSeconds;
    }
    if (this.options.onPhaseChange) {
      build.onPhaseChange = this.options.onPhaseChange;
    }
    return buildAuthRequest(build);
  }

  async authorize(
    providerKey: string,
    config?: AuthConfig,
    callerState?: string,
    options?: CallOptions
  ): Promise<string> {
    return this.request(providerKey, config).authorize(callerState, options);
  }

  async login(
    providerKey: string,
    config: AuthConfig | undefined,
    callbackParams: CallbackParams,
    options?: CallOptions
  ): Promise<NormalizedIdentity> {
    return this.request(providerKey, config).login(callbackParams, options);
  }

  async refresh(
    providerKey: string,
    config: AuthConfig | undefined,
    refreshToken: string,
    options?: CallOptions
  ): Promise<TokenResponse> {
    return this.request(providerKey, config).refresh(refreshToken, options);
  }

  async revoke(
    providerKey: string,
    config: AuthConfig | undefined,
    accessToken: string,
    options?: CallOptions
  ): Promise<void> {
    return this.request(providerKey, config).revoke(accessToken, options);
  }
}
