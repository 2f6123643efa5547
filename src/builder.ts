import { z } from 'zod';
import type { AuthConfig, ConfigResolver } from './types.js';
import type { CacheStore } from './cache/types.js';
import { getDefaultCacheStore } from './cache/default-store.js';
import type { HttpTransport } from './http/types.js';
import type { Logger } from './logging/types.js';
import type { SourceDescriptor } from './sources/types.js';
import {
  SourceRegistry,
  isSourceDescriptor,
  type SourceExtension,
} from './registry.js';
import {
  AuthRequest,
  type AuthRequestOptions,
  type PhaseListener,
} from './auth-request.js';
import { AuthError } from './errors.js';
import { formatIssues, safeValidate } from './config/schema.js';
import { createStandardError } from './utils/error-normalizer.js';
import { isRecord } from './utils/guards.js';

/**
 * Everything `buildAuthRequest` recognises.
 */
export interface BuildAuthRequestOptions {
  /** A registry key such as `github`, or a descriptor */
  source: string | SourceDescriptor;
  /** A static config, or a resolver called with the source key */
  config?: AuthConfig | ConfigResolver;
  /** Defaults to the process-wide default store */
  cacheStore?: CacheStore;
  /** Defaults to {@link SourceRegistry.withBuiltins} */
  registry?: SourceRegistry;
  extendSources?: SourceExtension;
  transport?: HttpTransport;
  logger?: Logger;
  timeoutMs?: number;
  stateTtlSeconds?: number;
  onPhaseChange?: PhaseListener;
  now?: () => number;
}

function isFunction(value: unknown): boolean {
  return typeof value === 'function';
}

function isConfigResolver(value: unknown): value is ConfigResolver {
  return typeof value === 'function';
}

function hasMethods(...names: string[]): (value: unknown) => boolean {
  return (value) =>
    isRecord(value) && names.every((name) => typeof value[name] === 'function');
}

const BuildOptionsSchema = z.object({
  source: z.union([
    z.string().trim().min(1, 'source key is required'),
    z.custom<SourceDescriptor>(isSourceDescriptor, 'Invalid source descriptor'),
  ]),
  config: z
    .union([
      z.custom<ConfigResolver>(isConfigResolver),
      z.record(z.string(), z.unknown()),
    ])
    .optional(),
  cacheStore: z
    .custom<CacheStore>(
      hasMethods('get', 'set', 'delete', 'clear'),
      'cacheStore must implement get, set, delete and clear'
    )
    .optional(),
  registry: z
    .custom<SourceRegistry>((value) => value instanceof SourceRegistry)
    .optional(),
  extendSources: z
    .custom<SourceExtension>(
      (value) => typeof value === 'object' && value !== null
    )
    .optional(),
  transport: z
    .custom<HttpTransport>(hasMethods('send'), 'transport must implement send')
    .optional(),
  logger: z
    .custom<Logger>(hasMethods('info', 'error', 'child'), 'Invalid logger')
    .optional(),
  timeoutMs: z.number().int().positive().optional(),
  stateTtlSeconds: z.number().int().positive().optional(),
  onPhaseChange: z.custom<PhaseListener>(isFunction).optional(),
  now: z.custom<() => number>(isFunction).optional(),
});

function resolutionFailed(description: string, source?: string): AuthError {
  return createStandardError(
    'ConfigResolutionFailed',
    'invalid_request',
    description,
    source === undefined ? {} : { source }
  );
}

/**
 * Resolve a source and its config and bind them to an AuthRequest. Fails
 * before any network call when either cannot be resolved.
 *
 * @throws {AuthError} `UnknownSource` for an unregistered key,
 * `ConfigResolutionFailed` for invalid options, a throwing resolver or an
 * invalid config
 */
export function buildAuthRequest(options: BuildAuthRequestOptions): AuthRequest {
  const parsed = BuildOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw resolutionFailed(
      `Invalid build options: ${formatIssues(parsed.error)}`
    );
  }
  const opts = parsed.data;

  let registry = opts.registry ?? SourceRegistry.withBuiltins();
  if (opts.extendSources) {
    registry = registry.extend(opts.extendSources);
  }
  const sourceKey = typeof opts.source === 'string' ? opts.source : opts.source.name;
  const source =
    typeof opts.source === 'string' ? registry.get(opts.source) : opts.source;

  const config = resolveConfig(opts.config, sourceKey, source.name);

  const requestOptions: AuthRequestOptions = {
    source,
    config,
    cacheStore: opts.cacheStore ?? getDefaultCacheStore(),
  };
  if (opts.transport) requestOptions.transport = opts.transport;
  if (opts.logger) requestOptions.logger = opts.logger;
  if (opts.timeoutMs !== undefined) requestOptions.timeoutMs = opts.timeoutMs;
  if (opts.stateTtlSeconds !== undefined) {
    requestOptions.stateTtlSeconds = opts.stateTtlSeconds;
  }
  if (opts.onPhaseChange) requestOptions.onPhaseChange = opts.onPhaseChange;
  if (opts.now) requestOptions.now = opts.now;

  const request = new AuthRequest(requestOptions);
  request.logger.debug('AuthRequest built', {
    stage: 'build',
    grant: source.grant,
    customCacheStore: Boolean(opts.cacheStore),
  });
  return request;
}

function resolveConfig(
  input: ConfigResolver | Record<string, unknown> | undefined,
  sourceKey: string,
  sourceName: string
): AuthConfig {
  if (input === undefined) {
    throw resolutionFailed(
      `No config or config resolver supplied for ${sourceKey}`,
      sourceName
    );
  }

  let candidate: unknown = input;
  if (isConfigResolver(input)) {
    try {
      candidate = input(sourceKey);
    } catch (error) {
      throw new AuthError(
        {
          kind: 'ConfigResolutionFailed',
          statusCode: 400,
          error: 'invalid_request',
          error_description: `Config resolver failed for ${sourceKey}: ${
            error instanceof Error ? error.message : String(error)
          }`,
          source: sourceName,
        },
        { cause: error }
      );
    }
  }

  const result = safeValidate(candidate);
  if (!result.success || !result.data) {
    throw resolutionFailed(
      `Invalid config for ${sourceKey}${
        result.error ? `: ${formatIssues(result.error)}` : ''
      }`,
      sourceName
    );
  }
  return result.data;
}
