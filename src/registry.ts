import type { SourceDescriptor } from './sources/types.js';
import { BUILTIN_SOURCES } from './sources/providers/index.js';
import { createStandardError } from './utils/error-normalizer.js';
import { isRecord } from './utils/guards.js';

/**
 * Custom sources: a list registered under their own names, or a record
 * registering each descriptor under its key.
 */
export type SourceExtension =
  | Iterable<SourceDescriptor>
  | Readonly<Record<string, SourceDescriptor>>;

function isIterable(
  value: SourceExtension
): value is Iterable<SourceDescriptor> {
  return typeof Reflect.get(value, Symbol.iterator) === 'function';
}

export function normalizeSourceKey(key: string): string {
  return key.trim().toLowerCase();
}

/**
 * Structural check for values handed to the registry at run time.
 */
export function isSourceDescriptor(value: unknown): value is SourceDescriptor {
  return (
    isRecord(value) &&
    typeof value.name === 'string' &&
    value.name.length > 0 &&
    (value.grant === 'authorization_code' || value.grant === 'oauth1a') &&
    isRecord(value.endpoints) &&
    typeof value.authorizeUrl === 'function' &&
    typeof value.tokenRequest === 'function' &&
    typeof value.parseTokenResponse === 'function' &&
    typeof value.parseProfileResponse === 'function' &&
    typeof value.detectError === 'function'
  );
}

/**
 * Maps source keys to descriptors. Keys are case-insensitive.
 */
export class SourceRegistry {
  private readonly sources = new Map<string, SourceDescriptor>();

  constructor(sources: SourceExtension = []) {
    this.registerAll(sources);
  }

  /**
   * A registry holding every built-in source.
   */
  static withBuiltins(): SourceRegistry {
    return new SourceRegistry(BUILTIN_SOURCES);
  }

  /**
   * Add or replace a source, under `key` or its own name.
   * @throws TypeError when the value is not a source descriptor
   */
  register(source: SourceDescriptor, key: string = source.name): this {
    if (!isSourceDescriptor(source)) {
      throw new TypeError(`Cannot register "${key}": not a source descriptor`);
    }
    this.sources.set(normalizeSourceKey(key), source);
    return this;
  }

  /**
   * @throws {AuthError} `UnknownSource` when nothing is registered under `key`
   */
  get(key: string): SourceDescriptor {
    const source = this.sources.get(normalizeSourceKey(key));
    if (!source) {
      throw createStandardError(
        'UnknownSource',
        'invalid_request',
        `No source registered for "${key}"`,
        { source: key },
        404
      );
    }
    return source;
  }

  has(key: string): boolean {
    return this.sources.has(normalizeSourceKey(key));
  }

  keys(): string[] {
    return [...this.sources.keys()];
  }

  /**
   * A new registry with this one's sources plus `sources`; this registry is
   * left unchanged.
   */
  extend(sources: SourceExtension): SourceRegistry {
    const extended = new SourceRegistry();
    for (const [key, source] of this.sources) {
      extended.sources.set(key, source);
    }
    return extended.registerAll(sources);
  }

  private registerAll(sources: SourceExtension): this {
    if (isIterable(sources)) {
      for (const source of sources) {
        this.register(source);
      }
    } else {
      for (const [key, source] of Object.entries(sources)) {
        this.register(source, key);
      }
    }
    return this;
  }
}
