import { isRecord } from '../utils/guards.js';

export const DEFAULT_REDACTION = '[redacted]';

const arrayPathExpr = /^\d+(\.|$)/;

function getNestedPaths(paths: string[], prefix: string): string[] {
  const nested: string[] = [];
  for (const path of paths) {
    if (path.startsWith(prefix + '.')) {
      nested.push(path.substring(prefix.length + 1));
    } else if (path.startsWith('*.')) {
      // a wildcard segment matches any key at this depth and stays active below it
      nested.push(path.substring(2), path);
    }
  }
  return nested;
}

function getGeneralArrayPaths(paths: string[]): string[] {
  return paths.filter((path) => !arrayPathExpr.test(path));
}

function matches(pathSet: Set<string>, key: string): boolean {
  return pathSet.has(key) || pathSet.has('*');
}

/**
 * Replace values at the given dot paths with a placeholder, returning a copy.
 *
 * Paths follow the structure of the value:
 * - `['password']` redacts a top-level property
 * - `['user.email']` redacts a nested property
 * - `['items.0.secret']` redacts a property of one array element
 * - `['users.password']` redacts the property in every element of `users`
 * - `['*.access_token']` redacts `access_token` in every nested object
 *
 * Primitives, null and undefined are returned unchanged.
 */
export function redactValue(
  value: unknown,
  paths: string[],
  redaction = DEFAULT_REDACTION
): unknown {
  if (value === null || typeof value !== 'object' || paths.length === 0) {
    return value;
  }

  const pathSet = new Set(paths);

  if (Array.isArray(value)) {
    const generalPaths = getGeneralArrayPaths(paths);
    return value.map((item: unknown, index) => {
      const indexStr = index.toString();
      if (pathSet.has(indexStr)) {
        return redaction;
      }
      return redactValue(
        item,
        [...getNestedPaths(paths, indexStr), ...generalPaths],
        redaction
      );
    });
  }

  if (!isRecord(value)) {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = matches(pathSet, key)
      ? redaction
      : redactValue(entry, getNestedPaths(paths, key), redaction);
  }
  return result;
}

/**
 * Redact a log metadata record. Undefined metadata becomes an empty record.
 */
export function redact(
  meta: Record<string, unknown> | undefined,
  paths: string[],
  redaction = DEFAULT_REDACTION
): Record<string, unknown> {
  if (meta === undefined) {
    return {};
  }
  const redacted = redactValue(meta, paths, redaction);
  return isRecord(redacted) ? redacted : {};
}
