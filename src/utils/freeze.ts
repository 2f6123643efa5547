/**
 * Recursively freeze a plain object graph. Functions are left as they are.
 */
export function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const nested: unknown = Reflect.get(value, key);
    if (
      nested !== null &&
      typeof nested === 'object' &&
      !Object.isFrozen(nested)
    ) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}
