/**
 * Own-property access for name-keyed records. Target and property names come
 * from files, so `__proto__` or `constructor` must behave like any other key.
 */

export function setEntry<T>(record: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(record, key, { value, enumerable: true, writable: true, configurable: true });
}

export function getEntry<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}
