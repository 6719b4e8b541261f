/**
 * Lookups on records keyed by text from the book.
 *
 * Names such as "constructor" or "toString" are ordinary keys here, so
 * reads must never fall through to Object.prototype, and "__proto__" is
 * never stored, since assigning it replaces the prototype instead.
 */

export function getOwn<V>(record: Record<string, V>, key: string): V | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

export function hasOwn(record: object, key: string): boolean {
  return Object.hasOwn(record, key);
}

export function isStorableKey(key: string): boolean {
  return key !== '__proto__';
}
