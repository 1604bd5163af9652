/**
 * Lookup by a caller-supplied key that ignores inherited members, so
 * names such as "constructor" or "__proto__" behave like any other key.
 */
export function ownValue<V>(record: Readonly<Record<string, V>>, key: string): V | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}
