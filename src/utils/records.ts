/**
 * Control ids and service names are arbitrary strings, so plain-object lookups
 * must ignore `Object.prototype` (`constructor`, `toString`, `__proto__`, ...).
 */
export function ownValue<T>(record: Readonly<Record<string, T>> | undefined, key: string): T | undefined {
  return record && Object.hasOwn(record, key) ? record[key] : undefined
}

