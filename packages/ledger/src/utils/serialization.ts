/**
 * JSON helpers for bigint-heavy ledger values.
 */

export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Round-trip a value through JSON so every bigint becomes a decimal string.
 */
export function toJsonSafe(value: unknown): unknown {
  return JSON.parse(JSON.stringify(value, bigintReplacer));
}
