/**
 * Deterministic JSON with sorted object keys.
 *
 * Used for audit entry hashes and snapshot checksums, so equal content
 * always hashes the same regardless of key insertion order. Undefined
 * object members are dropped; array order is kept.
 */
export function canonicalize(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null'
  }

  if (Array.isArray(value)) {
    return '[' + value.map((el) => canonicalize(el)).join(',') + ']'
  }

  if (typeof value === 'object') {
    const members: Array<[string, unknown]> = Object.entries(value)
    const pairs = members
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => JSON.stringify(k) + ':' + canonicalize(v))
    return '{' + pairs.join(',') + '}'
  }

  return JSON.stringify(value)
}
