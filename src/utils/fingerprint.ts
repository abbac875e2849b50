/**
 * Canonical serialization used as the pool cache key
 */

const canonicalize = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object' && value !== null) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const entry: unknown = Reflect.get(value, key);
      if (entry !== undefined) {
        sorted[key] = canonicalize(entry);
      }
    }
    return sorted;
  }
  return value;
};

/**
 * Stable JSON encoding: keys sorted at every depth, undefined entries dropped.
 * Two configs share a fingerprint iff they describe the same connection.
 */
export const fingerprint = (value: object): string => JSON.stringify(canonicalize(value));
