/**
 * Canonical JSON encoding for deterministic hashing.
 * Object keys are sorted, `undefined` members are dropped and no
 * whitespace is emitted, so equal values always encode to equal strings.
 */
export function canonicalEncode(value: unknown): string {
  return JSON.stringify(value, (_key, current: unknown) => {
    if (isPlainRecord(current)) {
      const sorted: Record<string, unknown> = {};
      for (const key of Object.keys(current).sort()) {
        if (current[key] !== undefined) {
          sorted[key] = current[key];
        }
      }
      return sorted;
    }
    return current;
  });
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
