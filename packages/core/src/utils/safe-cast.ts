/**
 * Narrow values read back from the graph or from parsed YAML without `as`
 * assertions. Each helper returns the fallback when given one, and throws a
 * TypeError otherwise.
 */

export function safeString(value: unknown, fallback?: string): string {
  if (typeof value === 'string') {
    return value;
  }
  if (fallback !== undefined) {
    return fallback;
  }
  throw new TypeError(`Expected string, got ${describeValue(value)}`);
}

/**
 * Finite numbers pass through. Numeric strings are accepted too, since the
 * executor turns integers outside the safe range into strings.
 */
export function safeNumber(value: unknown, fallback?: number): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  if (fallback !== undefined) {
    return fallback;
  }
  throw new TypeError(`Expected number, got ${describeValue(value)}`);
}

export function safeRecord(
  value: unknown,
  fallback?: Record<string, unknown>,
): Record<string, unknown> {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    // eslint-disable-next-line @typescript-eslint/consistent-type-assertions -- Runtime guard validates non-null, non-array object
    return value as Record<string, unknown>;
  }
  if (fallback !== undefined) {
    return fallback;
  }
  throw new TypeError(`Expected record (object), got ${describeValue(value)}`);
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
