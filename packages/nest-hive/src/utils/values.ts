export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

/**
 * String form used for artifact data, tags and template arguments.
 * Absent values become `''`; lists and objects are JSON-encoded.
 */
export function stringifyValue(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }

  if (typeof value === 'string') {
    return value;
  }

  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }

  return JSON.stringify(value) ?? '';
}

/** `true` for values that carry something: not null, not `''`, not an empty list. */
export function hasContent(value: unknown): boolean {
  if (value === null || value === undefined || value === '') {
    return false;
  }
  return !(Array.isArray(value) && value.length === 0);
}
