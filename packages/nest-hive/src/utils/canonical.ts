/**
 * Serializes a JSON-compatible value with object keys sorted by code point and
 * no insignificant whitespace, so equal payloads always produce equal bodies.
 *
 * `undefined` object members are skipped; `undefined`, functions and symbols
 * inside arrays become `null`, as with `JSON.stringify`.
 */
export function canonicalJson(value: unknown): string {
  return serializeValue(value);
}

function serializeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }

  switch (typeof value) {
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      return Number.isFinite(value) ? JSON.stringify(value) : 'null';
    case 'string':
      return JSON.stringify(value);
    case 'object':
      if (Array.isArray(value)) {
        return `[${value.map((item) => serializeValue(item)).join(',')}]`;
      }
      return serializeObject(value);
    default:
      return 'null';
  }
}

function serializeObject(obj: object): string {
  const pairs: string[] = [];
  const entries = Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  for (const [key, val] of entries) {
    if (val === undefined) {
      continue;
    }
    pairs.push(`${JSON.stringify(key)}:${serializeValue(val)}`);
  }

  return `{${pairs.join(',')}}`;
}
