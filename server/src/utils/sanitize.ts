// Blunt denylist filters. These are regex passes, not an HTML parser:
// obfuscated or malformed markup that does not match the literal patterns
// is left alone.
const HTML_TAG_RE = /<[^>]*>/g;
const URL_RE = /https?:\/\/\S+/g;
const CONTROL_RE = /[\x00-\x09\x0B\x0C\x0E-\x1F]/g;

export interface SanitizedField {
  name: string;
  value: string;
}

/**
 * Copy of a decoded JSON value with object keys in sorted order. Throws on a
 * cycle; a value shared between siblings is fine.
 */
function sortKeys(value: unknown, ancestors: Set<object> = new Set()): unknown {
  if (value === null || typeof value !== 'object') return value;
  if (ancestors.has(value)) throw new TypeError('cyclic value');
  ancestors.add(value);
  try {
    if (Array.isArray(value)) return value.map((item) => sortKeys(item, ancestors));
    // fromEntries defines own properties, so a "__proto__" key stays a field
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]): [string, unknown] => [k, sortKeys(v, ancestors)]),
    );
  } finally {
    ancestors.delete(value);
  }
}

/**
 * Text form of a payload value: strings as-is, anything else pretty-printed
 * as JSON with stable key order. Falls back to String() when the value
 * cannot be serialized.
 */
export function renderValue(value: unknown): string {
  if (typeof value === 'string') return value;
  let json: string | undefined;
  try {
    json = JSON.stringify(sortKeys(value), null, 2);
  } catch {
    // BigInt, cycles
    return String(value);
  }
  return json ?? String(value);
}

/**
 * Strip tags, http(s) URLs and control characters from any value, then trim.
 * Never throws.
 */
export function sanitizeValue(value: unknown): string {
  return renderValue(value)
    .replace(HTML_TAG_RE, '')
    .replace(URL_RE, '')
    .replace(CONTROL_RE, ' ')
    .trim();
}

/** Field names end up inside markup, so angle brackets become entities. */
export function escapeFieldName(name: string): string {
  return name.replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** Sanitize every field of a payload, sorted by field name. */
export function sanitizePayload(payload: Record<string, unknown>): SanitizedField[] {
  return Object.keys(payload)
    .sort()
    .map((key) => ({ name: escapeFieldName(key), value: sanitizeValue(payload[key]) }));
}
