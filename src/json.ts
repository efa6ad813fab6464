/**
 * JSON value model used for fixture expectations and engine results
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Parse JSON text. Throws SyntaxError on invalid input.
 */
export function parseJson(text: string): JsonValue {
  const value: JsonValue = JSON.parse(text);
  return value;
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Apply `fn` to every string in a JSON value, object keys included
 */
export function mapJsonStrings(value: JsonValue, fn: (s: string) => string): JsonValue {
  if (typeof value === 'string') {
    return fn(value);
  }
  if (typeof value === 'number' || typeof value === 'boolean' || value === null) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => mapJsonStrings(item, fn));
  }
  const out: JsonObject = {};
  for (const [key, item] of Object.entries(value)) {
    out[fn(key)] = mapJsonStrings(item, fn);
  }
  return out;
}

/**
 * Structural equality: arrays by position, objects by key set
 */
export function jsonEqual(a: JsonValue, b: JsonValue): boolean {
  if (a === b) return true;
  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => jsonEqual(item, b[i]));
  }
  if (isJsonObject(a)) {
    if (!isJsonObject(b)) return false;
    const aKeys = Object.keys(a);
    if (aKeys.length !== Object.keys(b).length) return false;
    return aKeys.every((key) => key in b && jsonEqual(a[key], b[key]));
  }
  return false;
}
