// packages/utils/src/json.ts
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(x: unknown): x is JsonObject {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

/**
 * Canonical JSON text of `value`.
 *
 * Same output as `JSON.stringify` for plain data, except that object keys are
 * emitted in sorted order at every depth. `Map` becomes an object keyed by
 * `String(key)`, `Set` an array ordered by each member's canonical text, and
 * `bigint` its decimal string. Top-level `undefined` renders as `null`.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(toCanonical(value, new Set()) ?? null);
}

function toCanonical(value: unknown, seen: Set<object>): JsonValue | undefined {
  if (typeof value === 'object' && value !== null && 'toJSON' in value && typeof value.toJSON === 'function') {
    value = value.toJSON();
  }

  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'bigint') return value.toString(10);
  if (value === null) return null;
  // undefined, functions and symbols are dropped like JSON.stringify does
  if (typeof value !== 'object') return undefined;

  if (seen.has(value)) throw new TypeError('canonicalJson: cyclic structure');
  seen.add(value);

  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown) => toCanonical(item, seen) ?? null);
    }

    if (value instanceof Set) {
      const members: JsonValue[] = [];
      for (const item of value) members.push(toCanonical(item, seen) ?? null);
      return members
        .map((m) => ({ m, key: JSON.stringify(m) }))
        .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
        .map(({ m }) => m);
    }

    const source: [string, unknown][] =
      value instanceof Map
        ? Array.from(value, ([k, v]): [string, unknown] => [String(k), v])
        : Object.entries(value);

    source.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

    const members: [string, JsonValue][] = [];
    for (const [k, v] of source) {
      const c = toCanonical(v, seen);
      if (c !== undefined) members.push([k, c]);
    }
    // own data properties; plain assignment would treat "__proto__" as the prototype
    return Object.fromEntries(members);
  } finally {
    seen.delete(value);
  }
}
