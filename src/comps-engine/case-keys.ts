// ── snake_case ⇄ camelCase for the JSON contract ────────────────────
//
// The wire format is snake_case; the engine works in camelCase.
// Null values are dropped on the way in so "null" and "absent" mean the same thing.

const snakeToCamel = (key: string) => key.replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase());
const camelToSnake = (key: string) => key.replace(/[A-Z]/g, c => `_${c.toLowerCase()}`);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toCamelKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(toCamelKeys);
  if (!isPlainObject(value)) return value;

  const out: Record<string, unknown> = {};
  for (const [key, v] of Object.entries(value)) {
    if (v === null) continue;
    out[snakeToCamel(key)] = toCamelKeys(v);
  }
  return out;
}

const NO_VALUE_KEYS: ReadonlySet<string> = new Set();

/** `valueKeys` names fields whose string values are identifiers and get converted too. */
export function toSnakeKeys(value: unknown, valueKeys: ReadonlySet<string> = NO_VALUE_KEYS): unknown {
  if (Array.isArray(value)) return value.map(v => toSnakeKeys(v, valueKeys));
  if (!isPlainObject(value)) return value;

  const out: Record<string, unknown> = {};
  for (const [key, v] of Object.entries(value)) {
    out[camelToSnake(key)] = valueKeys.has(key) && typeof v === 'string'
      ? camelToSnake(v)
      : toSnakeKeys(v, valueKeys);
  }
  return out;
}
