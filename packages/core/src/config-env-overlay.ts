const PREFIX = 'AGENTWIRE_';
const SEPARATOR = '__';

/**
 * Coerce a string value to a number, boolean, or leave as string.
 */
function coerce(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;

  if (/^-?\d+(\.\d+)?$/.test(value)) {
    const num = Number(value);
    if (Number.isFinite(num)) return num;
  }

  return value;
}

/**
 * Apply environment variable overrides to a config object.
 *
 * Variables must be prefixed with `AGENTWIRE_`. Nesting is expressed
 * with double-underscore (`__`). Each segment matches a key of `shape`
 * case-insensitively, so camelCase fields can be addressed from
 * upper-case variable names. Variables whose path is not a scalar field
 * of `shape` are ignored.
 *
 * Example: `AGENTWIRE_REGISTRY__HEARTBEATTIMEOUTMS=120000`
 *   → `config.registry.heartbeatTimeoutMs = 120000`
 *
 * @param config The config object to mutate in-place.
 * @param env    Optional env map (defaults to `process.env`).
 * @param shape  The addressable fields; defaults to `config` itself, so
 *               optional fields the config leaves out need a shape that has them.
 * @returns The mutated config (same reference).
 */
export function applyEnvOverrides<T extends object>(
  config: T,
  env: Record<string, string | undefined> = process.env,
  shape: object = config,
): T {
  for (const [key, rawValue] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || rawValue === undefined) continue;

    const path = key
      .slice(PREFIX.length)
      .split(SEPARATOR)
      .map((segment) => segment.toLowerCase());

    if (path.length === 0 || path.some((segment) => segment === '')) continue;

    const keys = resolvePath(shape, path);
    if (keys) setNested(config, keys, coerce(rawValue));
  }

  return config;
}

function isPlainObject(value: unknown): value is object {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Map lower-cased segments onto the shape's keys; null unless they end at a scalar. */
function resolvePath(shape: object, path: string[]): string[] | null {
  const keys: string[] = [];
  let current: unknown = shape;
  for (const segment of path) {
    if (!isPlainObject(current)) return null;
    const key = Object.keys(current).find((k) => k.toLowerCase() === segment);
    if (key === undefined) return null;
    keys.push(key);
    current = Reflect.get(current, key);
  }
  return current !== null && typeof current === 'object' ? null : keys;
}

function setNested(obj: object, keys: string[], value: unknown): void {
  let current: object = obj;

  for (const key of keys.slice(0, -1)) {
    const existing: unknown = Reflect.get(current, key);
    const next: object = isPlainObject(existing) ? existing : {};
    if (next !== existing) Reflect.set(current, key, next);
    current = next;
  }

  const last = keys[keys.length - 1];
  if (last !== undefined) Reflect.set(current, last, value);
}
