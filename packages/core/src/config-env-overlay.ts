const PREFIX = 'AGENT_MESH_';
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
 * Variables must be prefixed with `AGENT_MESH_`. Nesting is expressed
 * with double-underscore (`__`); numeric segments index into arrays.
 * Segments match existing keys case-insensitively, so camelCase keys stay
 * reachable; unmatched segments are created lowercased. Values are coerced
 * to numbers/booleans where possible.
 *
 * Example: `AGENT_MESH_AGENTS__0__PORT=9001`
 *   → `config.agents[0].port = 9001`
 *
 * @param config The config object to mutate in-place.
 * @param env    Optional env map (defaults to `process.env`).
 * @returns The mutated config (same reference).
 */
export function applyEnvOverrides<T extends object>(
  config: T,
  env: Record<string, string | undefined> = process.env,
): T {
  for (const [key, rawValue] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || rawValue === undefined) continue;

    const path = key.slice(PREFIX.length).split(SEPARATOR);
    if (path.length === 0 || path[0] === '') continue;

    setNested(config, path, coerce(rawValue));
  }

  return config;
}

type Container = Record<string, unknown> | unknown[];

function isContainer(value: unknown): value is Container {
  return typeof value === 'object' && value !== null;
}

function resolveKey(container: Container, segment: string): string | number {
  if (Array.isArray(container)) {
    return /^\d+$/.test(segment) ? Number(segment) : segment.toLowerCase();
  }
  const lower = segment.toLowerCase();
  return Object.keys(container).find((k) => k.toLowerCase() === lower) ?? lower;
}

function getChild(container: Container, key: string | number): unknown {
  if (Array.isArray(container)) {
    return typeof key === 'number' ? container[key] : undefined;
  }
  return container[String(key)];
}

function setChild(container: Container, key: string | number, value: unknown): void {
  if (Array.isArray(container)) {
    if (typeof key === 'number') container[key] = value;
    return;
  }
  container[String(key)] = value;
}

function setNested(obj: object, path: string[], value: unknown): void {
  if (!isContainer(obj)) return;
  let current: Container = obj;

  const last = path[path.length - 1];
  if (last === undefined) return;

  for (const segment of path.slice(0, -1)) {
    const key = resolveKey(current, segment);
    const next = getChild(current, key);

    if (isContainer(next)) {
      current = next;
    } else {
      // Create intermediate object
      const created: Record<string, unknown> = {};
      setChild(current, key, created);
      current = created;
    }
  }

  setChild(current, resolveKey(current, last), value);
}
