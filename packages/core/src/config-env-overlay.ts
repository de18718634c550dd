import { isRecord } from './utils.js';

const PREFIX = 'AGENTNET_';
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
 * Variables must be prefixed with `AGENTNET_`. Nesting is expressed
 * with double-underscore (`__`). Segments match existing keys
 * case-insensitively, so camelCase keys can be addressed. Values are
 * coerced to numbers/booleans where possible.
 *
 * Example: `AGENTNET_NETWORK__REQUESTTIMEOUTMS=5000`
 *   → `config.network.requestTimeoutMs = 5000`
 *
 * @param config The config object to mutate in-place.
 * @param env    Optional env map (defaults to `process.env`).
 * @returns The mutated config (same reference).
 */
export function applyEnvOverrides<T extends Record<string, unknown>>(
  config: T,
  env: Record<string, string | undefined> = process.env,
): T {
  for (const [key, rawValue] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || rawValue === undefined) continue;

    const path = key
      .slice(PREFIX.length)
      .toLowerCase()
      .split(SEPARATOR);

    if (path.length === 0 || path.some((segment) => segment === '')) continue;

    setNested(config, path, coerce(rawValue));
  }

  return config;
}

/** Find the existing key matching `segment` case-insensitively. */
function resolveKey(obj: Record<string, unknown>, segment: string): string {
  return Object.keys(obj).find((k) => k.toLowerCase() === segment) ?? segment;
}

function setNested(obj: Record<string, unknown>, path: string[], value: unknown): void {
  let current: Record<string, unknown> = obj;

  for (const segment of path.slice(0, -1)) {
    const key = resolveKey(current, segment);
    const next = current[key];

    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  const last = path[path.length - 1];
  if (last !== undefined) {
    current[resolveKey(current, last)] = value;
  }
}
