/**
 * Router configuration, read from the environment with defaults.
 */

export interface RouterConfig {
  /** Target used when a payload names no screen. */
  defaultTarget: string;
  /** Payload key that names the target screen. */
  screenKey: string;
  /** Maximum number of dispatched ids remembered for deduplication. */
  seenCapacity: number;
  /** Optional age bound for remembered ids; null keeps ids until evicted by count. */
  seenMaxAgeMs: number | null;
}

export const DEFAULT_ROUTER_CONFIG: RouterConfig = {
  defaultTarget: 'home',
  screenKey: 'screen',
  seenCapacity: 200,
  seenMaxAgeMs: null,
};

export function loadRouterConfig(env: NodeJS.ProcessEnv = process.env): RouterConfig {
  return {
    defaultTarget: nonEmpty(env['PUSH_DEFAULT_TARGET']) ?? DEFAULT_ROUTER_CONFIG.defaultTarget,
    screenKey: nonEmpty(env['PUSH_SCREEN_KEY']) ?? DEFAULT_ROUTER_CONFIG.screenKey,
    seenCapacity: readPositiveInt(env, 'PUSH_SEEN_CAPACITY') ?? DEFAULT_ROUTER_CONFIG.seenCapacity,
    seenMaxAgeMs: readPositiveInt(env, 'PUSH_SEEN_MAX_AGE_MS'),
  };
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/** Reads `env[name]` as a positive integer; null when unset or blank. */
export function readPositiveInt(env: NodeJS.ProcessEnv, name: string): number | null {
  const raw = nonEmpty(env[name]);
  if (raw === null) return null;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return parsed;
}
