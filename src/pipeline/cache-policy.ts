import { readFileSync } from 'node:fs';

export const CACHE_POLICIES = ['no_cache', 'cacheable', 'ttl_short', 'ttl_medium', 'ttl_long'] as const;

export type CachePolicy = typeof CACHE_POLICIES[number];

const TTL_SECONDS: Record<CachePolicy, number> = {
  no_cache: 0,
  cacheable: 0,
  ttl_short: 300,
  ttl_medium: 3600,
  ttl_long: 86400,
};

export const DEFAULT_CACHE_POLICY: CachePolicy = 'no_cache';

export const isCachePolicy = (value: unknown): value is CachePolicy => (
  typeof value === 'string' && (CACHE_POLICIES as readonly string[]).includes(value)
);

/** Seconds a cached result stays valid; 0 means no expiry (or nothing stored, for `no_cache`). */
export const cachePolicyTtlSeconds = (policy: CachePolicy): number => TTL_SECONDS[policy];

export const isCacheable = (policy: CachePolicy): boolean => policy !== 'no_cache';

const loadPresetPolicies = (): Record<string, CachePolicy> => {
  const raw: unknown = JSON.parse(readFileSync(new URL('./tool-policies.json', import.meta.url), 'utf8'));
  const out: Record<string, CachePolicy> = {};
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) return out;
  Object.entries(raw).forEach(([name, policy]) => {
    if (isCachePolicy(policy)) out[name] = policy;
  });
  return out;
};

export const PRESET_TOOL_POLICIES: Readonly<Record<string, CachePolicy>> = Object.freeze(loadPresetPolicies());

/**
 * Static tool name → default cache policy lookup supplied to request construction.
 * Read-only lookups default to a TTL, side-effecting tools to `no_cache`; unknown tools fall back to `no_cache`.
 */
export class ToolPolicyRegistry {
  private readonly policies = new Map<string, CachePolicy>();

  constructor(overrides: Record<string, CachePolicy> = {}, includePresets = true) {
    if (includePresets) {
      Object.entries(PRESET_TOOL_POLICIES).forEach(([name, policy]) => {
        this.policies.set(name, policy);
      });
    }
    Object.entries(overrides).forEach(([name, policy]) => {
      this.policies.set(name, policy);
    });
  }

  resolve(toolName: string): CachePolicy {
    return this.policies.get(toolName) ?? DEFAULT_CACHE_POLICY;
  }

  register(toolName: string, policy: CachePolicy): void {
    this.policies.set(toolName, policy);
  }

  entries(): [string, CachePolicy][] {
    return [...this.policies.entries()];
  }
}
