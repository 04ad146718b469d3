import { systemClock, type Clock, type LogCallback } from '../types.js';

import { cachePolicyTtlSeconds, isCacheable, type CachePolicy } from '../pipeline/cache-policy.js';
import { withMetadata, type ToolExecutionResult } from '../pipeline/result.js';
import { errorMessage, warn } from '../utils.js';

import { deriveIdempotencyKey, type IdempotencyKeyParts } from './idempotency-key.js';
import { TtlCache, type CacheStats } from './ttl-cache.js';

export interface CacheLookup extends IdempotencyKeyParts {
  cachePolicy: CachePolicy;
  /** Pre-derived key (e.g. from the request); derived from the parts otherwise. */
  idempotencyKey?: string;
}

export interface IdempotencyCacheOptions {
  maxSize?: number;
  clock?: Clock;
  onLog?: LogCallback;
}

/**
 * Result cache keyed by call identity (tool, version, params, caller, permission).
 * Only successful results are stored; `no_cache` bypasses storage entirely.
 * Store failures degrade to an uncached call.
 */
export class IdempotencyCache {
  private readonly cache: TtlCache<ToolExecutionResult>;
  private readonly clock: Clock;
  private readonly onLog?: LogCallback;

  constructor(opts: IdempotencyCacheOptions = {}) {
    this.clock = opts.clock ?? systemClock;
    this.cache = new TtlCache<ToolExecutionResult>({
      maxSize: opts.maxSize,
      clock: this.clock,
    });
    this.onLog = opts.onLog;
  }

  get size(): number {
    return this.cache.size;
  }

  get(key: string): ToolExecutionResult | undefined {
    return this.cache.get(key);
  }

  set(key: string, value: ToolExecutionResult, ttlSeconds?: number): void {
    this.cache.set(key, value, ttlSeconds);
  }

  delete(key: string): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  cleanupExpired(): number {
    return this.cache.cleanupExpired();
  }

  stats(): CacheStats {
    return this.cache.stats();
  }

  keyFor(lookup: CacheLookup): string | undefined {
    return lookup.idempotencyKey ?? deriveIdempotencyKey(lookup);
  }

  async getOrCompute(lookup: CacheLookup, compute: () => Promise<ToolExecutionResult>): Promise<ToolExecutionResult> {
    if (!isCacheable(lookup.cachePolicy)) return await compute();

    const key = this.keyFor(lookup);
    if (key === undefined) {
      warn(`cache key derivation failed for ${lookup.toolName}; executing uncached`);
      return await compute();
    }

    const cached = this.safeGet(key);
    if (cached !== undefined) {
      this.log('VRB', lookup.toolName, `cache hit ${key}`);
      return withMetadata(cached, { cacheHit: true, cachedAt: cached.createdAt });
    }

    const result = await compute();
    if (!result.success) return result;
    const stored = withMetadata(result, { cacheHit: false });
    this.safeSet(key, stored, cachePolicyTtlSeconds(lookup.cachePolicy));
    return stored;
  }

  invalidate(parts: IdempotencyKeyParts): boolean {
    const key = deriveIdempotencyKey(parts);
    return key !== undefined && this.cache.delete(key);
  }

  invalidateByTool(toolName: string): number {
    return this.cache.deleteWhere((value) => value.toolName === toolName);
  }

  private safeGet(key: string): ToolExecutionResult | undefined {
    try {
      return this.cache.get(key);
    } catch (error: unknown) {
      warn(`cache lookup failed: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private safeSet(key: string, value: ToolExecutionResult, ttlSeconds: number): void {
    try {
      this.cache.set(key, value, ttlSeconds);
    } catch (error: unknown) {
      warn(`cache store failed: ${errorMessage(error)}`);
    }
  }

  private log(severity: 'VRB', toolName: string, message: string): void {
    this.onLog?.({
      timestamp: this.clock(),
      severity,
      type: 'cache',
      remoteIdentifier: `tool:${toolName}`,
      message,
    });
  }
}
