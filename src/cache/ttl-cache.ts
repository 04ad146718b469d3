import { systemClock, type Clock } from '../types.js';

export interface CacheEntry<V> {
  key: string;
  value: V;
  createdAt: number;
  /** Epoch ms; 0 means the entry never expires. */
  expiresAt: number;
  hitCount: number;
}

export interface CacheEntrySummary {
  key: string;
  hitCount: number;
  ageSeconds: number;
  expiresInSeconds?: number;
}

export interface CacheStats {
  size: number;
  maxSize: number;
  totalHits: number;
  expiredCount: number;
  entries: CacheEntrySummary[];
}

export interface TtlCacheOptions {
  maxSize?: number;
  defaultTtlSeconds?: number;
  clock?: Clock;
}

const isExpired = (entry: CacheEntry<unknown>, now: number): boolean => (
  entry.expiresAt !== 0 && now > entry.expiresAt
);

/**
 * Capacity-bounded TTL map. When full, inserting a new key evicts the entry with the
 * oldest `createdAt` (insertion age, not access recency). Expired entries are dropped
 * lazily on `get` or by `cleanupExpired`. Every method is synchronous, so calls never
 * interleave on the event loop.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  readonly maxSize: number;
  readonly defaultTtlSeconds: number;
  private readonly clock: Clock;

  constructor(opts: TtlCacheOptions = {}) {
    this.maxSize = Math.max(1, Math.trunc(opts.maxSize ?? 1000));
    this.defaultTtlSeconds = Math.max(0, opts.defaultTtlSeconds ?? 3600);
    this.clock = opts.clock ?? systemClock;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined) return undefined;
    if (isExpired(entry, this.clock())) {
      this.entries.delete(key);
      return undefined;
    }
    entry.hitCount += 1;
    return entry.value;
  }

  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && !isExpired(entry, this.clock());
  }

  /** `ttlSeconds` 0 stores without expiry; omitted uses the default TTL. */
  set(key: string, value: V, ttlSeconds?: number): void {
    const now = this.clock();
    const ttl = Math.max(0, ttlSeconds ?? this.defaultTtlSeconds);
    const expiresAt = ttl > 0 ? now + ttl * 1000 : 0;
    const existing = this.entries.get(key);
    if (existing !== undefined) {
      existing.value = value;
      existing.expiresAt = expiresAt;
      return;
    }
    if (this.entries.size >= this.maxSize) this.evictOldest();
    this.entries.set(key, { key, value, createdAt: now, expiresAt, hitCount: 0 });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  deleteWhere(predicate: (value: V, key: string) => boolean): number {
    const doomed = [...this.entries.values()].filter((entry) => predicate(entry.value, entry.key));
    doomed.forEach((entry) => this.entries.delete(entry.key));
    return doomed.length;
  }

  clear(): void {
    this.entries.clear();
  }

  cleanupExpired(): number {
    const now = this.clock();
    return this.deleteWhere((_value, key) => {
      const entry = this.entries.get(key);
      return entry !== undefined && isExpired(entry, now);
    });
  }

  stats(): CacheStats {
    const now = this.clock();
    const all = [...this.entries.values()];
    const top = [...all].sort((a, b) => b.hitCount - a.hitCount).slice(0, 10);
    return {
      size: all.length,
      maxSize: this.maxSize,
      totalHits: all.reduce((sum, entry) => sum + entry.hitCount, 0),
      expiredCount: all.filter((entry) => isExpired(entry, now)).length,
      entries: top.map((entry) => ({
        key: entry.key,
        hitCount: entry.hitCount,
        ageSeconds: Math.max(0, (now - entry.createdAt) / 1000),
        expiresInSeconds: entry.expiresAt === 0 ? undefined : Math.max(0, (entry.expiresAt - now) / 1000),
      })),
    };
  }

  private evictOldest(): void {
    let oldest: CacheEntry<V> | undefined;
    this.entries.forEach((entry) => {
      if (oldest === undefined || entry.createdAt < oldest.createdAt) oldest = entry;
    });
    if (oldest !== undefined) this.entries.delete(oldest.key);
  }
}
