import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { Inject, Injectable } from '@nestjs/common';
import type { Cache } from 'cache-manager';

type CacheKeyPart = string | number | boolean | null | undefined;

@Injectable()
export class CacheService {
  private readonly defaultTtlMs = Number(process.env.CACHE_DEFAULT_TTL_MS ?? 60_000);
  private hits = 0;
  private misses = 0;

  constructor(@Inject(CACHE_MANAGER) private readonly cache: Cache) {}

  buildKey(namespace: string, ...parts: CacheKeyPart[]): string {
    const normalized = parts
      .map((part) => (part === null || part === undefined ? '' : String(part)))
      .filter((part) => part.length > 0);
    return [namespace, ...normalized].join(':');
  }

  /** Returns the cached value, or runs the loader and caches its result. Loader errors are not cached. */
  async wrap<T>(key: string, loader: () => Promise<T>, ttlMs?: number): Promise<T> {
    const cached = await this.get<T>(key);
    if (cached !== undefined) {
      return cached;
    }
    const value = await loader();
    await this.set(key, value, ttlMs);
    return value;
  }

  async get<T>(key: string): Promise<T | undefined> {
    const value = await this.cache.get<T>(key);
    if (value === undefined || value === null) {
      this.misses += 1;
      return undefined;
    }
    this.hits += 1;
    return value;
  }

  async set<T>(key: string, value: T, ttlMs?: number) {
    const effectiveTtl = ttlMs ?? this.defaultTtlMs;
    if (effectiveTtl <= 0) return;
    await this.cache.set(key, value, effectiveTtl);
  }

  async del(key: string) {
    await this.cache.del(key);
  }

  stats() {
    const total = this.hits + this.misses;
    const hitRate = total === 0 ? 0 : this.hits / total;
    return {
      hits: this.hits,
      misses: this.misses,
      hitRate,
      total,
    };
  }
}
