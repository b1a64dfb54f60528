import type { StructuredLogger } from "@vitrine/observability";
import { CacheOptions, CacheStore } from "./interfaces";
import { MemoryCacheStore } from "./memory-store";

/**
 * Read-through access to a {@link CacheStore}. The store is a derived view of
 * the entity store, so its failures are logged and treated as misses instead
 * of failing the caller.
 */
export class CacheManager {
  /** Bumped by every delete of a key; `clearGeneration` by every clear. */
  private readonly generations = new Map<string, number>();
  private clearGeneration = 0;

  constructor(
    private readonly store: CacheStore = new MemoryCacheStore(),
    private readonly logger?: StructuredLogger,
  ) {}

  async get<T>(key: string): Promise<T | undefined> {
    try {
      const value = await this.store.get<T>(key);
      this.logger?.debug(value === undefined ? "Cache miss" : "Cache hit", { key });
      return value;
    } catch (error) {
      this.logger?.warn("Cache read failed, treating as miss", { key, error });
      return undefined;
    }
  }

  async set<T>(key: string, value: T, options: CacheOptions): Promise<void> {
    try {
      await this.store.set(key, value, options.ttlMs);
    } catch (error) {
      this.logger?.warn("Cache write failed", { key, error });
    }
  }

  async delete(key: string): Promise<void> {
    this.generations.set(key, (this.generations.get(key) ?? 0) + 1);
    try {
      await this.store.delete(key);
      this.logger?.debug("Cache entry invalidated", { key });
    } catch (error) {
      this.logger?.error("Cache invalidation failed, entry expires by ttl", { key, error });
    }
  }

  async clear(): Promise<void> {
    this.clearGeneration += 1;
    try {
      await this.store.clear();
    } catch (error) {
      this.logger?.error("Cache clear failed", { error });
    }
  }

  /**
   * A value resolved while `key` was deleted or the cache cleared is returned
   * to the caller but never left in the store.
   */
  async getOrSet<T>(key: string, resolver: () => Promise<T> | T, options: CacheOptions): Promise<T> {
    const existing = await this.get<T>(key);
    if (existing !== undefined) {
      return existing;
    }
    const generation = this.generationOf(key);
    const value = await resolver();
    if (this.generationOf(key) !== generation) {
      this.logger?.debug("Cache fill skipped, entry invalidated while resolving", { key });
      return value;
    }
    await this.set(key, value, options);
    if (this.generationOf(key) !== generation) {
      // the invalidation landed while the write was in flight
      await this.delete(key);
    }
    return value;
  }

  private generationOf(key: string): string {
    return `${this.clearGeneration}:${this.generations.get(key) ?? 0}`;
  }
}
