export type MaybePromise<T> = Promise<T> | T;

/**
 * Key-value storage with per-entry expiry. `get` reports absence as
 * `undefined`; an entry whose ttl has elapsed is absent.
 */
export interface CacheStore {
  get<T>(key: string): MaybePromise<T | undefined>;
  set<T>(key: string, value: T, ttlMs: number): MaybePromise<void>;
  delete(key: string): MaybePromise<void>;
  clear(): MaybePromise<void>;
}

export interface CacheEntry<T = unknown> {
  value: T;
  expiresAt: number;
}

export interface CacheOptions {
  ttlMs: number;
}

export type Clock = () => number;
