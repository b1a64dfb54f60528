import test from "node:test";
import assert from "node:assert/strict";
import { StructuredLogger, createMemorySink } from "@vitrine/observability";
import { CacheManager } from "./cache-manager";
import { CacheStore } from "./interfaces";
import { MemoryCacheStore } from "./memory-store";

class BrokenStore implements CacheStore {
  get<T>(): T | undefined {
    throw new Error("store offline");
  }
  set(): void {
    throw new Error("store offline");
  }
  delete(): void {
    throw new Error("store offline");
  }
  clear(): void {
    throw new Error("store offline");
  }
}

class Gate {
  private release?: () => void;
  readonly opened = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  open(): void {
    this.release?.();
  }
}

/** Holds every `set` until `writes` opens; `writing` opens once a set is waiting. */
class HeldWriteStore implements CacheStore {
  readonly inner = new MemoryCacheStore();
  readonly writing = new Gate();
  readonly writes = new Gate();

  get<T>(key: string): T | undefined {
    return this.inner.get<T>(key);
  }
  async set<T>(key: string, value: T, ttlMs: number): Promise<void> {
    this.writing.open();
    await this.writes.opened;
    this.inner.set(key, value, ttlMs);
  }
  delete(key: string): void {
    this.inner.delete(key);
  }
  clear(): void {
    this.inner.clear();
  }
}

test("getOrSet resolves once and serves the cached value afterwards", async () => {
  const cache = new CacheManager(new MemoryCacheStore());
  let calls = 0;
  const resolver = () => {
    calls += 1;
    return ["Desk"];
  };
  assert.deepEqual(await cache.getOrSet("product_list", resolver, { ttlMs: 1_000 }), ["Desk"]);
  assert.deepEqual(await cache.getOrSet("product_list", resolver, { ttlMs: 1_000 }), ["Desk"]);
  assert.equal(calls, 1);
});

test("delete forces the next read to recompute", async () => {
  const cache = new CacheManager(new MemoryCacheStore());
  await cache.set("product_list", ["Desk"], { ttlMs: 1_000 });
  await cache.delete("product_list");
  assert.equal(await cache.get("product_list"), undefined);
});

test("store failures degrade to misses and are logged", async () => {
  const sink = createMemorySink();
  const logger = new StructuredLogger({ serviceName: "catalog" }, sink);
  const cache = new CacheManager(new BrokenStore(), logger);

  const value = await cache.getOrSet("product_list", () => ["Desk"], { ttlMs: 1_000 });
  await cache.delete("product_list");

  assert.deepEqual(value, ["Desk"]);
  assert.deepEqual(
    sink.entries.map((entry) => [entry.level, entry.message]),
    [
      ["warn", "Cache read failed, treating as miss"],
      ["warn", "Cache write failed"],
      ["error", "Cache invalidation failed, entry expires by ttl"],
    ],
  );
});

test("a delete while the resolver runs keeps the resolved value out of the cache", async () => {
  const cache = new CacheManager(new MemoryCacheStore());
  const resolving = new Gate();
  const loaded = new Gate();
  const pending = cache.getOrSet(
    "product_list",
    async () => {
      resolving.open();
      await loaded.opened;
      return ["Desk"];
    },
    { ttlMs: 1_000 },
  );

  await resolving.opened;
  await cache.delete("product_list");
  loaded.open();

  assert.deepEqual(await pending, ["Desk"]);
  assert.equal(await cache.get("product_list"), undefined);
});

test("a delete while the fill is being written removes the written entry", async () => {
  const store = new HeldWriteStore();
  const cache = new CacheManager(store);
  const pending = cache.getOrSet("product_list", () => ["Desk"], { ttlMs: 1_000 });

  await store.writing.opened;
  await cache.delete("product_list");
  store.writes.open();

  assert.deepEqual(await pending, ["Desk"]);
  assert.equal(await cache.get("product_list"), undefined);
});

test("a clear while the resolver runs keeps every resolved value out of the cache", async () => {
  const cache = new CacheManager(new MemoryCacheStore());
  const resolving = new Gate();
  const loaded = new Gate();
  const pending = cache.getOrSet(
    "category_list",
    async () => {
      resolving.open();
      await loaded.opened;
      return ["Phones"];
    },
    { ttlMs: 1_000 },
  );

  await resolving.opened;
  await cache.clear();
  loaded.open();
  await pending;

  assert.equal(await cache.get("category_list"), undefined);
});
