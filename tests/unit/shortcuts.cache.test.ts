/**
 * Unit Tests: ConfigCache
 *
 * Purpose: Verify read-through memoization, invalidation scopes and that a
 * load racing an invalidation is never memoized.
 */

import { describe, expect, it } from "vitest";
import { ConfigCache } from "@/modules/shortcuts/cache";
import { ErrResult, OkResult, type Result } from "@/utils/result";

interface Key {
  guildId: string;
  name: string;
}

function makeCache(options: { ttlMs?: number; maxEntries?: number; now?: () => number } = {}) {
  const store = new Map<string, string>();
  const loads: string[] = [];
  const cache = new ConfigCache<Key, string>({
    name: "test",
    guildOf: (key) => key.guildId,
    subKeyOf: (key) => key.name.toLowerCase(),
    load: async (key) => {
      loads.push(`${key.guildId}/${key.name}`);
      return OkResult(store.get(`${key.guildId}/${key.name.toLowerCase()}`) ?? null);
    },
    ...options,
  });
  return { cache, store, loads };
}

describe("ConfigCache", () => {
  it("loads once and serves later reads from memory", async () => {
    const { cache, store, loads } = makeCache();
    store.set("g1/hello", "hi");

    const first = await cache.queryOne({ guildId: "g1", name: "hello" });
    const second = await cache.queryOne({ guildId: "g1", name: "HELLO" });

    expect(first.isOk() && first.value).toBe("hi");
    expect(second.isOk() && second.value).toBe("hi");
    expect(loads).toEqual(["g1/hello"]);
  });

  it("memoizes a miss until the key is invalidated", async () => {
    const { cache, store, loads } = makeCache();
    const key = { guildId: "g1", name: "late" };

    const miss = await cache.queryOne(key);
    expect(miss.isOk() && miss.value).toBe(null);

    store.set("g1/late", "now here");
    const stillMiss = await cache.queryOne(key);
    expect(stillMiss.isOk() && stillMiss.value).toBe(null);

    cache.invalidateEntry(key);
    const hit = await cache.queryOne(key);
    expect(hit.isOk() && hit.value).toBe("now here");
    expect(loads).toHaveLength(2);
  });

  it("invalidateEntry drops only that key", async () => {
    const { cache, store, loads } = makeCache();
    store.set("g1/a", "1");
    store.set("g1/b", "2");
    await cache.queryOne({ guildId: "g1", name: "a" });
    await cache.queryOne({ guildId: "g1", name: "b" });

    cache.invalidateEntry({ guildId: "g1", name: "A" });
    await cache.queryOne({ guildId: "g1", name: "a" });
    await cache.queryOne({ guildId: "g1", name: "b" });

    expect(loads).toEqual(["g1/a", "g1/b", "g1/a"]);
  });

  it("invalidateByGuild drops every key of that guild and no other", async () => {
    const { cache, store } = makeCache();
    store.set("g1/a", "1");
    store.set("g1/b", "2");
    store.set("g2/a", "3");
    await cache.queryOne({ guildId: "g1", name: "a" });
    await cache.queryOne({ guildId: "g1", name: "b" });
    await cache.queryOne({ guildId: "g2", name: "a" });
    expect(cache.size).toBe(3);

    cache.invalidateByGuild("g1");
    expect(cache.size).toBe(1);
  });

  it("does not memoize a load that overlaps an invalidation", async () => {
    let release: (value: Result<string | null>) => void = () => undefined;
    let calls = 0;
    const cache = new ConfigCache<string, string>({
      name: "race",
      guildOf: (guildId) => guildId,
      load: () => {
        calls += 1;
        if (calls === 1) {
          return new Promise((resolve) => {
            release = resolve;
          });
        }
        return Promise.resolve(OkResult("fresh"));
      },
    });

    const pending = cache.queryOne("g1");
    cache.invalidateEntry("g1");
    release(OkResult("stale"));

    const raced = await pending;
    expect(raced.isOk() && raced.value).toBe("stale");
    expect(cache.size).toBe(0);

    const next = await cache.queryOne("g1");
    expect(next.isOk() && next.value).toBe("fresh");
  });

  it("returns load errors without memoizing them", async () => {
    let fail = true;
    const cache = new ConfigCache<string, string>({
      name: "flaky",
      guildOf: (guildId) => guildId,
      load: async () => (fail ? ErrResult(new Error("down")) : OkResult("up")),
    });

    const failed = await cache.queryOne("g1");
    expect(failed.isErr() && failed.error.message).toBe("down");
    expect(cache.size).toBe(0);

    fail = false;
    const ok = await cache.queryOne("g1");
    expect(ok.isOk() && ok.value).toBe("up");
  });

  it("reloads entries older than ttlMs", async () => {
    let clock = 0;
    const { cache, store, loads } = makeCache({ ttlMs: 100, now: () => clock });
    store.set("g1/a", "1");

    await cache.queryOne({ guildId: "g1", name: "a" });
    clock = 99;
    await cache.queryOne({ guildId: "g1", name: "a" });
    clock = 100;
    await cache.queryOne({ guildId: "g1", name: "a" });

    expect(loads).toEqual(["g1/a", "g1/a"]);
  });

  it("evicts the oldest entries past maxEntries", async () => {
    const { cache, loads } = makeCache({ maxEntries: 2 });
    await cache.queryOne({ guildId: "g1", name: "a" });
    await cache.queryOne({ guildId: "g1", name: "b" });
    await cache.queryOne({ guildId: "g1", name: "c" });
    expect(cache.size).toBe(2);

    await cache.queryOne({ guildId: "g1", name: "a" });
    expect(loads).toEqual(["g1/a", "g1/b", "g1/c", "g1/a"]);
  });
});
