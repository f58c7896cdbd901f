/**
 * Read-through, invalidate-on-write cache over one entity type.
 *
 * Keys are composite: a guild id plus an optional sub-key (empty for per-guild
 * settings, the lowercase name for entries). Misses go to the store loader and
 * the result is memoized, `null` ("not found") included.
 *
 * Invariants:
 * - Writers invalidate *after* the store write completes.
 * - A load that overlaps an invalidation is returned to its caller but not
 *   memoized, so the cache never holds a value older than the last completed
 *   write.
 * - Concurrent misses for one key may both reach the store; the last one to
 *   finish wins.
 */
import type { GuildId } from "@/db/types";
import { OkResult, type Result } from "@/utils/result";

type CacheSlot<V> = {
  guildId: GuildId;
  value: V | null;
  storedAt: number;
};

export interface ConfigCacheOptions<K, V> {
  /** Used in log lines. */
  name: string;
  guildOf: (key: K) => GuildId;
  /** Sub-key within the guild; defaults to `""`. */
  subKeyOf?: (key: K) => string;
  load: (key: K) => Promise<Result<V | null>>;
  /** Entries older than this are reloaded. Default: no expiry. */
  ttlMs?: number;
  /** Oldest entries are evicted past this size. Default: 2000. */
  maxEntries?: number;
  now?: () => number;
}

const DEFAULT_MAX_ENTRIES = 2_000;

export class ConfigCache<K, V> {
  private readonly slots = new Map<string, CacheSlot<V>>();
  private readonly byGuild = new Map<GuildId, Set<string>>();
  private epoch = 0;

  private readonly subKeyOf: (key: K) => string;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(private readonly options: ConfigCacheOptions<K, V>) {
    this.subKeyOf = options.subKeyOf ?? (() => "");
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_ENTRIES);
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.slots.size;
  }

  private slotKey(guildId: GuildId, subKey: string): string {
    return `${guildId}\u0000${subKey}`;
  }

  private isFresh(slot: CacheSlot<V>): boolean {
    if (this.options.ttlMs === undefined) return true;
    return this.now() - slot.storedAt < this.options.ttlMs;
  }

  private drop(slotKey: string): void {
    const slot = this.slots.get(slotKey);
    if (!slot) return;
    this.slots.delete(slotKey);
    const keys = this.byGuild.get(slot.guildId);
    keys?.delete(slotKey);
    if (keys && keys.size === 0) this.byGuild.delete(slot.guildId);
  }

  private store(guildId: GuildId, slotKey: string, value: V | null): void {
    this.drop(slotKey);
    this.slots.set(slotKey, { guildId, value, storedAt: this.now() });
    const keys = this.byGuild.get(guildId) ?? new Set<string>();
    keys.add(slotKey);
    this.byGuild.set(guildId, keys);

    while (this.slots.size > this.maxEntries) {
      const oldest = this.slots.keys().next().value;
      if (oldest === undefined) break;
      this.drop(oldest);
    }
  }

  /** Memoized value for `key`, loading it from the store on a miss. */
  async queryOne(key: K): Promise<Result<V | null>> {
    const guildId = this.options.guildOf(key);
    const slotKey = this.slotKey(guildId, this.subKeyOf(key));

    const slot = this.slots.get(slotKey);
    if (slot && this.isFresh(slot)) {
      return OkResult(slot.value);
    }
    if (slot) this.drop(slotKey);

    const startedAt = this.epoch;
    const loaded = await this.options.load(key);
    if (loaded.isErr()) {
      console.warn(`[shortcuts:${this.options.name}] load failed`, {
        guildId,
        error: loaded.error.message,
      });
      return loaded;
    }
    if (this.epoch === startedAt) {
      this.store(guildId, slotKey, loaded.value);
    }
    return loaded;
  }

  /** Drops the memoized value for exactly this key. */
  invalidateEntry(key: K): void {
    this.epoch += 1;
    this.drop(this.slotKey(this.options.guildOf(key), this.subKeyOf(key)));
  }

  /** Drops every memoized value under the guild. */
  invalidateByGuild(guildId: GuildId): void {
    this.epoch += 1;
    const keys = this.byGuild.get(guildId);
    if (!keys) return;
    for (const slotKey of [...keys]) {
      this.drop(slotKey);
    }
  }
}
