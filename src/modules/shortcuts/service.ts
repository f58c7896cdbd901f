/**
 * Shortcut service.
 *
 * Purpose: Validated CRUD over guild settings and shortcut entries, keeping
 * the two read-through caches coherent.
 *
 * Every store write is followed by the matching cache invalidation, issued
 * once the write has returned. Full listings (entries, category counts) always
 * read the store directly.
 */

import type { GuildId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { ConfigCache } from "./cache";
import type { ShortcutRepository } from "./repository";
import {
  ShortcutError,
  transportError,
  type CategoryCount,
  type RemoveOutcome,
  type SavedShortcut,
  type SetShortcutInput,
  type ShortcutEntry,
  type ShortcutEntryQuery,
  type ShortcutSettings,
} from "./types";
import {
  nameKey,
  validateCategory,
  validateName,
  validatePageSize,
  validatePrefix,
  validateValue,
} from "./validation";

export interface EntryKey {
  readonly guildId: GuildId;
  readonly name: string;
}

export interface ShortcutServiceOptions {
  /** Applied to both caches. Default: no expiry. */
  cacheTtlMs?: number;
  cacheMaxEntries?: number;
  now?: () => number;
}

export class ShortcutService {
  readonly settingsCache: ConfigCache<GuildId, ShortcutSettings>;
  readonly entryCache: ConfigCache<EntryKey, ShortcutEntry>;

  constructor(
    private readonly repo: ShortcutRepository,
    options: ShortcutServiceOptions = {},
  ) {
    this.settingsCache = new ConfigCache<GuildId, ShortcutSettings>({
      name: "settings",
      guildOf: (guildId) => guildId,
      load: (guildId) => this.repo.getSettings(guildId),
      ttlMs: options.cacheTtlMs,
      maxEntries: options.cacheMaxEntries,
      now: options.now,
    });
    this.entryCache = new ConfigCache<EntryKey, ShortcutEntry>({
      name: "entries",
      guildOf: (key) => key.guildId,
      subKeyOf: (key) => nameKey(key.name),
      load: (key) => this.repo.getEntry(key.guildId, key.name),
      ttlMs: options.cacheTtlMs,
      maxEntries: options.cacheMaxEntries,
      now: options.now,
    });
  }

  private fromStore<T>(result: Result<T>, operation: string, guildId: GuildId): Result<T, ShortcutError> {
    if (result.isOk()) return OkResult(result.value);
    console.error(`[shortcuts] ${operation} failed`, { guildId, error: result.error.message });
    return ErrResult(transportError(result.error));
  }

  private async notFound(guildId: GuildId, name: string): Promise<ShortcutError> {
    const listed = await this.repo.listEntries(guildId);
    const known = listed.isOk() ? listed.value.map((entry) => entry.name) : [];
    return new ShortcutError("NOT_FOUND", `No shortcut named \`${name}\` found.`, known);
  }

  /** Cached settings lookup; `null` when the guild never set a prefix. */
  async getSettings(guildId: GuildId): Promise<Result<ShortcutSettings | null, ShortcutError>> {
    return this.fromStore(await this.settingsCache.queryOne(guildId), "getSettings", guildId);
  }

  private async requireSettings(guildId: GuildId): Promise<Result<ShortcutSettings, ShortcutError>> {
    const settings = await this.getSettings(guildId);
    if (settings.isErr()) return ErrResult(settings.error);
    if (!settings.value) {
      return ErrResult(new ShortcutError("NOT_CONFIGURED", "Set a prefix first!"));
    }
    return OkResult(settings.value);
  }

  async setPrefix(guildId: GuildId, rawPrefix: string): Promise<Result<ShortcutSettings, ShortcutError>> {
    const prefix = validatePrefix(rawPrefix);
    if (prefix.isErr()) return ErrResult(prefix.error);

    const saved = await this.repo.upsertPrefix(guildId, prefix.value);
    this.settingsCache.invalidateEntry(guildId);
    return this.fromStore(saved, "setPrefix", guildId);
  }

  async setPageSize(guildId: GuildId, pageSize: number): Promise<Result<ShortcutSettings, ShortcutError>> {
    const size = validatePageSize(pageSize);
    if (size.isErr()) return ErrResult(size.error);

    const saved = this.fromStore(
      await this.repo.updatePageSize(guildId, size.value),
      "setPageSize",
      guildId,
    );
    this.settingsCache.invalidateEntry(guildId);
    if (saved.isErr()) return ErrResult(saved.error);
    if (!saved.value) {
      return ErrResult(
        new ShortcutError("NOT_CONFIGURED", "This server has no shortcut configuration, set a prefix."),
      );
    }
    return OkResult(saved.value);
  }

  /** Cached single-entry lookup (case-insensitive name). */
  async getEntry(guildId: GuildId, name: string): Promise<Result<ShortcutEntry | null, ShortcutError>> {
    return this.fromStore(await this.entryCache.queryOne({ guildId, name }), "getEntry", guildId);
  }

  /** Uncached; always the store's current state in insertion order. */
  async listEntries(
    guildId: GuildId,
    query?: ShortcutEntryQuery,
  ): Promise<Result<ShortcutEntry[], ShortcutError>> {
    return this.fromStore(await this.repo.listEntries(guildId, query), "listEntries", guildId);
  }

  /** Uncached distinct categories with counts, sorted by name. */
  async listCategories(guildId: GuildId): Promise<Result<CategoryCount[], ShortcutError>> {
    const counts = this.fromStore(await this.repo.countByCategory(guildId), "listCategories", guildId);
    if (counts.isErr()) return counts;
    return OkResult(
      [...counts.value]
        .filter((row) => row.count > 0)
        .sort((a, b) => (a.category < b.category ? -1 : a.category > b.category ? 1 : 0)),
    );
  }

  /** Creates or overwrites a shortcut. Requires a configured prefix. */
  async set(input: SetShortcutInput): Promise<Result<SavedShortcut, ShortcutError>> {
    const name = validateName(input.name);
    if (name.isErr()) return ErrResult(name.error);
    const value = validateValue(input.value);
    if (value.isErr()) return ErrResult(value.error);
    const category = validateCategory(input.category);
    if (category.isErr()) return ErrResult(category.error);

    const settings = await this.requireSettings(input.guildId);
    if (settings.isErr()) return ErrResult(settings.error);

    const existing = await this.getEntry(input.guildId, name.value);
    if (existing.isErr()) return ErrResult(existing.error);

    const saved = this.fromStore(
      await this.repo.upsertEntry({
        guildId: input.guildId,
        name: name.value,
        value: value.value,
        category: category.value,
      }),
      "set",
      input.guildId,
    );
    this.entryCache.invalidateEntry({ guildId: input.guildId, name: name.value });
    if (saved.isErr()) return ErrResult(saved.error);
    return OkResult({ entry: saved.value, created: existing.value === null });
  }

  /** Idempotent; a missing name is reported, not raised. */
  async remove(guildId: GuildId, rawName: string): Promise<Result<RemoveOutcome, ShortcutError>> {
    const name = rawName.trim();
    const existing = await this.getEntry(guildId, name);
    if (existing.isErr()) return ErrResult(existing.error);
    if (!existing.value) return OkResult<RemoveOutcome, ShortcutError>("not_found");

    const deleted = await this.repo.deleteEntry(guildId, name);
    this.entryCache.invalidateEntry({ guildId, name });
    const result = this.fromStore(deleted, "remove", guildId);
    if (result.isErr()) return ErrResult(result.error);
    return OkResult<RemoveOutcome, ShortcutError>(result.value ? "removed" : "not_found");
  }

  async rename(
    guildId: GuildId,
    oldName: string,
    newName: string,
  ): Promise<Result<ShortcutEntry, ShortcutError>> {
    const target = validateName(newName);
    if (target.isErr()) return ErrResult(target.error);
    const source = oldName.trim();

    const renamed = await this.repo.renameEntry(guildId, source, target.value);
    this.entryCache.invalidateEntry({ guildId, name: source });
    this.entryCache.invalidateEntry({ guildId, name: target.value });

    const outcome = this.fromStore(renamed, "rename", guildId);
    if (outcome.isErr()) return ErrResult(outcome.error);

    const result = outcome.value;
    if (result.status === "conflict") {
      return ErrResult(
        new ShortcutError("CONFLICT", `A shortcut named \`${target.value}\` already exists.`),
      );
    }
    if (result.status === "missing") {
      return ErrResult(await this.notFound(guildId, source));
    }
    return OkResult(result.entry);
  }

  /** Overwrites the category only. */
  async move(
    guildId: GuildId,
    name: string,
    rawCategory: string,
  ): Promise<Result<ShortcutEntry, ShortcutError>> {
    const category = validateCategory(rawCategory);
    if (category.isErr()) return ErrResult(category.error);

    const updated = await this.repo.updateCategory(guildId, name.trim(), category.value);
    this.entryCache.invalidateEntry({ guildId, name });

    const entry = this.fromStore(updated, "move", guildId);
    if (entry.isErr()) return ErrResult(entry.error);
    if (!entry.value) return ErrResult(await this.notFound(guildId, name.trim()));
    return OkResult(entry.value);
  }

  /**
   * Deletes every entry tagged with `category`.
   *
   * @remarks
   * Callers must have collected the confirmation token first (see `runBulkDelete`).
   */
  async deleteByCategory(guildId: GuildId, rawCategory: string): Promise<Result<number, ShortcutError>> {
    if (!rawCategory.trim()) {
      return ErrResult(new ShortcutError("VALIDATION", "Name a category to delete, or use `all`."));
    }
    const category = validateCategory(rawCategory);
    if (category.isErr()) return ErrResult(category.error);

    const deleted = await this.repo.deleteEntries(guildId, { category: category.value });
    this.entryCache.invalidateByGuild(guildId);

    const count = this.fromStore(deleted, "deleteByCategory", guildId);
    if (count.isErr()) return count;
    if (count.value === 0) {
      const categories = await this.listCategories(guildId);
      return ErrResult(
        new ShortcutError(
          "NOT_FOUND",
          `No shortcuts in category \`${category.value}\`.`,
          categories.isOk() ? categories.value.map((row) => row.category) : [],
        ),
      );
    }
    return OkResult(count.value);
  }

  async deleteAll(guildId: GuildId): Promise<Result<number, ShortcutError>> {
    const deleted = await this.repo.deleteEntries(guildId);
    this.entryCache.invalidateByGuild(guildId);
    return this.fromStore(deleted, "deleteAll", guildId);
  }
}
