/**
 * Shortcut repository.
 *
 * Purpose: Persist guild settings and shortcut entries (two guild-scoped
 * collections) behind an interface the service and tests share.
 *
 * Every method returns `Result` and never throws; the service decides how a
 * store failure reaches the user.
 */

import { getDb, getMongoClient } from "@/db/mongo";
import { isDuplicateKeyError, isTransactionUnsupported } from "@/db/helpers";
import type { GuildId } from "@/db/types";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import type { ClientSession, Collection, Filter } from "mongodb";
import {
  parseEntryDoc,
  parseSettingsDoc,
  shortcutKeys,
  toEntry,
  toSettings,
  type ShortcutEntryDoc,
  type ShortcutSettingsDoc,
} from "./schema";
import {
  DEFAULT_CATEGORY,
  SHORTCUT_LIMITS,
  type CategoryCount,
  type RenameOutcome,
  type ShortcutEntry,
  type ShortcutEntryQuery,
  type ShortcutSettings,
} from "./types";

const SETTINGS_COLLECTION = "shortcut_settings";
const ENTRIES_COLLECTION = "shortcuts";

export interface ShortcutRepository {
  ensureIndexes(): Promise<Result<void>>;
  getSettings(guildId: GuildId): Promise<Result<ShortcutSettings | null>>;
  /** Creates the settings row when absent (default page size). */
  upsertPrefix(guildId: GuildId, prefix: string): Promise<Result<ShortcutSettings>>;
  /** `null` when the guild has no settings row. */
  updatePageSize(guildId: GuildId, pageSize: number): Promise<Result<ShortcutSettings | null>>;
  getEntry(guildId: GuildId, name: string): Promise<Result<ShortcutEntry | null>>;
  /** Entries in insertion order. */
  listEntries(guildId: GuildId, query?: ShortcutEntryQuery): Promise<Result<ShortcutEntry[]>>;
  /** Upsert keyed by (guild, lowercase name); overwrites name casing, value and category. */
  upsertEntry(entry: ShortcutEntry): Promise<Result<ShortcutEntry>>;
  deleteEntry(guildId: GuildId, name: string): Promise<Result<boolean>>;
  renameEntry(guildId: GuildId, from: string, to: string): Promise<Result<RenameOutcome>>;
  /** `null` when the entry does not exist. */
  updateCategory(
    guildId: GuildId,
    name: string,
    category: string,
  ): Promise<Result<ShortcutEntry | null>>;
  /** Returns the number of deleted entries. */
  deleteEntries(guildId: GuildId, query?: ShortcutEntryQuery): Promise<Result<number>>;
  countByCategory(guildId: GuildId): Promise<Result<CategoryCount[]>>;
}

const entryFilter = (
  guildId: GuildId,
  query?: ShortcutEntryQuery,
): Filter<ShortcutEntryDoc> =>
  query?.category !== undefined ? { guildId, category: query.category } : { guildId };

export class MongoShortcutRepository implements ShortcutRepository {
  private async settings(): Promise<Collection<ShortcutSettingsDoc>> {
    return (await getDb()).collection<ShortcutSettingsDoc>(SETTINGS_COLLECTION);
  }

  private async entries(): Promise<Collection<ShortcutEntryDoc>> {
    return (await getDb()).collection<ShortcutEntryDoc>(ENTRIES_COLLECTION);
  }

  async ensureIndexes(): Promise<Result<void>> {
    try {
      const col = await this.entries();
      await col.createIndex({ guildId: 1, createdAt: 1 }, { name: "guild_created_idx" });
      await col.createIndex({ guildId: 1, category: 1 }, { name: "guild_category_idx" });
      return OkResult(undefined);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async getSettings(guildId: GuildId): Promise<Result<ShortcutSettings | null>> {
    try {
      const col = await this.settings();
      const doc = await col.findOne({ _id: shortcutKeys.settings(guildId) });
      const parsed = doc ? parseSettingsDoc(doc) : null;
      return OkResult(parsed ? toSettings(parsed) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async upsertPrefix(guildId: GuildId, prefix: string): Promise<Result<ShortcutSettings>> {
    try {
      const col = await this.settings();
      const now = new Date();
      const doc = await col.findOneAndUpdate(
        { _id: shortcutKeys.settings(guildId) },
        {
          $set: { prefix, updatedAt: now },
          $setOnInsert: { pageSize: SHORTCUT_LIMITS.defaultPageSize, createdAt: now },
        },
        { upsert: true, returnDocument: "after" },
      );
      const parsed = doc ? parseSettingsDoc(doc) : null;
      if (!parsed) {
        return ErrResult(new Error(`settings for guild ${guildId} missing after upsert`));
      }
      return OkResult(toSettings(parsed));
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async updatePageSize(
    guildId: GuildId,
    pageSize: number,
  ): Promise<Result<ShortcutSettings | null>> {
    try {
      const col = await this.settings();
      const doc = await col.findOneAndUpdate(
        { _id: shortcutKeys.settings(guildId) },
        { $set: { pageSize, updatedAt: new Date() } },
        { returnDocument: "after" },
      );
      const parsed = doc ? parseSettingsDoc(doc) : null;
      return OkResult(parsed ? toSettings(parsed) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async getEntry(guildId: GuildId, name: string): Promise<Result<ShortcutEntry | null>> {
    try {
      const col = await this.entries();
      const doc = await col.findOne({ _id: shortcutKeys.entry(guildId, name) });
      const parsed = doc ? parseEntryDoc(doc) : null;
      return OkResult(parsed ? toEntry(parsed) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async listEntries(
    guildId: GuildId,
    query?: ShortcutEntryQuery,
  ): Promise<Result<ShortcutEntry[]>> {
    try {
      const col = await this.entries();
      const docs = await col
        .find(entryFilter(guildId, query))
        .sort({ createdAt: 1, _id: 1 })
        .toArray();
      const entries: ShortcutEntry[] = [];
      for (const doc of docs) {
        const parsed = parseEntryDoc(doc);
        if (parsed) entries.push(toEntry(parsed));
      }
      return OkResult(entries);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async upsertEntry(entry: ShortcutEntry): Promise<Result<ShortcutEntry>> {
    try {
      const col = await this.entries();
      const now = new Date();
      await col.updateOne(
        { _id: shortcutKeys.entry(entry.guildId, entry.name) },
        {
          $set: {
            guildId: entry.guildId,
            name: entry.name,
            value: entry.value,
            category: entry.category,
            updatedAt: now,
          },
          $setOnInsert: { createdAt: now },
        },
        { upsert: true },
      );
      return OkResult(entry);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async deleteEntry(guildId: GuildId, name: string): Promise<Result<boolean>> {
    try {
      const col = await this.entries();
      const res = await col.deleteOne({ _id: shortcutKeys.entry(guildId, name) });
      return OkResult(res.deletedCount > 0);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  /**
   * Copies the source row under the new name, then deletes the source.
   *
   * @remarks
   * Both steps run in one transaction. Standalone deployments reject
   * transactions; there the steps run in sequence and a failed delete removes
   * the copy again so the guild never keeps both names.
   */
  async renameEntry(
    guildId: GuildId,
    from: string,
    to: string,
  ): Promise<Result<RenameOutcome>> {
    let col: Collection<ShortcutEntryDoc>;
    try {
      col = await this.entries();
    } catch (error) {
      return ErrResult(toError(error));
    }

    const client = await getMongoClient().catch((error: unknown) => toError(error));
    if (client instanceof Error) return ErrResult(client);

    const session = client.startSession();
    try {
      const holder: { outcome: RenameOutcome | null } = { outcome: null };
      await session.withTransaction(async () => {
        holder.outcome = await this.copyThenDelete(col, guildId, from, to, session);
      });
      if (!holder.outcome) {
        return ErrResult(new Error("rename transaction finished without an outcome"));
      }
      return OkResult(holder.outcome);
    } catch (error) {
      if (isDuplicateKeyError(error)) return OkResult({ status: "conflict" });
      if (!isTransactionUnsupported(error)) return ErrResult(toError(error));
    } finally {
      await session.endSession();
    }

    return this.renameWithoutTransaction(col, guildId, from, to);
  }

  private async copyThenDelete(
    col: Collection<ShortcutEntryDoc>,
    guildId: GuildId,
    from: string,
    to: string,
    session?: ClientSession,
    progress: { inserted: boolean } = { inserted: false },
  ): Promise<RenameOutcome> {
    const fromId = shortcutKeys.entry(guildId, from);
    const toId = shortcutKeys.entry(guildId, to);
    const now = new Date();

    const raw = await col.findOne({ _id: fromId }, { session });
    const source = raw ? parseEntryDoc(raw) : null;
    if (!source) return { status: "missing" };

    if (fromId === toId) {
      await col.updateOne({ _id: fromId }, { $set: { name: to, updatedAt: now } }, { session });
      return { status: "renamed", entry: toEntry({ ...source, name: to }) };
    }

    const existing = await col.findOne({ _id: toId }, { session });
    if (existing) return { status: "conflict" };

    const copy: ShortcutEntryDoc = { ...source, _id: toId, name: to, updatedAt: now };
    await col.insertOne(copy, { session });
    progress.inserted = true;
    await col.deleteOne({ _id: fromId }, { session });
    return { status: "renamed", entry: toEntry(copy) };
  }

  private async renameWithoutTransaction(
    col: Collection<ShortcutEntryDoc>,
    guildId: GuildId,
    from: string,
    to: string,
  ): Promise<Result<RenameOutcome>> {
    const progress = { inserted: false };
    try {
      return OkResult(await this.copyThenDelete(col, guildId, from, to, undefined, progress));
    } catch (error) {
      if (isDuplicateKeyError(error)) return OkResult({ status: "conflict" });
      if (progress.inserted) {
        await col.deleteOne({ _id: shortcutKeys.entry(guildId, to) }).catch((compensation: unknown) => {
          console.error("[ShortcutRepository] rename compensation failed", {
            guildId,
            from,
            to,
            error: compensation,
          });
        });
      }
      return ErrResult(toError(error));
    }
  }

  async updateCategory(
    guildId: GuildId,
    name: string,
    category: string,
  ): Promise<Result<ShortcutEntry | null>> {
    try {
      const col = await this.entries();
      const doc = await col.findOneAndUpdate(
        { _id: shortcutKeys.entry(guildId, name) },
        { $set: { category, updatedAt: new Date() } },
        { returnDocument: "after" },
      );
      const parsed = doc ? parseEntryDoc(doc) : null;
      return OkResult(parsed ? toEntry(parsed) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async deleteEntries(guildId: GuildId, query?: ShortcutEntryQuery): Promise<Result<number>> {
    try {
      const col = await this.entries();
      const res = await col.deleteMany(entryFilter(guildId, query));
      return OkResult(res.deletedCount);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async countByCategory(guildId: GuildId): Promise<Result<CategoryCount[]>> {
    try {
      const col = await this.entries();
      const rows = await col
        .aggregate<{ _id: unknown; count: number }>([
          { $match: { guildId } },
          { $group: { _id: "$category", count: { $sum: 1 } } },
          { $sort: { _id: 1 } },
        ])
        .toArray();
      return OkResult(
        rows.map((row) => ({
          category: typeof row._id === "string" && row._id ? row._id : DEFAULT_CATEGORY,
          count: row.count,
        })),
      );
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}
