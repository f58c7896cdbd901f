/**
 * Shortcut document schemas.
 *
 * Purpose: Runtime validation + repair for persisted settings and entries.
 */

import { z } from "zod";
import { DEFAULT_CATEGORY, SHORTCUT_LIMITS } from "./types";
import type { ShortcutEntry, ShortcutSettings } from "./types";

export const ShortcutSettingsSchema = z.object({
  _id: z.string(),
  prefix: z.string().min(1),
  pageSize: z
    .number()
    .int()
    .min(SHORTCUT_LIMITS.minPageSize)
    .max(SHORTCUT_LIMITS.maxPageSize)
    .catch(SHORTCUT_LIMITS.defaultPageSize),
  createdAt: z.coerce.date().catch(() => new Date()),
  updatedAt: z.coerce.date().catch(() => new Date()),
});

export type ShortcutSettingsDoc = z.infer<typeof ShortcutSettingsSchema>;

export const ShortcutEntrySchema = z.object({
  _id: z.string(),
  guildId: z.string(),
  name: z.string().min(1),
  value: z.string(),
  category: z.string().min(1).catch(DEFAULT_CATEGORY),
  createdAt: z.coerce.date().catch(() => new Date()),
  updatedAt: z.coerce.date().catch(() => new Date()),
});

export type ShortcutEntryDoc = z.infer<typeof ShortcutEntrySchema>;

export const shortcutKeys = {
  settings: (guildId: string): string => guildId,
  entry: (guildId: string, name: string): string =>
    `${guildId}:${name.trim().toLowerCase()}`,
} as const;

export const toSettings = (doc: ShortcutSettingsDoc): ShortcutSettings => ({
  guildId: doc._id,
  prefix: doc.prefix,
  pageSize: doc.pageSize,
});

export const toEntry = (doc: ShortcutEntryDoc): ShortcutEntry => ({
  guildId: doc.guildId,
  name: doc.name,
  value: doc.value,
  category: doc.category,
});

/** Parses a settings document; `null` when it cannot be repaired (no prefix). */
export function parseSettingsDoc(doc: unknown): ShortcutSettingsDoc | null {
  const parsed = ShortcutSettingsSchema.safeParse(doc);
  if (parsed.success) return parsed.data;
  console.warn("[ShortcutRepository] Invalid settings document ignored.", parsed.error.issues);
  return null;
}

/** Parses an entry document; `null` when the key fields are unusable. */
export function parseEntryDoc(doc: unknown): ShortcutEntryDoc | null {
  const parsed = ShortcutEntrySchema.safeParse(doc);
  if (parsed.success) return parsed.data;
  console.warn("[ShortcutRepository] Invalid shortcut document ignored.", parsed.error.issues);
  return null;
}
