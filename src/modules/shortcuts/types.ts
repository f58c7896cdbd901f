/**
 * Shortcut domain types.
 *
 * Purpose: Define guild settings, shortcut entries, limits and the error model.
 */

import type { GuildId } from "@/db/types";

export const DEFAULT_CATEGORY = "General";

export const SHORTCUT_LIMITS = {
  maxNameLength: 20,
  maxCategoryLength: 50,
  minPageSize: 1,
  maxPageSize: 25,
  defaultPageSize: 10,
  displayValueCap: 1024,
  notFoundListing: 10,
  importErrorListing: 10,
} as const;

export const CATEGORY_PATTERN = /^[A-Za-z0-9 _-]+$/;

/** Literal token `bulk_delete` requires on the same invocation. */
export const BULK_DELETE_CONFIRMATION = "CONFIRM";

export interface ShortcutSettings {
  readonly guildId: GuildId;
  readonly prefix: string;
  readonly pageSize: number;
}

export interface ShortcutEntry {
  readonly guildId: GuildId;
  readonly name: string;
  readonly value: string;
  readonly category: string;
}

export interface CategoryCount {
  readonly category: string;
  readonly count: number;
}

export interface SetShortcutInput {
  readonly guildId: GuildId;
  readonly name: string;
  readonly value: string;
  readonly category?: string | null;
}

/** Typed filter for entry listings; `category` matches exactly. */
export interface ShortcutEntryQuery {
  readonly category?: string;
}

/** `created` is false when an existing name was overwritten. */
export interface SavedShortcut {
  readonly entry: ShortcutEntry;
  readonly created: boolean;
}

export type RemoveOutcome = "removed" | "not_found";

export type RenameOutcome =
  | { readonly status: "renamed"; readonly entry: ShortcutEntry }
  | { readonly status: "missing" }
  | { readonly status: "conflict" };

export type BulkDeleteTarget =
  | { readonly kind: "all" }
  | { readonly kind: "category"; readonly category: string };

export type ShortcutErrorCode =
  | "VALIDATION"
  | "NOT_FOUND"
  | "CONFLICT"
  | "TRANSPORT"
  | "NOT_CONFIGURED"
  | "CONFIRMATION_REQUIRED"
  | "DECODE"
  | "MALFORMED_CSV";

export class ShortcutError extends Error {
  constructor(
    public readonly code: ShortcutErrorCode,
    message: string,
    /** For `NOT_FOUND`: the names (or categories) that do exist. */
    public readonly known: readonly string[] = [],
  ) {
    super(message);
    this.name = "ShortcutError";
  }
}

export const validationError = (message: string): ShortcutError =>
  new ShortcutError("VALIDATION", message);

export const transportError = (cause: Error): ShortcutError =>
  new ShortcutError("TRANSPORT", `Shortcut storage is unavailable: ${cause.message}`);
