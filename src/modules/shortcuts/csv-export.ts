import { stringify } from "csv-stringify/sync";
import type { GuildId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { ShortcutService } from "./service";
import { DEFAULT_CATEGORY, ShortcutError, type ShortcutEntry } from "./types";

export const CSV_HEADER = ["Shortcut", "Value", "Category"] as const;

export interface CsvExport {
  filename: string;
  content: string;
  count: number;
}

export function exportFilename(guildId: GuildId, at: Date): string {
  return `shortcuts-${guildId}-${at.toISOString().slice(0, 10)}.csv`;
}

/** Header row plus one `prefix+name, value, category` row per entry. */
export function renderShortcutsCsv(prefix: string, entries: readonly ShortcutEntry[]): string {
  return stringify([
    [...CSV_HEADER],
    ...entries.map((entry) => [prefix + entry.name, entry.value, entry.category || DEFAULT_CATEGORY]),
  ]);
}

/** `null` when the guild has no shortcuts to export. */
export async function exportShortcutsCsv(
  service: ShortcutService,
  guildId: GuildId,
  now: () => Date = () => new Date(),
): Promise<Result<CsvExport | null, ShortcutError>> {
  const settings = await service.getSettings(guildId);
  if (settings.isErr()) return ErrResult(settings.error);
  if (!settings.value) {
    return ErrResult(new ShortcutError("NOT_CONFIGURED", "Set a prefix first!"));
  }

  const entries = await service.listEntries(guildId);
  if (entries.isErr()) return ErrResult(entries.error);
  if (entries.value.length === 0) return OkResult(null);

  return OkResult({
    filename: exportFilename(guildId, now()),
    content: renderShortcutsCsv(settings.value.prefix, entries.value),
    count: entries.value.length,
  });
}
