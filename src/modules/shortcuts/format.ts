import type { CsvImportReport } from "./csv-import";
import { SHORTCUT_LIMITS, type CategoryCount, type ShortcutError } from "./types";

/** Backticked names, capped with a `+K more` suffix. */
export function formatNameListing(
  names: readonly string[],
  limit: number = SHORTCUT_LIMITS.notFoundListing,
): string {
  if (names.length === 0) return "none";
  const shown = names.slice(0, limit).map((name) => `\`${name}\``).join(", ");
  const hidden = names.length - limit;
  return hidden > 0 ? `${shown} +${hidden} more` : shown;
}

/** Single-line reply text for an error. */
export function describeError(error: ShortcutError): string {
  if (error.code === "NOT_FOUND") {
    return `${error.message} Existing: ${formatNameListing(error.known)}`;
  }
  return error.message;
}

export function formatImportReport(report: CsvImportReport): string {
  const lines = [`Imported ${report.imported} shortcut(s), skipped ${report.skipped}.`];
  if (report.errors.length > 0) {
    lines.push("", ...report.errors);
    if (report.hiddenErrors > 0) lines.push(`+${report.hiddenErrors} more`);
  }
  return lines.join("\n");
}

export function formatCategoryCounts(rows: readonly CategoryCount[]): string {
  return rows.map((row) => `**${row.category}**: ${row.count}`).join("\n");
}
