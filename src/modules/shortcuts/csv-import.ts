/**
 * CSV import.
 *
 * Purpose: Upsert shortcuts from an uploaded `Shortcut,Value[,Category]` file.
 *
 * Whole-file problems (undecodable bytes, broken CSV, no prefix configured)
 * abort before any row is written. Row problems are recorded as
 * `row N: reason`, N being the file line the record starts on, and only that
 * row is skipped. A store failure stops the
 * import; rows already written stay written.
 */
import { parse } from "csv-parse/sync";
import { z } from "zod";
import type { GuildId } from "@/db/types";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import type { ShortcutService } from "./service";
import { SHORTCUT_LIMITS, ShortcutError } from "./types";

export interface CsvImportReport {
  imported: number;
  skipped: number;
  /** First `SHORTCUT_LIMITS.importErrorListing` row errors. */
  errors: string[];
  /** Row errors left out of `errors`. */
  hiddenErrors: number;
}

interface ColumnLayout {
  hasHeader: boolean;
  name: number;
  value: number;
  /** `-1` when the file has no category column. */
  category: number;
}

/** One parsed record and the 1-based file line it starts on. */
export interface CsvRow {
  cells: string[];
  line: number;
}

const RecordsSchema = z.array(
  z.object({
    record: z.array(z.string()),
    info: z.object({ lines: z.number() }),
  }),
);

const POSITIONAL: ColumnLayout = { hasHeader: false, name: 0, value: 1, category: 2 };

export function decodeCsv(bytes: Uint8Array): Result<string, ShortcutError> {
  try {
    return OkResult(new TextDecoder("utf-8", { fatal: true }).decode(bytes));
  } catch {
    return ErrResult(new ShortcutError("DECODE", "The file is not valid UTF-8 text."));
  }
}

const lineBreaksIn = (cells: readonly string[]): number =>
  cells.reduce((total, cell) => total + cell.split("\n").length - 1, 0);

export function parseCsvRows(text: string): Result<CsvRow[], ShortcutError> {
  let records: unknown;
  try {
    records = parse(text, { bom: true, info: true, relax_column_count: true, skip_empty_lines: true });
  } catch (error) {
    return ErrResult(new ShortcutError("MALFORMED_CSV", `Could not read the CSV: ${toError(error).message}`));
  }

  const parsed = RecordsSchema.safeParse(records);
  if (!parsed.success || parsed.data.length === 0) {
    return ErrResult(new ShortcutError("MALFORMED_CSV", "The CSV file has no rows."));
  }
  // `info.lines` is the line a record ends on; quoted line breaks push it past the start.
  return OkResult(
    parsed.data.map(({ record, info }) => ({ cells: record, line: info.lines - lineBreaksIn(record) })),
  );
}

const headerCell = (cell: string | undefined): string => (cell ?? "").trim().toLowerCase();

/**
 * A first row whose first two cells read `shortcut` and `value` is a header;
 * anything else is data in positional columns.
 */
export function detectLayout(firstRow: readonly string[]): ColumnLayout {
  if (headerCell(firstRow[0]) !== "shortcut" || headerCell(firstRow[1]) !== "value") {
    return POSITIONAL;
  }
  const header = firstRow.map(headerCell);
  return {
    hasHeader: true,
    name: header.indexOf("shortcut"),
    value: header.indexOf("value"),
    category: header.indexOf("category"),
  };
}

function stripPrefix(cell: string, prefix: string): string {
  const name = cell.trim();
  return name.startsWith(prefix) ? name.slice(prefix.length) : name;
}

export async function importShortcutsCsv(
  service: ShortcutService,
  guildId: GuildId,
  bytes: Uint8Array,
): Promise<Result<CsvImportReport, ShortcutError>> {
  const text = decodeCsv(bytes);
  if (text.isErr()) return ErrResult(text.error);

  const rows = parseCsvRows(text.value);
  if (rows.isErr()) return ErrResult(rows.error);

  const settings = await service.getSettings(guildId);
  if (settings.isErr()) return ErrResult(settings.error);
  if (!settings.value) {
    return ErrResult(new ShortcutError("NOT_CONFIGURED", "Set a prefix first!"));
  }
  const { prefix } = settings.value;

  const layout = detectLayout(rows.value[0]?.cells ?? []);
  const allErrors: string[] = [];
  let imported = 0;

  for (const [index, { cells: row, line: rowNumber }] of rows.value.entries()) {
    if (layout.hasHeader && index === 0) continue;

    const saved = await service.set({
      guildId,
      name: stripPrefix(row[layout.name] ?? "", prefix),
      value: row[layout.value] ?? "",
      category: layout.category >= 0 ? row[layout.category] : undefined,
    });

    if (saved.isOk()) {
      imported += 1;
      continue;
    }
    if (saved.error.code !== "VALIDATION") {
      console.error("[shortcuts:import] aborted", { guildId, rowNumber, imported, error: saved.error.message });
      return ErrResult(
        new ShortcutError(
          saved.error.code,
          `Import stopped at row ${rowNumber} (${saved.error.message}). ${imported} shortcut(s) were imported before the failure.`,
        ),
      );
    }
    allErrors.push(`row ${rowNumber}: ${saved.error.message}`);
  }

  const limit = SHORTCUT_LIMITS.importErrorListing;
  console.log("[shortcuts:import] done", { guildId, imported, skipped: allErrors.length });
  return OkResult({
    imported,
    skipped: allErrors.length,
    errors: allErrors.slice(0, limit),
    hiddenErrors: Math.max(0, allErrors.length - limit),
  });
}
