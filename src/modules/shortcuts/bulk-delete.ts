import type { GuildId } from "@/db/types";
import { ErrResult, type Result } from "@/utils/result";
import type { ShortcutService } from "./service";
import { BULK_DELETE_CONFIRMATION, ShortcutError, type BulkDeleteTarget } from "./types";

export interface BulkDeleteRequest {
  guildId: GuildId;
  target: BulkDeleteTarget;
  /** Must equal `CONFIRM` exactly; nothing is deleted otherwise. */
  confirmation?: string | null;
}

/** Resolves `all` (any case) to every entry, anything else to a category. */
export function parseBulkDeleteTarget(raw: string): BulkDeleteTarget {
  const value = raw.trim();
  return value.toLowerCase() === "all" ? { kind: "all" } : { kind: "category", category: value };
}

export async function runBulkDelete(
  service: ShortcutService,
  request: BulkDeleteRequest,
): Promise<Result<number, ShortcutError>> {
  if (request.confirmation !== BULK_DELETE_CONFIRMATION) {
    const what =
      request.target.kind === "all" ? "every shortcut" : `every shortcut in \`${request.target.category}\``;
    return ErrResult(
      new ShortcutError(
        "CONFIRMATION_REQUIRED",
        `This deletes ${what}. Run the command again with \`${BULK_DELETE_CONFIRMATION}\` to proceed.`,
      ),
    );
  }

  const deleted =
    request.target.kind === "all"
      ? await service.deleteAll(request.guildId)
      : await service.deleteByCategory(request.guildId, request.target.category);
  if (deleted.isOk()) {
    console.log("[shortcuts] bulk delete", {
      guildId: request.guildId,
      target: request.target,
      deleted: deleted.value,
    });
  }
  return deleted;
}
