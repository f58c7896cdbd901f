import {
  Declare,
  Options,
  SubCommand,
  createAttachmentOption,
  type GuildCommandContext,
} from "seyfert";

import { ShortcutError, importShortcutsCsv } from "@/modules/shortcuts";
import { buildImportEmbed } from "@/modules/shortcuts/views";

import { replyWithError, requireShortcutContext } from "./shared";

const MAX_IMPORT_BYTES = 1_000_000;

const options = {
  file: createAttachmentOption({
    description: "CSV with columns Shortcut,Value[,Category] (header optional)",
    required: true,
  }),
};

@Declare({
  name: "import",
  description: "Import shortcuts from a CSV file",
  defaultMemberPermissions: ["ManageMessages"],
})
@Options(options)
export default class ShortcutsImportCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireShortcutContext(ctx, { manage: true });
    if (!context) return;

    const { file } = ctx.options;
    if (file.size > MAX_IMPORT_BYTES) {
      await replyWithError(
        ctx,
        new ShortcutError("VALIDATION", `The file is too large (max ${MAX_IMPORT_BYTES} bytes).`),
      );
      return;
    }

    await ctx.deferReply();

    let bytes: Uint8Array;
    try {
      const response = await fetch(file.url);
      if (!response.ok) {
        throw new Error(`download failed with status ${response.status}`);
      }
      bytes = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      ctx.client.logger.warn("[shortcuts:import] attachment download failed", {
        guildId: context.guildId,
        error,
      });
      await ctx.editOrReply({ content: "Could not download the attached file." });
      return;
    }

    const report = await importShortcutsCsv(context.shortcuts.service, context.guildId, bytes);
    if (report.isErr()) {
      await replyWithError(ctx, report.error);
      return;
    }

    await ctx.editOrReply({ embeds: [buildImportEmbed(report.value)] });
  }
}
