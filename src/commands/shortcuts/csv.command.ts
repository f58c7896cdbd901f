import { AttachmentBuilder, Declare, SubCommand, type GuildCommandContext } from "seyfert";

import { exportShortcutsCsv } from "@/modules/shortcuts";

import { replyWithError, requireShortcutContext } from "./shared";

@Declare({
  name: "csv",
  description: "Export this server's shortcuts as a CSV file",
})
export default class ShortcutsCsvCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    const context = await requireShortcutContext(ctx);
    if (!context) return;

    await ctx.deferReply();
    const exported = await exportShortcutsCsv(context.shortcuts.service, context.guildId);
    if (exported.isErr()) {
      await replyWithError(ctx, exported.error);
      return;
    }
    if (!exported.value) {
      await ctx.editOrReply({ content: "No shortcuts for this server!" });
      return;
    }

    const file = new AttachmentBuilder()
      .setName(exported.value.filename)
      .setDescription("Shortcut export")
      .setFile("buffer", Buffer.from(exported.value.content, "utf-8"));

    await ctx.editOrReply({
      content: `Exported ${exported.value.count} shortcut(s).`,
      files: [file],
    });
  }
}
