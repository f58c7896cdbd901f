import { Declare, SubCommand, type GuildCommandContext } from "seyfert";

import { buildCategoriesEmbed } from "@/modules/shortcuts/views";

import { replyWithError, requireShortcutContext } from "./shared";

@Declare({
  name: "categories",
  description: "Count shortcuts per category",
})
export default class ShortcutsCategoriesCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    const context = await requireShortcutContext(ctx);
    if (!context) return;

    const rows = await context.shortcuts.service.listCategories(context.guildId);
    if (rows.isErr()) {
      await replyWithError(ctx, rows.error);
      return;
    }

    await ctx.write({ embeds: [buildCategoriesEmbed(rows.value)] });
  }
}
