import { Declare, SubCommand, type GuildCommandContext } from "seyfert";

import { buildSettingsEmbed } from "@/modules/shortcuts/views";

import { replyWithError, requireShortcutContext } from "./shared";

@Declare({
  name: "info",
  description: "Show the shortcut prefix and page size",
})
export default class ShortcutsInfoCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    const context = await requireShortcutContext(ctx);
    if (!context) return;

    const settings = await context.shortcuts.service.getSettings(context.guildId);
    if (settings.isErr()) {
      await replyWithError(ctx, settings.error);
      return;
    }

    await ctx.write({ embeds: [buildSettingsEmbed(settings.value)] });
  }
}
