import { Declare, SubCommand, type GuildCommandContext } from "seyfert";

import { renderBrowser } from "@/modules/shortcuts";
import { buildBrowserMessage } from "@/modules/shortcuts/views";

import { replyWithError, requireShortcutContext, scheduleBrowserExpiry } from "./shared";

@Declare({
  name: "list",
  description: "Browse shortcuts by category",
})
export default class ShortcutsListCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    const context = await requireShortcutContext(ctx);
    if (!context) return;

    const { browser, sessions } = context.shortcuts;
    const opened = await browser.open(context.guildId);
    if (opened.isErr()) {
      await replyWithError(ctx, opened.error);
      return;
    }

    const state = opened.value;
    const message = await ctx.editOrReply(buildBrowserMessage(renderBrowser(state)), true);
    if (!message || state.categories.length === 0) return;

    sessions.store({ messageId: message.id, invokerId: ctx.author.id, state });
    scheduleBrowserExpiry(ctx.client, message.id, message.channelId ?? ctx.channelId, browser.timeoutMs);
  }
}
