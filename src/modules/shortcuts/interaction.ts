/**
 * Browser interaction handling shared by the button and select components.
 */
import type { ComponentContext } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";

import { renderBrowser, type BrowserAction } from "./browser";
import { buildBrowserMessage, buildShortcutErrorEmbed } from "./views";

type BrowserComponentContext = ComponentContext<"Button"> | ComponentContext<"StringSelect">;

export async function driveBrowser(
  ctx: BrowserComponentContext,
  action: BrowserAction,
): Promise<void> {
  const messageId = ctx.interaction.message?.id;
  const { sessions, browser } = ctx.client.shortcuts;
  const session = messageId ? sessions.get(messageId) : undefined;
  if (!messageId || !session) {
    await ctx.write({
      content: "This browser is no longer active. Run `/shortcuts list` again.",
      flags: MessageFlags.Ephemeral,
    });
    return;
  }

  if (ctx.author.id !== session.invokerId) {
    await ctx.write({
      content: "Only the member who opened this browser can use it.",
      flags: MessageFlags.Ephemeral,
    });
    return;
  }

  const result = await browser.dispatch(session.state, action);
  if (result.isErr()) {
    await ctx.write({
      embeds: [buildShortcutErrorEmbed(result.error)],
      flags: MessageFlags.Ephemeral,
    });
    return;
  }

  const step = result.value;
  switch (step.status) {
    case "expired":
      sessions.clear(messageId);
      await ctx.deferUpdate();
      await ctx.editResponse(buildBrowserMessage(renderBrowser(step.state)));
      return;
    case "changed":
      session.state = step.state;
      await ctx.deferUpdate();
      await ctx.editResponse(buildBrowserMessage(renderBrowser(step.state)));
      return;
    case "unchanged":
      session.state = step.state;
      await ctx.write({
        content: action.type === "next" ? "This is the last page." : "This is the first page.",
        flags: MessageFlags.Ephemeral,
      });
      return;
    case "invalid":
      await ctx.write({
        content: "That control is not available right now.",
        flags: MessageFlags.Ephemeral,
      });
      return;
  }
}
