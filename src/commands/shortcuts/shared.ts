/**
 * Shortcut command helpers.
 *
 * Guild and permission checks, the standard error reply and browser expiry,
 * so each subcommand only deals with its own operation.
 */

import type { GuildCommandContext, UsingClient } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";

import {
  EXPIRED,
  renderBrowser,
  type ShortcutError,
  type ShortcutsRuntime,
} from "@/modules/shortcuts";
import { buildBrowserMessage, buildShortcutErrorEmbed } from "@/modules/shortcuts/views";

export const GUILD_ONLY_MESSAGE = "This command only works inside a server.";

export interface ShortcutCommandContext {
  guildId: string;
  shortcuts: ShortcutsRuntime;
}

/**
 * Resolve the guild and the shortcuts runtime. When `manage` is set the
 * caller also needs Manage Messages.
 */
export async function requireShortcutContext(
  ctx: GuildCommandContext,
  options: { manage?: boolean } = {},
): Promise<ShortcutCommandContext | null> {
  const guildId = ctx.guildId;
  if (!guildId) {
    await ctx.write({ content: GUILD_ONLY_MESSAGE, flags: MessageFlags.Ephemeral });
    return null;
  }

  if (options.manage && ctx.member?.permissions.has(["ManageMessages"]) !== true) {
    await ctx.write({
      content: "You need the Manage Messages permission to change shortcuts.",
      flags: MessageFlags.Ephemeral,
    });
    return null;
  }

  return { guildId, shortcuts: ctx.client.shortcuts };
}

export async function replyWithError(
  ctx: GuildCommandContext,
  error: ShortcutError,
): Promise<void> {
  await ctx.editOrReply({
    embeds: [buildShortcutErrorEmbed(error)],
    flags: MessageFlags.Ephemeral,
  });
}

/**
 * Disable the browser once it has been idle for the full timeout. Activity
 * pushes the deadline back, so the check re-arms itself until then.
 */
export function scheduleBrowserExpiry(
  client: UsingClient,
  messageId: string,
  channelId: string,
  delayMs: number,
): void {
  setTimeout(() => {
    expireBrowser(client, messageId, channelId).catch((error: unknown) => {
      client.logger.warn("[shortcuts] failed to expire browser", { messageId, error });
    });
  }, delayMs);
}

async function expireBrowser(
  client: UsingClient,
  messageId: string,
  channelId: string,
): Promise<void> {
  const { sessions, browser } = client.shortcuts;
  const session = sessions.get(messageId);
  if (!session) return;

  const { state } = session;
  if (state.kind !== "expired") {
    const remaining = state.lastActivityAt + browser.timeoutMs - Date.now();
    if (remaining > 0) {
      scheduleBrowserExpiry(client, messageId, channelId, remaining);
      return;
    }
  }

  sessions.clear(messageId);
  await client.messages.edit(messageId, channelId, buildBrowserMessage(renderBrowser(EXPIRED)));
}
