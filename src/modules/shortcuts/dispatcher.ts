/**
 * Prefix dispatcher.
 *
 * Purpose: Resolve an inbound chat message to the stored value it triggers.
 *
 * Settings come through the cache; the entry list is always read fresh so a
 * match reflects the store's current order.
 */
import type { GuildId } from "@/db/types";
import type { ShortcutService } from "./service";

/** The parts of a chat message the dispatcher looks at. */
export interface InboundMessage {
  readonly guildId?: GuildId | null;
  readonly authorIsBot: boolean;
  readonly content: string;
}

export class PrefixDispatcher {
  constructor(private readonly service: ShortcutService) {}

  /**
   * Value to reply with, or `null` when the message triggers nothing.
   * Store failures are logged and treated as "no match".
   */
  async resolve(message: InboundMessage): Promise<string | null> {
    const guildId = message.guildId;
    if (!guildId || message.authorIsBot) return null;

    const settings = await this.service.getSettings(guildId);
    if (settings.isErr()) {
      console.warn("[shortcuts:dispatch] settings unavailable", {
        guildId,
        error: settings.error.message,
      });
      return null;
    }
    if (!settings.value) return null;

    const { prefix } = settings.value;
    const { content } = message;
    if (content.length < prefix.length || !content.startsWith(prefix)) return null;

    const entries = await this.service.listEntries(guildId);
    if (entries.isErr()) {
      console.warn("[shortcuts:dispatch] entries unavailable", {
        guildId,
        error: entries.error.message,
      });
      return null;
    }

    const wanted = content.slice(prefix.length).toLowerCase();
    const match = entries.value.find((entry) => entry.name.toLowerCase() === wanted);
    return match ? match.value : null;
  }
}
