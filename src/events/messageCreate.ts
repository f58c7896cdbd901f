/**
 * Scans every chat message for a shortcut trigger and replies with the
 * stored value in the same channel.
 */
import { createEvent } from "seyfert";

export default createEvent({
  data: { name: "messageCreate" },
  async run(message, client) {
    const value = await client.shortcuts.dispatcher.resolve({
      guildId: message.guildId,
      authorIsBot: message.author.bot === true,
      content: message.content,
    });
    if (value === null) return;

    try {
      await client.messages.write(message.channelId, { content: value });
    } catch (error) {
      client.logger.error("[shortcuts:dispatch] reply failed", {
        guildId: message.guildId,
        channelId: message.channelId,
        error,
      });
    }
  },
});
