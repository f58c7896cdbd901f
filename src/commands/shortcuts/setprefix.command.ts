import {
  Declare,
  Options,
  SubCommand,
  createStringOption,
  type GuildCommandContext,
} from "seyfert";

import { buildSuccessEmbed } from "@/modules/ui/design-system";

import { replyWithError, requireShortcutContext } from "./shared";

const options = {
  prefix: createStringOption({
    description: "Text that must start a message to trigger a shortcut",
    required: true,
  }),
};

@Declare({
  name: "setprefix",
  description: "Set the prefix that triggers shortcuts",
  defaultMemberPermissions: ["ManageGuild"],
})
@Options(options)
export default class ShortcutsSetPrefixCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireShortcutContext(ctx, { manage: true });
    if (!context) return;

    const saved = await context.shortcuts.service.setPrefix(context.guildId, ctx.options.prefix);
    if (saved.isErr()) {
      await replyWithError(ctx, saved.error);
      return;
    }

    ctx.client.logger.info("[shortcuts] prefix updated", {
      guildId: context.guildId,
      actorId: ctx.author.id,
    });
    await ctx.write({
      embeds: [
        buildSuccessEmbed({
          title: "Prefix updated",
          description: `Shortcuts now trigger with \`${saved.value.prefix}\`.`,
        }),
      ],
    });
  }
}
