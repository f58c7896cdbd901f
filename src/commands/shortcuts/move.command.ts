import {
  Declare,
  Options,
  SubCommand,
  createStringOption,
  type GuildCommandContext,
} from "seyfert";

import { SHORTCUT_LIMITS } from "@/modules/shortcuts";
import { buildSuccessEmbed } from "@/modules/ui/design-system";

import { replyWithError, requireShortcutContext } from "./shared";

const options = {
  name: createStringOption({
    description: "Shortcut to move",
    required: true,
  }),
  category: createStringOption({
    description: "Destination category",
    required: true,
    max_length: SHORTCUT_LIMITS.maxCategoryLength,
  }),
};

@Declare({
  name: "move",
  description: "Move a shortcut to another category",
  defaultMemberPermissions: ["ManageMessages"],
})
@Options(options)
export default class ShortcutsMoveCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireShortcutContext(ctx, { manage: true });
    if (!context) return;

    const moved = await context.shortcuts.service.move(
      context.guildId,
      ctx.options.name,
      ctx.options.category,
    );
    if (moved.isErr()) {
      await replyWithError(ctx, moved.error);
      return;
    }

    await ctx.write({
      embeds: [
        buildSuccessEmbed({
          title: "Shortcut moved",
          description: `\`${moved.value.name}\` is now in **${moved.value.category}**.`,
        }),
      ],
    });
  }
}
