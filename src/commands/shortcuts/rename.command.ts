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
  old: createStringOption({
    description: "Current shortcut name",
    required: true,
  }),
  new: createStringOption({
    description: "New shortcut name",
    required: true,
    max_length: SHORTCUT_LIMITS.maxNameLength,
  }),
};

@Declare({
  name: "rename",
  description: "Rename a shortcut",
  defaultMemberPermissions: ["ManageMessages"],
})
@Options(options)
export default class ShortcutsRenameCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireShortcutContext(ctx, { manage: true });
    if (!context) return;

    const renamed = await context.shortcuts.service.rename(
      context.guildId,
      ctx.options.old,
      ctx.options.new,
    );
    if (renamed.isErr()) {
      await replyWithError(ctx, renamed.error);
      return;
    }

    await ctx.write({
      embeds: [
        buildSuccessEmbed({
          title: "Shortcut renamed",
          description: `\`${ctx.options.old.trim()}\` is now \`${renamed.value.name}\`.`,
        }),
      ],
    });
  }
}
