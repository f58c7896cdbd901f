import {
  Declare,
  Options,
  SubCommand,
  createIntegerOption,
  type GuildCommandContext,
} from "seyfert";

import { SHORTCUT_LIMITS } from "@/modules/shortcuts";
import { buildSuccessEmbed } from "@/modules/ui/design-system";

import { replyWithError, requireShortcutContext } from "./shared";

const options = {
  size: createIntegerOption({
    description: "Shortcuts per page in the browser",
    required: true,
    min_value: SHORTCUT_LIMITS.minPageSize,
    max_value: SHORTCUT_LIMITS.maxPageSize,
  }),
};

@Declare({
  name: "setpagesize",
  description: "Set how many shortcuts the browser shows per page",
  defaultMemberPermissions: ["ManageGuild"],
})
@Options(options)
export default class ShortcutsSetPageSizeCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireShortcutContext(ctx, { manage: true });
    if (!context) return;

    const saved = await context.shortcuts.service.setPageSize(context.guildId, ctx.options.size);
    if (saved.isErr()) {
      await replyWithError(ctx, saved.error);
      return;
    }

    await ctx.write({
      embeds: [
        buildSuccessEmbed({
          title: "Page size updated",
          description: `The browser now shows ${saved.value.pageSize} shortcut(s) per page.`,
        }),
      ],
    });
  }
}
