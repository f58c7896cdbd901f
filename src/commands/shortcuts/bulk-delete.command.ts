import {
  Declare,
  Options,
  SubCommand,
  createStringOption,
  type GuildCommandContext,
} from "seyfert";

import { BULK_DELETE_CONFIRMATION, parseBulkDeleteTarget, runBulkDelete } from "@/modules/shortcuts";
import { buildSuccessEmbed } from "@/modules/ui/design-system";

import { replyWithError, requireShortcutContext } from "./shared";

const options = {
  target: createStringOption({
    description: "A category name, or `all` for every shortcut",
    required: true,
  }),
  confirm: createStringOption({
    description: `Type ${BULK_DELETE_CONFIRMATION} to delete`,
    required: false,
  }),
};

@Declare({
  name: "bulk_delete",
  description: "Delete every shortcut in a category, or all of them",
  defaultMemberPermissions: ["ManageGuild"],
})
@Options(options)
export default class ShortcutsBulkDeleteCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireShortcutContext(ctx, { manage: true });
    if (!context) return;

    const target = parseBulkDeleteTarget(ctx.options.target);
    const deleted = await runBulkDelete(context.shortcuts.service, {
      guildId: context.guildId,
      target,
      confirmation: ctx.options.confirm,
    });
    if (deleted.isErr()) {
      await replyWithError(ctx, deleted.error);
      return;
    }

    ctx.client.logger.info("[shortcuts] bulk delete by command", {
      guildId: context.guildId,
      actorId: ctx.author.id,
      deleted: deleted.value,
    });
    const scope = target.kind === "all" ? "" : ` from **${target.category}**`;
    await ctx.write({
      embeds: [
        buildSuccessEmbed({
          title: "Shortcuts deleted",
          description: `Deleted ${deleted.value} shortcut(s)${scope}.`,
        }),
      ],
    });
  }
}
