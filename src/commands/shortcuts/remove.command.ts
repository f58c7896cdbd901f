import {
  Declare,
  Options,
  SubCommand,
  createStringOption,
  type GuildCommandContext,
} from "seyfert";

import { ShortcutError } from "@/modules/shortcuts";
import { buildSuccessEmbed } from "@/modules/ui/design-system";

import { replyWithError, requireShortcutContext } from "./shared";

const options = {
  name: createStringOption({
    description: "Shortcut to remove",
    required: true,
  }),
};

@Declare({
  name: "remove",
  description: "Remove a shortcut",
  defaultMemberPermissions: ["ManageMessages"],
})
@Options(options)
export default class ShortcutsRemoveCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireShortcutContext(ctx, { manage: true });
    if (!context) return;

    const { service } = context.shortcuts;
    const name = ctx.options.name.trim();
    const removed = await service.remove(context.guildId, name);
    if (removed.isErr()) {
      await replyWithError(ctx, removed.error);
      return;
    }

    if (removed.value === "not_found") {
      const entries = await service.listEntries(context.guildId);
      const known = entries.isOk() ? entries.value.map((entry) => entry.name) : [];
      await replyWithError(ctx, new ShortcutError("NOT_FOUND", `No shortcut named \`${name}\` found.`, known));
      return;
    }

    await ctx.write({
      embeds: [buildSuccessEmbed({ title: "Shortcut removed", description: `Removed \`${name}\`.` })],
    });
  }
}
