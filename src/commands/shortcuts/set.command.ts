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
    description: "Shortcut name (case-insensitive)",
    required: true,
    max_length: SHORTCUT_LIMITS.maxNameLength,
  }),
  value: createStringOption({
    description: "Text the bot replies with",
    required: true,
  }),
  category: createStringOption({
    description: "Category used when browsing (default: General)",
    required: false,
    max_length: SHORTCUT_LIMITS.maxCategoryLength,
  }),
};

@Declare({
  name: "set",
  description: "Create or overwrite a shortcut",
  defaultMemberPermissions: ["ManageMessages"],
})
@Options(options)
export default class ShortcutsSetCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireShortcutContext(ctx, { manage: true });
    if (!context) return;

    const { service } = context.shortcuts;
    const saved = await service.set({
      guildId: context.guildId,
      name: ctx.options.name,
      value: ctx.options.value,
      category: ctx.options.category,
    });
    if (saved.isErr()) {
      await replyWithError(ctx, saved.error);
      return;
    }

    const settings = await service.getSettings(context.guildId);
    const prefix = settings.isOk() && settings.value ? settings.value.prefix : "";
    await ctx.write({
      embeds: [
        buildSuccessEmbed({
          title: saved.value.created ? "Shortcut created" : "Shortcut updated",
          description: `\`${prefix}${saved.value.entry.name}\` in **${saved.value.entry.category}**.`,
        }),
      ],
    });
  }
}
