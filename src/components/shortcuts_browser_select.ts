import { ComponentCommand, type ComponentContext } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";

import { driveBrowser } from "@/modules/shortcuts/interaction";
import { BROWSER_IDS } from "@/modules/shortcuts/views";

export default class ShortcutsBrowserSelect extends ComponentCommand {
  componentType = "StringSelect" as const;
  customId = BROWSER_IDS.select;

  async run(ctx: ComponentContext<"StringSelect">) {
    const category = ctx.interaction.values?.[0];
    if (!category) {
      await ctx.write({
        content: "Pick a category to continue.",
        flags: MessageFlags.Ephemeral,
      });
      return;
    }
    await driveBrowser(ctx, { type: "select_category", category });
  }
}
