import { ComponentCommand, type ComponentContext } from "seyfert";

import type { BrowserAction } from "@/modules/shortcuts";
import { driveBrowser } from "@/modules/shortcuts/interaction";
import { BROWSER_IDS } from "@/modules/shortcuts/views";

const BUTTON_ACTIONS = new Map<string, BrowserAction>([
  [BROWSER_IDS.previous, { type: "previous" }],
  [BROWSER_IDS.next, { type: "next" }],
  [BROWSER_IDS.back, { type: "back" }],
]);

export default class ShortcutsBrowserButtons extends ComponentCommand {
  componentType = "Button" as const;

  filter(ctx: ComponentContext<"Button">) {
    return BUTTON_ACTIONS.has(ctx.customId);
  }

  async run(ctx: ComponentContext<"Button">) {
    const action = BUTTON_ACTIONS.get(ctx.customId);
    if (!action) return;
    await driveBrowser(ctx, action);
  }
}
