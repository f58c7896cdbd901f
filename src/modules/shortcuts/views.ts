/**
 * Shortcut UI builders.
 *
 * Purpose: Keep reply text and embed formatting out of command handlers.
 */

import {
  ActionRow,
  Button,
  Embed,
  StringSelectMenu,
  StringSelectOption,
} from "seyfert";
import { ButtonStyle } from "seyfert/lib/types";
import {
  Emoji,
  UIColors,
  buildErrorEmbed,
  buildInfoEmbed,
  buildSuccessEmbed,
  buildWarningEmbed,
} from "@/modules/ui/design-system";
import type { BrowserView } from "./browser";
import type { CsvImportReport } from "./csv-import";
import { describeError, formatCategoryCounts, formatImportReport } from "./format";
import type { CategoryCount, ShortcutError, ShortcutSettings } from "./types";

export const BROWSER_IDS = {
  prefix: "shortcuts:browser:",
  select: "shortcuts:browser:select",
  previous: "shortcuts:browser:previous",
  next: "shortcuts:browser:next",
  back: "shortcuts:browser:back",
} as const;

export function buildShortcutErrorEmbed(error: ShortcutError): Embed {
  if (error.code === "CONFIRMATION_REQUIRED") {
    return buildWarningEmbed({ title: "Confirmation required", message: error.message });
  }
  if (error.code === "TRANSPORT") {
    return buildErrorEmbed({
      message: "Shortcut storage is unavailable right now.",
      solution: "Try again in a moment.",
    });
  }
  if (error.code === "NOT_CONFIGURED") {
    return buildErrorEmbed({
      title: "Not configured",
      message: error.message,
      solution: "Use `/shortcuts setprefix` first.",
    });
  }
  return buildErrorEmbed({ message: describeError(error) });
}

export function buildSettingsEmbed(settings: ShortcutSettings | null): Embed {
  if (!settings) {
    return buildInfoEmbed({
      title: "Shortcuts",
      description: "This server has no shortcut configuration.",
      options: { hint: "Set a prefix with /shortcuts setprefix." },
    });
  }
  return buildInfoEmbed({
    title: "Shortcuts",
    fields: [
      { name: "Prefix", value: `\`${settings.prefix}\``, inline: true },
      { name: "Page size", value: String(settings.pageSize), inline: true },
    ],
  });
}

export function buildCategoriesEmbed(rows: readonly CategoryCount[]): Embed {
  if (rows.length === 0) {
    return buildInfoEmbed({ title: "Categories", description: "This server has no shortcuts yet." });
  }
  return new Embed()
    .setColor(UIColors.info)
    .setTitle(`${Emoji.folder} Categories`)
    .setDescription(formatCategoryCounts(rows));
}

export function buildImportEmbed(report: CsvImportReport): Embed {
  const description = formatImportReport(report);
  return report.skipped === 0
    ? buildSuccessEmbed({ title: "Import finished", description })
    : buildWarningEmbed({ title: "Import finished with errors", message: description });
}

function pageButton(customId: string, label: string, disabled: boolean): Button {
  return new Button()
    .setCustomId(customId)
    .setLabel(label)
    .setStyle(ButtonStyle.Secondary)
    .setDisabled(disabled);
}

/** Embed and controls for one browser state. */
export function buildBrowserMessage(view: BrowserView): {
  embeds: Embed[];
  components: Array<ActionRow<Button> | ActionRow<StringSelectMenu>>;
} {
  if (view.kind === "expired") {
    const embed = new Embed()
      .setColor(UIColors.neutral)
      .setTitle(`${Emoji.clock} Expired`)
      .setDescription(view.description);
    return { embeds: [embed], components: [] };
  }

  if (view.kind === "category_select") {
    const embed = new Embed()
      .setColor(UIColors.info)
      .setTitle(`${Emoji.folder} ${view.title}`)
      .setDescription(view.description);
    if (view.footer) embed.setFooter({ text: view.footer });
    if (view.options.length === 0) return { embeds: [embed], components: [] };

    const menu = new StringSelectMenu()
      .setCustomId(BROWSER_IDS.select)
      .setPlaceholder("Choose a category")
      .setValuesLength({ min: 1, max: 1 })
      .setOptions(
        view.options.map((option) =>
          new StringSelectOption()
            .setLabel(option.label)
            .setValue(option.value)
            .setDescription(option.description),
        ),
      );
    const components: Array<ActionRow<Button> | ActionRow<StringSelectMenu>> = [
      new ActionRow<StringSelectMenu>().addComponents(menu),
    ];
    if (view.hasPrevious || view.hasNext) {
      components.push(
        new ActionRow<Button>().addComponents(
          pageButton(BROWSER_IDS.previous, `${Emoji.arrow_left} Previous`, !view.hasPrevious),
          pageButton(BROWSER_IDS.next, `Next ${Emoji.arrow_right}`, !view.hasNext),
        ),
      );
    }
    return { embeds: [embed], components };
  }

  const embed = new Embed()
    .setColor(UIColors.info)
    .setTitle(view.title)
    .setFooter({ text: view.footer });
  if (view.fields.length > 0) {
    embed.setFields(view.fields.map((field) => ({ name: field.name, value: field.value })));
  } else {
    embed.setDescription("No shortcuts on this page.");
  }

  const row = new ActionRow<Button>().addComponents(
    pageButton(BROWSER_IDS.previous, `${Emoji.arrow_left} Previous`, !view.hasPrevious),
    new Button()
      .setCustomId(BROWSER_IDS.back)
      .setLabel("Categories")
      .setStyle(ButtonStyle.Primary),
    pageButton(BROWSER_IDS.next, `Next ${Emoji.arrow_right}`, !view.hasNext),
  );
  return { embeds: [embed], components: [row] };
}
