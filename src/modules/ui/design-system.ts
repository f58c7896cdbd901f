/**
 * UI design system.
 *
 * Purpose: Shared colors, emoji and embed builders so every shortcut reply
 * looks the same.
 */

import { Embed } from "seyfert";
import type { APIEmbedField } from "seyfert/lib/types";

// ============================================================================
// COLOR PALETTE
// ============================================================================

/**
 * Semantic colors. Use the state name, not the color name.
 */
export const UIColors = {
    success: 0x10b981,    // Green - positive outcomes
    warning: 0xf59e0b,    // Amber - cautions, pending
    error: 0xef4444,      // Red - failures, restrictions
    info: 0x6366f1,       // Indigo - neutral info
    neutral: 0x6b7280,    // Grey - disabled, meta
} as const;

// ============================================================================
// EMOJI CONSTANTS
// ============================================================================

export const Emoji = {
    success: "✅",
    error: "❌",
    warning: "⚠️",
    info: "ℹ️",
    clock: "⏰",
    folder: "📁",
    arrow_right: "→",
    arrow_left: "←",
} as const;

// ============================================================================
// EMBED HELPERS
// ============================================================================

export interface EmbedOptions {
    /** Hint text for footer */
    hint?: string;
}

function applyOptions(embed: Embed, options: EmbedOptions = {}): Embed {
    if (options.hint) {
        embed.setFooter({ text: `💡 ${options.hint}` });
    }
    return embed;
}

// ============================================================================
// STANDARD EMBED BUILDERS
// ============================================================================

export function buildSuccessEmbed(params: {
    title: string;
    description?: string;
    fields?: APIEmbedField[];
    options?: EmbedOptions;
}): Embed {
    const embed = new Embed()
        .setColor(UIColors.success)
        .setTitle(`${Emoji.success} ${params.title}`);

    if (params.description) {
        embed.setDescription(params.description);
    }
    if (params.fields?.length) {
        embed.setFields(params.fields);
    }
    return applyOptions(embed, params.options);
}

/**
 * Build an error embed with an optional solution hint.
 */
export function buildErrorEmbed(params: {
    title?: string;
    message: string;
    solution?: string;
    options?: EmbedOptions;
}): Embed {
    const { title = "Error", message, solution, options = {} } = params;

    let description = message;
    if (solution) {
        description += `\n\n💡 ${solution}`;
    }

    const embed = new Embed()
        .setColor(UIColors.error)
        .setTitle(`${Emoji.error} ${title}`)
        .setDescription(description);

    return applyOptions(embed, options);
}

export function buildWarningEmbed(params: {
    title?: string;
    message: string;
    fields?: APIEmbedField[];
    options?: EmbedOptions;
}): Embed {
    const { title = "Warning", message, fields = [], options = {} } = params;

    const embed = new Embed()
        .setColor(UIColors.warning)
        .setTitle(`${Emoji.warning} ${title}`)
        .setDescription(message);

    if (fields.length) {
        embed.setFields(fields);
    }
    return applyOptions(embed, options);
}

export function buildInfoEmbed(params: {
    title: string;
    description?: string;
    fields?: APIEmbedField[];
    options?: EmbedOptions;
}): Embed {
    const embed = new Embed()
        .setColor(UIColors.info)
        .setTitle(`${Emoji.info} ${params.title}`);

    if (params.description) {
        embed.setDescription(params.description);
    }
    if (params.fields?.length) {
        embed.setFields(params.fields);
    }
    return applyOptions(embed, params.options);
}
