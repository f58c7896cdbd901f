/**
 * Category browser.
 *
 * Purpose: Interactive listing of a guild's shortcuts as an explicit state
 * machine: pick a category, page through its entries, go back.
 *
 * States:
 * - `category_select`: distinct categories with counts (initial), offered
 *   `MAX_CATEGORY_OPTIONS` at a time.
 * - `paged_list`: one category, one page of `pageSize` entries.
 * - `expired`: terminal; reached after the inactivity timeout.
 *
 * `transition` and `renderBrowser` are pure. `CategoryBrowser` wraps them with
 * the fresh store reads that entering a state requires.
 */
import type { GuildId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { ShortcutService } from "./service";
import {
  SHORTCUT_LIMITS,
  ShortcutError,
  type CategoryCount,
  type ShortcutEntry,
} from "./types";

export const DEFAULT_BROWSER_TIMEOUT_MS = 300_000;

/** Discord caps a select menu at 25 options. */
export const MAX_CATEGORY_OPTIONS = 25;

const ELLIPSIS = "…";

interface BrowserContext {
  readonly guildId: GuildId;
  readonly prefix: string;
  readonly pageSize: number;
  readonly lastActivityAt: number;
}

export interface CategorySelectState extends BrowserContext {
  readonly kind: "category_select";
  readonly categories: readonly CategoryCount[];
  readonly categoryPage: number;
}

export interface PagedListState extends BrowserContext {
  readonly kind: "paged_list";
  readonly category: string;
  readonly page: number;
  readonly maxPages: number;
  readonly entries: readonly ShortcutEntry[];
}

export interface ExpiredState {
  readonly kind: "expired";
}

export type ActiveBrowserState = CategorySelectState | PagedListState;
export type BrowserState = ActiveBrowserState | ExpiredState;

export type BrowserAction =
  | { readonly type: "select_category"; readonly category: string }
  | { readonly type: "next" }
  | { readonly type: "previous" }
  | { readonly type: "back" };

/**
 * Outcome of one interaction.
 * - `changed`: the view must be re-rendered.
 * - `unchanged`: accepted, nothing to redraw (page bound reached).
 * - `expired`: the browser timed out; nothing else is accepted.
 * - `invalid`: the action does not apply to the current state.
 */
export type BrowserStep =
  | { readonly status: "changed"; readonly state: ActiveBrowserState }
  | { readonly status: "unchanged"; readonly state: ActiveBrowserState }
  | { readonly status: "expired"; readonly state: ExpiredState }
  | { readonly status: "invalid"; readonly state: ActiveBrowserState };

/** Fresh data needed to enter a state, loaded by the caller. */
export type BrowserData =
  | { readonly kind: "categories"; readonly categories: readonly CategoryCount[] }
  | { readonly kind: "entries"; readonly entries: readonly ShortcutEntry[] };

export const EXPIRED: ExpiredState = { kind: "expired" };

export function maxPagesFor(count: number, pageSize: number): number {
  return Math.ceil(count / pageSize);
}

export function clampPage(page: number, maxPages: number): number {
  return Math.min(Math.max(page, 0), Math.max(maxPages - 1, 0));
}

export function categoryPagesFor(categories: readonly CategoryCount[]): number {
  return maxPagesFor(categories.length, MAX_CATEGORY_OPTIONS);
}

export function isExpired(state: BrowserState, now: number, timeoutMs: number): boolean {
  return state.kind === "expired" || now - state.lastActivityAt >= timeoutMs;
}

/** Which store read (if any) `action` needs before `transition` can run. */
export function dataNeeded(
  state: ActiveBrowserState,
  action: BrowserAction,
): { kind: "categories" } | { kind: "entries"; category: string } | null {
  if (action.type === "select_category" && state.kind === "category_select") {
    return { kind: "entries", category: action.category };
  }
  if (action.type === "back" && state.kind === "paged_list") {
    return { kind: "categories" };
  }
  return null;
}

export function initialState(
  context: Omit<BrowserContext, "lastActivityAt">,
  categories: readonly CategoryCount[],
  now: number,
): CategorySelectState {
  return { ...context, kind: "category_select", categories, categoryPage: 0, lastActivityAt: now };
}

export function transition(
  state: BrowserState,
  action: BrowserAction,
  now: number,
  timeoutMs: number,
  data?: BrowserData,
): BrowserStep {
  if (state.kind === "expired" || isExpired(state, now, timeoutMs)) {
    return { status: "expired", state: EXPIRED };
  }

  const context: BrowserContext = {
    guildId: state.guildId,
    prefix: state.prefix,
    pageSize: state.pageSize,
    lastActivityAt: now,
  };

  if (state.kind === "category_select") {
    if (action.type === "next" || action.type === "previous") {
      const delta = action.type === "next" ? 1 : -1;
      const categoryPage = clampPage(state.categoryPage + delta, categoryPagesFor(state.categories));
      if (categoryPage === state.categoryPage) {
        return { status: "unchanged", state: { ...state, lastActivityAt: now } };
      }
      return { status: "changed", state: { ...state, categoryPage, lastActivityAt: now } };
    }
    if (action.type !== "select_category" || data?.kind !== "entries") {
      return { status: "invalid", state };
    }
    return {
      status: "changed",
      state: {
        ...context,
        kind: "paged_list",
        category: action.category,
        page: 0,
        maxPages: maxPagesFor(data.entries.length, state.pageSize),
        entries: data.entries,
      },
    };
  }

  switch (action.type) {
    case "next":
    case "previous": {
      const delta = action.type === "next" ? 1 : -1;
      const page = clampPage(state.page + delta, state.maxPages);
      if (page === state.page) {
        return { status: "unchanged", state: { ...state, lastActivityAt: now } };
      }
      return { status: "changed", state: { ...state, page, lastActivityAt: now } };
    }
    case "back":
      if (data?.kind !== "categories") return { status: "invalid", state };
      return {
        status: "changed",
        state: { ...context, kind: "category_select", categories: data.categories, categoryPage: 0 },
      };
    default:
      return { status: "invalid", state };
  }
}

export interface BrowserField {
  readonly name: string;
  readonly value: string;
}

export interface BrowserOption {
  readonly label: string;
  readonly value: string;
  readonly description: string;
}

export type BrowserView =
  | {
      readonly kind: "category_select";
      readonly title: string;
      readonly description: string;
      readonly options: readonly BrowserOption[];
      /** Empty when every category fits in one select menu. */
      readonly footer: string;
      readonly hasPrevious: boolean;
      readonly hasNext: boolean;
    }
  | {
      readonly kind: "paged_list";
      readonly title: string;
      readonly fields: readonly BrowserField[];
      readonly footer: string;
      readonly hasPrevious: boolean;
      readonly hasNext: boolean;
    }
  | { readonly kind: "expired"; readonly description: string };

/** Display-only truncation; stored values are never touched. */
export function truncateForDisplay(value: string, cap: number = SHORTCUT_LIMITS.displayValueCap): string {
  if (value.length <= cap) return value;
  return value.slice(0, cap - ELLIPSIS.length) + ELLIPSIS;
}

export function pageEntries(state: PagedListState): readonly ShortcutEntry[] {
  const start = state.page * state.pageSize;
  return state.entries.slice(start, start + state.pageSize);
}

export function renderBrowser(state: BrowserState): BrowserView {
  if (state.kind === "expired") {
    return { kind: "expired", description: "This browser has expired. Run the list command again." };
  }

  if (state.kind === "category_select") {
    const pages = categoryPagesFor(state.categories);
    const start = state.categoryPage * MAX_CATEGORY_OPTIONS;
    const shown = state.categories.slice(start, start + MAX_CATEGORY_OPTIONS);
    return {
      kind: "category_select",
      title: "Shortcut categories",
      description:
        state.categories.length === 0
          ? "This server has no shortcuts yet."
          : "Pick a category to browse its shortcuts.",
      options: shown.map((row) => ({
        label: row.category,
        value: row.category,
        description: `${row.count} shortcut${row.count === 1 ? "" : "s"}`,
      })),
      footer: pages > 1 ? `Categories ${state.categoryPage + 1}/${pages}` : "",
      hasPrevious: state.categoryPage > 0,
      hasNext: state.categoryPage < pages - 1,
    };
  }

  return {
    kind: "paged_list",
    title: `Shortcuts: ${state.category}`,
    fields: pageEntries(state).map((entry) => ({
      name: state.prefix + entry.name,
      value: truncateForDisplay(entry.value),
    })),
    footer: `Page ${Math.min(state.page + 1, Math.max(state.maxPages, 1))}/${Math.max(state.maxPages, 1)}`,
    hasPrevious: state.page > 0,
    hasNext: state.page < state.maxPages - 1,
  };
}

export interface CategoryBrowserOptions {
  timeoutMs?: number;
  now?: () => number;
}

/** Runs browser transitions against fresh store data. */
export class CategoryBrowser {
  readonly timeoutMs: number;
  private readonly now: () => number;

  constructor(
    private readonly service: ShortcutService,
    options: CategoryBrowserOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_BROWSER_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  async open(guildId: GuildId): Promise<Result<CategorySelectState, ShortcutError>> {
    const settings = await this.service.getSettings(guildId);
    if (settings.isErr()) return ErrResult(settings.error);
    if (!settings.value) {
      return ErrResult(new ShortcutError("NOT_CONFIGURED", "Set a prefix first!"));
    }

    const categories = await this.service.listCategories(guildId);
    if (categories.isErr()) return ErrResult(categories.error);

    return OkResult(
      initialState(
        { guildId, prefix: settings.value.prefix, pageSize: settings.value.pageSize },
        categories.value,
        this.now(),
      ),
    );
  }

  async dispatch(
    state: BrowserState,
    action: BrowserAction,
  ): Promise<Result<BrowserStep, ShortcutError>> {
    const now = this.now();
    if (state.kind === "expired" || isExpired(state, now, this.timeoutMs)) {
      return OkResult(transition(state, action, now, this.timeoutMs));
    }

    const needed = dataNeeded(state, action);
    if (!needed) return OkResult(transition(state, action, now, this.timeoutMs));

    if (needed.kind === "categories") {
      const categories = await this.service.listCategories(state.guildId);
      if (categories.isErr()) return ErrResult(categories.error);
      return OkResult(
        transition(state, action, now, this.timeoutMs, {
          kind: "categories",
          categories: categories.value,
        }),
      );
    }

    const entries = await this.service.listEntries(state.guildId, { category: needed.category });
    if (entries.isErr()) return ErrResult(entries.error);
    if (entries.value.length === 0) {
      return ErrResult(
        new ShortcutError("NOT_FOUND", `No shortcuts in category \`${needed.category}\`.`),
      );
    }
    return OkResult(
      transition(state, action, now, this.timeoutMs, { kind: "entries", entries: entries.value }),
    );
  }
}
