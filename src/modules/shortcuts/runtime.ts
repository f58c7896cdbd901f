import { CategoryBrowser, DEFAULT_BROWSER_TIMEOUT_MS } from "./browser";
import { PrefixDispatcher } from "./dispatcher";
import type { ShortcutRepository } from "./repository";
import { ShortcutService, type ShortcutServiceOptions } from "./service";
import { BrowserSessions } from "./sessions";

export interface ShortcutsRuntimeOptions extends ShortcutServiceOptions {
  browserTimeoutMs?: number;
}

/**
 * Everything the bot needs to serve shortcuts, built once at startup and
 * owned by the client.
 */
export class ShortcutsRuntime {
  readonly service: ShortcutService;
  readonly dispatcher: PrefixDispatcher;
  readonly browser: CategoryBrowser;
  readonly sessions = new BrowserSessions();

  constructor(
    readonly repository: ShortcutRepository,
    options: ShortcutsRuntimeOptions = {},
  ) {
    this.service = new ShortcutService(repository, options);
    this.dispatcher = new PrefixDispatcher(this.service);
    this.browser = new CategoryBrowser(this.service, {
      timeoutMs: options.browserTimeoutMs,
      now: options.now,
    });
  }
}

/** Reads `SHORTCUTS_BROWSER_TIMEOUT_MS`; falls back to the default on bad input. */
export function browserTimeoutFromEnv(env: NodeJS.ProcessEnv = process.env): number {
  const raw = env.SHORTCUTS_BROWSER_TIMEOUT_MS;
  const parsed = raw ? Number(raw) : Number.NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_BROWSER_TIMEOUT_MS;
}
