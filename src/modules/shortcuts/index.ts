/**
 * Shortcuts module.
 *
 * Purpose: Guild-scoped text shortcuts triggered by a configurable prefix,
 * with category browsing and CSV import/export.
 */

export * from "./types";
export * from "./validation";
export { ConfigCache, type ConfigCacheOptions } from "./cache";
export { MongoShortcutRepository, type ShortcutRepository } from "./repository";
export { ShortcutService, type EntryKey, type ShortcutServiceOptions } from "./service";
export { PrefixDispatcher, type InboundMessage } from "./dispatcher";
export * from "./browser";
export { BrowserSessions, type BrowserSession } from "./sessions";
export * from "./csv-import";
export * from "./csv-export";
export * from "./bulk-delete";
export * from "./format";
export { ShortcutsRuntime, browserTimeoutFromEnv, type ShortcutsRuntimeOptions } from "./runtime";
