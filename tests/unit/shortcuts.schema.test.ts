/**
 * Unit Tests: persisted document parsing and runtime configuration
 */

import { describe, expect, it, vi } from "vitest";
import { browserTimeoutFromEnv } from "@/modules/shortcuts/runtime";
import { parseEntryDoc, parseSettingsDoc, shortcutKeys } from "@/modules/shortcuts/schema";

describe("shortcutKeys", () => {
  it("keys entries by guild and lowercase name", () => {
    expect(shortcutKeys.entry("g1", " Hello ")).toBe("g1:hello");
  });
});

describe("parseSettingsDoc", () => {
  it("repairs an out-of-range page size", () => {
    const doc = parseSettingsDoc({ _id: "g1", prefix: "!", pageSize: 99 });
    expect(doc?.pageSize).toBe(10);
    expect(doc?.prefix).toBe("!");
  });

  it("skips a document without a prefix", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    expect(parseSettingsDoc({ _id: "g1", pageSize: 5 })).toBe(null);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe("parseEntryDoc", () => {
  it("defaults a missing category to General", () => {
    const doc = parseEntryDoc({ _id: "g1:a", guildId: "g1", name: "a", value: "v" });
    expect(doc?.category).toBe("General");
  });

  it("skips a document without a name", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    expect(parseEntryDoc({ _id: "g1:", guildId: "g1", value: "v" })).toBe(null);
  });
});

describe("browserTimeoutFromEnv", () => {
  it("reads a positive number of milliseconds", () => {
    expect(browserTimeoutFromEnv({ SHORTCUTS_BROWSER_TIMEOUT_MS: "60000" })).toBe(60_000);
  });

  it("falls back to five minutes", () => {
    expect(browserTimeoutFromEnv({})).toBe(300_000);
    expect(browserTimeoutFromEnv({ SHORTCUTS_BROWSER_TIMEOUT_MS: "soon" })).toBe(300_000);
    expect(browserTimeoutFromEnv({ SHORTCUTS_BROWSER_TIMEOUT_MS: "-5" })).toBe(300_000);
  });
});
