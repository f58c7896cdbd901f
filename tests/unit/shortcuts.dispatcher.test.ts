/**
 * Unit Tests: PrefixDispatcher
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { PrefixDispatcher } from "@/modules/shortcuts/dispatcher";
import { ShortcutService } from "@/modules/shortcuts/service";
import { MemoryShortcutRepository } from "./_fakes/memory-repository";

const G = "guild-1";

let repo: MemoryShortcutRepository;
let service: ShortcutService;
let dispatcher: PrefixDispatcher;

const message = (content: string, overrides: { guildId?: string | null; authorIsBot?: boolean } = {}) => ({
  guildId: G,
  authorIsBot: false,
  content,
  ...overrides,
});

beforeEach(async () => {
  repo = new MemoryShortcutRepository();
  service = new ShortcutService(repo);
  dispatcher = new PrefixDispatcher(service);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);

  await service.setPrefix(G, "!");
  await service.set({ guildId: G, name: "hello", value: "Hi there!" });
  await service.set({ guildId: G, name: "rules", value: "  Be *nice*  " });
});

describe("PrefixDispatcher", () => {
  it("replies with the stored value for a prefixed name", async () => {
    expect(await dispatcher.resolve(message("!hello"))).toBe("Hi there!");
  });

  it("matches names case-insensitively", async () => {
    expect(await dispatcher.resolve(message("!HELLO"))).toBe("Hi there!");
  });

  it("returns the value verbatim", async () => {
    expect(await dispatcher.resolve(message("!rules"))).toBe("  Be *nice*  ");
  });

  it("does not match a longer word", async () => {
    expect(await dispatcher.resolve(message("!helloworld"))).toBe(null);
  });

  it("requires the prefix at the start", async () => {
    expect(await dispatcher.resolve(message("hello"))).toBe(null);
    expect(await dispatcher.resolve(message(" !hello"))).toBe(null);
  });

  it("matches the prefix case-sensitively", async () => {
    await service.setPrefix(G, "sc.");
    expect(await dispatcher.resolve(message("SC.hello"))).toBe(null);
    expect(await dispatcher.resolve(message("sc.hello"))).toBe("Hi there!");
  });

  it("ignores messages shorter than the prefix", async () => {
    await service.setPrefix(G, "!!!");
    expect(await dispatcher.resolve(message("!!"))).toBe(null);
  });

  it("ignores bots and messages outside a guild", async () => {
    expect(await dispatcher.resolve(message("!hello", { authorIsBot: true }))).toBe(null);
    expect(await dispatcher.resolve(message("!hello", { guildId: null }))).toBe(null);
    expect(repo.calls.listEntries).toBe(0);
  });

  it("does nothing for an unconfigured guild", async () => {
    expect(await dispatcher.resolve(message("!hello", { guildId: "guild-2" }))).toBe(null);
    expect(repo.calls.listEntries).toBe(0);
  });

  it("reads the entry list fresh on every match attempt", async () => {
    await dispatcher.resolve(message("!hello"));
    await service.set({ guildId: G, name: "new", value: "just added" });

    expect(await dispatcher.resolve(message("!new"))).toBe("just added");
    expect(repo.calls.listEntries).toBe(2);
  });

  it("swallows store failures", async () => {
    repo.failNext("listEntries");
    expect(await dispatcher.resolve(message("!hello"))).toBe(null);
  });
});
