/**
 * Unit Tests: shortcuts end to end
 *
 * Purpose: One guild configured from scratch through the runtime the bot
 * builds at startup: prefix, shortcuts, chat triggers, move, export.
 */

import { describe, expect, it, vi } from "vitest";
import { exportShortcutsCsv } from "@/modules/shortcuts/csv-export";
import { ShortcutsRuntime } from "@/modules/shortcuts/runtime";
import { MemoryShortcutRepository } from "./_fakes/memory-repository";

const G = "guild-g";

describe("shortcuts scenario", () => {
  it("serves, moves and exports a guild's shortcuts", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const { service, dispatcher } = new ShortcutsRuntime(new MemoryShortcutRepository());

    expect((await service.setPrefix(G, "!")).isOk()).toBe(true);
    expect((await service.set({ guildId: G, name: "hello", value: "Hi there!", category: "General" })).isOk()).toBe(true);
    expect((await service.set({ guildId: G, name: "joke", value: "Why did...", category: "Fun" })).isOk()).toBe(true);

    const categories = await service.listCategories(G);
    expect(categories.isOk() && categories.value).toEqual([
      { category: "Fun", count: 1 },
      { category: "General", count: 1 },
    ]);

    const say = (content: string) => dispatcher.resolve({ guildId: G, authorIsBot: false, content });
    expect(await say("!hello")).toBe("Hi there!");
    expect(await say("!HELLO")).toBe("Hi there!");
    expect(await say("!helloworld")).toBe(null);

    await service.move(G, "hello", "Fun");
    const moved = await service.listCategories(G);
    expect(moved.isOk() && moved.value).toEqual([{ category: "Fun", count: 2 }]);

    const exported = await exportShortcutsCsv(service, G);
    if (exported.isErr() || !exported.value) throw new Error("export failed");
    const lines = exported.value.content.trimEnd().split("\n");
    expect(lines[0]).toBe("Shortcut,Value,Category");
    expect(lines.slice(1).sort()).toEqual(["!hello,Hi there!,Fun", "!joke,Why did...,Fun"]);
  });
});
