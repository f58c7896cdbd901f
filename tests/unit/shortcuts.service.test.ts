/**
 * Unit Tests: ShortcutService
 *
 * Purpose: CRUD semantics, error codes and cache coherence against the
 * in-memory repository.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { ShortcutService } from "@/modules/shortcuts/service";
import { MemoryShortcutRepository } from "./_fakes/memory-repository";

const G = "guild-1";

let repo: MemoryShortcutRepository;
let service: ShortcutService;

beforeEach(() => {
  repo = new MemoryShortcutRepository();
  service = new ShortcutService(repo);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

async function configure(prefix = "!") {
  const res = await service.setPrefix(G, prefix);
  expect(res.isOk()).toBe(true);
}

describe("settings", () => {
  it("setPrefix creates the row with the default page size", async () => {
    const res = await service.setPrefix(G, " ? ");
    expect(res.isOk() && res.value).toEqual({ guildId: G, prefix: "?", pageSize: 10 });
  });

  it("setPrefix rejects an empty prefix without touching the store", async () => {
    const res = await service.setPrefix(G, "  ");
    expect(res.isErr() && res.error.code).toBe("VALIDATION");
    expect(repo.calls.upsertPrefix).toBe(0);
  });

  it("setPageSize needs an existing settings row", async () => {
    const res = await service.setPageSize(G, 5);
    expect(res.isErr() && res.error.code).toBe("NOT_CONFIGURED");
  });

  it("setPageSize rejects sizes outside 1-25", async () => {
    await configure();
    const res = await service.setPageSize(G, 26);
    expect(res.isErr() && res.error.code).toBe("VALIDATION");
    expect(repo.calls.updatePageSize).toBe(0);
  });

  it("cached settings reflect a later write", async () => {
    await configure("!");
    const before = await service.getSettings(G);
    expect(before.isOk() && before.value?.prefix).toBe("!");

    await service.setPrefix(G, "$");
    const after = await service.getSettings(G);
    expect(after.isOk() && after.value?.prefix).toBe("$");
  });

  it("serves repeated settings reads from the cache", async () => {
    await configure();
    await service.getSettings(G);
    await service.getSettings(G);
    expect(repo.calls.getSettings).toBe(1);
  });
});

describe("set", () => {
  it("requires a configured prefix", async () => {
    const res = await service.set({ guildId: G, name: "hello", value: "hi" });
    expect(res.isErr() && res.error.code).toBe("NOT_CONFIGURED");
    expect(res.isErr() && res.error.message).toBe("Set a prefix first!");
  });

  it("round-trips through getEntry", async () => {
    await configure();
    await service.set({ guildId: G, name: "hello", value: "Hi there!", category: "Greetings" });

    const res = await service.getEntry(G, "hello");
    expect(res.isOk() && res.value).toEqual({
      guildId: G,
      name: "hello",
      value: "Hi there!",
      category: "Greetings",
    });
  });

  it("defaults the category to General", async () => {
    await configure();
    const res = await service.set({ guildId: G, name: "a", value: "b" });
    expect(res.isOk() && res.value.entry.category).toBe("General");
  });

  it("reports whether the name was new", async () => {
    await configure();
    const first = await service.set({ guildId: G, name: "Greet", value: "one" });
    const second = await service.set({ guildId: G, name: "greet", value: "two" });
    expect(first.isOk() && first.value.created).toBe(true);
    expect(second.isOk() && second.value.created).toBe(false);
  });

  it("treats names case-insensitively and keeps the latest casing", async () => {
    await configure();
    await service.set({ guildId: G, name: "Hi", value: "one" });
    await service.set({ guildId: G, name: "hi", value: "two" });

    const list = await service.listEntries(G);
    expect(list.isOk() && list.value).toEqual([
      { guildId: G, name: "hi", value: "two", category: "General" },
    ]);
  });

  it("invalidates the cached entry on overwrite", async () => {
    await configure();
    await service.set({ guildId: G, name: "x", value: "old" });
    await service.getEntry(G, "x");
    await service.set({ guildId: G, name: "X", value: "new" });

    const res = await service.getEntry(G, "x");
    expect(res.isOk() && res.value?.value).toBe("new");
  });

  it("rejects invalid input without writing", async () => {
    await configure();
    const long = await service.set({ guildId: G, name: "n".repeat(21), value: "v" });
    const empty = await service.set({ guildId: G, name: "n", value: "   " });
    const badCategory = await service.set({ guildId: G, name: "n", value: "v", category: "no!" });

    expect(long.isErr() && long.error.code).toBe("VALIDATION");
    expect(empty.isErr() && empty.error.code).toBe("VALIDATION");
    expect(badCategory.isErr() && badCategory.error.code).toBe("VALIDATION");
    expect(repo.calls.upsertEntry).toBe(0);
  });

  it("maps store failures to TRANSPORT", async () => {
    await configure();
    repo.failNext("upsertEntry");
    const res = await service.set({ guildId: G, name: "n", value: "v" });
    expect(res.isErr() && res.error.code).toBe("TRANSPORT");
  });
});

describe("remove", () => {
  it("reports removed and not_found without raising", async () => {
    await configure();
    await service.set({ guildId: G, name: "gone", value: "v" });

    const first = await service.remove(G, "GONE");
    const second = await service.remove(G, "gone");
    expect(first.isOk() && first.value).toBe("removed");
    expect(second.isOk() && second.value).toBe("not_found");
  });

  it("answers a repeated miss from the entry cache without touching the store", async () => {
    await configure();
    const first = await service.remove(G, "ghost");
    const second = await service.remove(G, "ghost");

    expect(first.isOk() && first.value).toBe("not_found");
    expect(second.isOk() && second.value).toBe("not_found");
    expect(repo.calls.getEntry).toBe(1);
    expect(repo.calls.deleteEntry).toBe(0);
  });

  it("maps a failed lookup to TRANSPORT", async () => {
    await configure();
    repo.failNext("getEntry");
    const res = await service.remove(G, "gone");
    expect(res.isErr() && res.error.code).toBe("TRANSPORT");
    expect(repo.calls.deleteEntry).toBe(0);
  });

  it("drops the cached entry", async () => {
    await configure();
    await service.set({ guildId: G, name: "gone", value: "v" });
    await service.getEntry(G, "gone");
    await service.remove(G, "gone");

    const res = await service.getEntry(G, "gone");
    expect(res.isOk() && res.value).toBe(null);
  });
});

describe("rename", () => {
  beforeEach(async () => {
    await configure();
    await service.set({ guildId: G, name: "old", value: "payload", category: "Fun" });
  });

  it("moves value and category to the new name", async () => {
    const res = await service.rename(G, "old", "new");
    expect(res.isOk() && res.value).toEqual({
      guildId: G,
      name: "new",
      value: "payload",
      category: "Fun",
    });

    const oldEntry = await service.getEntry(G, "old");
    expect(oldEntry.isOk() && oldEntry.value).toBe(null);
  });

  it("fails with CONFLICT when the target exists", async () => {
    await service.set({ guildId: G, name: "taken", value: "v" });
    const res = await service.rename(G, "old", "TAKEN");
    expect(res.isErr() && res.error.code).toBe("CONFLICT");
    expect(res.isErr() && res.error.message).toBe("A shortcut named `TAKEN` already exists.");

    const still = await service.getEntry(G, "old");
    expect(still.isOk() && still.value?.value).toBe("payload");
  });

  it("updates the casing in place for a case-only rename", async () => {
    const res = await service.rename(G, "old", "OLD");
    expect(res.isOk() && res.value.name).toBe("OLD");

    const list = await service.listEntries(G);
    expect(list.isOk() && list.value.map((entry) => entry.name)).toEqual(["OLD"]);
  });

  it("reports NOT_FOUND with the known names", async () => {
    const res = await service.rename(G, "missing", "other");
    expect(res.isErr() && res.error.code).toBe("NOT_FOUND");
    expect(res.isErr() && res.error.known).toEqual(["old"]);
  });

  it("validates the new name", async () => {
    const res = await service.rename(G, "old", "x".repeat(21));
    expect(res.isErr() && res.error.code).toBe("VALIDATION");
    expect(repo.calls.renameEntry).toBe(0);
  });
});

describe("move", () => {
  it("changes only the category", async () => {
    await configure();
    await service.set({ guildId: G, name: "m", value: "keep", category: "A" });

    const res = await service.move(G, "M", "B");
    expect(res.isOk() && res.value).toEqual({ guildId: G, name: "m", value: "keep", category: "B" });
  });

  it("fails with NOT_FOUND for an unknown name", async () => {
    await configure();
    const res = await service.move(G, "nope", "B");
    expect(res.isErr() && res.error.code).toBe("NOT_FOUND");
  });

  it("re-validates the category", async () => {
    await configure();
    await service.set({ guildId: G, name: "m", value: "keep" });
    const res = await service.move(G, "m", "bad/category");
    expect(res.isErr() && res.error.code).toBe("VALIDATION");
  });
});

describe("listCategories", () => {
  it("returns distinct categories with counts sorted by name", async () => {
    await configure();
    await service.set({ guildId: G, name: "a", value: "1", category: "Zed" });
    await service.set({ guildId: G, name: "b", value: "2", category: "Alpha" });
    await service.set({ guildId: G, name: "c", value: "3", category: "Zed" });

    const res = await service.listCategories(G);
    expect(res.isOk() && res.value).toEqual([
      { category: "Alpha", count: 1 },
      { category: "Zed", count: 2 },
    ]);
  });
});

describe("bulk deletion", () => {
  beforeEach(async () => {
    await configure();
    await service.set({ guildId: G, name: "a", value: "1", category: "Fun" });
    await service.set({ guildId: G, name: "b", value: "2", category: "Fun" });
    await service.set({ guildId: G, name: "c", value: "3" });
  });

  it("deleteByCategory removes exactly that category", async () => {
    const res = await service.deleteByCategory(G, "Fun");
    expect(res.isOk() && res.value).toBe(2);

    const left = await service.listCategories(G);
    expect(left.isOk() && left.value).toEqual([{ category: "General", count: 1 }]);
  });

  it("deleteByCategory reports NOT_FOUND with existing categories", async () => {
    const res = await service.deleteByCategory(G, "Nothing");
    expect(res.isErr() && res.error.code).toBe("NOT_FOUND");
    expect(res.isErr() && res.error.known).toEqual(["Fun", "General"]);
  });

  it("deleteAll clears the guild and its cached entries", async () => {
    await service.getEntry(G, "a");
    const res = await service.deleteAll(G);
    expect(res.isOk() && res.value).toBe(3);

    const cached = await service.getEntry(G, "a");
    expect(cached.isOk() && cached.value).toBe(null);
  });
});
