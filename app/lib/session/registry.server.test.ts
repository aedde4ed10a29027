import { describe, it, expect, vi } from "vitest";
import { ok, type ServiceResult } from "~/lib/errors";
import { SessionRegistry } from "./registry.server";

const user = {
  identity: "u1",
  email: "u1@example.com",
  displayName: "Ada",
  idToken: "test-token",
};

function sequentialIds() {
  let next = 0;
  return () => `session-${++next}`;
}

describe("SessionRegistry", () => {
  it("creates stores that can be looked up by id", () => {
    const registry = new SessionRegistry({ createId: sequentialIds(), idleTtlMs: 60_000 });

    const store = registry.create();

    expect(store.id).toBe("session-1");
    expect(registry.get("session-1")).toBe(store);
    expect(registry.size).toBe(1);
  });

  it("returns null for an unknown id", () => {
    const registry = new SessionRegistry({ idleTtlMs: 60_000 });
    expect(registry.get("missing")).toBeNull();
  });

  it("clears a store when it is destroyed", async () => {
    const registry = new SessionRegistry({ createId: sequentialIds(), idleTtlMs: 60_000 });
    const store = registry.create();
    store.setSelection("identity", user);
    await store.getOrFetch("watchlist:u1", async () => ok(["movie-603"]), 300);

    expect(registry.destroy(store.id)).toBe(true);

    expect(registry.get(store.id)).toBeNull();
    expect(store.getSelection("identity")).toBeUndefined();
    expect(store.userCacheSize).toBe(0);
    expect(registry.destroy(store.id)).toBe(false);
  });

  it("clears the least recently used store when over capacity", () => {
    const registry = new SessionRegistry({
      createId: sequentialIds(),
      idleTtlMs: 60_000,
      maxSessions: 1,
    });
    const first = registry.create();
    first.setSelection("identity", user);

    registry.create();

    expect(registry.get("session-1")).toBeNull();
    expect(registry.get("session-2")).not.toBeNull();
    expect(first.getSelection("identity")).toBeUndefined();
  });

  it("gives every store the same global cache", async () => {
    const registry = new SessionRegistry({ createId: sequentialIds(), idleTtlMs: 60_000 });
    const a = registry.create();
    const b = registry.create();
    await a.getOrFetch("trending:week:1", async () => ok("shared"), 300, "global");

    const fetchFn = vi.fn(async (): Promise<ServiceResult<string>> => ok("fresh"));
    const result = await b.getOrFetch("trending:week:1", fetchFn, 300, "global");

    expect(result).toEqual({ success: true, data: "shared" });
    expect(fetchFn).not.toHaveBeenCalled();
    expect(registry.globalCache.size).toBe(1);
  });

  it("bounds the shared cache however many distinct searches run", async () => {
    const registry = new SessionRegistry({
      createId: sequentialIds(),
      idleTtlMs: 60_000,
      maxGlobalResponses: 50,
    });
    const store = registry.create();

    for (let page = 1; page <= 200; page++) {
      await store.getOrFetch(`search:multi:dune:${page}`, async () => ok(page), 600, "global");
    }

    expect(registry.globalCache.size).toBe(50);
    expect(registry.globalCache.get("search:multi:dune:1", 600)).toBeUndefined();
    expect(registry.globalCache.get("search:multi:dune:200", 600)).toBe(200);
  });
});
