import { describe, it, expect, vi } from "vitest";
import type { Clock } from "~/lib/clock";
import { fail, ok, type ServiceResult } from "~/lib/errors";
import { ResponseCache } from "./cache.server";
import { SessionStateStore } from "./state.server";
import type { SelectionField } from "./types";

function manualClock(): Clock & { setSeconds(seconds: number): void } {
  let now = 0;
  return {
    now: () => now,
    setSeconds(seconds: number) {
      now = seconds * 1000;
    },
  };
}

const user = {
  identity: "u1",
  email: "u1@example.com",
  displayName: null,
  idToken: "test-token",
};

function createStore(clock: Clock = manualClock(), globalCache = new ResponseCache(clock)) {
  return new SessionStateStore("session-1", { clock, globalCache });
}

describe("SessionStateStore.getOrFetch", () => {
  it("calls the fetcher once for two reads within the ttl", async () => {
    const clock = manualClock();
    const store = createStore(clock);
    const fetchFn = vi.fn(async (): Promise<ServiceResult<string>> => ok("payload"));

    const first = await store.getOrFetch("k", fetchFn, 60);
    clock.setSeconds(59);
    const second = await store.getOrFetch("k", fetchFn, 60);

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(first).toEqual({ success: true, data: "payload" });
    expect(second).toEqual({ success: true, data: "payload" });
  });

  it("fetches again once the ttl has elapsed", async () => {
    const clock = manualClock();
    const store = createStore(clock);
    const fetchFn = vi
      .fn<() => Promise<ServiceResult<number>>>()
      .mockResolvedValueOnce(ok(1))
      .mockResolvedValueOnce(ok(2));

    await store.getOrFetch("k", fetchFn, 60);
    clock.setSeconds(60);
    const result = await store.getOrFetch("k", fetchFn, 60);

    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(result).toEqual({ success: true, data: 2 });
  });

  it("follows the trending timeline: fetch at 0, hit at 100, fetch at 400", async () => {
    const clock = manualClock();
    const store = createStore(clock);
    const fetchTrending = vi.fn(async (): Promise<ServiceResult<string[]>> => ok(["Dune", "Arcane"]));

    clock.setSeconds(0);
    const fresh = await store.getOrFetch("trending:1", fetchTrending, 300);
    expect(fetchTrending).toHaveBeenCalledTimes(1);

    clock.setSeconds(100);
    const cached = await store.getOrFetch("trending:1", fetchTrending, 300);
    expect(fetchTrending).toHaveBeenCalledTimes(1);
    expect(cached).toEqual(fresh);

    clock.setSeconds(400);
    await store.getOrFetch("trending:1", fetchTrending, 300);
    expect(fetchTrending).toHaveBeenCalledTimes(2);
  });

  it("returns a failure unchanged and caches nothing", async () => {
    const store = createStore();
    const failing = vi.fn(async (): Promise<ServiceResult<string>> =>
      fail("network", "HTTP 503: Service Unavailable", 503)
    );

    const result = await store.getOrFetch("k", failing, 60);
    expect(result).toEqual({
      success: false,
      error: { kind: "network", message: "HTTP 503: Service Unavailable", status: 503 },
    });
    expect(store.userCacheSize).toBe(0);

    // Next read is still a miss
    const succeeding = vi.fn(async (): Promise<ServiceResult<string>> => ok("recovered"));
    expect(await store.getOrFetch("k", succeeding, 60)).toEqual({ success: true, data: "recovered" });
    expect(succeeding).toHaveBeenCalledTimes(1);
  });

  it("keeps the previous entry out of reach after a failed refresh", async () => {
    const clock = manualClock();
    const store = createStore(clock);

    await store.getOrFetch("k", async () => ok("old"), 60);
    clock.setSeconds(61);
    const result = await store.getOrFetch("k", async () => fail<string>("not_found", "gone"), 60);

    expect(result.success).toBe(false);
    expect(store.userCacheSize).toBe(0);
  });

  it("propagates a thrown error without caching", async () => {
    const store = createStore();

    await expect(
      store.getOrFetch("k", async () => {
        throw new Error("socket hang up");
      }, 60)
    ).rejects.toThrow("socket hang up");
    expect(store.userCacheSize).toBe(0);
  });

  it("shares global entries between stores and keeps user entries private", async () => {
    const clock = manualClock();
    const globalCache = new ResponseCache(clock);
    const storeA = createStore(clock, globalCache);
    const storeB = new SessionStateStore("session-2", { clock, globalCache });

    await storeA.getOrFetch("trending:week:1", async () => ok("shared"), 300, "global");
    await storeA.getOrFetch("insight:movie:1", async () => ok("private"), 300);

    const globalFetch = vi.fn(async (): Promise<ServiceResult<string>> => ok("refetched"));
    const userFetch = vi.fn(async (): Promise<ServiceResult<string>> => ok("mine"));

    expect(await storeB.getOrFetch("trending:week:1", globalFetch, 300, "global")).toEqual({
      success: true,
      data: "shared",
    });
    expect(await storeB.getOrFetch("insight:movie:1", userFetch, 300)).toEqual({
      success: true,
      data: "mine",
    });
    expect(globalFetch).not.toHaveBeenCalled();
    expect(userFetch).toHaveBeenCalledTimes(1);
  });
});

describe("SessionStateStore selections", () => {
  it("reads back a selected media id", () => {
    const store = createStore();
    store.setSelection("selectedMedia", "tt001");
    expect(store.getSelection("selectedMedia")).toBe("tt001");
  });

  it("returns undefined for a field never set", () => {
    expect(createStore().getSelection("lastAiResult")).toBeUndefined();
  });

  it("clears a single field", () => {
    const store = createStore();
    store.setSelection("currentPage", "watchlist");
    store.clearSelection("currentPage");
    expect(store.getSelection("currentPage")).toBeUndefined();
  });

  it("rejects fields outside the recognized set", () => {
    const store = createStore();
    const field = "favoriteColor";
    const read = () => store.getSelection(field as SelectionField);
    expect(read).toThrow("Unknown session field: favoriteColor");
  });
});

describe("SessionStateStore.clearOnSignOut", () => {
  it("drops identity and user entries but keeps global ones", async () => {
    const clock = manualClock();
    const globalCache = new ResponseCache(clock);
    const store = createStore(clock, globalCache);

    store.setSelection("identity", user);
    store.setSelection("selectedMedia", "movie-603");
    store.setSelection("currentPage", "home");
    store.setSelection("lastAiResult", { subject: "movie-603", title: "The Matrix", text: "..." });
    await store.getOrFetch("trending:week:1", async () => ok(["The Matrix"]), 300, "global");
    await store.getOrFetch("watchlist:u1", async () => ok(["movie-603"]), 300);

    store.clearOnSignOut();

    expect(store.getSelection("identity")).toBeUndefined();
    expect(store.getSelection("selectedMedia")).toBeUndefined();
    expect(store.getSelection("lastAiResult")).toBeUndefined();
    expect(store.getSelection("currentPage")).toBe("home");
    expect(store.userCacheSize).toBe(0);
    expect(globalCache.get("trending:week:1", 300)).toEqual(["The Matrix"]);
  });

  it("makes a per-user key a miss for whoever signs in next", async () => {
    const store = createStore();
    store.setSelection("identity", user);
    await store.getOrFetch("watchlist:u1", async () => ok(["movie-603"]), 300);

    store.clearOnSignOut();
    store.setSelection("identity", { ...user, identity: "u2" });

    const fetchFn = vi.fn(async (): Promise<ServiceResult<string[]>> => ok([]));
    await store.getOrFetch("watchlist:u1", fetchFn, 300);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });
});
