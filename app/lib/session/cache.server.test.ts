import { describe, it, expect } from "vitest";
import type { Clock } from "~/lib/clock";
import { ResponseCache } from "./cache.server";

function manualClock(start = 0): Clock & { advanceSeconds(seconds: number): void } {
  let now = start;
  return {
    now: () => now,
    advanceSeconds(seconds: number) {
      now += seconds * 1000;
    },
  };
}

describe("ResponseCache", () => {
  it("returns a value stored under the key while it is fresh", () => {
    const clock = manualClock();
    const cache = new ResponseCache(clock);

    cache.set("search:multi:dune:1", ["Dune"]);
    clock.advanceSeconds(59);

    expect(cache.get<string[]>("search:multi:dune:1", 60)).toEqual(["Dune"]);
  });

  it("treats an entry exactly ttl seconds old as absent", () => {
    const clock = manualClock();
    const cache = new ResponseCache(clock);

    cache.set("k", "v");
    clock.advanceSeconds(60);

    expect(cache.get("k", 60)).toBeUndefined();
  });

  it("purges an expired entry on the read that finds it", () => {
    const clock = manualClock();
    const cache = new ResponseCache(clock);

    cache.set("k", "v");
    clock.advanceSeconds(120);
    expect(cache.size).toBe(1);

    expect(cache.get("k", 60)).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("keeps one entry per key and restarts its age on overwrite", () => {
    const clock = manualClock();
    const cache = new ResponseCache(clock);

    cache.set("k", "first");
    clock.advanceSeconds(50);
    cache.set("k", "second");
    clock.advanceSeconds(50);

    expect(cache.size).toBe(1);
    expect(cache.get("k", 60)).toBe("second");
  });

  it("evaluates the ttl given by each read", () => {
    const clock = manualClock();
    const cache = new ResponseCache(clock);

    cache.set("k", "v");
    clock.advanceSeconds(30);

    expect(cache.has("k", 60)).toBe(true);
    expect(cache.has("k", 10)).toBe(false);
    // The short-ttl read purged it
    expect(cache.has("k", 60)).toBe(false);
  });

  it("deletes and clears entries", () => {
    const cache = new ResponseCache(manualClock());
    cache.set("a", 1);
    cache.set("b", 2);

    expect(cache.delete("a")).toBe(true);
    expect(cache.delete("a")).toBe(false);
    cache.clear();
    expect(cache.size).toBe(0);
  });

  it("evicts the least recently used entry past its capacity", () => {
    const cache = new ResponseCache(manualClock(), 2);

    cache.set("search:multi:dune:1", "a");
    cache.set("search:multi:heat:1", "b");
    cache.set("search:multi:alien:1", "c");

    expect(cache.size).toBe(2);
    expect(cache.get("search:multi:dune:1", 60)).toBeUndefined();
    expect(cache.get("search:multi:heat:1", 60)).toBe("b");
    expect(cache.get("search:multi:alien:1", 60)).toBe("c");
  });

  it("keeps a recently read entry when evicting", () => {
    const cache = new ResponseCache(manualClock(), 2);

    cache.set("a", 1);
    cache.set("b", 2);
    expect(cache.get("a", 60)).toBe(1);
    cache.set("c", 3);

    expect(cache.get("b", 60)).toBeUndefined();
    expect(cache.get("a", 60)).toBe(1);
  });
});
