import { describe, it, expect } from "vitest";
import {
  CACHE_POLICIES,
  detailsKey,
  insightKey,
  normalizeQuery,
  searchKey,
  titleInsightKey,
  trendingKey,
} from "./keys";

describe("normalizeQuery", () => {
  it("trims, lower-cases and collapses inner whitespace", () => {
    expect(normalizeQuery("  The   Matrix\tReloaded ")).toBe("the matrix reloaded");
  });
});

describe("cache keys", () => {
  it("derives equal search keys for queries that differ only in case and spacing", () => {
    expect(searchKey("  Dune ", 1)).toBe(searchKey("dune", 1));
    expect(searchKey("dune", 1)).toBe("search:multi:dune:1");
  });

  it("separates search kinds and pages", () => {
    expect(searchKey("dune", 2, "movie")).toBe("search:movie:dune:2");
    expect(searchKey("dune", 1, "tv")).not.toBe(searchKey("dune", 1, "movie"));
  });

  it("builds trending, details and insight keys from their parameters", () => {
    expect(trendingKey("week", 1)).toBe("trending:week:1");
    expect(detailsKey("show", 1396)).toBe("details:show:1396");
    expect(insightKey("movie", 603)).toBe("insight:movie:603");
  });

  it("includes the plot in free-text insight keys", () => {
    expect(titleInsightKey(" Heat ", "A  heist")).toBe("insight:title:heat:a heist");
    expect(titleInsightKey("Heat", "A heist")).not.toBe(titleInsightKey("Heat", "A chase"));
  });
});

describe("CACHE_POLICIES", () => {
  it("shares metadata across sessions and keeps insights per user", () => {
    expect(CACHE_POLICIES.trending).toEqual({ ttlSeconds: 300, scope: "global" });
    expect(CACHE_POLICIES.search).toEqual({ ttlSeconds: 600, scope: "global" });
    expect(CACHE_POLICIES.details).toEqual({ ttlSeconds: 3600, scope: "global" });
    expect(CACHE_POLICIES.insight).toEqual({ ttlSeconds: 3600, scope: "user" });
  });
});
