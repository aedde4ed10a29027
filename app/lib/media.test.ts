import { describe, it, expect } from "vitest";
import {
  formatMetaLine,
  formatRuntime,
  kindLabel,
  parseMediaId,
  releaseYear,
  toMediaId,
} from "./media";

describe("media ids", () => {
  it("round-trips a kind and tmdb id", () => {
    expect(toMediaId("show", 1396)).toBe("show-1396");
    expect(parseMediaId("show-1396")).toEqual({ kind: "show", id: 1396 });
  });

  it("rejects ids that are not <kind>-<number>", () => {
    expect(parseMediaId("tv-1396")).toBeNull();
    expect(parseMediaId("movie-")).toBeNull();
    expect(parseMediaId("tt0133093")).toBeNull();
  });
});

describe("display helpers", () => {
  it("formats runtimes in hours and minutes", () => {
    expect(formatRuntime(136)).toBe("2h 16m");
    expect(formatRuntime(45)).toBe("45m");
    expect(formatRuntime(null)).toBeUndefined();
    expect(formatRuntime(0)).toBeUndefined();
  });

  it("takes the year from a release date", () => {
    expect(releaseYear("1999-03-30")).toBe("1999");
    expect(releaseYear("")).toBeUndefined();
  });

  it("labels kinds and joins the non-empty meta parts", () => {
    expect(kindLabel("show")).toBe("Series");
    expect(formatMetaLine(["1999", undefined, "2h 16m", null, "Action"])).toBe(
      "1999 • 2h 16m • Action"
    );
  });
});
