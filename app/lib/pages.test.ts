import { describe, expect, it } from "vitest";
import { pageForPath } from "./pages";

describe("pageForPath", () => {
  it("maps app paths to their page", () => {
    expect(pageForPath("/app")).toBe("home");
    expect(pageForPath("/app/watchlist")).toBe("watchlist");
    expect(pageForPath("/app/settings")).toBe("settings");
  });

  it("treats unknown paths as home", () => {
    expect(pageForPath("/app/anything")).toBe("home");
  });
});
