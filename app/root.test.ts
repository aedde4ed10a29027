import { afterEach, describe, expect, it, vi } from "vitest";
import { ConfigError } from "~/lib/errors";
import { runStartupChecks } from "~/lib/startup.server";
import { loader } from "./root";

vi.mock("~/lib/startup.server", () => ({ runStartupChecks: vi.fn() }));

describe("root loader", () => {
  afterEach(() => {
    vi.mocked(runStartupChecks).mockReset();
  });

  it("checks the configuration before rendering", async () => {
    const response = await loader();

    expect(runStartupChecks).toHaveBeenCalledTimes(1);
    expect(await response.json()).toEqual({});
  });

  it("surfaces a missing key on the first request", async () => {
    vi.mocked(runStartupChecks).mockImplementation(() => {
      throw new ConfigError("TMDB_API_KEY");
    });

    await expect(loader()).rejects.toThrow(ConfigError);
  });
});
