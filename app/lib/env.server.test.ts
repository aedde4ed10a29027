import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "./errors";
import { env, getFeatureFlags, validateEnv } from "./env.server";

const REQUIRED = {
  TMDB_API_KEY: "test-tmdb",
  FIREBASE_API_KEY: "test-firebase",
  FIREBASE_DB_URL: "https://cinebase-test.example.com/",
  SESSION_SECRET: "test-secret",
};

describe("env", () => {
  const saved = { ...process.env };

  beforeEach(() => {
    Object.assign(process.env, REQUIRED);
    delete process.env.PERPLEXITY_API_KEY;
    delete process.env.OMDB_API_KEY;
    delete process.env.SESSION_IDLE_MINUTES;
  });

  afterEach(() => {
    process.env = { ...saved };
  });

  it("passes validation when every required variable is set", () => {
    expect(() => validateEnv()).not.toThrow();
  });

  it("names the missing variable", () => {
    delete process.env.FIREBASE_API_KEY;
    expect(() => validateEnv()).toThrow(ConfigError);
    expect(() => validateEnv()).toThrow(
      "Missing required environment variable: FIREBASE_API_KEY. Check .env.example for documentation."
    );
  });

  it("treats whitespace-only values as missing", () => {
    process.env.TMDB_API_KEY = "   ";
    expect(() => env.TMDB_API_KEY).toThrow(ConfigError);
  });

  it("strips trailing slashes from the database URL", () => {
    expect(env.FIREBASE_DB_URL).toBe("https://cinebase-test.example.com");
  });

  it("disables optional features when their keys are absent", () => {
    expect(getFeatureFlags()).toEqual({ insights: false, omdb: false });

    process.env.PERPLEXITY_API_KEY = "test-pplx";
    expect(getFeatureFlags()).toEqual({ insights: true, omdb: false });
  });

  it("falls back to the default idle timeout for bad values", () => {
    expect(env.SESSION_IDLE_MINUTES).toBe(120);
    process.env.SESSION_IDLE_MINUTES = "abc";
    expect(env.SESSION_IDLE_MINUTES).toBe(120);
    process.env.SESSION_IDLE_MINUTES = "15";
    expect(env.SESSION_IDLE_MINUTES).toBe(15);
  });
});
