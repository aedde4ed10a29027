/**
 * Server-side environment configuration with typed access and validation.
 * The .server.ts suffix ensures this file is never bundled for the client.
 */

import { ConfigError } from "./errors";

function getEnvVar(name: string): string {
  const value = process.env[name]?.trim();
  if (!value) {
    throw new ConfigError(name);
  }
  return value;
}

function getEnvVarWithDefault(name: string, defaultValue: string): string {
  return process.env[name] ?? defaultValue;
}

function getOptionalEnvVar(name: string): string | null {
  const value = process.env[name];
  return value && value.trim() ? value.trim() : null;
}

/**
 * Variables the server refuses to start without.
 */
export const REQUIRED_ENV_VARS = [
  "TMDB_API_KEY",
  "FIREBASE_API_KEY",
  "FIREBASE_DB_URL",
  "SESSION_SECRET",
] as const;

/**
 * Typed environment configuration.
 * Access via: import { env } from "~/lib/env.server";
 */
export const env = {
  /**
   * TMDB v3 API key for trending, search and details
   */
  get TMDB_API_KEY(): string {
    return getEnvVar("TMDB_API_KEY");
  },

  /**
   * Firebase Web API key (Identity Toolkit sign-in/sign-up)
   */
  get FIREBASE_API_KEY(): string {
    return getEnvVar("FIREBASE_API_KEY");
  },

  /**
   * Firebase Realtime Database root URL, without a trailing slash
   */
  get FIREBASE_DB_URL(): string {
    return getEnvVar("FIREBASE_DB_URL").replace(/\/+$/, "");
  },

  /**
   * Session secret for cookie signing
   */
  get SESSION_SECRET(): string {
    return getEnvVar("SESSION_SECRET");
  },

  /**
   * Perplexity API key. AI insights are disabled when unset.
   */
  get PERPLEXITY_API_KEY(): string | null {
    return getOptionalEnvVar("PERPLEXITY_API_KEY");
  },

  /**
   * OMDb API key. Awards and external ratings are skipped when unset.
   */
  get OMDB_API_KEY(): string | null {
    return getOptionalEnvVar("OMDB_API_KEY");
  },

  /**
   * Current environment (development, production, test)
   */
  get NODE_ENV(): string {
    return getEnvVarWithDefault("NODE_ENV", "development");
  },

  get isProduction(): boolean {
    return this.NODE_ENV === "production";
  },

  /**
   * Whether to use secure cookies (requires HTTPS).
   * Defaults to true in production, false in development.
   */
  get SECURE_COOKIES(): boolean {
    const value = process.env.SECURE_COOKIES;
    if (value !== undefined) {
      return value.toLowerCase() === "true";
    }
    return this.isProduction;
  },

  /**
   * Minutes a session store survives without a request
   */
  get SESSION_IDLE_MINUTES(): number {
    const parsed = parseInt(getEnvVarWithDefault("SESSION_IDLE_MINUTES", "120"), 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : 120;
  },
} as const;

export type Env = typeof env;

/**
 * Read every required variable, throwing a ConfigError for the first one missing.
 */
export function validateEnv(): void {
  for (const name of REQUIRED_ENV_VARS) {
    getEnvVar(name);
  }
}

export interface FeatureFlags {
  insights: boolean;
  omdb: boolean;
}

export function getFeatureFlags(): FeatureFlags {
  return {
    insights: env.PERPLEXITY_API_KEY !== null,
    omdb: env.OMDB_API_KEY !== null,
  };
}
