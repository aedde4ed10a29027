/**
 * Startup configuration checks and logging.
 * Runs once before the server starts listening.
 */

import { env, getFeatureFlags, validateEnv } from "./env.server";
import { createLogger } from "./logger.server";

const logger = createLogger("Startup");

let startupCheckDone = false;

/**
 * Validate required configuration and log which optional features are on.
 * Throws ConfigError when a required variable is missing.
 */
export function runStartupChecks(): void {
  if (startupCheckDone) return;

  validateEnv();
  startupCheckDone = true;

  const features = getFeatureFlags();
  logger.info("CineBase configuration", {
    nodeEnv: env.NODE_ENV,
    databaseUrl: env.FIREBASE_DB_URL,
    secureCookies: env.SECURE_COOKIES,
    sessionIdleMinutes: env.SESSION_IDLE_MINUTES,
  });

  if (features.insights) {
    logger.info("AI insights enabled");
  } else {
    logger.warn("PERPLEXITY_API_KEY not set; AI insights disabled");
  }

  if (features.omdb) {
    logger.info("OMDb awards and ratings enabled");
  } else {
    logger.info("OMDB_API_KEY not set; awards and external ratings disabled");
  }
}
