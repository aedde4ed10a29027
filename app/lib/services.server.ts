/**
 * Shared service clients. They hold no per-user state, so one instance of
 * each serves every session.
 */

import { createAuthClient, type FirebaseAuthClient } from "~/lib/auth/firebase.server";
import { createInsightClient, type InsightClient } from "~/lib/insight/client.server";
import { createTMDBClient, type TMDBClient } from "~/lib/tmdb/client.server";
import { createDatabaseClient, type FirebaseDatabaseClient } from "~/lib/watchlist/database.server";

export interface Services {
  auth: FirebaseAuthClient;
  database: FirebaseDatabaseClient;
  metadata: TMDBClient;
  /** null when PERPLEXITY_API_KEY is not set */
  insight: InsightClient | null;
}

let services: Services | null = null;

export function getServices(): Services {
  if (!services) {
    services = {
      auth: createAuthClient(),
      database: createDatabaseClient(),
      metadata: createTMDBClient(),
      insight: createInsightClient(),
    };
  }
  return services;
}
