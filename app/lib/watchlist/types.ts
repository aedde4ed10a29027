/**
 * Watchlist types
 */

import type { MediaKind } from "~/lib/tmdb/types";

/**
 * A saved title, stored under /users/<identity>/watchlist/<mediaId>.
 */
export interface WatchlistEntry {
  /** "<kind>-<tmdbId>", see toMediaId() */
  mediaId: string;
  kind: MediaKind;
  title: string;
  posterUrl: string | null;
}

/**
 * Record body as stored in the database (the key carries the mediaId).
 */
export interface StoredWatchlistEntry {
  title?: string;
  kind?: string;
  posterUrl?: string | null;
}

export interface UserProfile {
  name: string;
}
