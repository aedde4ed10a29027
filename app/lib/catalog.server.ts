/**
 * Cached reads the pages make against the metadata and insight services.
 * Each function takes the session's store explicitly and goes through getOrFetch().
 */

import type { AuthenticatedUser } from "~/lib/auth/types";
import { fail, ok, type ServiceResult } from "~/lib/errors";
import type { InsightClient } from "~/lib/insight/client.server";
import { INSIGHTS_DISABLED_MESSAGE } from "~/lib/insight/client.server";
import { parseMediaId, toMediaId } from "~/lib/media";
import {
  CACHE_POLICIES,
  detailsKey,
  insightKey,
  searchKey,
  titleInsightKey,
  trendingKey,
} from "~/lib/session/keys";
import type { SessionStateStore } from "~/lib/session/state.server";
import type { InsightRecord } from "~/lib/session/types";
import type { TMDBClient } from "~/lib/tmdb/client.server";
import type { MediaDetails, ResultPage, SearchKind, TrendingWindow } from "~/lib/tmdb/types";
import type { FirebaseDatabaseClient } from "~/lib/watchlist/database.server";
import type { WatchlistEntry } from "~/lib/watchlist/types";

/** Capability the catalog needs from the metadata client */
export type MetadataSource = Pick<TMDBClient, "search" | "trending" | "details">;

/** Capability the catalog needs from the insight client */
export type InsightSource = Pick<InsightClient, "summarize">;

export type WatchlistWriter = Pick<FirebaseDatabaseClient, "addEntry">;

export function getTrending(
  store: SessionStateStore,
  metadata: MetadataSource,
  window: TrendingWindow = "week",
  page = 1
): Promise<ServiceResult<ResultPage>> {
  const { ttlSeconds, scope } = CACHE_POLICIES.trending;
  return store.getOrFetch(
    trendingKey(window, page),
    () => metadata.trending(window, page),
    ttlSeconds,
    scope
  );
}

export function searchTitles(
  store: SessionStateStore,
  metadata: MetadataSource,
  query: string,
  page = 1,
  kind: SearchKind = "multi"
): Promise<ServiceResult<ResultPage>> {
  const { ttlSeconds, scope } = CACHE_POLICIES.search;
  return store.getOrFetch(
    searchKey(query, page, kind),
    () => metadata.search(query.trim(), page, kind),
    ttlSeconds,
    scope
  );
}

export async function getDetails(
  store: SessionStateStore,
  metadata: MetadataSource,
  mediaId: string
): Promise<ServiceResult<MediaDetails>> {
  const ref = parseMediaId(mediaId);
  if (!ref) {
    return fail("not_found", `Unknown media id: ${mediaId}`);
  }
  const { ttlSeconds, scope } = CACHE_POLICIES.details;
  return store.getOrFetch(
    detailsKey(ref.kind, ref.id),
    () => metadata.details(ref.kind, ref.id),
    ttlSeconds,
    scope
  );
}

/**
 * Insight for a title the user has open. Cached per user and remembered as
 * the session's last AI result.
 */
export async function getMediaInsight(
  store: SessionStateStore,
  insight: InsightSource | null,
  details: MediaDetails
): Promise<ServiceResult<InsightRecord>> {
  if (!insight) {
    return fail("unavailable", INSIGHTS_DISABLED_MESSAGE);
  }

  const { ttlSeconds, scope } = CACHE_POLICIES.insight;
  const result = await store.getOrFetch(
    insightKey(details.kind, details.id),
    () => insight.summarize({ title: details.title, overview: details.overview }),
    ttlSeconds,
    scope
  );
  if (!result.success) return result;

  const record: InsightRecord = {
    subject: toMediaId(details.kind, details.id),
    title: details.title,
    text: result.data,
    kind: details.kind,
  };
  store.setSelection("lastAiResult", record);
  return { success: true, data: record };
}

/**
 * Insight for a free-text title. When no plot is given, the overview of the
 * first movie matching the title is used.
 */
export async function getTitleInsight(
  store: SessionStateStore,
  metadata: MetadataSource,
  insight: InsightSource | null,
  title: string,
  plot: string
): Promise<ServiceResult<InsightRecord>> {
  if (!insight) {
    return fail("unavailable", INSIGHTS_DISABLED_MESSAGE);
  }

  const cleanTitle = title.trim();
  let overview = plot.trim();

  if (!overview && cleanTitle) {
    const search = await searchTitles(store, metadata, cleanTitle, 1, "movie");
    if (!search.success) return search;
    const first = search.data.results[0];
    if (first) {
      const details = await getDetails(store, metadata, toMediaId(first.kind, first.id));
      if (!details.success) return details;
      overview = details.data.overview;
    }
  }

  if (!cleanTitle || !overview) {
    return fail("not_found", "Need a title and a plot to run AI insights.");
  }

  const { ttlSeconds, scope } = CACHE_POLICIES.insight;
  const result = await store.getOrFetch(
    titleInsightKey(cleanTitle, overview),
    () => insight.summarize({ title: cleanTitle, overview }),
    ttlSeconds,
    scope
  );
  if (!result.success) return result;

  const record: InsightRecord = {
    subject: cleanTitle,
    title: cleanTitle,
    text: result.data,
  };
  store.setSelection("lastAiResult", record);
  return { success: true, data: record };
}

/**
 * Save a title to the user's watchlist, named from its details.
 */
export async function addToWatchlist(
  database: WatchlistWriter,
  user: AuthenticatedUser,
  details: MediaDetails
): Promise<ServiceResult<WatchlistEntry>> {
  const entry: WatchlistEntry = {
    mediaId: toMediaId(details.kind, details.id),
    kind: details.kind,
    title: details.title,
    posterUrl: details.posterUrl,
  };
  const saved = await database.addEntry(user, entry);
  if (!saved.success) return saved;
  return ok(entry);
}
