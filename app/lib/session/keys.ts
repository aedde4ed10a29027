/**
 * Cache keys and lifetimes for external service calls.
 * Keys are derived only from the request parameters, so equal requests share an entry.
 */

import type { MediaKind, SearchKind, TrendingWindow } from "~/lib/tmdb/types";
import type { CacheScope } from "./types";

export interface CachePolicy {
  ttlSeconds: number;
  scope: CacheScope;
}

export const CACHE_POLICIES = {
  trending: { ttlSeconds: 300, scope: "global" },
  search: { ttlSeconds: 600, scope: "global" },
  details: { ttlSeconds: 3600, scope: "global" },
  insight: { ttlSeconds: 3600, scope: "user" },
} as const satisfies Record<string, CachePolicy>;

/**
 * Lower-case, trim and collapse whitespace so "  The  Matrix" and "the matrix" match.
 */
export function normalizeQuery(query: string): string {
  return query.trim().toLowerCase().replace(/\s+/g, " ");
}

export function trendingKey(window: TrendingWindow, page: number): string {
  return `trending:${window}:${page}`;
}

export function searchKey(query: string, page: number, kind: SearchKind = "multi"): string {
  return `search:${kind}:${normalizeQuery(query)}:${page}`;
}

export function detailsKey(kind: MediaKind, id: number): string {
  return `details:${kind}:${id}`;
}

export function insightKey(kind: MediaKind, id: number): string {
  return `insight:${kind}:${id}`;
}

export function titleInsightKey(title: string, plot: string): string {
  return `insight:title:${normalizeQuery(title)}:${normalizeQuery(plot)}`;
}
