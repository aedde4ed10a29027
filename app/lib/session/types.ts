/**
 * Session state types.
 */

import type { AuthenticatedUser } from "~/lib/auth/types";
import type { MediaKind } from "~/lib/tmdb/types";

export type AppPage = "home" | "watchlist" | "settings";

export type CacheScope = "global" | "user";

/**
 * Last AI insight produced in this session.
 */
export interface InsightRecord {
  /** What the insight is about: a media key ("movie-603") or a free-text title */
  subject: string;
  title: string;
  text: string;
  kind?: MediaKind;
}

/**
 * Transient UI state kept per session.
 */
export interface SessionSelections {
  currentPage: AppPage;
  /** Opaque media identifier, e.g. "movie-603" */
  selectedMedia: string;
  identity: AuthenticatedUser;
  lastAiResult: InsightRecord;
}

export type SelectionField = keyof SessionSelections;

export const SELECTION_FIELDS: readonly SelectionField[] = [
  "currentPage",
  "selectedMedia",
  "identity",
  "lastAiResult",
];

export function isSelectionField(value: string): value is SelectionField {
  return SELECTION_FIELDS.some((field) => field === value);
}
