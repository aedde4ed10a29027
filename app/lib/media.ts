/**
 * Media identifiers and display helpers shared by loaders and components.
 */

import type { MediaKind } from "~/lib/tmdb/types";

/**
 * Stable id for a title across the app and the watchlist database.
 * TMDB ids are only unique per kind, so the kind is part of the id.
 */
export function toMediaId(kind: MediaKind, tmdbId: number): string {
  return `${kind}-${tmdbId}`;
}

export function parseMediaId(mediaId: string): { kind: MediaKind; id: number } | null {
  const match = /^(movie|show)-(\d+)$/.exec(mediaId);
  if (!match) return null;
  const kind: MediaKind = match[1] === "movie" ? "movie" : "show";
  return { kind, id: parseInt(match[2], 10) };
}

export function isMediaKind(value: unknown): value is MediaKind {
  return value === "movie" || value === "show";
}

export function formatRuntime(minutes: number | null | undefined): string | undefined {
  if (!minutes) return undefined;
  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  if (hours > 0) {
    return `${hours}h ${remainingMinutes}m`;
  }
  return `${remainingMinutes}m`;
}

export function releaseYear(releaseDate: string | undefined): string | undefined {
  if (!releaseDate) return undefined;
  const year = releaseDate.split("-")[0];
  return year.length === 4 ? year : undefined;
}

export function kindLabel(kind: MediaKind): string {
  return kind === "movie" ? "Movie" : "Series";
}

/**
 * "2019 • 2h 12m • Drama, Crime" with empty parts left out.
 */
export function formatMetaLine(parts: Array<string | undefined | null>): string {
  return parts.filter((part): part is string => Boolean(part)).join(" • ");
}
