/**
 * OMDb API client for awards and ratings from IMDb, Rotten Tomatoes and Metacritic.
 * Only used to enrich TMDB details; every failure is non-fatal for the caller.
 */

import { env } from "~/lib/env.server";
import { fail, fromFetchError, ok, type ServiceResult } from "~/lib/errors";
import type { ExternalRatings } from "~/lib/tmdb/types";

const OMDB_BASE_URL = "https://www.omdbapi.com";
const OMDB_REQUEST_TIMEOUT = 10000;

interface OMDbResponse {
  Response: "True" | "False";
  Error?: string;
  Awards?: string;
  imdbRating?: string;
  imdbVotes?: string;
  Metascore?: string;
  Ratings?: Array<{ Source: string; Value: string }>;
}

export interface OMDbExtras {
  awards: string | null;
  ratings: ExternalRatings;
}

/**
 * Pull awards and per-source ratings out of an OMDb title response.
 */
export function parseExtras(data: OMDbResponse): OMDbExtras {
  const ratings: ExternalRatings = {};

  if (data.imdbRating && data.imdbRating !== "N/A") {
    ratings.imdb = {
      rating: data.imdbRating,
      votes: data.imdbVotes?.replace(/,/g, "") || "0",
    };
  }

  if (data.Ratings) {
    for (const rating of data.Ratings) {
      if (rating.Source === "Rotten Tomatoes") {
        ratings.rottenTomatoes = { rating: rating.Value };
      } else if (rating.Source === "Metacritic") {
        ratings.metacritic = { rating: rating.Value };
      }
    }
  }

  // Metascore is present even when the Ratings array omits Metacritic
  if (!ratings.metacritic && data.Metascore && data.Metascore !== "N/A") {
    ratings.metacritic = { rating: `${data.Metascore}/100` };
  }

  const awards = data.Awards && data.Awards !== "N/A" ? data.Awards : null;
  return { awards, ratings };
}

export class OMDbClient {
  private readonly apiKey: string;

  constructor(apiKey: string) {
    this.apiKey = apiKey;
  }

  /**
   * Fetch awards and ratings by IMDb ID.
   */
  async getExtrasByIMDbId(imdbId: string): Promise<ServiceResult<OMDbExtras>> {
    const params = new URLSearchParams({ apikey: this.apiKey, i: imdbId });
    const url = `${OMDB_BASE_URL}/?${params.toString()}`;

    try {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), OMDB_REQUEST_TIMEOUT);

      const response = await fetch(url, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: controller.signal,
      });

      clearTimeout(timeoutId);

      if (!response.ok) {
        return fail("network", `HTTP ${response.status}: ${response.statusText}`, response.status);
      }

      const data: OMDbResponse = await response.json();

      if (data.Response === "False") {
        const message = data.Error || "Unknown error";
        return fail(message === "Incorrect IMDb ID." ? "not_found" : "network", message);
      }

      return ok(parseExtras(data));
    } catch (error) {
      return fromFetchError(error);
    }
  }
}

/**
 * Create an OMDbClient if the API key is configured.
 */
export function createOMDbClient(): OMDbClient | null {
  const apiKey = env.OMDB_API_KEY;
  if (!apiKey) {
    return null;
  }
  return new OMDbClient(apiKey);
}
