/**
 * TMDB API client for trending lists, search and title details.
 * The .server.ts suffix ensures this is never bundled for the client.
 */

import { env } from "~/lib/env.server";
import {
  fail,
  fromFetchError,
  kindForStatus,
  ok,
  type ServiceResult,
} from "~/lib/errors";
import { createLogger } from "~/lib/logger.server";
import { createOMDbClient, type OMDbClient } from "~/lib/omdb/client.server";
import type {
  CastMember,
  MediaDetails,
  MediaKind,
  MediaSummary,
  ResultPage,
  SearchKind,
  TMDBCredits,
  TMDBErrorBody,
  TMDBMovie,
  TMDBMovieDetails,
  TMDBMultiResult,
  TMDBPaginatedResponse,
  TMDBShow,
  TMDBShowDetails,
  TrendingWindow,
} from "./types";

const TMDB_BASE_URL = "https://api.themoviedb.org/3";
export const TMDB_IMAGE_BASE_URL = "https://image.tmdb.org/t/p";
const TMDB_REQUEST_TIMEOUT = 10000; // 10 seconds
const CAST_LIMIT = 5;

const logger = createLogger("TMDB");

export function imageUrl(
  path: string | null | undefined,
  size: "w185" | "w342" | "w500" | "w780"
): string | null {
  return path ? `${TMDB_IMAGE_BASE_URL}/${size}${path}` : null;
}

function isMovie(item: TMDBMultiResult): item is TMDBMovie {
  return item.media_type === "movie";
}

function isShow(item: TMDBMultiResult): item is TMDBShow {
  return item.media_type === "tv";
}

function movieToSummary(movie: TMDBMovie): MediaSummary {
  return {
    id: movie.id,
    kind: "movie",
    title: movie.title,
    releaseDate: movie.release_date ?? "",
    overview: movie.overview,
    posterUrl: imageUrl(movie.poster_path, "w342"),
    popularity: movie.popularity,
    rating: movie.vote_average > 0 ? movie.vote_average : null,
  };
}

function showToSummary(show: TMDBShow): MediaSummary {
  return {
    id: show.id,
    kind: "show",
    title: show.name,
    releaseDate: show.first_air_date ?? "",
    overview: show.overview,
    posterUrl: imageUrl(show.poster_path, "w342"),
    popularity: show.popularity,
    rating: show.vote_average > 0 ? show.vote_average : null,
  };
}

/**
 * Keep movies and shows from a mixed result list, dropping people.
 */
function multiToSummaries(items: TMDBMultiResult[]): MediaSummary[] {
  const summaries: MediaSummary[] = [];
  for (const item of items) {
    if (isMovie(item)) {
      summaries.push(movieToSummary(item));
    } else if (isShow(item)) {
      summaries.push(showToSummary(item));
    }
  }
  return summaries;
}

function toPage<T>(
  response: TMDBPaginatedResponse<T>,
  results: MediaSummary[]
): ResultPage {
  return {
    page: response.page,
    totalPages: response.total_pages,
    totalResults: response.total_results,
    results,
  };
}

function castFromCredits(credits: TMDBCredits | undefined): CastMember[] {
  return (credits?.cast ?? []).slice(0, CAST_LIMIT).map((member) => ({
    name: member.name,
    character: member.character ?? "",
    profileUrl: imageUrl(member.profile_path, "w185"),
  }));
}

export function movieDetailsFromResponse(data: TMDBMovieDetails): MediaDetails {
  return {
    kind: "movie",
    id: data.id,
    title: data.title,
    overview: data.overview ?? "",
    releaseDate: data.release_date ?? "",
    posterUrl: imageUrl(data.poster_path, "w500"),
    backdropUrl: imageUrl(data.backdrop_path, "w780"),
    genres: data.genres.map((genre) => genre.name),
    rating: data.vote_average > 0 ? data.vote_average : null,
    directedBy: (data.credits?.crew ?? [])
      .filter((member) => member.job === "Director")
      .map((member) => member.name),
    cast: castFromCredits(data.credits),
    imdbId: data.external_ids?.imdb_id ?? null,
    awards: null,
    externalRatings: {},
    runtime: data.runtime || null,
  };
}

export function showDetailsFromResponse(data: TMDBShowDetails): MediaDetails {
  return {
    kind: "show",
    id: data.id,
    title: data.name,
    overview: data.overview ?? "",
    releaseDate: data.first_air_date ?? "",
    posterUrl: imageUrl(data.poster_path, "w500"),
    backdropUrl: imageUrl(data.backdrop_path, "w780"),
    genres: data.genres.map((genre) => genre.name),
    rating: data.vote_average > 0 ? data.vote_average : null,
    directedBy: (data.created_by ?? []).map((creator) => creator.name),
    cast: castFromCredits(data.credits),
    imdbId: data.external_ids?.imdb_id ?? null,
    awards: null,
    externalRatings: {},
    seasons: data.number_of_seasons ?? null,
    episodes: data.number_of_episodes ?? null,
  };
}

/**
 * TMDB API client.
 */
export class TMDBClient {
  private readonly apiKey: string;
  private readonly omdb: OMDbClient | null;

  constructor(apiKey: string, omdb: OMDbClient | null = null) {
    this.apiKey = apiKey;
    this.omdb = omdb;
  }

  /**
   * Make a request to the TMDB API.
   */
  private async request<T>(path: string, params?: URLSearchParams): Promise<ServiceResult<T>> {
    const query = new URLSearchParams(params);
    query.set("api_key", this.apiKey);
    const url = `${TMDB_BASE_URL}${path}?${query.toString()}`;

    try {
      const controller = new AbortController();
      const timeoutId = setTimeout(
        () => controller.abort(),
        TMDB_REQUEST_TIMEOUT
      );

      const response = await fetch(url, {
        method: "GET",
        headers: {
          Accept: "application/json",
        },
        signal: controller.signal,
      });

      clearTimeout(timeoutId);

      if (!response.ok) {
        // Check for rate limiting
        if (response.status === 429) {
          const retryAfter = response.headers.get("Retry-After") || "unknown";
          logger.error(`RATE LIMITED! Retry after: ${retryAfter}s. Path: ${path}`);
        }

        let message = `HTTP ${response.status}: ${response.statusText}`;
        try {
          const body: TMDBErrorBody = await response.json();
          if (body.status_message) {
            message = `TMDB ${response.status}: ${body.status_message}`;
          }
        } catch {
          // Body was not JSON; keep the status line.
        }

        return fail(kindForStatus(response.status), message, response.status);
      }

      try {
        const data: T = await response.json();
        return ok(data);
      } catch {
        return fail("network", "Failed to decode JSON");
      }
    } catch (error) {
      return fromFetchError(error);
    }
  }

  /**
   * Search movies, shows or both. Multi-search drops people from the results.
   */
  async search(
    query: string,
    page = 1,
    kind: SearchKind = "multi"
  ): Promise<ServiceResult<ResultPage>> {
    const params = new URLSearchParams({
      query,
      page: page.toString(),
      include_adult: "false",
    });

    if (kind === "movie") {
      const result = await this.request<TMDBPaginatedResponse<TMDBMovie>>("/search/movie", params);
      if (!result.success) return result;
      return ok(toPage(result.data, result.data.results.map(movieToSummary)));
    }

    if (kind === "tv") {
      const result = await this.request<TMDBPaginatedResponse<TMDBShow>>("/search/tv", params);
      if (!result.success) return result;
      return ok(toPage(result.data, result.data.results.map(showToSummary)));
    }

    const result = await this.request<TMDBPaginatedResponse<TMDBMultiResult>>("/search/multi", params);
    if (!result.success) return result;
    return ok(toPage(result.data, multiToSummaries(result.data.results)));
  }

  /**
   * Trending movies and shows for the day or week.
   */
  async trending(
    window: TrendingWindow = "week",
    page = 1
  ): Promise<ServiceResult<ResultPage>> {
    const result = await this.request<TMDBPaginatedResponse<TMDBMultiResult>>(
      `/trending/all/${window}`,
      new URLSearchParams({ page: page.toString() })
    );
    if (!result.success) return result;
    return ok(toPage(result.data, multiToSummaries(result.data.results)));
  }

  /**
   * Full details with credits and external ids, plus OMDb awards and
   * ratings when OMDb is configured.
   */
  async details(kind: MediaKind, id: number): Promise<ServiceResult<MediaDetails>> {
    const params = new URLSearchParams({ append_to_response: "credits,external_ids" });

    let details: MediaDetails;
    if (kind === "movie") {
      const result = await this.request<TMDBMovieDetails>(`/movie/${id}`, params);
      if (!result.success) return result;
      details = movieDetailsFromResponse(result.data);
    } else {
      const result = await this.request<TMDBShowDetails>(`/tv/${id}`, params);
      if (!result.success) return result;
      details = showDetailsFromResponse(result.data);
    }

    if (this.omdb && details.imdbId) {
      const extras = await this.omdb.getExtrasByIMDbId(details.imdbId);
      if (extras.success) {
        details.awards = extras.data.awards;
        details.externalRatings = extras.data.ratings;
      } else {
        logger.warn(`OMDb lookup failed for ${details.imdbId}`, {
          message: extras.error.message,
        });
      }
    }

    return ok(details);
  }
}

/**
 * Create a TMDBClient from the environment, with OMDb enrichment when configured.
 */
export function createTMDBClient(): TMDBClient {
  return new TMDBClient(env.TMDB_API_KEY, createOMDbClient());
}
