/**
 * TMDB API type definitions.
 * Raw response shapes first, then the normalized types the routes use.
 */

/**
 * TMDB movie from list responses.
 */
export interface TMDBMovie {
  id: number;
  title: string;
  overview: string;
  poster_path: string | null;
  backdrop_path: string | null;
  vote_average: number;
  release_date?: string;
  popularity: number;
  media_type?: "movie";
}

/**
 * TMDB TV show from list responses.
 */
export interface TMDBShow {
  id: number;
  name: string;
  overview: string;
  poster_path: string | null;
  backdrop_path: string | null;
  vote_average: number;
  first_air_date?: string;
  popularity: number;
  media_type?: "tv";
}

/**
 * Person hit from multi-search; dropped during normalization.
 */
export interface TMDBPerson {
  id: number;
  name: string;
  media_type: "person";
}

export type TMDBMultiResult = TMDBMovie | TMDBShow | TMDBPerson;

/**
 * TMDB paginated response wrapper.
 */
export interface TMDBPaginatedResponse<T> {
  page: number;
  results: T[];
  total_pages: number;
  total_results: number;
}

export interface TMDBCastMember {
  id: number;
  name: string;
  character?: string;
  profile_path: string | null;
}

export interface TMDBCrewMember {
  id: number;
  name: string;
  job: string;
}

export interface TMDBCredits {
  cast: TMDBCastMember[];
  crew: TMDBCrewMember[];
}

interface TMDBDetailsBase {
  id: number;
  overview: string | null;
  poster_path: string | null;
  backdrop_path: string | null;
  vote_average: number;
  genres: Array<{ id: number; name: string }>;
  credits?: TMDBCredits;
  external_ids?: { imdb_id?: string | null };
}

export interface TMDBMovieDetails extends TMDBDetailsBase {
  title: string;
  release_date?: string;
  runtime: number | null;
}

export interface TMDBShowDetails extends TMDBDetailsBase {
  name: string;
  first_air_date?: string;
  number_of_seasons?: number;
  number_of_episodes?: number;
  created_by?: Array<{ id: number; name: string }>;
}

/**
 * TMDB error body (`status_message` is set on most failures).
 */
export interface TMDBErrorBody {
  status_code?: number;
  status_message?: string;
}

// Normalized types

export type MediaKind = "movie" | "show";
export type SearchKind = "multi" | "movie" | "tv";
export type TrendingWindow = "day" | "week";

/**
 * Movie or show as shown in grids.
 */
export interface MediaSummary {
  id: number;
  kind: MediaKind;
  title: string;
  releaseDate: string;
  overview: string;
  posterUrl: string | null;
  popularity: number;
  /** TMDB rating (0-10 scale) */
  rating: number | null;
}

export interface ResultPage {
  page: number;
  totalPages: number;
  totalResults: number;
  results: MediaSummary[];
}

export interface CastMember {
  name: string;
  character: string;
  profileUrl: string | null;
}

export interface ExternalRatings {
  imdb?: { rating: string; votes: string };
  rottenTomatoes?: { rating: string };
  metacritic?: { rating: string };
}

interface MediaDetailsBase {
  id: number;
  title: string;
  overview: string;
  releaseDate: string;
  posterUrl: string | null;
  backdropUrl: string | null;
  genres: string[];
  rating: number | null;
  /** Director for movies, creators for shows */
  directedBy: string[];
  cast: CastMember[];
  imdbId: string | null;
  awards: string | null;
  externalRatings: ExternalRatings;
}

export interface MovieDetails extends MediaDetailsBase {
  kind: "movie";
  /** Minutes */
  runtime: number | null;
}

export interface ShowDetails extends MediaDetailsBase {
  kind: "show";
  seasons: number | null;
  episodes: number | null;
}

export type MediaDetails = MovieDetails | ShowDetails;
