/**
 * Discovery Pipeline - Type Definitions
 *
 * Shapes shared by the providers, the cache codecs and the pipeline stages.
 * Everything here is treated as immutable once created.
 */

// ============================================================================
// Candidates & Details
// ============================================================================

/** Unverified reference to a title, as returned by a term search. */
export interface Candidate {
  identifier: string;
  title: string;
  year?: string;
}

export const RATING_SOURCES = [
  "Internet Movie Database",
  "Rotten Tomatoes",
  "Metacritic",
] as const;

export type RatingSource = (typeof RATING_SOURCES)[number];

export type NormalizedRatings = Record<RatingSource, number | null>;

export interface Detail {
  identifier: string;
  title: string;
  year: string;
  poster: string;
  runtime: string;
  genres: string[];
  plot: string;
  director: string;
  writer: string;
  cast: string;
  rawRatings: Record<string, string>;
  boxOfficeRaw: string;
  releaseDate: string;
  language: string;
  awards: string;
  imdbRating: string;
}

export interface EnrichedResult extends Detail {
  ratings: NormalizedRatings;
  averageRating: number | null;
  boxOfficeValue: number;
  matchScore: number;
}

export interface SimilarTitle {
  identifier: string;
  title: string;
  year: string;
  poster: string;
  genres: string[];
  imdbRating: string;
  averageRating: number | null;
}

export interface RatingSummary {
  identifier: string;
  title: string;
  year: string;
  poster: string;
  ratings: NormalizedRatings;
  averageRating: number | null;
}

// ============================================================================
// Providers
// ============================================================================

export type MediaType = "movie" | "series" | "episode";

export interface SearchFilters {
  type?: MediaType;
  year?: string;
}

export interface SearchPage {
  candidates: Candidate[];
  totalResults: number;
}

export interface MetadataProvider {
  searchByTerm(term: string, page: number, filters?: SearchFilters): Promise<SearchPage>;
  getDetails(identifier: string): Promise<Detail | null>;
}

export interface CatalogCandidate {
  catalogId: number;
  title: string;
  year?: string;
}

export interface CatalogPage {
  candidates: CatalogCandidate[];
  totalPages: number;
}

export interface DiscoverOptions {
  page?: number;
  sortBy?: string;
  year?: string;
  language?: string;
  minVotes?: number;
}

export interface CatalogProvider {
  isConfigured(): boolean;
  listGenres(): Promise<Record<string, number>>;
  discoverByGenre(genreId: number, options?: DiscoverOptions): Promise<CatalogPage>;
  resolveExternalId(catalogId: number): Promise<string | null>;
}

// ============================================================================
// Sorting & Paging
// ============================================================================

export type SearchSort = "relevance" | "recency" | "rating";

export type GenreSort =
  | "rating_desc"
  | "rating_asc"
  | "year_desc"
  | "year_asc"
  | "title_asc"
  | "title_desc";

export type BoxOfficeSort =
  | "box_office_desc"
  | "box_office_asc"
  | "rating_desc"
  | "rating_asc"
  | "title_asc"
  | "title_desc";

export interface PageMeta {
  page: number;
  pageSize: number;
  totalCount: number;
  totalPages: number;
  hasPrev: boolean;
  hasNext: boolean;
}

export interface Page<T> extends PageMeta {
  items: T[];
}
