/**
 * Test builders for discovery shapes. Defaults describe a fictional title so
 * tests only spell out the fields they care about.
 */

import type {
  Candidate,
  CatalogProvider,
  Detail,
  EnrichedResult,
  MetadataProvider,
  NormalizedRatings,
  SearchFilters,
  SearchPage,
} from "./types";

export function makeDetail(overrides: Partial<Detail> = {}): Detail {
  return {
    identifier: "tt0000001",
    title: "Placeholder Picture",
    year: "2001",
    poster: "N/A",
    runtime: "100 min",
    genres: ["Drama"],
    plot: "A placeholder plot.",
    director: "Jane Doe",
    writer: "John Roe",
    cast: "Alex Poe, Sam Loe",
    rawRatings: { "Internet Movie Database": "7.0/10" },
    boxOfficeRaw: "N/A",
    releaseDate: "01 Jan 2001",
    language: "English",
    awards: "N/A",
    imdbRating: "7.0",
    ...overrides,
  };
}

export function makeRatings(overrides: Partial<NormalizedRatings> = {}): NormalizedRatings {
  return {
    "Internet Movie Database": null,
    "Rotten Tomatoes": null,
    Metacritic: null,
    ...overrides,
  };
}

export function makeResult(overrides: Partial<EnrichedResult> = {}): EnrichedResult {
  return {
    ...makeDetail(),
    ratings: makeRatings(),
    averageRating: null,
    boxOfficeValue: 0,
    matchScore: 0,
    ...overrides,
  };
}

export function makeCandidate(identifier: string, title: string, year?: string): Candidate {
  return year === undefined ? { identifier, title } : { identifier, title, year };
}

/**
 * In-process metadata provider. Search pages are registered per term and
 * page; details are looked up case-insensitively by identifier or title.
 */
export class FakeProvider implements MetadataProvider {
  private pages = new Map<string, SearchPage>();
  private details = new Map<string, Detail>();
  searchCalls: string[] = [];
  detailCalls: string[] = [];

  addPage(term: string, page: number, candidates: Candidate[], totalResults: number): this {
    this.pages.set(`${term}:${page}`, { candidates, totalResults });
    return this;
  }

  addDetail(detail: Detail, ...aliases: string[]): this {
    for (const key of [detail.identifier, ...aliases]) this.details.set(key.toLowerCase(), detail);
    return this;
  }

  async searchByTerm(term: string, page: number, _filters?: SearchFilters): Promise<SearchPage> {
    this.searchCalls.push(`${term}:${page}`);
    return this.pages.get(`${term}:${page}`) ?? { candidates: [], totalResults: 0 };
  }

  async getDetails(identifier: string): Promise<Detail | null> {
    this.detailCalls.push(identifier);
    return this.details.get(identifier.toLowerCase()) ?? null;
  }
}

/** Catalog provider that is unconfigured unless overridden. */
export function makeCatalog(overrides: Partial<CatalogProvider> = {}): CatalogProvider {
  return {
    isConfigured: () => false,
    listGenres: async () => ({}),
    discoverByGenre: async () => ({ candidates: [], totalPages: 0 }),
    resolveExternalId: async () => null,
    ...overrides,
  };
}
