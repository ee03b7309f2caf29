/**
 * Discovery Pipeline
 *
 * Wires term expansion, aggregation, enrichment, ranking and pagination into
 * the use cases the HTTP layer exposes. Each list use case computes an
 * enriched dataset once, caches it under its own namespace, and re-applies
 * per-request filters, sort and pagination on every call.
 */

import Bottleneck from "bottleneck";
import type { PipelineConfig } from "../../server/common/config";
import { createLogger } from "../../server/common/logger";
import {
  aggregateCandidates,
  excludeTitlesContaining,
  seedCandidates,
  MAX_PAGES_PER_TERM,
} from "./aggregator";
import { cacheKeys, type MetadataCache } from "./cache";
import {
  catalogGenresCodec,
  datasetCodec,
  ratingSummaryCodec,
  similarCodec,
} from "./codecs";
import {
  BOX_OFFICE_SEED_TERMS,
  DEFAULT_BOX_OFFICE_IDS,
  curatedIdsFor,
} from "./curated";
import { DetailEnricher, roundTo2, toEnrichedResult } from "./enricher";
import { paginate } from "./paginate";
import {
  applyCuratedPriority,
  applyFilters,
  matchScore,
  sortGenreResults,
  sortResults,
} from "./ranking";
import { expandGenreTerms, expandTerms, GENRE_SUFFIXES } from "./terms";
import {
  RATING_SOURCES,
  type BoxOfficeSort,
  type Candidate,
  type CatalogProvider,
  type Detail,
  type EnrichedResult,
  type GenreSort,
  type MediaType,
  type MetadataProvider,
  type NormalizedRatings,
  type PageMeta,
  type RatingSummary,
  type SearchSort,
  type SimilarTitle,
} from "./types";

const logger = createLogger("discovery-pipeline");

export const NO_RESULTS_MESSAGE = "No results found.";

export const BROWSE_PAGE_SIZE = 10;
export const GENRE_POOL_SIZE = 300;
export const BOX_OFFICE_POOL_SIZE = 250;
export const BOX_OFFICE_QUERY_POOL_SIZE = 80;
export const BOX_OFFICE_SEED_PAGES = 4;
export const SIMILAR_LIMIT = 6;
export const RECOMMENDED_LIMIT = 5;
export const CHART_LIMIT = 10;
export const CATALOG_MIN_VOTES = 100;
/** Source ratings further apart than this (0-100 scale) are logged. */
export const RATING_SPREAD_THRESHOLD = 5;

/** Catalog genre names that differ from the provider's genre labels. */
const CATALOG_GENRE_ALIASES: Record<string, string> = {
  "sci-fi": "science fiction",
};

// ============================================================================
// Requests & responses
// ============================================================================

export interface SearchRequest {
  query: string;
  page: number;
  pageSize: number;
  type?: MediaType;
  year?: string;
  language?: string;
  sort?: SearchSort;
}

export interface GenreBrowseRequest {
  genre: string;
  page: number;
  year?: string;
  language?: string;
  /** IMDb rating floor, 0-10. */
  minRating?: number;
  sort?: GenreSort;
}

export interface BoxOfficeRequest {
  query?: string;
  page: number;
  genre?: string;
  sort?: BoxOfficeSort;
}

export interface ListResponse<F> extends PageMeta {
  results: EnrichedResult[];
  filters: F;
  cached: boolean;
  message?: string;
}

export interface SearchResponse
  extends ListResponse<{
    type: MediaType | null;
    year: string | null;
    language: string | null;
    sort: SearchSort;
  }> {
  query: string;
  variants: string[];
}

export interface GenreBrowseResponse
  extends ListResponse<{
    year: string | null;
    language: string | null;
    rating: number | null;
    sort: GenreSort;
  }> {
  genre: string;
}

export interface BoxOfficeMetrics {
  totalBoxOffice: number;
  averageBoxOffice: number;
  topBoxOffice: string;
}

export interface BoxOfficeResponse
  extends ListResponse<{ genre: string | null; sort: BoxOfficeSort }> {
  query: string;
  chart: Array<{ title: string; boxOffice: number }>;
  metrics: BoxOfficeMetrics;
  recommended: EnrichedResult[];
}

export interface TitleView {
  movie: Detail;
  ratings: NormalizedRatings;
  averageRating: number | null;
  boxOfficeValue: number;
  similar: SimilarTitle[];
  cached: boolean;
}

export interface TitleGenres {
  movie: Pick<Detail, "identifier" | "title" | "year" | "poster">;
  genres: string[];
  cached: boolean;
}

export interface RatingSummaryEntry extends RatingSummary {
  cached: boolean;
}

export interface RatingSummaryResponse {
  results: RatingSummaryEntry[];
  count: number;
  errors: Array<{ target: string; error: string }>;
  cached: boolean;
}

export interface CatalogGenresResponse {
  configured: boolean;
  genres: Record<string, number>;
  cached: boolean;
}

// ============================================================================
// Pipeline
// ============================================================================

export interface DiscoveryPipelineDeps {
  provider: MetadataProvider;
  catalog: CatalogProvider;
  cache: MetadataCache;
  config: PipelineConfig;
}

export class DiscoveryPipeline {
  private provider: MetadataProvider;
  private catalog: CatalogProvider;
  private cache: MetadataCache;
  private config: PipelineConfig;
  private enricher: DetailEnricher;
  private catalogLimiter: Bottleneck;

  constructor(deps: DiscoveryPipelineDeps) {
    this.provider = deps.provider;
    this.catalog = deps.catalog;
    this.cache = deps.cache;
    this.config = deps.config;
    this.enricher = new DetailEnricher({
      provider: deps.provider,
      cache: deps.cache,
      concurrency: deps.config.enrichConcurrency,
    });
    this.catalogLimiter = new Bottleneck({ maxConcurrent: Math.max(1, deps.config.enrichConcurrency) });
  }

  // --------------------------------------------------------------------------
  // Search
  // --------------------------------------------------------------------------

  async search(request: SearchRequest): Promise<SearchResponse> {
    const startedAt = Date.now();
    const query = request.query.trim();
    const { page, pageSize, type, year, language } = request;
    const sort = request.sort ?? "relevance";
    const variants = expandTerms(query);

    const key = cacheKeys.searchDataset(query, page, { pageSize, type, year, language });
    let dataset = await this.cache.read(key, datasetCodec);
    const cached = dataset !== null;

    if (dataset === null) {
      const pool = await aggregateCandidates(this.provider, {
        terms: variants,
        targetSize: (page - 1) * pageSize + 2 * pageSize,
        maxPagesPerTerm: this.config.maxPagesPerTerm,
        filters: { type, year },
      });
      const enriched = await this.enricher.enrich(pool, (candidate: Candidate) =>
        matchScore(query, candidate.title, year, candidate.year)
      );
      dataset = applyFilters(enriched, { year, language });
      await this.cache.write(key, datasetCodec, dataset, this.cache.ttl.datasetSeconds);
    }

    const { items, ...meta } = paginate(sortResults(dataset, sort), page, pageSize);
    logger.info("search", {
      query,
      page: meta.page,
      pageSize,
      variants,
      results: items.length,
      totalCount: meta.totalCount,
      cached,
      durationMs: Date.now() - startedAt,
    });

    return {
      query,
      variants,
      ...meta,
      results: items,
      filters: { type: type ?? null, year: year ?? null, language: language ?? null, sort },
      cached,
      ...(meta.totalCount === 0 ? { message: NO_RESULTS_MESSAGE } : {}),
    };
  }

  // --------------------------------------------------------------------------
  // Genre browse
  // --------------------------------------------------------------------------

  async browseGenre(request: GenreBrowseRequest): Promise<GenreBrowseResponse> {
    const startedAt = Date.now();
    const genre = request.genre.trim();
    const { year, language, minRating } = request;
    const sort = request.sort ?? "rating_desc";
    const curated = curatedIdsFor(genre);

    const key = cacheKeys.genreDataset(genre);
    let dataset = await this.cache.read(key, datasetCodec);
    const cached = dataset !== null;

    if (dataset === null) {
      const catalogSeeds = await this.discoverCatalogSeeds(genre);
      const pool = await aggregateCandidates(this.provider, {
        terms: expandGenreTerms(genre),
        targetSize: GENRE_POOL_SIZE,
        maxPagesPerTerm: this.config.maxPagesPerTerm,
        seed: [...seedCandidates(curated), ...catalogSeeds],
        exclude: excludeTitlesContaining(genre),
      });
      const enriched = await this.enricher.enrich(pool);
      dataset = applyFilters(enriched, { genre });
      await this.cache.write(key, datasetCodec, dataset, this.cache.ttl.datasetSeconds);
    }

    const filtered = applyFilters(dataset, { year, language, minRating });
    const ordered = applyCuratedPriority(sortGenreResults(filtered, sort), curated);
    const { items, ...meta } = paginate(ordered, request.page, BROWSE_PAGE_SIZE);
    logger.info("genre browse", {
      genre,
      page: meta.page,
      sort,
      results: items.length,
      totalCount: meta.totalCount,
      cached,
      durationMs: Date.now() - startedAt,
    });

    return {
      genre,
      ...meta,
      results: items,
      filters: { year: year ?? null, language: language ?? null, rating: minRating ?? null, sort },
      cached,
      ...(meta.totalCount === 0 ? { message: NO_RESULTS_MESSAGE } : {}),
    };
  }

  // --------------------------------------------------------------------------
  // Box office
  // --------------------------------------------------------------------------

  async boxOfficeTop(request: BoxOfficeRequest): Promise<BoxOfficeResponse> {
    const startedAt = Date.now();
    const query = request.query?.trim() || undefined;
    const genre = request.genre?.trim() || undefined;
    const sort = request.sort ?? "box_office_desc";
    // the genre only shapes the candidate pool when browsing without a query
    const poolGenre = query ? undefined : genre;
    const curated = curatedIdsFor(poolGenre);

    const key = cacheKeys.boxOfficeDataset(query, poolGenre);
    let dataset = await this.cache.read(key, datasetCodec);
    const cached = dataset !== null;

    if (dataset === null) {
      const pool = await this.boxOfficePool(query, poolGenre, curated);
      const enriched = await this.enricher.enrich(pool);
      dataset = sortResults(enriched, "box_office_desc");
      await this.cache.write(key, datasetCodec, dataset, this.cache.ttl.datasetSeconds);
    }

    const filtered = genre ? applyFilters(dataset, { genre }) : dataset;
    const ordered = applyCuratedPriority(sortResults(filtered, sort), curated);
    const { items, ...meta } = paginate(ordered, request.page, BROWSE_PAGE_SIZE);
    logger.info("box office", {
      query: query ?? null,
      genre: genre ?? null,
      page: meta.page,
      sort,
      totalCount: meta.totalCount,
      cached,
      durationMs: Date.now() - startedAt,
    });

    return {
      query: query ?? "top box office",
      ...meta,
      results: items,
      filters: { genre: genre ?? null, sort },
      cached,
      chart: ordered.slice(0, CHART_LIMIT).map((r) => ({ title: r.title, boxOffice: r.boxOfficeValue })),
      metrics: boxOfficeMetrics(ordered),
      recommended: recommendFrom(ordered),
      ...(meta.totalCount === 0 ? { message: NO_RESULTS_MESSAGE } : {}),
    };
  }

  private async boxOfficePool(
    query: string | undefined,
    genre: string | undefined,
    curated: readonly string[]
  ): Promise<Candidate[]> {
    const filters = { type: "movie" as const };
    if (query) {
      return aggregateCandidates(this.provider, {
        terms: [query],
        targetSize: BOX_OFFICE_QUERY_POOL_SIZE,
        maxPagesPerTerm: Math.min(this.config.maxPagesPerTerm, MAX_PAGES_PER_TERM),
        filters,
      });
    }

    const seed = seedCandidates([...DEFAULT_BOX_OFFICE_IDS, ...curated]);
    if (genre) {
      return aggregateCandidates(this.provider, {
        terms: expandGenreTerms(genre, GENRE_SUFFIXES.slice(0, 3)),
        targetSize: BOX_OFFICE_POOL_SIZE,
        maxPagesPerTerm: this.config.maxPagesPerTerm,
        seed,
        exclude: excludeTitlesContaining(genre),
        filters,
      });
    }
    return aggregateCandidates(this.provider, {
      terms: BOX_OFFICE_SEED_TERMS,
      targetSize: BOX_OFFICE_POOL_SIZE,
      maxPagesPerTerm: Math.min(this.config.maxPagesPerTerm, BOX_OFFICE_SEED_PAGES),
      seed,
      filters,
    });
  }

  // --------------------------------------------------------------------------
  // Single title
  // --------------------------------------------------------------------------

  async getTitle(identifier: string): Promise<TitleView | null> {
    const fetched = await this.enricher.fetchDetail(identifier);
    if (!fetched) return null;

    const { detail, cached } = fetched;
    const enriched = toEnrichedResult(detail);
    return {
      movie: detail,
      ratings: enriched.ratings,
      averageRating: enriched.averageRating,
      boxOfficeValue: enriched.boxOfficeValue,
      similar: await this.similarTitles(identifier.trim(), detail),
      cached,
    };
  }

  async getTitleGenres(identifierOrTitle: string): Promise<TitleGenres | null> {
    const fetched = await this.enricher.fetchDetail(identifierOrTitle);
    if (!fetched) return null;

    const { identifier, title, year, poster, genres } = fetched.detail;
    return { movie: { identifier, title, year, poster }, genres, cached: fetched.cached };
  }

  private async similarTitles(identifier: string, base: Detail): Promise<SimilarTitle[]> {
    const key = cacheKeys.similar(identifier);
    const hit = await this.cache.read(key, similarCodec);
    if (hit) return hit;

    const primaryGenre = base.genres[0];
    if (!primaryGenre) return [];

    const { candidates } = await this.provider.searchByTerm(primaryGenre, 1);
    const seen = new Set([base.identifier.toLowerCase()]);
    const similar: SimilarTitle[] = [];

    for (const candidate of candidates) {
      if (similar.length >= SIMILAR_LIMIT) break;
      const candidateKey = (candidate.identifier || candidate.title).toLowerCase();
      if (seen.has(candidateKey)) continue;
      seen.add(candidateKey);

      const fetched = await this.enricher.fetchDetail(candidate.identifier || candidate.title);
      if (!fetched) continue;
      const enriched = toEnrichedResult(fetched.detail);
      similar.push({
        identifier: enriched.identifier,
        title: enriched.title,
        year: enriched.year,
        poster: enriched.poster,
        genres: enriched.genres,
        imdbRating: enriched.imdbRating,
        averageRating: enriched.averageRating,
      });
    }

    await this.cache.write(key, similarCodec, similar, this.cache.ttl.datasetSeconds);
    return similar;
  }

  // --------------------------------------------------------------------------
  // Rating summaries
  // --------------------------------------------------------------------------

  async summarizeRatings(targets: readonly string[]): Promise<RatingSummaryResponse> {
    const results: RatingSummaryEntry[] = [];
    const errors: RatingSummaryResponse["errors"] = [];

    for (const rawTarget of targets) {
      const target = rawTarget.trim();
      if (!target) continue;

      const key = cacheKeys.ratingSummary(target);
      const hit = await this.cache.read(key, ratingSummaryCodec);
      if (hit) {
        results.push({ ...hit, cached: true });
        continue;
      }

      const fetched = await this.enricher.fetchDetail(target);
      if (!fetched) {
        errors.push({ target, error: "Title not found or unavailable." });
        continue;
      }

      const enriched = toEnrichedResult(fetched.detail);
      const summary: RatingSummary = {
        identifier: enriched.identifier,
        title: enriched.title,
        year: enriched.year,
        poster: enriched.poster,
        ratings: enriched.ratings,
        averageRating: enriched.averageRating,
      };
      logRatingSpread(summary);
      await this.cache.write(key, ratingSummaryCodec, summary, this.cache.ttl.datasetSeconds);
      results.push({ ...summary, cached: fetched.cached });
    }

    return {
      results,
      count: results.length,
      errors,
      cached: results.length > 0 && results.every((entry) => entry.cached),
    };
  }

  // --------------------------------------------------------------------------
  // Catalog
  // --------------------------------------------------------------------------

  async listCatalogGenres(): Promise<CatalogGenresResponse> {
    if (!this.catalog.isConfigured()) return { configured: false, genres: {}, cached: false };

    const key = cacheKeys.catalogGenres();
    const hit = await this.cache.read(key, catalogGenresCodec);
    if (hit) return { configured: true, genres: hit, cached: true };

    const genres = await this.catalog.listGenres();
    if (Object.keys(genres).length > 0) {
      await this.cache.write(key, catalogGenresCodec, genres, this.cache.ttl.datasetSeconds);
    }
    return { configured: true, genres, cached: false };
  }

  /** Popular catalog titles for the genre, resolved to provider ids. */
  private async discoverCatalogSeeds(genre: string): Promise<Candidate[]> {
    if (!this.catalog.isConfigured()) return [];

    const { genres } = await this.listCatalogGenres();
    const name = genre.toLowerCase();
    const genreId: number | undefined = genres[name] ?? genres[CATALOG_GENRE_ALIASES[name] ?? ""];
    if (genreId === undefined) return [];

    const { candidates } = await this.catalog.discoverByGenre(genreId, {
      page: 1,
      sortBy: "popularity.desc",
      minVotes: CATALOG_MIN_VOTES,
    });
    const resolved = await Promise.all(
      candidates.map((candidate) =>
        this.catalogLimiter.schedule(() => this.catalog.resolveExternalId(candidate.catalogId))
      )
    );

    const seeds: Candidate[] = [];
    resolved.forEach((identifier, index) => {
      if (!identifier) return;
      const { title, year } = candidates[index];
      seeds.push(year === undefined ? { identifier, title } : { identifier, title, year });
    });
    logger.debug("Catalog seeds", { genre, discovered: candidates.length, resolved: seeds.length });
    return seeds;
  }
}

// ============================================================================
// Helpers
// ============================================================================

function boxOfficeMetrics(results: readonly EnrichedResult[]): BoxOfficeMetrics {
  const totalBoxOffice = results.reduce((sum, r) => sum + r.boxOfficeValue, 0);
  return {
    totalBoxOffice,
    averageBoxOffice: results.length > 0 ? roundTo2(totalBoxOffice / results.length) : 0,
    topBoxOffice: results[0]?.boxOfficeRaw ?? "N/A",
  };
}

/** Titles by the leader's director, else the runners-up. */
function recommendFrom(results: readonly EnrichedResult[]): EnrichedResult[] {
  const [leader] = results;
  if (!leader) return [];

  const director = leader.director;
  if (director && director !== "N/A") {
    const sameDirector = results.filter((r) => r.director === director).slice(1, 1 + RECOMMENDED_LIMIT);
    if (sameDirector.length > 0) return sameDirector;
  }
  return results.slice(1, 1 + RECOMMENDED_LIMIT);
}

function logRatingSpread(summary: RatingSummary): void {
  const scores = RATING_SOURCES.map((source) => summary.ratings[source]).filter(
    (score): score is number => score !== null
  );
  if (scores.length < 2) return;
  const spread = Math.max(...scores) - Math.min(...scores);
  if (spread > RATING_SPREAD_THRESHOLD) {
    logger.info("Rating spread across sources", {
      identifier: summary.identifier,
      title: summary.title,
      spread: roundTo2(spread),
      ratings: summary.ratings,
    });
  }
}
