/**
 * Detail Enricher
 *
 * Resolves candidates to full details through the metadata cache, then
 * derives normalized ratings, an average and a numeric box-office figure.
 * Lookups fan out through a Bottleneck limiter so a large pool never opens
 * more than `concurrency` provider requests at once.
 */

import Bottleneck from "bottleneck";
import { createLogger } from "../../server/common/logger";
import { cacheKeys, type MetadataCache } from "./cache";
import { detailCodec } from "./codecs";
import {
  RATING_SOURCES,
  type Candidate,
  type Detail,
  type EnrichedResult,
  type MetadataProvider,
  type NormalizedRatings,
  type RatingSource,
} from "./types";

const logger = createLogger("detail-enricher");

export const DEFAULT_ENRICH_CONCURRENCY = 4;

// ============================================================================
// Rating & box-office normalization
// ============================================================================

const FRACTION = /^\s*(\d+(?:\.\d+)?)\s*\/\s*(\d+(?:\.\d+)?)\s*$/;
const PERCENT = /^\s*(\d+(?:\.\d+)?)\s*%\s*$/;

export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function isRatingSource(source: string): source is RatingSource {
  return RATING_SOURCES.some((known) => known === source);
}

/** Maps a provider rating ("8.0/10", "91%", "69/100") to the 0-100 scale. */
export function normalizeRating(source: string, value: string): number | null {
  if (!isRatingSource(source)) return null;

  const fraction = FRACTION.exec(value);
  if (fraction) {
    const denominator = Number(fraction[2]);
    if (denominator === 0) return null;
    return roundTo2((Number(fraction[1]) / denominator) * 100);
  }

  const percent = PERCENT.exec(value);
  if (percent) return roundTo2(Number(percent[1]));

  return null;
}

export function extractRatings(rawRatings: Record<string, string>): NormalizedRatings {
  const ratings: NormalizedRatings = {
    "Internet Movie Database": null,
    "Rotten Tomatoes": null,
    Metacritic: null,
  };
  for (const source of RATING_SOURCES) {
    const raw = rawRatings[source];
    if (raw) ratings[source] = normalizeRating(source, raw);
  }
  return ratings;
}

export function averageRating(ratings: NormalizedRatings): number | null {
  const values = RATING_SOURCES.map((source) => ratings[source]).filter(
    (value): value is number => value !== null
  );
  if (values.length === 0) return null;
  return roundTo2(values.reduce((sum, value) => sum + value, 0) / values.length);
}

export function parseBoxOffice(raw: string | undefined): number {
  if (!raw || raw === "N/A") return 0;
  const digits = raw.replace(/\D/g, "");
  return digits ? Number(digits) : 0;
}

export function toEnrichedResult(detail: Detail, matchScore = 0): EnrichedResult {
  const ratings = extractRatings(detail.rawRatings);
  return {
    ...detail,
    ratings,
    averageRating: averageRating(ratings),
    boxOfficeValue: parseBoxOffice(detail.boxOfficeRaw),
    matchScore,
  };
}

// ============================================================================
// Enricher
// ============================================================================

export interface DetailEnricherDeps {
  provider: MetadataProvider;
  cache: MetadataCache;
  concurrency?: number;
}

export interface FetchedDetail {
  detail: Detail;
  cached: boolean;
}

export class DetailEnricher {
  private provider: MetadataProvider;
  private cache: MetadataCache;
  private limiter: Bottleneck;

  constructor(deps: DetailEnricherDeps) {
    this.provider = deps.provider;
    this.cache = deps.cache;
    this.limiter = new Bottleneck({
      maxConcurrent: Math.max(1, deps.concurrency ?? DEFAULT_ENRICH_CONCURRENCY),
    });
  }

  async fetchDetail(identifier: string): Promise<FetchedDetail | null> {
    const trimmed = identifier.trim();
    if (!trimmed) return null;

    const key = cacheKeys.detail(trimmed);
    const hit = await this.cache.read(key, detailCodec);
    if (hit) return { detail: hit, cached: true };

    let detail: Detail | null;
    try {
      detail = await this.provider.getDetails(trimmed);
    } catch (error) {
      logger.error("Detail lookup failed", { identifier: trimmed, error: String(error) });
      return null;
    }
    if (!detail) return null;

    await this.cache.write(key, detailCodec, detail, this.cache.ttl.detailSeconds);
    return { detail, cached: false };
  }

  /**
   * Resolves every candidate, preserving input order. Candidates that fail to
   * resolve are skipped, as are later candidates resolving to a detail that
   * was already produced.
   */
  async enrich(
    candidates: readonly Candidate[],
    scoreOf: (candidate: Candidate) => number = () => 0
  ): Promise<EnrichedResult[]> {
    const fetched = await Promise.all(
      candidates.map((candidate) =>
        this.limiter.schedule(() => this.fetchDetail(candidate.identifier || candidate.title))
      )
    );

    const results: EnrichedResult[] = [];
    const seen = new Set<string>();
    fetched.forEach((entry, index) => {
      if (!entry) return;
      const key = entry.detail.identifier.toLowerCase();
      if (seen.has(key)) return;
      seen.add(key);
      results.push(toEnrichedResult(entry.detail, scoreOf(candidates[index])));
    });

    logger.debug("Enriched candidates", { candidates: candidates.length, results: results.length });
    return results;
  }
}
