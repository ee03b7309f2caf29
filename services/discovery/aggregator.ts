/**
 * Candidate Aggregator
 *
 * Fans a list of search terms out over provider pages and collects a
 * deduplicated, first-seen-ordered candidate pool. Provider failures surface
 * as empty pages, so aggregation degrades to a smaller (possibly empty) pool
 * and never fails.
 */

import { createLogger } from "../../server/common/logger";
import type { Candidate, MetadataProvider, SearchFilters } from "./types";

const logger = createLogger("candidate-aggregator");

/** Results per provider search page. */
export const PROVIDER_PAGE_SIZE = 10;

/** Hard ceiling on pages requested per term. */
export const MAX_PAGES_PER_TERM = 5;

export interface AggregateOptions {
  terms: readonly string[];
  targetSize: number;
  maxPagesPerTerm: number;
  /** Admitted ahead of any search result, in order. */
  seed?: readonly Candidate[];
  /** Search results matching this predicate are dropped. */
  exclude?: (candidate: Candidate) => boolean;
  filters?: SearchFilters;
}

export function candidateKey(candidate: Candidate): string {
  return (candidate.identifier || candidate.title).trim().toLowerCase();
}

/** Drops candidates whose title contains the genre, e.g. "Action Jackson" for "action". */
export function excludeTitlesContaining(genre: string): (candidate: Candidate) => boolean {
  const needle = genre.trim().toLowerCase();
  return (candidate) => needle.length > 0 && candidate.title.toLowerCase().includes(needle);
}

export function seedCandidates(identifiers: readonly string[]): Candidate[] {
  return identifiers.map((identifier) => ({ identifier, title: "" }));
}

export async function aggregateCandidates(
  provider: MetadataProvider,
  options: AggregateOptions
): Promise<Candidate[]> {
  const { targetSize, exclude, filters } = options;
  const maxPages = Math.min(Math.max(1, options.maxPagesPerTerm), MAX_PAGES_PER_TERM);
  const pool: Candidate[] = [];
  const seen = new Set<string>();

  const admit = (candidate: Candidate): void => {
    const key = candidateKey(candidate);
    if (!key || seen.has(key)) return;
    seen.add(key);
    pool.push(candidate);
  };

  for (const candidate of options.seed ?? []) admit(candidate);

  let requests = 0;
  for (const rawTerm of options.terms) {
    const term = rawTerm.trim();
    if (!term) continue;
    if (pool.length >= targetSize) break;

    for (let page = 1; page <= maxPages; page++) {
      if (pool.length >= targetSize) break;

      const result = await provider.searchByTerm(term, page, filters);
      requests++;
      if (result.candidates.length === 0) break;

      for (const candidate of result.candidates) {
        if (exclude?.(candidate)) continue;
        admit(candidate);
      }

      if (page * PROVIDER_PAGE_SIZE >= result.totalResults) break;
    }
  }

  logger.debug("Aggregated candidates", {
    terms: options.terms.length,
    requests,
    pool: pool.length,
    targetSize,
  });
  return pool;
}
