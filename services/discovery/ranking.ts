/**
 * Scorer / Filter / Sorter
 *
 * Pure functions over enriched results. Every sort returns a new array and is
 * stable, so equal keys keep their aggregation order.
 */

import type { BoxOfficeSort, EnrichedResult, GenreSort, SearchSort } from "./types";

// ============================================================================
// Scoring
// ============================================================================

type Block = { a: number; b: number; size: number };

function longestCommonBlock(a: string, b: string, aLo: number, aHi: number, bLo: number, bHi: number): Block {
  let best: Block = { a: aLo, b: bLo, size: 0 };
  let previous = new Map<number, number>();
  for (let i = aLo; i < aHi; i++) {
    const current = new Map<number, number>();
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const size = (previous.get(j - 1) ?? 0) + 1;
      current.set(j, size);
      if (size > best.size) best = { a: i - size + 1, b: j - size + 1, size };
    }
    previous = current;
  }
  return best;
}

function matchingCharacters(a: string, b: string, aLo: number, aHi: number, bLo: number, bHi: number): number {
  const block = longestCommonBlock(a, b, aLo, aHi, bLo, bHi);
  if (block.size === 0) return 0;
  return (
    block.size +
    matchingCharacters(a, b, aLo, block.a, bLo, block.b) +
    matchingCharacters(a, b, block.a + block.size, aHi, block.b + block.size, bHi)
  );
}

/** Ratcliff/Obershelp similarity, case-insensitive, in [0, 1]. */
export function similarityScore(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  const total = left.length + right.length;
  if (total === 0) return 1;
  return (2 * matchingCharacters(left, right, 0, left.length, 0, right.length)) / total;
}

export const YEAR_MATCH_BONUS = 0.5;

export function matchScore(query: string, title: string, yearFilter?: string, year?: string): number {
  const bonus = yearFilter && year === yearFilter ? YEAR_MATCH_BONUS : 0;
  return similarityScore(query, title) + bonus;
}

// ============================================================================
// Filtering
// ============================================================================

export interface ResultFilters {
  year?: string;
  language?: string;
  /** On the 0-10 IMDb scale; a missing IMDb rating counts as 0. */
  minRating?: number;
  genre?: string;
}

export function applyFilters(results: readonly EnrichedResult[], filters: ResultFilters): EnrichedResult[] {
  const { year, minRating } = filters;
  const language = filters.language?.trim().toLowerCase();
  const genre = filters.genre?.trim().toLowerCase();

  return results.filter((result) => {
    if (year && !result.year.startsWith(year)) return false;
    if (language && !result.language.toLowerCase().includes(language)) return false;
    if (minRating !== undefined && imdbRatingValue(result) < minRating) return false;
    if (genre && !result.genres.join(", ").toLowerCase().includes(genre)) return false;
    return true;
  });
}

// ============================================================================
// Sorting
// ============================================================================

type Comparator = (a: EnrichedResult, b: EnrichedResult) => number;
type Key = (result: EnrichedResult) => number;

export function yearValue(result: EnrichedResult): number {
  const year = parseInt(result.year.slice(0, 4), 10);
  return Number.isNaN(year) ? 0 : year;
}

/** IMDb rating as a number; "N/A" and unparseable values are 0. */
export function imdbRatingValue(result: EnrichedResult): number {
  const rating = parseFloat(result.imdbRating);
  return Number.isNaN(rating) ? 0 : rating;
}

const ratingValue: Key = (result) => result.averageRating ?? -1;
const boxOffice: Key = (result) => result.boxOfficeValue;
const score: Key = (result) => result.matchScore;

const ascending = (key: Key): Comparator => (a, b) => key(a) - key(b);
const descending = (key: Key): Comparator => (a, b) => key(b) - key(a);

function titleAscending(a: EnrichedResult, b: EnrichedResult): number {
  const left = a.title.toLowerCase();
  const right = b.title.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

function chain(...comparators: Comparator[]): Comparator {
  return (a, b) => {
    for (const compare of comparators) {
      const order = compare(a, b);
      if (order !== 0) return order;
    }
    return 0;
  };
}

const titleDescending: Comparator = (a, b) => titleAscending(b, a);

const COMPARATORS: Record<SearchSort | BoxOfficeSort, Comparator> = {
  relevance: chain(descending(score), descending(yearValue)),
  recency: chain(descending(yearValue), descending(score)),
  rating: chain(descending(ratingValue), descending(score)),
  rating_desc: chain(descending(ratingValue), descending(boxOffice), titleAscending),
  rating_asc: chain(ascending(ratingValue), descending(boxOffice), titleAscending),
  box_office_desc: chain(descending(boxOffice), titleAscending),
  box_office_asc: chain(ascending(boxOffice), titleAscending),
  title_asc: titleAscending,
  title_desc: titleDescending,
};

// Genre listings rank on the IMDb rating; every tie-break runs in the sort's direction.
const GENRE_COMPARATORS: Record<GenreSort, Comparator> = {
  rating_desc: chain(descending(imdbRatingValue), descending(boxOffice), descending(yearValue), titleDescending),
  rating_asc: chain(ascending(imdbRatingValue), ascending(boxOffice), ascending(yearValue), titleAscending),
  year_desc: chain(descending(yearValue), descending(imdbRatingValue), descending(boxOffice), titleDescending),
  year_asc: chain(ascending(yearValue), ascending(imdbRatingValue), ascending(boxOffice), titleAscending),
  title_asc: titleAscending,
  title_desc: titleDescending,
};

export function sortResults(results: readonly EnrichedResult[], mode: SearchSort | BoxOfficeSort): EnrichedResult[] {
  return [...results].sort(COMPARATORS[mode]);
}

export function sortGenreResults(results: readonly EnrichedResult[], mode: GenreSort): EnrichedResult[] {
  return [...results].sort(GENRE_COMPARATORS[mode]);
}

/**
 * Pins curated ids that are present in `sorted` to the front, in curated
 * order; everything else keeps its sorted position.
 */
export function applyCuratedPriority(
  sorted: readonly EnrichedResult[],
  curatedIds: readonly string[]
): EnrichedResult[] {
  if (curatedIds.length === 0) return [...sorted];

  const byId = new Map<string, EnrichedResult>();
  for (const result of sorted) {
    const key = result.identifier.toLowerCase();
    if (!byId.has(key)) byId.set(key, result);
  }

  const pinned: EnrichedResult[] = [];
  const pinnedKeys = new Set<string>();
  for (const id of curatedIds) {
    const key = id.toLowerCase();
    const match = byId.get(key);
    if (!match || pinnedKeys.has(key)) continue;
    pinnedKeys.add(key);
    pinned.push(match);
  }

  return [...pinned, ...sorted.filter((result) => !pinnedKeys.has(result.identifier.toLowerCase()))];
}
