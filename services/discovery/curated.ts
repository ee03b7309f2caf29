import data from "./curated.json";

/** Highest-grossing titles used when box-office browsing has no query. */
export const DEFAULT_BOX_OFFICE_IDS: readonly string[] = data.defaultBoxOfficeIds;

/** Franchise terms searched to widen the default box-office pool. */
export const BOX_OFFICE_SEED_TERMS: readonly string[] = data.boxOfficeSeedTerms;

const GENRE_CURATED_IDS: Readonly<Record<string, readonly string[]>> = data.genreCuratedIds;

/** Hand-picked ids pinned to the top of a genre listing; empty for unknown genres. */
export function curatedIdsFor(genre: string | undefined): readonly string[] {
  if (!genre) return [];
  return GENRE_CURATED_IDS[genre.trim().toLowerCase()] ?? [];
}
