/**
 * Term Expansion
 *
 * Cheap lexical variants so a search for "Avenger" also reaches "Avengers"
 * and a genre browse for "Comedy" also reaches "Comedies".
 */

export const GENRE_SUFFIXES = ["movie", "film", "blockbuster", "cinema"] as const;

function dedupeCaseInsensitive(terms: string[]): string[] {
  const seen = new Set<string>();
  const ordered: string[] = [];
  for (const term of terms) {
    const key = term.toLowerCase();
    if (!term || seen.has(key)) continue;
    seen.add(key);
    ordered.push(term);
  }
  return ordered;
}

export function expandTerms(term: string): string[] {
  const normalized = term.trim();
  if (!normalized) return [];

  const lower = normalized.toLowerCase();
  const variants = [normalized];

  if (lower.endsWith("ies")) {
    variants.push(`${normalized.slice(0, -3)}y`);
  } else if (lower.endsWith("y")) {
    variants.push(`${normalized.slice(0, -1)}ies`);
  }

  if (lower.endsWith("s")) {
    const singular = normalized.slice(0, -1);
    if (singular) variants.push(singular);
  } else {
    variants.push(`${normalized}s`);
  }

  return dedupeCaseInsensitive(variants);
}

/**
 * Genre browse terms: the genre's own variants followed by "<genre> <suffix>"
 * phrases, which the provider's title search otherwise never reaches.
 */
export function expandGenreTerms(
  genre: string,
  suffixes: readonly string[] = GENRE_SUFFIXES
): string[] {
  const normalized = genre.trim();
  if (!normalized) return [];
  return dedupeCaseInsensitive([
    ...expandTerms(normalized),
    ...suffixes.map((suffix) => `${normalized} ${suffix}`),
  ]);
}
