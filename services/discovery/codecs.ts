/**
 * Cache codecs
 *
 * One codec per cache namespace. Values are wrapped in a versioned envelope
 * that also carries the absolute expiry, so an entry is never served past its
 * TTL even by a backend that ignores expiry. Anything that fails to decode is
 * reported as `null` and callers treat it as a miss.
 */

import {
  RATING_SOURCES,
  type Detail,
  type EnrichedResult,
  type NormalizedRatings,
  type RatingSummary,
  type SimilarTitle,
} from "./types";

export interface Codec<T> {
  namespace: string;
  version: number;
  is(value: unknown): value is T;
}

interface Envelope {
  ns: string;
  v: number;
  expiresAt: number;
  data: unknown;
}

export function encode<T>(codec: Codec<T>, value: T, expiresAt: number): string {
  const envelope: Envelope = { ns: codec.namespace, v: codec.version, expiresAt, data: value };
  return JSON.stringify(envelope);
}

export function decode<T>(codec: Codec<T>, raw: string, now: number): T | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;
  if (parsed.ns !== codec.namespace || parsed.v !== codec.version) return null;
  if (typeof parsed.expiresAt !== "number" || parsed.expiresAt <= now) return null;
  return codec.is(parsed.data) ? parsed.data : null;
}

// ============================================================================
// Shape guards
// ============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isNullableNumber(value: unknown): value is number | null {
  return value === null || typeof value === "number";
}

function hasStringFields(record: Record<string, unknown>, fields: readonly string[]): boolean {
  return fields.every((field) => typeof record[field] === "string");
}

const DETAIL_STRING_FIELDS = [
  "identifier",
  "title",
  "year",
  "poster",
  "runtime",
  "plot",
  "director",
  "writer",
  "cast",
  "boxOfficeRaw",
  "releaseDate",
  "language",
  "awards",
  "imdbRating",
] as const;

export function isDetail(value: unknown): value is Detail {
  if (!isRecord(value)) return false;
  if (!hasStringFields(value, DETAIL_STRING_FIELDS)) return false;
  if (!isStringArray(value.genres)) return false;
  const raw = value.rawRatings;
  return isRecord(raw) && Object.values(raw).every((v) => typeof v === "string");
}

export function isNormalizedRatings(value: unknown): value is NormalizedRatings {
  if (!isRecord(value)) return false;
  const record = value;
  return RATING_SOURCES.every((source) => isNullableNumber(record[source]));
}

export function isEnrichedResult(value: unknown): value is EnrichedResult {
  return (
    isDetail(value) &&
    isRecord(value) &&
    isNormalizedRatings(value.ratings) &&
    isNullableNumber(value.averageRating) &&
    typeof value.boxOfficeValue === "number" &&
    typeof value.matchScore === "number"
  );
}

function isSimilarTitle(value: unknown): value is SimilarTitle {
  return (
    isRecord(value) &&
    hasStringFields(value, ["identifier", "title", "year", "poster", "imdbRating"]) &&
    isStringArray(value.genres) &&
    isNullableNumber(value.averageRating)
  );
}

function isRatingSummary(value: unknown): value is RatingSummary {
  return (
    isRecord(value) &&
    hasStringFields(value, ["identifier", "title", "year", "poster"]) &&
    isNormalizedRatings(value.ratings) &&
    isNullableNumber(value.averageRating)
  );
}

// ============================================================================
// Namespaces
// ============================================================================

export const detailCodec: Codec<Detail> = {
  namespace: "detail",
  version: 1,
  is: isDetail,
};

export const datasetCodec: Codec<EnrichedResult[]> = {
  namespace: "dataset",
  version: 1,
  is: (value): value is EnrichedResult[] => Array.isArray(value) && value.every(isEnrichedResult),
};

export const similarCodec: Codec<SimilarTitle[]> = {
  namespace: "similar",
  version: 1,
  is: (value): value is SimilarTitle[] => Array.isArray(value) && value.every(isSimilarTitle),
};

export const ratingSummaryCodec: Codec<RatingSummary> = {
  namespace: "rating-summary",
  version: 1,
  is: isRatingSummary,
};

export const catalogGenresCodec: Codec<Record<string, number>> = {
  namespace: "catalog-genres",
  version: 1,
  is: (value): value is Record<string, number> =>
    isRecord(value) && Object.values(value).every((v) => typeof v === "number"),
};
