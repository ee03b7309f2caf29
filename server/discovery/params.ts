/**
 * Inbound parameter parsing for the discovery routes. Paging values are
 * clamped into range; anything else that cannot be honoured raises a
 * ValidationError before the pipeline runs.
 */

import { ValidationError } from '../common/errors';
import { isRecord } from '../../services/discovery/codecs';
import type {
  BoxOfficeRequest,
  GenreBrowseRequest,
  SearchRequest,
} from '../../services/discovery/pipeline';
import type {
  BoxOfficeSort,
  GenreSort,
  MediaType,
  SearchSort,
} from '../../services/discovery/types';

export type QueryParams = Record<string, unknown>;

export const MAX_QUERY_LENGTH = 100;
export const MAX_PAGE = 10;

const MEDIA_TYPES: readonly MediaType[] = ['movie', 'series', 'episode'];
const SEARCH_SORTS: readonly SearchSort[] = ['relevance', 'recency', 'rating'];
const GENRE_SORTS: readonly GenreSort[] = [
  'rating_desc',
  'rating_asc',
  'year_desc',
  'year_asc',
  'title_asc',
  'title_desc',
];
const BOX_OFFICE_SORTS: readonly BoxOfficeSort[] = [
  'box_office_desc',
  'box_office_asc',
  'rating_desc',
  'rating_asc',
  'title_asc',
  'title_desc',
];

// ============================================================================
// Primitives
// ============================================================================

/** First value of a query parameter, trimmed; blank values read as absent. */
export function param(query: QueryParams | undefined, name: string): string | undefined {
  const raw = query?.[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/** Integer parameter clamped into [min, max]; missing or non-integer → fallback. */
export function clampInt(raw: string | undefined, fallback: number, min: number, max: number): number {
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) return fallback;
  return Math.min(Math.max(parsed, min), max);
}

function oneOf<T extends string>(value: string | undefined, allowed: readonly T[]): T | undefined {
  return allowed.find((option) => option === value);
}

// ============================================================================
// Use-case parameters
// ============================================================================

export function parseSearchParams(query: QueryParams | undefined): SearchRequest {
  const q = param(query, 'q');
  if (!q) throw new ValidationError("Query parameter 'q' is required.");
  if (q.length > MAX_QUERY_LENGTH) {
    throw new ValidationError(`Query must be ${MAX_QUERY_LENGTH} characters or fewer.`);
  }

  const request: SearchRequest = {
    query: q,
    page: clampInt(param(query, 'page'), 1, 1, MAX_PAGE),
    pageSize: clampInt(param(query, 'per_page'), 10, 5, 10),
  };

  const rawType = param(query, 'type');
  if (rawType !== undefined) {
    const type = oneOf(rawType, MEDIA_TYPES);
    if (!type) throw new ValidationError(`type must be one of ${MEDIA_TYPES.join(', ')}`);
    request.type = type;
  }

  const year = param(query, 'year');
  if (year !== undefined) {
    if (!/^\d{4}$/.test(year)) throw new ValidationError('year must be a four-digit number');
    request.year = year;
  }

  const language = param(query, 'language');
  if (language !== undefined) request.language = language;

  const rawSort = param(query, 'sort');
  if (rawSort !== undefined) {
    const sort = oneOf(rawSort, SEARCH_SORTS);
    if (!sort) throw new ValidationError(`sort must be one of ${SEARCH_SORTS.join(', ')}`);
    request.sort = sort;
  }

  return request;
}

export function parseGenreParams(genre: string | undefined, query: QueryParams | undefined): GenreBrowseRequest {
  const name = genre?.trim();
  if (!name) throw new ValidationError('genre is required');

  const request: GenreBrowseRequest = {
    genre: name,
    page: clampInt(param(query, 'page'), 1, 1, MAX_PAGE),
    sort: oneOf(param(query, 'sort'), GENRE_SORTS) ?? 'rating_desc',
  };

  const year = param(query, 'year');
  if (year !== undefined) request.year = year;
  const language = param(query, 'language');
  if (language !== undefined) request.language = language;

  const rating = param(query, 'rating');
  if (rating !== undefined) {
    const minRating = Number(rating);
    if (!Number.isFinite(minRating)) throw new ValidationError('rating must be numeric');
    request.minRating = minRating;
  }

  return request;
}

export function parseBoxOfficeParams(query: QueryParams | undefined): BoxOfficeRequest {
  const request: BoxOfficeRequest = {
    page: clampInt(param(query, 'page'), 1, 1, MAX_PAGE),
    sort: oneOf(param(query, 'sort'), BOX_OFFICE_SORTS) ?? 'box_office_desc',
  };

  const q = param(query, 'q');
  if (q !== undefined) {
    if (q.length > MAX_QUERY_LENGTH) {
      throw new ValidationError(`Query must be ${MAX_QUERY_LENGTH} characters or fewer.`);
    }
    request.query = q;
  }
  const genre = param(query, 'genre');
  if (genre !== undefined) request.genre = genre;

  return request;
}

export function parseTitleTarget(query: QueryParams | undefined): string {
  const target = param(query, 'title') ?? param(query, 'imdbID') ?? param(query, 'id');
  if (!target) throw new ValidationError('Provide ?title=<title> or ?imdbID=<id> to fetch genres.');
  return target;
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter((item): item is string => typeof item === 'string')
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Rating-summary targets, ids first. GET reads `imdbID`/`id`, `title` and the
 * comma-separated `titles`; POST reads `{ ids: [], titles: [] }`.
 */
export function parseRatingTargets(query: QueryParams | undefined, body?: unknown): string[] {
  const ids: string[] = [];
  const titles: string[] = [];

  if (isRecord(body)) {
    ids.push(...stringList(body.ids));
    titles.push(...stringList(body.titles));
  } else {
    const id = param(query, 'imdbID') ?? param(query, 'id');
    if (id) ids.push(id);
    const list = param(query, 'titles');
    if (list) titles.push(...list.split(',').map((t) => t.trim()).filter(Boolean));
    const title = param(query, 'title');
    if (title) titles.push(title);
  }

  const targets = [...ids, ...titles];
  if (targets.length === 0) {
    throw new ValidationError("Provide a 'title'/'titles' or 'imdbID'/'ids' to summarize ratings.");
  }
  return targets;
}
