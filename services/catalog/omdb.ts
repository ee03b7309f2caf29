/**
 * OMDb Adapter
 *
 * Title search and per-title detail lookup against the OMDb API. Payloads are
 * validated here into tagged outcomes; callers only ever see `Candidate` and
 * `Detail` values, and every failure degrades to an empty page or `null`.
 */

import type { OmdbConfig } from "../../server/common/config";
import { createLogger } from "../../server/common/logger";
import { isRecord } from "../discovery/codecs";
import type {
  Candidate,
  Detail,
  MetadataProvider,
  SearchFilters,
  SearchPage,
} from "../discovery/types";
import { buildUrl, fetchJson } from "./http";

const logger = createLogger("omdb-adapter");

const MISSING = "N/A";

export interface OmdbAdapterDeps {
  config: OmdbConfig;
}

// ============================================================================
// Payload parsing
// ============================================================================

export type OmdbSearchOutcome =
  | { kind: "results"; candidates: Candidate[]; totalResults: number }
  | { kind: "empty"; reason: string }
  | { kind: "error"; reason: string };

export type OmdbDetailOutcome =
  | { kind: "results"; detail: Detail }
  | { kind: "empty"; reason: string }
  | { kind: "error"; reason: string };

function text(record: Record<string, unknown>, field: string): string {
  const value = record[field];
  return typeof value === "string" && value.trim() ? value.trim() : MISSING;
}

function optionalText(record: Record<string, unknown>, field: string): string | undefined {
  const value = text(record, field);
  return value === MISSING ? undefined : value;
}

function notFound(payload: Record<string, unknown>): { kind: "empty"; reason: string } | null {
  if (payload.Response === "True") return null;
  if (payload.Response === "False") {
    return { kind: "empty", reason: optionalText(payload, "Error") ?? "no results" };
  }
  return null;
}

export function parseOmdbSearch(payload: unknown): OmdbSearchOutcome {
  if (!isRecord(payload)) return { kind: "error", reason: "malformed payload" };
  const empty = notFound(payload);
  if (empty) return empty;
  if (payload.Response !== "True" || !Array.isArray(payload.Search)) {
    return { kind: "error", reason: "malformed payload" };
  }

  const candidates: Candidate[] = [];
  for (const item of payload.Search) {
    if (!isRecord(item)) continue;
    const title = optionalText(item, "Title");
    const identifier = optionalText(item, "imdbID") ?? title;
    if (!identifier) continue;
    const candidate: Candidate = { identifier, title: title ?? "" };
    const year = optionalText(item, "Year");
    if (year) candidate.year = year;
    candidates.push(candidate);
  }

  const total = parseInt(optionalText(payload, "totalResults") ?? "", 10);
  return {
    kind: "results",
    candidates,
    totalResults: Number.isNaN(total) ? candidates.length : total,
  };
}

function splitList(value: string): string[] {
  if (value === MISSING) return [];
  return value
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean);
}

function parseRawRatings(value: unknown): Record<string, string> {
  const ratings: Record<string, string> = {};
  if (!Array.isArray(value)) return ratings;
  for (const entry of value) {
    if (!isRecord(entry)) continue;
    const source = optionalText(entry, "Source");
    const rating = optionalText(entry, "Value");
    if (source && rating) ratings[source] = rating;
  }
  return ratings;
}

export function parseOmdbDetail(payload: unknown): OmdbDetailOutcome {
  if (!isRecord(payload)) return { kind: "error", reason: "malformed payload" };
  const empty = notFound(payload);
  if (empty) return empty;
  if (payload.Response !== "True") return { kind: "error", reason: "malformed payload" };

  const title = optionalText(payload, "Title");
  const identifier = optionalText(payload, "imdbID") ?? title;
  if (!identifier) return { kind: "error", reason: "detail without identifier" };

  return {
    kind: "results",
    detail: {
      identifier,
      title: title ?? MISSING,
      year: text(payload, "Year"),
      poster: text(payload, "Poster"),
      runtime: text(payload, "Runtime"),
      genres: splitList(text(payload, "Genre")),
      plot: text(payload, "Plot"),
      director: text(payload, "Director"),
      writer: text(payload, "Writer"),
      cast: text(payload, "Actors"),
      rawRatings: parseRawRatings(payload.Ratings),
      boxOfficeRaw: text(payload, "BoxOffice"),
      releaseDate: text(payload, "Released"),
      language: text(payload, "Language"),
      awards: text(payload, "Awards"),
      imdbRating: text(payload, "imdbRating"),
    },
  };
}

// ============================================================================
// OMDb Adapter
// ============================================================================

export class OmdbAdapter implements MetadataProvider {
  private config: OmdbConfig;

  constructor(deps: OmdbAdapterDeps) {
    this.config = deps.config;
  }

  async searchByTerm(term: string, page: number, filters: SearchFilters = {}): Promise<SearchPage> {
    const url = buildUrl(this.config.baseUrl, "", {
      apikey: this.config.apiKey,
      s: term,
      page,
      type: filters.type,
      y: filters.year,
    });
    const fetched = await fetchJson(url, this.config.searchTimeoutMs);
    if (fetched.kind === "error") {
      logger.error("OMDb search failed", { term, page, reason: fetched.reason });
      return { candidates: [], totalResults: 0 };
    }

    const outcome = parseOmdbSearch(fetched.body);
    switch (outcome.kind) {
      case "results":
        return { candidates: outcome.candidates, totalResults: outcome.totalResults };
      case "empty":
        logger.debug("OMDb search returned no results", { term, page, reason: outcome.reason });
        return { candidates: [], totalResults: 0 };
      case "error":
        logger.error("OMDb search returned an unexpected payload", { term, page, reason: outcome.reason });
        return { candidates: [], totalResults: 0 };
    }
  }

  async getDetails(identifier: string): Promise<Detail | null> {
    const byId = identifier.toLowerCase().startsWith("tt");
    const url = buildUrl(this.config.baseUrl, "", {
      apikey: this.config.apiKey,
      plot: "short",
      i: byId ? identifier : undefined,
      t: byId ? undefined : identifier,
    });
    const fetched = await fetchJson(url, this.config.detailTimeoutMs);
    if (fetched.kind === "error") {
      logger.warn("Failed to fetch title details", { identifier, reason: fetched.reason });
      return null;
    }

    const outcome = parseOmdbDetail(fetched.body);
    switch (outcome.kind) {
      case "results":
        return outcome.detail;
      case "empty":
        logger.warn("Title not found in OMDb", { identifier, reason: outcome.reason });
        return null;
      case "error":
        logger.warn("OMDb detail payload rejected", { identifier, reason: outcome.reason });
        return null;
    }
  }
}
