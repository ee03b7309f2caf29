/**
 * TMDB Adapter
 *
 * Optional catalog provider used to seed genre browsing with popular titles.
 * Without an API key the adapter reports itself unconfigured and every call
 * returns an empty value without touching the network.
 */

import type { TmdbConfig } from "../../server/common/config";
import { createLogger } from "../../server/common/logger";
import { isRecord } from "../discovery/codecs";
import type {
  CatalogCandidate,
  CatalogPage,
  CatalogProvider,
  DiscoverOptions,
} from "../discovery/types";
import { buildUrl, fetchJson, type QueryValue } from "./http";

const logger = createLogger("tmdb-adapter");

export interface TmdbAdapterDeps {
  config: TmdbConfig;
}

// ============================================================================
// TMDB → internal mapping
// ============================================================================

export function mapTmdbGenres(payload: unknown): Record<string, number> {
  const genres: Record<string, number> = {};
  if (!isRecord(payload) || !Array.isArray(payload.genres)) return genres;
  for (const genre of payload.genres) {
    if (!isRecord(genre)) continue;
    const { id, name } = genre;
    if (typeof id === "number" && typeof name === "string" && name.trim()) {
      genres[name.trim().toLowerCase()] = id;
    }
  }
  return genres;
}

export function mapTmdbDiscover(payload: unknown): CatalogPage {
  if (!isRecord(payload) || !Array.isArray(payload.results)) {
    return { candidates: [], totalPages: 0 };
  }
  const candidates: CatalogCandidate[] = [];
  for (const item of payload.results) {
    if (!isRecord(item) || typeof item.id !== "number") continue;
    const title = typeof item.title === "string" ? item.title : "";
    const candidate: CatalogCandidate = { catalogId: item.id, title };
    if (typeof item.release_date === "string" && item.release_date.length >= 4) {
      candidate.year = item.release_date.slice(0, 4);
    }
    candidates.push(candidate);
  }
  const totalPages = typeof payload.total_pages === "number" ? payload.total_pages : 1;
  return { candidates, totalPages };
}

// ============================================================================
// TMDB Adapter
// ============================================================================

export class TmdbAdapter implements CatalogProvider {
  private config: TmdbConfig;

  constructor(deps: TmdbAdapterDeps) {
    this.config = deps.config;
  }

  isConfigured(): boolean {
    return Boolean(this.config.apiKey);
  }

  async listGenres(): Promise<Record<string, number>> {
    const payload = await this.get("genre/movie/list", {});
    return payload === null ? {} : mapTmdbGenres(payload);
  }

  async discoverByGenre(genreId: number, options: DiscoverOptions = {}): Promise<CatalogPage> {
    const payload = await this.get("discover/movie", {
      with_genres: genreId,
      page: options.page ?? 1,
      sort_by: options.sortBy ?? "popularity.desc",
      include_adult: false,
      primary_release_year: options.year,
      with_original_language: options.language,
      "vote_count.gte": options.minVotes,
    });
    return payload === null ? { candidates: [], totalPages: 0 } : mapTmdbDiscover(payload);
  }

  async resolveExternalId(catalogId: number): Promise<string | null> {
    const payload = await this.get(`movie/${catalogId}/external_ids`, {});
    if (!isRecord(payload)) return null;
    const imdbId = payload.imdb_id;
    return typeof imdbId === "string" && imdbId ? imdbId : null;
  }

  // --------------------------------------------------------------------------
  // Internal
  // --------------------------------------------------------------------------

  private async get(path: string, params: Record<string, QueryValue>): Promise<unknown> {
    const { apiKey } = this.config;
    if (!apiKey) return null;

    const url = buildUrl(this.config.baseUrl, path, { api_key: apiKey, ...params });
    const fetched = await fetchJson(url, this.config.timeoutMs);
    if (fetched.kind === "error") {
      logger.error(`TMDB request failed: ${path}`, { reason: fetched.reason });
      return null;
    }
    return fetched.body;
  }
}
