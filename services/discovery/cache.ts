/**
 * Metadata Cache
 *
 * Namespaced, TTL-bound memoization of provider responses and computed
 * datasets. The cache is advisory: a missing backend, a failing read or an
 * undecodable entry is a miss, and a failing write is logged and dropped.
 */

import { createLogger } from "../../server/common/logger";
import { decode, encode, type Codec } from "./codecs";
import type { CacheStore } from "./stores";
import type { MediaType } from "./types";

const logger = createLogger("metadata-cache");

export interface CacheTtls {
  detailSeconds: number;
  datasetSeconds: number;
}

export interface MetadataCacheOptions {
  /** Resolved on every call, so a backend attached after startup is picked up. */
  store: CacheStore | (() => CacheStore | undefined) | undefined;
  ttl?: Partial<CacheTtls>;
  now?: () => number;
}

export const DEFAULT_TTL_SECONDS = 600;

// ============================================================================
// Keys
// ============================================================================

export interface SearchDatasetFilters {
  pageSize: number;
  type?: MediaType;
  year?: string;
  language?: string;
}

function token(value: string | undefined, fallback: string): string {
  const trimmed = (value ?? "").trim().toLowerCase();
  return trimmed || fallback;
}

export const cacheKeys = {
  detail: (identifier: string) => `detail:${identifier.trim().toLowerCase()}`,
  searchDataset: (query: string, page: number, filters: SearchDatasetFilters) =>
    [
      "search-dataset",
      token(query, ""),
      page,
      filters.pageSize,
      token(filters.type, "any"),
      token(filters.year, "any"),
      token(filters.language, "any"),
    ].join(":"),
  genreDataset: (genre: string) => `genre-dataset:${token(genre, "")}`,
  boxOfficeDataset: (query: string | undefined, genre: string | undefined) =>
    `boxoffice-dataset:${token(query, "default")}:${token(genre, "any")}`,
  similar: (identifier: string) => `similar:${token(identifier, "")}`,
  ratingSummary: (target: string) => `rating-summary:${token(target, "")}`,
  catalogGenres: () => "catalog-genres",
};

// ============================================================================
// Cache
// ============================================================================

export class MetadataCache {
  private resolveStore: () => CacheStore | undefined;
  private now: () => number;
  readonly ttl: CacheTtls;

  constructor(options: MetadataCacheOptions) {
    const { store } = options;
    this.resolveStore = typeof store === "function" ? store : () => store;
    this.now = options.now ?? Date.now;
    this.ttl = {
      detailSeconds: options.ttl?.detailSeconds ?? DEFAULT_TTL_SECONDS,
      datasetSeconds: options.ttl?.datasetSeconds ?? DEFAULT_TTL_SECONDS,
    };
  }

  async read<T>(key: string, codec: Codec<T>): Promise<T | null> {
    const store = this.resolveStore();
    if (!store) return null;

    let raw: string | null;
    try {
      raw = await store.get(key);
    } catch (error) {
      logger.warn("Cache read failed", { key, error: String(error) });
      return null;
    }
    if (raw === null) return null;

    const value = decode(codec, raw, this.now());
    if (value === null) {
      logger.warn("Discarding undecodable or expired cache entry", { key });
    }
    return value;
  }

  async write<T>(key: string, codec: Codec<T>, value: T, ttlSeconds: number): Promise<void> {
    const store = this.resolveStore();
    if (!store || ttlSeconds <= 0) return;

    try {
      const payload = encode(codec, value, this.now() + ttlSeconds * 1000);
      await store.set(key, payload, ttlSeconds);
    } catch (error) {
      logger.warn("Cache write failed", { key, error: String(error) });
    }
  }
}
