/**
 * Runtime Configuration
 *
 * Environment-driven getters. Each getter returns a plain struct that is
 * handed to the component that needs it at construction time; nothing reads
 * `process.env` after startup.
 */

// ============================================================================
// Providers
// ============================================================================

export interface OmdbConfig {
  apiKey: string;
  baseUrl: string;
  searchTimeoutMs: number;
  detailTimeoutMs: number;
}

export function getOmdbConfig(): OmdbConfig {
  return {
    apiKey: process.env.OMDB_API_KEY || '',
    baseUrl: process.env.OMDB_BASE_URL || 'http://www.omdbapi.com/',
    searchTimeoutMs: envInt('OMDB_SEARCH_TIMEOUT_MS', 3000),
    detailTimeoutMs: envInt('OMDB_DETAIL_TIMEOUT_MS', 5000),
  };
}

export interface TmdbConfig {
  apiKey?: string;
  baseUrl: string;
  timeoutMs: number;
}

export function getTmdbConfig(): TmdbConfig {
  const config: TmdbConfig = {
    baseUrl: process.env.TMDB_BASE_URL || 'https://api.themoviedb.org/3',
    timeoutMs: envInt('TMDB_TIMEOUT_MS', 3000),
  };
  if (process.env.TMDB_API_KEY) config.apiKey = process.env.TMDB_API_KEY;
  return config;
}

// ============================================================================
// Cache
// ============================================================================

export interface CacheConfig {
  enabled: boolean;
  redisUrl: string;
  detailTtlSeconds: number;
  datasetTtlSeconds: number;
}

export function getCacheConfig(): CacheConfig {
  return {
    enabled: envBool('CACHE_ENABLED', true),
    redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
    detailTtlSeconds: envInt('CACHE_DETAIL_TTL_SECONDS', 600),
    datasetTtlSeconds: envInt('CACHE_DATASET_TTL_SECONDS', 600),
  };
}

// ============================================================================
// Pipeline
// ============================================================================

export interface PipelineConfig {
  enrichConcurrency: number;
  maxPagesPerTerm: number;
}

export function getPipelineConfig(): PipelineConfig {
  return {
    enrichConcurrency: Math.max(1, envInt('ENRICH_CONCURRENCY', 4)),
    // providers page at 10 results; more than five pages per term is never useful
    maxPagesPerTerm: Math.min(Math.max(1, envInt('MAX_PAGES_PER_TERM', 5)), 5),
  };
}

// ============================================================================
// Server
// ============================================================================

export interface ServerConfig {
  port: number;
  host: string;
  rateLimitPerMinute: number;
}

export function getServerConfig(): ServerConfig {
  return {
    port: envInt('PORT', 8080),
    host: process.env.HOST || '0.0.0.0',
    rateLimitPerMinute: envInt('RATE_LIMIT_PER_MINUTE', 100),
  };
}

// ============================================================================
// Utilities
// ============================================================================

export function envBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

export function envInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}
