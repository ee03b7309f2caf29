import { describe, it, expect, afterEach, vi } from 'vitest';
import { getCacheConfig, getOmdbConfig, getPipelineConfig, getTmdbConfig, envBool } from './config';

describe('config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('uses defaults when nothing is set', () => {
    vi.stubEnv('OMDB_SEARCH_TIMEOUT_MS', '');
    const omdb = getOmdbConfig();
    expect(omdb.baseUrl).toBe('http://www.omdbapi.com/');
    expect(omdb.searchTimeoutMs).toBe(3000);
    expect(omdb.detailTimeoutMs).toBe(5000);
  });

  it('reads cache TTLs from the environment', () => {
    vi.stubEnv('CACHE_DETAIL_TTL_SECONDS', '120');
    vi.stubEnv('CACHE_DATASET_TTL_SECONDS', 'abc');
    const cache = getCacheConfig();
    expect(cache.detailTtlSeconds).toBe(120);
    expect(cache.datasetTtlSeconds).toBe(600);
  });

  it('omits the TMDB key when not configured', () => {
    vi.stubEnv('TMDB_API_KEY', '');
    expect(getTmdbConfig().apiKey).toBeUndefined();
    vi.stubEnv('TMDB_API_KEY', 'test-tmdb-key');
    expect(getTmdbConfig().apiKey).toBe('test-tmdb-key');
  });

  it('clamps pages per term to five', () => {
    vi.stubEnv('MAX_PAGES_PER_TERM', '9');
    expect(getPipelineConfig().maxPagesPerTerm).toBe(5);
    vi.stubEnv('ENRICH_CONCURRENCY', '0');
    expect(getPipelineConfig().enrichConcurrency).toBe(1);
  });

  it('parses boolean flags', () => {
    vi.stubEnv('CACHE_ENABLED', '0');
    expect(envBool('CACHE_ENABLED', true)).toBe(false);
    vi.stubEnv('CACHE_ENABLED', 'TRUE');
    expect(envBool('CACHE_ENABLED', false)).toBe(true);
  });
});
