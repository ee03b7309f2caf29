import { createClient } from 'redis';
import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { REQUEST_ID_HEADER, resolveRequestId } from './common/requestId';
import { logger } from './common/logger';
import {
  getCacheConfig,
  getOmdbConfig,
  getPipelineConfig,
  getServerConfig,
  getTmdbConfig,
} from './common/config';
import { errorMessage } from './common/errors';
import discoveryRouter from './discovery/router';
import { OmdbAdapter } from '../services/catalog/omdb';
import { TmdbAdapter } from '../services/catalog/tmdb';
import { MetadataCache } from '../services/discovery/cache';
import { DiscoveryPipeline } from '../services/discovery/pipeline';
import { MemoryStore, createRedisStore, type CacheStore, type RedisClient } from '../services/discovery/stores';

// attach redis
declare module 'fastify' {
  interface FastifyInstance {
    redis?: RedisClient;
    cacheStore?: CacheStore;
  }
}

export interface BuildAppOptions {
  /** Replaces the pipeline wired from environment configuration. */
  pipeline?: DiscoveryPipeline;
}

type CacheBackend = 'redis' | 'memory' | 'disabled';

export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const serverConfig = getServerConfig();
  const cacheConfig = getCacheConfig();

  const app = Fastify({
    logger: false,
    genReqId: (req) => resolveRequestId(req.headers),
  });
  app.register(cors, { origin: true });
  app.register(helmet, { contentSecurityPolicy: false });
  app.register(rateLimit, { max: serverConfig.rateLimitPerMinute, timeWindow: '1 minute' });

  // Echo the request id and make sure 429s carry Retry-After
  app.addHook('onSend', (request, reply, _payload, done) => {
    reply.header(REQUEST_ID_HEADER, request.id);
    if (reply.statusCode === 429 && !reply.hasHeader('Retry-After')) {
      reply.header('Retry-After', '60');
    }
    done();
  });

  // Redis when reachable, otherwise an in-process store
  const memoryStore = new MemoryStore();
  const cache = new MetadataCache({
    store: () => (cacheConfig.enabled ? (app.cacheStore ?? memoryStore) : undefined),
    ttl: {
      detailSeconds: cacheConfig.detailTtlSeconds,
      datasetSeconds: cacheConfig.datasetTtlSeconds,
    },
  });

  const pipeline =
    options.pipeline ??
    new DiscoveryPipeline({
      provider: new OmdbAdapter({ config: getOmdbConfig() }),
      catalog: new TmdbAdapter({ config: getTmdbConfig() }),
      cache,
      config: getPipelineConfig(),
    });

  app.get(
    '/healthz',
    {
      schema: {
        response: {
          200: {
            type: 'object',
            properties: {
              ok: { type: 'boolean' },
              cache: { type: 'string', enum: ['redis', 'memory', 'disabled'] },
            },
            required: ['ok', 'cache'],
          },
        },
      },
    },
    async () => {
      const backend: CacheBackend = !cacheConfig.enabled ? 'disabled' : app.redis ? 'redis' : 'memory';
      return { ok: true, cache: backend };
    },
  );

  app.register(discoveryRouter, { prefix: '/api', pipeline });

  /* c8 ignore start */
  app.addHook('onReady', async () => {
    // Skip Redis in test env to keep tests fast and deterministic
    if (process.env.NODE_ENV === 'test' || !cacheConfig.enabled) return;
    try {
      const client = createClient({
        url: cacheConfig.redisUrl,
        socket: {
          connectTimeout: 2000,
          reconnectStrategy: (retries) =>
            retries > 3 ? new Error('Redis unreachable') : Math.min(retries * 200, 1000),
        },
      });
      client.on('error', (err) => logger.warn('redis_error', { err: String(err) }));
      await client.connect();
      app.redis = client;
      app.cacheStore = createRedisStore(client);
      logger.info('redis_connected', { url: cacheConfig.redisUrl });
    } catch (err) {
      logger.warn('redis_disabled_or_unreachable', { err: errorMessage(err) });
    }
  });

  app.addHook('onClose', async () => {
    if (app.redis?.isOpen) await app.redis.quit();
  });
  /* c8 ignore stop */

  return app;
}

/* c8 ignore start */
export async function start(): Promise<FastifyInstance> {
  if (!getOmdbConfig().apiKey) {
    throw new Error('OMDB_API_KEY is required to start the server');
  }
  const app = buildApp();
  const { port, host } = getServerConfig();
  await app.listen({ port, host });
  logger.info(`API listening on http://localhost:${port}`);
  return app;
}
/* c8 ignore stop */

export default buildApp;
