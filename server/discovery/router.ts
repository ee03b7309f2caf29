/**
 * Discovery API Router
 *
 * GET  /search            : free-text search over expanded query terms
 * GET  /genre/:genre      : genre browsing with curated titles pinned first
 * GET  /genres            : genres of a single title
 * GET  /catalog/genres    : catalog genre map (503 without a catalog key)
 * GET  /boxoffice/top     : box-office ranking, chart and metrics
 * GET  /movie/:id         : title detail with similar titles
 * GET|POST /ratings/summary : normalized ratings per title
 *
 * Registered under /api by api.ts.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { DiscoveryPipeline } from '../../services/discovery/pipeline';
import { errorMessage, ValidationError, type ErrorBody } from '../common/errors';
import { createLogger } from '../common/logger';
import {
  parseBoxOfficeParams,
  parseGenreParams,
  parseRatingTargets,
  parseSearchParams,
  parseTitleTarget,
  type QueryParams,
} from './params';

const logger = createLogger('discovery-router');

// ============================================================================
// Plugin Options
// ============================================================================

export interface DiscoveryRouterOptions {
  pipeline: DiscoveryPipeline;
}

type QueryRequest = FastifyRequest<{ Querystring: QueryParams }>;

function sendError(reply: FastifyReply, route: string, error: unknown): FastifyReply {
  if (error instanceof ValidationError) {
    return reply.status(400).send(error.toBody());
  }
  logger.error('Discovery endpoint error', { route, error: errorMessage(error) });
  const body: ErrorBody = { error: 'Internal server error', code: 'INTERNAL_ERROR' };
  return reply.status(500).send(body);
}

function notFound(reply: FastifyReply, error: string): FastifyReply {
  const body: ErrorBody = { error, code: 'NOT_FOUND' };
  return reply.status(404).send(body);
}

// ============================================================================
// Fastify Plugin
// ============================================================================

export default async function discoveryRouter(
  app: FastifyInstance,
  options: DiscoveryRouterOptions,
): Promise<void> {
  const { pipeline } = options;

  // --------------------------------------------------------------------------
  // Search & browse
  // --------------------------------------------------------------------------

  app.get('/search', async (request: QueryRequest, reply) => {
    try {
      const response = await pipeline.search(parseSearchParams(request.query));
      return reply.send(response);
    } catch (error) {
      return sendError(reply, 'search', error);
    }
  });

  app.get(
    '/genre/:genre',
    async (request: FastifyRequest<{ Params: { genre: string }; Querystring: QueryParams }>, reply) => {
      try {
        const response = await pipeline.browseGenre(parseGenreParams(request.params.genre, request.query));
        return reply.send(response);
      } catch (error) {
        return sendError(reply, 'genre', error);
      }
    },
  );

  app.get('/boxoffice/top', async (request: QueryRequest, reply) => {
    try {
      const response = await pipeline.boxOfficeTop(parseBoxOfficeParams(request.query));
      return reply.send(response);
    } catch (error) {
      return sendError(reply, 'boxoffice', error);
    }
  });

  app.get('/catalog/genres', async (_request, reply) => {
    try {
      const response = await pipeline.listCatalogGenres();
      if (!response.configured) {
        const body: ErrorBody = {
          error: 'Catalog provider is not configured',
          code: 'CATALOG_NOT_CONFIGURED',
        };
        return reply.status(503).send(body);
      }
      return reply.send(response);
    } catch (error) {
      return sendError(reply, 'catalog-genres', error);
    }
  });

  // --------------------------------------------------------------------------
  // Single title
  // --------------------------------------------------------------------------

  app.get('/genres', async (request: QueryRequest, reply) => {
    try {
      const response = await pipeline.getTitleGenres(parseTitleTarget(request.query));
      if (!response) return notFound(reply, 'Title not found.');
      return reply.send(response);
    } catch (error) {
      return sendError(reply, 'genres', error);
    }
  });

  app.get('/movie/:id', async (request: FastifyRequest<{ Params: { id: string } }>, reply) => {
    try {
      const response = await pipeline.getTitle(request.params.id);
      if (!response) return notFound(reply, 'Title not found.');
      return reply.send(response);
    } catch (error) {
      return sendError(reply, 'movie', error);
    }
  });

  // --------------------------------------------------------------------------
  // Rating summaries
  // --------------------------------------------------------------------------

  async function ratingSummary(targets: () => string[], reply: FastifyReply): Promise<FastifyReply> {
    try {
      const response = await pipeline.summarizeRatings(targets());
      return reply.status(response.count > 0 ? 200 : 404).send(response);
    } catch (error) {
      return sendError(reply, 'ratings-summary', error);
    }
  }

  app.get('/ratings/summary', async (request: QueryRequest, reply) =>
    ratingSummary(() => parseRatingTargets(request.query), reply),
  );

  app.post('/ratings/summary', async (request: FastifyRequest<{ Querystring: QueryParams; Body: unknown }>, reply) =>
    ratingSummary(() => parseRatingTargets(request.query, request.body ?? {}), reply),
  );
}
