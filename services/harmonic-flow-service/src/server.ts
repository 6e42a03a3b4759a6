/**
 * Fastify server assembly for the Harmonic Flow Service
 */

import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { config } from './config/index.js';
import { setupRoutes } from './routes/index.js';
import { MetricsService } from './services/metrics.js';
import { PlaylistOptimizerService } from './services/playlistOptimizer.js';
import { KEY_TO_CAMELOT } from './utils/harmonic.js';
import { createPinoLoggerOptions } from './utils/logger.js';
import {
  metricsMiddleware,
  errorMiddleware,
  contextMiddleware,
  createHealthResponse,
} from './utils/middleware.js';

// Playlist uploads arrive as the raw request body
const PLAYLIST_CONTENT_TYPES = [
  'text/plain',
  'text/csv',
  'text/tab-separated-values',
  'text/xml',
  'application/xml',
  'application/octet-stream',
];

export interface ServerOptions {
  metrics?: MetricsService;
  exactThreshold?: number;
}

/**
 * Create and configure Fastify server
 */
export async function createServer(options: ServerOptions = {}): Promise<FastifyInstance> {
  const metrics = options.metrics ?? new MetricsService({ collectDefaults: config.env !== 'test' });
  const optimizer = new PlaylistOptimizerService(metrics, {
    exactThreshold: options.exactThreshold ?? config.optimizer.exactMaxKeys,
  });

  const fastify = Fastify({
    logger: createPinoLoggerOptions(),
    trustProxy: true,
    keepAliveTimeout: 30000,
    bodyLimit: config.server.bodyLimit,
  });

  fastify.decorate('metrics', metrics);
  fastify.decorate('optimizer', optimizer);
  fastify.decorateRequest('requestId', '');

  // Register security plugins
  await fastify.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        frameAncestors: ["'none'"],
      },
    },
  });

  await fastify.register(cors, {
    origin: (origin, callback) => {
      // Allow requests with no origin (curl, server-to-server)
      if (!origin) return callback(null, true);
      callback(null, config.security.corsOrigins.includes(origin));
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-Id'],
    exposedHeaders: ['Content-Disposition', 'X-Request-Id'],
  });

  await fastify.register(rateLimit, {
    max: config.security.rateLimitMax,
    timeWindow: config.security.rateLimitWindow,
  });

  fastify.removeContentTypeParser('text/plain');
  fastify.addContentTypeParser(PLAYLIST_CONTENT_TYPES, { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  fastify.addHook('onRequest', contextMiddleware);
  fastify.addHook('onRequest', metricsMiddleware);
  fastify.setErrorHandler(errorMiddleware);

  fastify.get('/health', async (_request, reply) => {
    const health = createHealthResponse(
      { keyNotations: KEY_TO_CAMELOT.size > 0 },
      { exactSolverMaxKeys: options.exactThreshold ?? config.optimizer.exactMaxKeys }
    );
    return reply.code(health.status === 'healthy' ? 200 : 503).send(health);
  });

  // Metrics endpoint for Prometheus
  fastify.get('/metrics', async (_request, reply) => {
    const body = await metrics.getMetrics();
    return reply.type(metrics.contentType).send(body);
  });

  await fastify.register(setupRoutes, { prefix: '/api/v1' });

  return fastify;
}
