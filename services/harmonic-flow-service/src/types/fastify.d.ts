/**
 * Fastify type declarations for the Harmonic Flow Service
 */

import { MetricsService } from '../services/metrics.js';
import { PlaylistOptimizerService } from '../services/playlistOptimizer.js';

declare module 'fastify' {
  interface FastifyInstance {
    metrics: MetricsService;
    optimizer: PlaylistOptimizerService;
  }

  interface FastifyRequest {
    requestId: string;
  }
}
