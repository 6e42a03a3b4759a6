/**
 * Harmonic Flow Service
 * Main entry point for the harmonic playlist ordering backend
 */

import { config } from './config/index.js';
import { createServer } from './server.js';
import { logger } from './utils/logger.js';
import { gracefulShutdown } from './utils/middleware.js';

/**
 * Start the HTTP server and install signal handlers
 */
async function start(): Promise<void> {
  try {
    const fastify = await createServer();

    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
    signals.forEach((signal) => {
      process.once(signal, () => {
        void gracefulShutdown(signal, [() => fastify.close()]);
      });
    });

    const address = await fastify.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info(`Harmonic Flow Service started on ${address}`);
    logger.info(`Environment: ${config.env}`);
    logger.info('Optimizer settings', {
      exactMaxKeys: config.optimizer.exactMaxKeys,
      defaultPolicy: config.optimizer.defaultPolicy,
    });
  } catch (error) {
    logger.fatal('Failed to start server', { error });
    process.exit(1);
  }
}

// Start the server if this file is executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  void start();
}

export { createServer, start };
export type { ServerOptions } from './server.js';
export { optimizePlaylist, groupByKey, PlaylistOptimizerService } from './services/playlistOptimizer.js';
export {
  importPlaylist,
  detectPlaylistFormat,
  decodePlaylistText,
  PlaylistImportError,
} from './services/playlistImporter.js';
export { exportPlaylistCsv } from './services/playlistExporter.js';
export { MetricsService } from './services/metrics.js';
export { normalizeKey, getCamelotDistance, camelotToKeyName, CAMELOT_KEYS } from './utils/harmonic.js';
export { solveKeyPath, buildDistanceMatrix, pathDistance } from './utils/pathfinding.js';
export { sequenceTracks, orientKeyPath, sortByBpm, parseEnergyPolicy, ENERGY_POLICIES } from './utils/energyUtils.js';
export { reportTransitionQuality, classifyTransition } from './utils/transitionQuality.js';
export type * from './types/track.js';
