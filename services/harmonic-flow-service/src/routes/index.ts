/**
 * Route Setup for the Harmonic Flow Service
 */

import { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { config } from '../config/index.js';
import { OptimizationResult, PlaylistFormat } from '../types/track.js';
import { camelotToKeyName } from '../utils/harmonic.js';
import { parseEnergyPolicy } from '../utils/energyUtils.js';
import { logger } from '../utils/logger.js';
import {
  PlaylistImportError,
  detectPlaylistFormat,
  importPlaylist,
  isPlaylistFormat,
  parseBpm,
} from '../services/playlistImporter.js';
import { exportPlaylistCsv } from '../services/playlistExporter.js';

const energyPolicySchema = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined) return config.optimizer.defaultPolicy;
    const policy = parseEnergyPolicy(value);
    if (!policy) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown energy policy "${value}"; expected ramp_up, ramp_down or wave`,
      });
      return z.NEVER;
    }
    return policy;
  });

const trackSchema = z.object({
  artist: z.string().default(''),
  title: z.string().default(''),
  bpm: z
    .union([z.number(), z.string(), z.null()])
    .optional()
    .transform(value => {
      if (typeof value === 'number') return Number.isFinite(value) && value > 0 ? value : null;
      return parseBpm(value ?? undefined);
    }),
  key: z
    .string()
    .nullable()
    .optional()
    .transform(value => value?.trim() || null),
});

const columnsSchema = z.object({
  artist: z.string().optional(),
  title: z.string().optional(),
  key: z.string().optional(),
  bpm: z.string().optional(),
});

const optimizeBodySchema = z.object({
  tracks: z.array(trackSchema),
  energyPolicy: energyPolicySchema,
});

const exportBodySchema = z.object({
  tracks: z.array(trackSchema),
  columns: columnsSchema.optional(),
});

const importQuerySchema = z.object({
  format: z.string().optional(),
  filename: z.string().optional(),
  energyPolicy: energyPolicySchema,
  output: z.enum(['json', 'csv']).default('json'),
});

const CONTENT_TYPE_FORMATS: Record<string, PlaylistFormat> = {
  'text/csv': 'csv',
  'text/tab-separated-values': 'txt',
  'text/plain': 'txt',
  'text/xml': 'xml',
  'application/xml': 'xml',
};

/**
 * Resolve the upload format from the query, then the file name, then the
 * content type
 */
function resolveFormat(request: FastifyRequest, format?: string, filename?: string): PlaylistFormat {
  if (format !== undefined) {
    const normalized = format.trim().toLowerCase();
    if (!isPlaylistFormat(normalized)) {
      throw new PlaylistImportError('UNSUPPORTED_FORMAT', `Unsupported playlist format "${format}"; expected txt, csv or xml`);
    }
    return normalized;
  }

  if (filename !== undefined) {
    const detected = detectPlaylistFormat(filename);
    if (detected) return detected;
  }

  const contentType = (request.headers['content-type'] ?? '').split(';')[0].trim().toLowerCase();
  const fromContentType = CONTENT_TYPE_FORMATS[contentType];
  if (fromContentType) return fromContentType;

  throw new PlaylistImportError(
    'UNSUPPORTED_FORMAT',
    'Cannot determine the playlist format; pass ?format=txt|csv|xml or a filename'
  );
}

function presentResult(result: OptimizationResult) {
  return {
    ...result,
    keyPathNames: result.keyPath.map(camelotToKeyName),
  };
}

export async function setupRoutes(fastify: FastifyInstance): Promise<void> {
  // Reorder a playlist given as JSON
  fastify.post('/playlists/optimize', async (request) => {
    const body = optimizeBodySchema.parse(request.body);
    const result = fastify.optimizer.optimize(body.tracks, body.energyPolicy);
    return presentResult(result);
  });

  // Import a DJ software export and reorder it
  fastify.post('/playlists/import', async (request, reply) => {
    const query = importQuerySchema.parse(request.query);
    const format = resolveFormat(request, query.format, query.filename);

    if (!Buffer.isBuffer(request.body)) {
      throw new PlaylistImportError(
        'UNSUPPORTED_FORMAT',
        'Send the playlist file as the raw request body (text/plain, text/csv or application/xml)'
      );
    }

    const playlist = importPlaylist(request.body, format);
    const result = fastify.optimizer.optimize(playlist.tracks, query.energyPolicy);

    logger.info('Playlist imported', {
      requestId: request.requestId,
      format,
      trackCount: playlist.tracks.length,
      keylessCount: result.keylessCount,
    });

    if (query.output === 'csv') {
      return reply
        .type('text/csv; charset=utf-8')
        .header('content-disposition', `attachment; filename="${config.optimizer.exportFileName}"`)
        .send(exportPlaylistCsv(result.tracks, playlist.columns));
    }

    return {
      format,
      columns: playlist.columns,
      ...presentResult(result),
    };
  });

  // Serialize an already ordered playlist to CSV
  fastify.post('/playlists/export', async (request, reply) => {
    const body = exportBodySchema.parse(request.body);
    return reply
      .type('text/csv; charset=utf-8')
      .header('content-disposition', `attachment; filename="${config.optimizer.exportFileName}"`)
      .send(exportPlaylistCsv(body.tracks, body.columns));
  });

  logger.debug('Routes configured successfully');
}
