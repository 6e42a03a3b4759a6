/**
 * Middleware utilities for the Harmonic Flow Service
 * Including metrics collection, request context and error responses
 */

import { randomUUID } from 'crypto';
import { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { PlaylistImportError } from '../services/playlistImporter.js';
import { config } from '../config/index.js';
import { logger } from './logger.js';

/**
 * Middleware to collect HTTP request metrics
 */
export async function metricsMiddleware(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  const startTime = process.hrtime.bigint();

  // Route pattern when one matched, otherwise the bare path
  const route = request.routeOptions.url || request.url.split('?')[0];

  reply.raw.on('finish', () => {
    const duration = Number(process.hrtime.bigint() - startTime) / 1e9;
    request.server.metrics.recordHttpRequest(
      request.method,
      route || '/unknown',
      reply.statusCode,
      duration
    );
  });
}

/**
 * Request context enhancement middleware
 */
export async function contextMiddleware(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  // Add request ID for tracing
  const header = request.headers['x-request-id'];
  const requestId = (Array.isArray(header) ? header[0] : header) || randomUUID();

  request.requestId = requestId;
  reply.header('x-request-id', requestId);

  logger.debug('Incoming request', {
    requestId,
    method: request.method,
    url: request.url,
    userAgent: request.headers['user-agent'],
    ip: request.ip,
  });
}

export interface ErrorResponse {
  error: true;
  message: string;
  code?: string;
  issues?: Array<{ path: string; message: string }>;
  timestamp: string;
  path: string;
  method: string;
  stack?: string;
}

interface ClassifiedError {
  statusCode: number;
  code: string;
  message: string;
  issues?: ErrorResponse['issues'];
}

function classifyError(error: FastifyError): ClassifiedError {
  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      code: 'VALIDATION_ERROR',
      message: 'Request validation failed',
      issues: error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
    };
  }

  if (error instanceof PlaylistImportError) {
    return {
      statusCode: error.code === 'UNSUPPORTED_FORMAT' ? 400 : 422,
      code: error.code,
      message: error.message,
    };
  }

  // Fastify and plugin errors carry their own status (413, 415, 429, ...)
  const statusCode = error.statusCode && error.statusCode >= 400 ? error.statusCode : 500;
  return {
    statusCode,
    code: error.code || (statusCode >= 500 ? 'INTERNAL_ERROR' : 'REQUEST_ERROR'),
    message:
      statusCode >= 500 && config.env === 'production'
        ? 'Internal Server Error'
        : error.message || 'Internal Server Error',
  };
}

/**
 * Middleware to handle and log errors with metrics
 */
export async function errorMiddleware(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  const classified = classifyError(error);

  request.server.metrics.recordError(error.name || 'UnknownError', classified.code);

  const logMeta = {
    requestId: request.requestId,
    error: {
      name: error.name,
      code: classified.code,
      message: error.message,
      stack: error.stack,
    },
    request: {
      method: request.method,
      url: request.url,
      ip: request.ip,
    },
    statusCode: classified.statusCode,
  };
  if (classified.statusCode >= 500) {
    logger.error('Request error occurred', logMeta);
  } else {
    logger.warn('Request rejected', logMeta);
  }

  if (reply.sent) return;

  const errorResponse: ErrorResponse = {
    error: true,
    message: classified.message,
    code: classified.code,
    ...(classified.issues && { issues: classified.issues }),
    timestamp: new Date().toISOString(),
    path: request.url,
    method: request.method,
  };

  // Don't expose stack traces outside development
  if (config.env === 'development') {
    errorResponse.stack = error.stack;
  }

  reply.code(classified.statusCode).send(errorResponse);
}

export interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  services: Record<string, boolean>;
  version: string;
  environment: string;
}

/**
 * Health check response helper
 */
export function createHealthResponse(
  services: Record<string, boolean>,
  additionalInfo: Record<string, unknown> = {}
): HealthResponse & Record<string, unknown> {
  const allHealthy = Object.values(services).every(status => status);

  return {
    ...additionalInfo,
    status: allHealthy ? 'healthy' : 'unhealthy',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    services,
    version: process.env.npm_package_version || '1.0.0',
    environment: config.env,
  };
}

/**
 * Graceful shutdown helper
 */
export async function gracefulShutdown(
  signal: string,
  cleanupFunctions: Array<() => Promise<void> | void>
): Promise<void> {
  logger.info('Graceful shutdown initiated', { signal });

  try {
    await Promise.all(cleanupFunctions.map(fn => fn()));
    logger.info('Graceful shutdown completed');
    logger.cleanup();
    process.exit(0);
  } catch (error) {
    logger.fatal('Error during graceful shutdown', { error });
    process.exit(1);
  }
}
