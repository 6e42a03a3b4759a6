/**
 * Harmonic Flow Service Logger
 */

import winston from 'winston';
import { stdSerializers, type LoggerOptions } from 'pino';
import { config } from '../config/index.js';
import { EnergyPolicy, PathAlgorithm, TransitionQuality } from '../types/track.js';

const SERVICE_NAME = 'harmonic-flow-service';

export type LogMeta = Record<string, unknown>;

/**
 * Application logger: pretty console output in development, structured JSON elsewhere
 */
class ServiceLogger {
  private winston: winston.Logger;

  constructor() {
    this.winston = this.createLogger();
  }

  private createLogger(): winston.Logger {
    const transports: winston.transport[] = [];

    if (config.logging.prettyPrint) {
      transports.push(
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.colorize(),
            winston.format.printf(({ timestamp, level, message, ...meta }) => {
              const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta, null, 2)}` : '';
              return `[${timestamp}] ${level}: ${message}${metaStr}`;
            })
          ),
        })
      );
    } else {
      transports.push(
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            winston.format.printf((info) => {
              const enriched = {
                ...info,
                service: SERVICE_NAME,
                environment: config.env,
                version: process.env.npm_package_version || '1.0.0',
                pid: process.pid,
              };
              return JSON.stringify(enriched);
            })
          ),
        })
      );
    }

    return winston.createLogger({
      level: config.logging.level,
      transports,
      silent: config.env === 'test',
      exitOnError: false,
    });
  }

  debug(message: string, meta?: LogMeta) {
    this.winston.debug(message, this.enrichMeta(meta));
  }

  info(message: string, meta?: LogMeta) {
    this.winston.info(message, this.enrichMeta(meta));
  }

  warn(message: string, meta?: LogMeta) {
    this.winston.warn(message, this.enrichMeta(meta));
  }

  error(message: string, meta?: LogMeta) {
    this.winston.error(message, this.enrichMeta(meta));
  }

  /**
   * Fatal level logging (maps to error)
   */
  fatal(message: string, meta?: LogMeta) {
    this.winston.error(message, { ...this.enrichMeta(meta), fatal: true });
  }

  /**
   * Log the outcome of one playlist optimization run
   */
  logOptimization(
    policy: EnergyPolicy,
    algorithm: PathAlgorithm,
    trackCount: number,
    quality: TransitionQuality,
    duration: number
  ) {
    this.info('Playlist optimized', {
      policy,
      algorithm,
      trackCount,
      totalDistance: quality.totalDistance,
      worstJump: quality.worstJump,
      transitionCount: quality.transitionCount,
      duration,
    });
  }

  private enrichMeta(meta?: LogMeta): LogMeta {
    return {
      timestamp: new Date().toISOString(),
      ...meta,
    };
  }

  cleanup() {
    this.winston.end();
  }
}

// Export singleton instance
export const logger = new ServiceLogger();

/**
 * Pino options for the Fastify request logger
 */
export function createPinoLoggerOptions(): LoggerOptions {
  const baseOptions: LoggerOptions = {
    level: config.env === 'test' ? 'silent' : config.logging.level,
    msgPrefix: `[${SERVICE_NAME}] `,
    serializers: {
      err: stdSerializers.err,
    },
  };

  if (config.logging.prettyPrint) {
    return {
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    };
  }

  return {
    ...baseOptions,
    formatters: {
      log: (object) => ({
        ...object,
        service: SERVICE_NAME,
        environment: config.env,
        version: process.env.npm_package_version || '1.0.0',
      }),
    },
  };
}
