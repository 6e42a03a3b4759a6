/**
 * Harmonic Flow Service Configuration
 * Built from environment variables and validated at load time
 */

import { parseEnergyPolicy, DEFAULT_ENERGY_POLICY } from '../utils/energyUtils.js';
import { EXACT_SOLVER_MAX_KEYS } from '../utils/pathfinding.js';

// Levels understood by both winston and pino
const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
type LogLevel = typeof LOG_LEVELS[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

const errors: string[] = [];

const logLevel = process.env.LOG_LEVEL || 'info';
if (!isLogLevel(logLevel)) {
  errors.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')} (got "${logLevel}")`);
}

const defaultPolicy = parseEnergyPolicy(process.env.OPTIMIZER_DEFAULT_POLICY || DEFAULT_ENERGY_POLICY);
if (!defaultPolicy) {
  errors.push(`OPTIMIZER_DEFAULT_POLICY must be ramp_up, ramp_down or wave (got "${process.env.OPTIMIZER_DEFAULT_POLICY}")`);
}

const exactMaxKeys = parseInt(process.env.OPTIMIZER_EXACT_MAX_KEYS || String(EXACT_SOLVER_MAX_KEYS), 10);
if (Number.isNaN(exactMaxKeys)) {
  errors.push('OPTIMIZER_EXACT_MAX_KEYS must be an integer');
}

const port = parseInt(process.env.PORT || '8090', 10);
if (Number.isNaN(port) || port < 0 || port > 65535) {
  errors.push(`PORT must be a valid port number (got "${process.env.PORT}")`);
}

const bodyLimit = parseInt(process.env.BODY_LIMIT || '10485760', 10); // 10MB
if (Number.isNaN(bodyLimit) || bodyLimit <= 0) {
  errors.push(`BODY_LIMIT must be a positive number of bytes (got "${process.env.BODY_LIMIT}")`);
}

const rateLimitMax = parseInt(process.env.RATE_LIMIT_MAX || '100', 10);
if (Number.isNaN(rateLimitMax) || rateLimitMax <= 0) {
  errors.push(`RATE_LIMIT_MAX must be a positive integer (got "${process.env.RATE_LIMIT_MAX}")`);
}

if (errors.length > 0) {
  console.error('Configuration validation failed:');
  errors.forEach((error, index) => {
    console.error(`  ${index + 1}. ${error}`);
  });
  throw new Error(`Configuration validation failed: ${errors.length} error(s) found`);
}

export const config = Object.freeze({
  // Environment
  env: process.env.NODE_ENV || 'development',

  // Server configuration
  server: Object.freeze({
    port,
    host: process.env.HOST || '0.0.0.0',
    bodyLimit,
  }),

  // Playlist optimizer
  optimizer: Object.freeze({
    // Clamped: below 3 the exact solver is never used, above 20 its tables outgrow memory
    exactMaxKeys: Math.min(Math.max(exactMaxKeys, 3), 20),
    defaultPolicy: defaultPolicy ?? DEFAULT_ENERGY_POLICY,
    exportFileName: 'harmonic_flow_sorted.csv',
  }),

  // Logging configuration
  logging: Object.freeze({
    level: isLogLevel(logLevel) ? logLevel : 'info',
    prettyPrint: process.env.NODE_ENV === 'development',
  }),

  security: Object.freeze({
    corsOrigins: Object.freeze(
      process.env.CORS_ORIGINS ? process.env.CORS_ORIGINS.split(',').map(origin => origin.trim()) : ['http://localhost:3000']
    ),
    rateLimitMax,
    rateLimitWindow: process.env.RATE_LIMIT_WINDOW || '1 minute',
  }),
});
