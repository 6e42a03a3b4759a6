/**
 * Prometheus Metrics Service for the Harmonic Flow Service
 */

import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';
import { EnergyPolicy, PathAlgorithm, TransitionQuality } from '../types/track.js';

export interface MetricsServiceOptions {
  /** Also collect Node.js process metrics (heap, GC, event loop) */
  collectDefaults?: boolean;
}

/**
 * Metrics service for collecting and exposing Prometheus metrics.
 * Each instance owns its registry, so several servers can coexist in one process.
 */
export class MetricsService {
  public readonly registry = new Registry();

  // HTTP request metrics
  public readonly httpRequestTotal = new Counter({
    name: 'http_requests_total',
    help: 'Total number of HTTP requests',
    labelNames: ['method', 'route', 'status_code'],
    registers: [this.registry],
  });

  public readonly httpRequestDuration = new Histogram({
    name: 'http_request_duration_seconds',
    help: 'Duration of HTTP requests in seconds',
    labelNames: ['method', 'route', 'status_code'],
    buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
    registers: [this.registry],
  });

  // Optimizer metrics
  public readonly optimizationTotal = new Counter({
    name: 'playlist_optimizations_total',
    help: 'Total number of playlist optimization runs',
    labelNames: ['policy', 'algorithm'],
    registers: [this.registry],
  });

  public readonly optimizationDuration = new Histogram({
    name: 'playlist_optimization_duration_seconds',
    help: 'Time taken to optimize a playlist',
    labelNames: ['algorithm'],
    buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2],
    registers: [this.registry],
  });

  public readonly tracksProcessed = new Counter({
    name: 'playlist_tracks_processed_total',
    help: 'Total number of tracks ordered, by whether their key resolved',
    labelNames: ['keyed'],
    registers: [this.registry],
  });

  public readonly lastTransitionQuality = new Gauge({
    name: 'playlist_last_transition_quality',
    help: 'Transition statistics of the most recent optimization run',
    labelNames: ['stat'],
    registers: [this.registry],
  });

  // Error metrics
  public readonly errorTotal = new Counter({
    name: 'errors_total',
    help: 'Total number of errors',
    labelNames: ['type', 'code'],
    registers: [this.registry],
  });

  constructor(options: MetricsServiceOptions = {}) {
    if (options.collectDefaults) {
      collectDefaultMetrics({
        register: this.registry,
        prefix: 'harmonic_flow_',
      });
    }
  }

  /**
   * Record HTTP request metrics
   */
  recordHttpRequest(method: string, route: string, statusCode: number, duration: number): void {
    this.httpRequestTotal.inc({ method, route, status_code: statusCode.toString() });
    this.httpRequestDuration.observe(
      { method, route, status_code: statusCode.toString() },
      duration
    );
  }

  /**
   * Record one optimizer run
   */
  recordOptimization(
    policy: EnergyPolicy,
    algorithm: PathAlgorithm,
    keyedCount: number,
    keylessCount: number,
    quality: TransitionQuality,
    duration: number
  ): void {
    this.optimizationTotal.inc({ policy, algorithm });
    this.optimizationDuration.observe({ algorithm }, duration);
    this.tracksProcessed.inc({ keyed: 'true' }, keyedCount);
    this.tracksProcessed.inc({ keyed: 'false' }, keylessCount);

    this.lastTransitionQuality.set({ stat: 'total_distance' }, quality.totalDistance);
    this.lastTransitionQuality.set({ stat: 'worst_jump' }, quality.worstJump);
    this.lastTransitionQuality.set({ stat: 'perfect' }, quality.perfectCount);
    this.lastTransitionQuality.set({ stat: 'good' }, quality.goodCount);
    this.lastTransitionQuality.set({ stat: 'bad' }, quality.badCount);
  }

  /**
   * Record error metrics
   */
  recordError(type: string, code: string): void {
    this.errorTotal.inc({ type, code });
  }

  /**
   * Get metrics registry for Prometheus scraping
   */
  getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}
