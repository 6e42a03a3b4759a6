/**
 * Playlist optimizer: normalizes keys, plans the key path and expands it into
 * a full track order for the requested energy policy.
 */

import {
  CamelotKey,
  EnergyPolicy,
  OptimizationResult,
  OptimizationWarning,
  TrackRecord,
} from '../types/track.js';
import { normalizeKey } from '../utils/harmonic.js';
import { solveKeyPath, EXACT_SOLVER_MAX_KEYS, EXACT_SOLVER_HARD_LIMIT } from '../utils/pathfinding.js';
import { sequenceTracks } from '../utils/energyUtils.js';
import { reportTransitionQuality } from '../utils/transitionQuality.js';
import { MetricsService } from './metrics.js';
import { logger } from '../utils/logger.js';

export interface OptimizeOptions {
  exactThreshold?: number;
}

/**
 * Keyed track indices grouped by Camelot key, in order of first appearance
 */
export function groupByKey(camelotKeys: ReadonlyArray<CamelotKey | null>): Map<CamelotKey, number[]> {
  const groups = new Map<CamelotKey, number[]>();
  camelotKeys.forEach((key, index) => {
    if (key === null) return;
    const members = groups.get(key);
    if (members) {
      members.push(index);
    } else {
      groups.set(key, [index]);
    }
  });
  return groups;
}

/**
 * Reorder a playlist for harmonic transitions along an energy contour.
 * Never throws for data problems: unresolvable keys go to the end, and an
 * input without any resolvable key passes through in its original order.
 */
export function optimizePlaylist(
  tracks: readonly TrackRecord[],
  policy: EnergyPolicy,
  options: OptimizeOptions = {}
): OptimizationResult {
  const { exactThreshold = EXACT_SOLVER_MAX_KEYS } = options;
  const resolved = tracks.map(track => normalizeKey(track.key));
  const groups = groupByKey(resolved);
  const keylessIndices = resolved.flatMap((key, index) => (key === null ? [index] : []));
  const warnings: OptimizationWarning[] = [];

  const solved = solveKeyPath(Array.from(groups.keys()), { exactThreshold });

  if (groups.size === 0) {
    warnings.push({
      code: 'NO_KEYED_TRACKS',
      message: 'No track has a recognizable key; the playlist is returned in its original order',
    });
  } else if (keylessIndices.length > 0) {
    warnings.push({
      code: 'KEYLESS_TRACKS',
      message: `${keylessIndices.length} track(s) without a recognizable key were appended at the end`,
    });
  }
  if (solved.algorithm === 'greedy') {
    warnings.push({
      code: 'GREEDY_FALLBACK',
      message: `${groups.size} distinct keys exceed the exact solver limit of ${Math.min(exactThreshold, EXACT_SOLVER_HARD_LIMIT)}; the key order may not be optimal`,
    });
  }

  const sequenced = sequenceTracks(solved.path, groups, tracks, policy);
  const order = [...sequenced.order, ...keylessIndices];
  const orderedTracks = order.map(index => tracks[index]);
  const camelotKeys = order.map(index => resolved[index]);
  const startBpm = orderedTracks.length > 0 ? orderedTracks[0].bpm : null;

  return {
    tracks: orderedTracks,
    camelotKeys,
    keyPath: sequenced.path,
    algorithm: solved.algorithm,
    energyPolicy: policy,
    quality: reportTransitionQuality(camelotKeys),
    keylessCount: keylessIndices.length,
    warnings,
    summary: {
      trackCount: orderedTracks.length,
      startBpm,
    },
  };
}

/**
 * Runs the optimizer with the service's solver settings, logging and
 * recording every run.
 */
export class PlaylistOptimizerService {
  constructor(
    private readonly metrics: MetricsService,
    private readonly options: OptimizeOptions = {}
  ) {}

  optimize(tracks: readonly TrackRecord[], policy: EnergyPolicy): OptimizationResult {
    const startTime = process.hrtime.bigint();
    const result = optimizePlaylist(tracks, policy, this.options);
    const duration = Number(process.hrtime.bigint() - startTime) / 1e9;

    for (const warning of result.warnings) {
      logger.warn(warning.message, { code: warning.code, trackCount: tracks.length });
    }

    this.metrics.recordOptimization(
      policy,
      result.algorithm,
      result.tracks.length - result.keylessCount,
      result.keylessCount,
      result.quality,
      duration
    );
    logger.logOptimization(policy, result.algorithm, result.tracks.length, result.quality, duration);

    return result;
  }
}
