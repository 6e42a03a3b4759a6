/**
 * @file Energy Utilities
 * @description Energy policies (BPM contours) and the sequencer that expands a
 * key path into a full track order.
 */

import { CamelotKey, EnergyPolicy, SortDirection, TrackRecord } from '../types/track.js';

interface EnergyPolicyRule {
  label: string;
  /** Whether the key path should be walked from its other end */
  shouldReverse: (firstMeanBpm: number, lastMeanBpm: number) => boolean;
  /** BPM order inside the key group at `groupIndex` of the final path */
  sortOrder: (groupIndex: number) => SortDirection;
}

/**
 * Each policy pairs its direction rule with its in-group sort rule.
 * `wave` keeps the solved direction and alternates the sort per group.
 */
export const ENERGY_POLICIES: Readonly<Record<EnergyPolicy, EnergyPolicyRule>> = {
  ramp_up: {
    label: 'Ramp Up (Low -> High)',
    shouldReverse: (first, last) => first > last,
    sortOrder: () => 'asc',
  },
  ramp_down: {
    label: 'Ramp Down (High -> Low)',
    shouldReverse: (first, last) => first < last,
    sortOrder: () => 'desc',
  },
  wave: {
    label: 'Wave (Mixed)',
    shouldReverse: () => false,
    sortOrder: groupIndex => (groupIndex % 2 === 0 ? 'asc' : 'desc'),
  },
};

export const ENERGY_POLICY_NAMES: readonly EnergyPolicy[] = ['ramp_up', 'ramp_down', 'wave'];

export const DEFAULT_ENERGY_POLICY: EnergyPolicy = 'ramp_up';

export function isEnergyPolicy(value: unknown): value is EnergyPolicy {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(ENERGY_POLICIES, value);
}

/**
 * Accepts policy tokens ("ramp_up") and their display labels ("Ramp Up (Low -> High)").
 */
export function parseEnergyPolicy(value: unknown): EnergyPolicy | null {
  if (typeof value !== 'string') return null;
  const token = value.trim();
  if (isEnergyPolicy(token)) return token;
  return ENERGY_POLICY_NAMES.find(name => ENERGY_POLICIES[name].label === token) ?? null;
}

function bpmOf(track: TrackRecord): number | null {
  return typeof track.bpm === 'number' && Number.isFinite(track.bpm) ? track.bpm : null;
}

/**
 * Mean BPM of the indexed tracks, ignoring missing values. Undefined when none has a BPM.
 */
export function meanBpm(indices: readonly number[], tracks: readonly TrackRecord[]): number | undefined {
  let sum = 0;
  let count = 0;
  for (const index of indices) {
    const bpm = bpmOf(tracks[index]);
    if (bpm !== null) {
      sum += bpm;
      count++;
    }
  }
  return count > 0 ? sum / count : undefined;
}

/**
 * Stable BPM sort of track indices; tracks without a BPM always go last
 */
export function sortByBpm(indices: readonly number[], tracks: readonly TrackRecord[], direction: SortDirection): number[] {
  return [...indices].sort((a, b) => {
    const bpmA = bpmOf(tracks[a]);
    const bpmB = bpmOf(tracks[b]);
    if (bpmA === null || bpmB === null) {
      return Number(bpmA === null) - Number(bpmB === null);
    }
    return direction === 'asc' ? bpmA - bpmB : bpmB - bpmA;
  });
}

/**
 * Decide the traversal direction of a key path from the mean BPM of its end groups
 */
export function orientKeyPath(
  path: readonly CamelotKey[],
  groups: ReadonlyMap<CamelotKey, readonly number[]>,
  tracks: readonly TrackRecord[],
  policy: EnergyPolicy
): CamelotKey[] {
  const oriented = [...path];
  if (oriented.length < 2) return oriented;

  const first = meanBpm(groups.get(oriented[0]) ?? [], tracks);
  const last = meanBpm(groups.get(oriented[oriented.length - 1]) ?? [], tracks);
  if (first === undefined || last === undefined) return oriented;

  return ENERGY_POLICIES[policy].shouldReverse(first, last) ? oriented.reverse() : oriented;
}

export interface SequencedTracks {
  /** Key path in the direction it is played */
  path: CamelotKey[];
  /** Indices into `tracks`, grouped tracks only */
  order: number[];
}

/**
 * Expand a key path into a track order. `groups` maps each key to indices into
 * `tracks`; the returned order covers every grouped track exactly once.
 */
export function sequenceTracks(
  path: readonly CamelotKey[],
  groups: ReadonlyMap<CamelotKey, readonly number[]>,
  tracks: readonly TrackRecord[],
  policy: EnergyPolicy
): SequencedTracks {
  const rule = ENERGY_POLICIES[policy];
  const oriented = orientKeyPath(path, groups, tracks, policy);
  const order: number[] = [];

  oriented.forEach((key, groupIndex) => {
    const members = groups.get(key) ?? [];
    order.push(...sortByBpm(members, tracks, rule.sortOrder(groupIndex)));
  });

  return { path: oriented, order };
}
