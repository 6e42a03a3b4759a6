/**
 * Track and playlist type definitions
 * Based on the Camelot Wheel system used for harmonic mixing
 */

// Camelot Wheel key notation (1A-12A for minor, 1B-12B for major)
export type CamelotKey =
  | '1A' | '2A' | '3A' | '4A' | '5A' | '6A'
  | '7A' | '8A' | '9A' | '10A' | '11A' | '12A'
  | '1B' | '2B' | '3B' | '4B' | '5B' | '6B'
  | '7B' | '8B' | '9B' | '10B' | '11B' | '12B';

// A = minor ring, B = major ring
export type CamelotMode = 'A' | 'B';

// One playlist row as delivered by an importer or an API client
export interface TrackRecord {
  artist: string;
  title: string;
  bpm: number | null;
  key: string | null; // raw key notation as found in the source
}

// BPM contour strategies
export type EnergyPolicy = 'ramp_up' | 'ramp_down' | 'wave';

export type SortDirection = 'asc' | 'desc';

export type PathAlgorithm = 'trivial' | 'exact' | 'greedy';

export type TransitionGrade = 'perfect' | 'good' | 'bad';

export interface TransitionQuality {
  totalDistance: number;
  perfectCount: number;
  goodCount: number;
  badCount: number;
  worstJump: number;
  transitionCount: number;
}

export type OptimizationWarningCode = 'NO_KEYED_TRACKS' | 'KEYLESS_TRACKS' | 'GREEDY_FALLBACK';

export interface OptimizationWarning {
  code: OptimizationWarningCode;
  message: string;
}

export interface OptimizationResult {
  tracks: TrackRecord[];
  camelotKeys: Array<CamelotKey | null>; // parallel to tracks
  keyPath: CamelotKey[];
  algorithm: PathAlgorithm;
  energyPolicy: EnergyPolicy;
  quality: TransitionQuality;
  keylessCount: number;
  warnings: OptimizationWarning[];
  summary: {
    trackCount: number;
    startBpm: number | null;
  };
}

// Playlist file formats accepted by the importer
export type PlaylistFormat = 'txt' | 'csv' | 'xml';

/**
 * Header names of the exportable columns that existed on input.
 * A field is absent when the source had no such column.
 */
export interface PlaylistColumns {
  artist?: string;
  title?: string;
  key?: string;
  bpm?: string;
}

export interface ImportedPlaylist {
  format: PlaylistFormat;
  tracks: TrackRecord[];
  columns: PlaylistColumns;
}
