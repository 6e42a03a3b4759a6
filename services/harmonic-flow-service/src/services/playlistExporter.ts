/**
 * CSV export of an ordered playlist
 */

import { stringify } from 'csv-stringify/sync';
import { PlaylistColumns, TrackRecord } from '../types/track.js';

const DEFAULT_COLUMNS: Required<PlaylistColumns> = {
  artist: 'Artist',
  title: 'Title',
  key: 'Key',
  bpm: 'BPM',
};

const FIELD_ORDER = ['artist', 'title', 'key', 'bpm'] as const;

/**
 * Serialize tracks to CSV, one row per track in the given order. Only the
 * columns the playlist was imported with are written, under their original
 * header names; without any, all four default columns are used.
 */
export function exportPlaylistCsv(
  tracks: readonly TrackRecord[],
  columns: PlaylistColumns = DEFAULT_COLUMNS
): string {
  const present = FIELD_ORDER.filter(field => columns[field] !== undefined);
  const fields: ReadonlyArray<keyof PlaylistColumns> = present.length > 0 ? present : FIELD_ORDER;

  const header = fields.map(field => columns[field] ?? DEFAULT_COLUMNS[field]);
  const rows = tracks.map(track =>
    fields.map(field => {
      const value = track[field];
      return value === null ? '' : String(value);
    })
  );

  return stringify([header, ...rows]);
}
