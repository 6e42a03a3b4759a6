/**
 * Playlist importer for DJ software exports: tab-separated TXT, CSV and
 * attribute-based collection XML.
 */

import { parse } from 'csv-parse/sync';
import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { ImportedPlaylist, PlaylistColumns, PlaylistFormat, TrackRecord } from '../types/track.js';

export type PlaylistImportErrorCode =
  | 'EMPTY_PLAYLIST'
  | 'MISSING_KEY_COLUMN'
  | 'INVALID_STRUCTURE'
  | 'UNSUPPORTED_FORMAT';

export class PlaylistImportError extends Error {
  constructor(
    public readonly code: PlaylistImportErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PlaylistImportError';
  }
}

export const PLAYLIST_FORMATS: readonly PlaylistFormat[] = ['txt', 'csv', 'xml'];

export function isPlaylistFormat(value: unknown): value is PlaylistFormat {
  return typeof value === 'string' && PLAYLIST_FORMATS.some(format => format === value);
}

/**
 * Guess the format from a file name extension
 */
export function detectPlaylistFormat(filename: string): PlaylistFormat | null {
  const extension = filename.trim().toLowerCase().split('.').pop();
  switch (extension) {
    case 'txt':
    case 'tsv':
      return 'txt';
    case 'csv':
      return 'csv';
    case 'xml':
      return 'xml';
    default:
      return null;
  }
}

/**
 * Decode raw upload bytes. DJ software writes TXT exports as UTF-16LE, often
 * with a byte-order mark; everything else is read as UTF-8.
 */
export function decodePlaylistText(input: Buffer | string): string {
  if (typeof input === 'string') {
    return input.replace(/^\uFEFF/, '');
  }

  if (input.length >= 2 && input[0] === 0xff && input[1] === 0xfe) {
    return input.subarray(2).toString('utf16le');
  }
  if (input.length >= 2 && input[0] === 0xfe && input[1] === 0xff) {
    return new TextDecoder('utf-16be').decode(input.subarray(2));
  }

  // UTF-16LE without BOM: ASCII text leaves every odd byte zero
  const sample = input.subarray(0, Math.min(input.length, 64));
  if (sample.length >= 4 && sample.length % 2 === 0) {
    let oddBytesZero = true;
    for (let i = 1; i < sample.length; i += 2) {
      if (sample[i] !== 0) {
        oddBytesZero = false;
        break;
      }
    }
    if (oddBytesZero) {
      return input.toString('utf16le');
    }
  }

  return input.toString('utf-8').replace(/^\uFEFF/, '');
}

/**
 * BPM from text such as "128.00" or "128,5". Missing, unparsable and
 * non-positive values (unanalysed tracks are exported as 0) become null.
 */
export function parseBpm(value: string | undefined): number | null {
  if (value === undefined) return null;
  const text = value.trim().replace(',', '.');
  if (!text) return null;
  const bpm = Number(text);
  return Number.isFinite(bpm) && bpm > 0 ? bpm : null;
}

// Accepted header spellings per field, compared case-insensitively
const COLUMN_ALIASES: Record<keyof PlaylistColumns, readonly string[]> = {
  artist: ['artist'],
  title: ['track title', 'title', 'name'],
  bpm: ['bpm', 'tempo'],
  key: ['key', 'tonality', 'initial key'],
};

function findColumn(headers: readonly string[], field: keyof PlaylistColumns): number {
  for (const alias of COLUMN_ALIASES[field]) {
    const index = headers.findIndex(header => header.toLowerCase() === alias);
    if (index !== -1) return index;
  }
  return -1;
}

const rowsSchema = z.array(z.array(z.string()));

function importDelimited(text: string, delimiter: string): Omit<ImportedPlaylist, 'format'> {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      delimiter,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true,
    });
  } catch (error) {
    throw new PlaylistImportError('INVALID_STRUCTURE', 'Playlist file could not be parsed as delimited text', { cause: error });
  }

  const rows = rowsSchema.parse(parsed);
  if (rows.length === 0) {
    throw new PlaylistImportError('EMPTY_PLAYLIST', 'Playlist file is empty');
  }

  const headers = rows[0].map(header => header.trim());
  const indices = {
    artist: findColumn(headers, 'artist'),
    title: findColumn(headers, 'title'),
    bpm: findColumn(headers, 'bpm'),
    key: findColumn(headers, 'key'),
  };

  if (indices.key === -1) {
    throw new PlaylistImportError(
      'MISSING_KEY_COLUMN',
      "Column 'Key' not found. Please ensure your export includes Key information."
    );
  }

  const columns: PlaylistColumns = {};
  for (const field of ['artist', 'title', 'key', 'bpm'] as const) {
    if (indices[field] !== -1) {
      columns[field] = headers[indices[field]];
    }
  }

  const cell = (row: readonly string[], index: number): string | undefined =>
    index === -1 ? undefined : row[index]?.trim();

  const tracks: TrackRecord[] = rows.slice(1).map(row => ({
    artist: cell(row, indices.artist) ?? '',
    title: cell(row, indices.title) ?? '',
    bpm: parseBpm(cell(row, indices.bpm)),
    key: cell(row, indices.key) || null,
  }));

  return { tracks, columns };
}

const collectionTrackSchema = z.object({
  Name: z.string().optional(),
  Artist: z.string().optional(),
  AverageBpm: z.string().optional(),
  Tonality: z.string().optional(),
});

// An element without attributes or children parses to ""
const emptyElementAsObject = (value: unknown): unknown => (value === '' ? {} : value);

const collectionSchema = z.object({
  DJ_PLAYLISTS: z.object({
    COLLECTION: z.preprocess(
      emptyElementAsObject,
      z.object({
        TRACK: z.array(z.preprocess(emptyElementAsObject, collectionTrackSchema)).default([]),
      })
    ),
  }),
});

function importCollectionXml(text: string): Omit<ImportedPlaylist, 'format'> {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '',
    parseAttributeValue: false,
    isArray: name => name === 'TRACK',
  });

  let document: unknown;
  try {
    document = parser.parse(text, true);
  } catch (error) {
    throw new PlaylistImportError('INVALID_STRUCTURE', 'Playlist XML is not well-formed', { cause: error });
  }

  const result = collectionSchema.safeParse(document);
  if (!result.success) {
    throw new PlaylistImportError(
      'INVALID_STRUCTURE',
      'Playlist XML has no DJ_PLAYLISTS > COLLECTION element',
      { cause: result.error }
    );
  }

  const tracks: TrackRecord[] = result.data.DJ_PLAYLISTS.COLLECTION.TRACK.map(track => ({
    artist: track.Artist?.trim() ?? '',
    title: track.Name?.trim() ?? '',
    bpm: parseBpm(track.AverageBpm),
    key: track.Tonality?.trim() || null,
  }));

  return {
    tracks,
    columns: { artist: 'Artist', title: 'Title', key: 'Key', bpm: 'BPM' },
  };
}

/**
 * Read a playlist export into track records. Throws PlaylistImportError when
 * the file cannot supply a key for ordering.
 */
export function importPlaylist(input: Buffer | string, format: PlaylistFormat): ImportedPlaylist {
  const text = decodePlaylistText(input);

  let imported: Omit<ImportedPlaylist, 'format'>;
  switch (format) {
    case 'txt':
      imported = importDelimited(text, '\t');
      break;
    case 'csv':
      imported = importDelimited(text, ',');
      break;
    case 'xml':
      imported = importCollectionXml(text);
      break;
  }

  if (imported.tracks.length === 0) {
    throw new PlaylistImportError('EMPTY_PLAYLIST', 'Playlist contains no tracks');
  }

  return { format, ...imported };
}
