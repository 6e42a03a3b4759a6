// Camelot wheel key normalization and harmonic distance for playlist ordering

import { CamelotKey, CamelotMode } from '../types/track.js';
import keyNotations from '../data/key-notations.json' with { type: 'json' };

/**
 * The 24 wheel codes, interleaved by wheel number (1A, 1B, 2A, ...).
 */
export const CAMELOT_KEYS: readonly CamelotKey[] = [
  '1A', '1B', '2A', '2B', '3A', '3B', '4A', '4B',
  '5A', '5B', '6A', '6B', '7A', '7B', '8A', '8B',
  '9A', '9B', '10A', '10B', '11A', '11B', '12A', '12B',
];

const CAMELOT_KEY_SET: ReadonlySet<string> = new Set(CAMELOT_KEYS);

// Returned when either side of a transition has no wheel position; larger than any real distance
export const UNKNOWN_KEY_DISTANCE = 100;

// Largest distance between two valid codes: six ring steps plus a ring change
export const MAX_CAMELOT_DISTANCE = 7;

export function isCamelotKey(value: unknown): value is CamelotKey {
  return typeof value === 'string' && CAMELOT_KEY_SET.has(value);
}

function buildNotationTable(notations: Record<string, string>): ReadonlyMap<string, CamelotKey> {
  const table = new Map<string, CamelotKey>();
  for (const [notation, code] of Object.entries(notations)) {
    if (!isCamelotKey(code)) {
      throw new Error(`Key notation "${notation}" maps to invalid Camelot code "${code}"`);
    }
    table.set(notation, code);
  }
  return table;
}

/**
 * Musical key spellings (sharp/flat names, maj/min suffixes, spelled-out
 * modes, Open Key) to Camelot codes. Map iteration follows file order, which
 * the case-insensitive fallback relies on.
 */
export const KEY_TO_CAMELOT: ReadonlyMap<string, CamelotKey> = buildNotationTable(keyNotations.notations);

/**
 * Resolve any supported key notation to its Camelot code.
 * Returns null for input that cannot be placed on the wheel.
 */
export function normalizeKey(raw: unknown): CamelotKey | null {
  if (typeof raw !== 'string') return null;

  const input = raw.trim();
  if (!input) return null;

  if (isCamelotKey(input)) {
    return input;
  }

  const direct = KEY_TO_CAMELOT.get(input);
  if (direct) {
    return direct;
  }

  // Zero-padded wheel numbers, e.g. "01A" or "08B"
  if (input.startsWith('0')) {
    const unpadded = input.slice(1);
    if (isCamelotKey(unpadded)) {
      return unpadded;
    }
  }

  const lowered = input.toLowerCase();
  for (const [notation, code] of KEY_TO_CAMELOT) {
    if (notation.toLowerCase() === lowered) {
      return code;
    }
  }

  // Lowercase ring letters, e.g. "8a" or "12b"
  const upperCased = input.toUpperCase();
  if (isCamelotKey(upperCased)) {
    return upperCased;
  }

  return null;
}

/**
 * Split a Camelot code into wheel number and ring letter
 */
export function parseCamelotKey(key: CamelotKey): { number: number; mode: CamelotMode } {
  const mode: CamelotMode = key.endsWith('A') ? 'A' : 'B';
  return { number: parseInt(key.slice(0, -1), 10), mode };
}

/**
 * Harmonic distance between two keys on the two-ring wheel.
 * Each step to an adjacent number on the same ring costs 1, and so does
 * switching rings at the same number; the result is the shortest path length.
 */
export function getCamelotDistance(key1: string | null | undefined, key2: string | null | undefined): number {
  if (!isCamelotKey(key1) || !isCamelotKey(key2)) {
    return UNKNOWN_KEY_DISTANCE;
  }

  const a = parseCamelotKey(key1);
  const b = parseCamelotKey(key2);

  const diff = Math.abs(a.number - b.number);
  const numDiff = Math.min(diff, 12 - diff);

  if (numDiff === 0 && a.mode !== b.mode) {
    return 1; // relative major/minor
  }
  if (a.mode === b.mode) {
    return numDiff;
  }
  return numDiff + 1;
}

const NOTE_NAMES_BY_POSITION: Record<CamelotMode, readonly string[]> = {
  A: ['Ab', 'Eb', 'Bb', 'F', 'C', 'G', 'D', 'A', 'E', 'B', 'F#', 'Db'],
  B: ['B', 'F#', 'Db', 'Ab', 'Eb', 'Bb', 'F', 'C', 'G', 'D', 'A', 'E'],
};

/**
 * Convert Camelot key to standard key notation, e.g. "8A" -> "A minor"
 */
export function camelotToKeyName(key: CamelotKey): string {
  const { number, mode } = parseCamelotKey(key);
  return `${NOTE_NAMES_BY_POSITION[mode][number - 1]} ${mode === 'A' ? 'minor' : 'major'}`;
}
