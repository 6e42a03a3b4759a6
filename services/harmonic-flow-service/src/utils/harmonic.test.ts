import { describe, it, expect } from 'vitest';
import {
  CAMELOT_KEYS,
  KEY_TO_CAMELOT,
  MAX_CAMELOT_DISTANCE,
  UNKNOWN_KEY_DISTANCE,
  camelotToKeyName,
  getCamelotDistance,
  isCamelotKey,
  normalizeKey,
} from './harmonic.js';

describe('Camelot key normalization', () => {
  it('should return canonical codes unchanged', () => {
    for (const key of CAMELOT_KEYS) {
      expect(normalizeKey(key)).toBe(key);
    }
  });

  it('should be idempotent over every table entry', () => {
    for (const notation of KEY_TO_CAMELOT.keys()) {
      const code = normalizeKey(notation);
      expect(code).not.toBeNull();
      expect(normalizeKey(code)).toBe(code);
    }
  });

  it('should resolve musical key names', () => {
    expect(normalizeKey('Am')).toBe('8A');
    expect(normalizeKey('A minor')).toBe('8A');
    expect(normalizeKey('C major')).toBe('8B');
    expect(normalizeKey('Cmaj')).toBe('8B');
    expect(normalizeKey('F#m')).toBe('11A');
    expect(normalizeKey('Gbm')).toBe('11A');
    expect(normalizeKey('Db')).toBe('3B');
    expect(normalizeKey('C#')).toBe('3B');
  });

  it('should fall back to a case-insensitive lookup', () => {
    expect(normalizeKey('am')).toBe('8A');
    expect(normalizeKey('c MAJOR')).toBe('8B');
    expect(normalizeKey('AMIN')).toBe('8A');
  });

  it('should accept wheel codes with a lowercase ring letter', () => {
    expect(normalizeKey('8a')).toBe('8A');
    expect(normalizeKey(' 12b ')).toBe('12B');
    expect(normalizeKey('13a')).toBeNull();
  });

  it('should load the notation table in file order', () => {
    expect(KEY_TO_CAMELOT.size).toBe(126);
    expect([...KEY_TO_CAMELOT.entries()].slice(0, 3)).toEqual([
      ['B', '1B'],
      ['F#', '2B'],
      ['Gb', '2B'],
    ]);
  });

  it('should strip a single leading zero from wheel numbers', () => {
    expect(normalizeKey('01A')).toBe('1A');
    expect(normalizeKey('08B')).toBe('8B');
    expect(normalizeKey('001A')).toBeNull();
  });

  it('should map Open Key notation onto the wheel', () => {
    expect(normalizeKey('1d')).toBe('8B');
    expect(normalizeKey('12d')).toBe('7B');
    expect(normalizeKey('1m')).toBe('8A');
    expect(normalizeKey('6m')).toBe('1A');
  });

  it('should trim surrounding whitespace', () => {
    expect(normalizeKey('  Am ')).toBe('8A');
    expect(normalizeKey('\t9B\n')).toBe('9B');
  });

  it('should return null for values that are not keys', () => {
    expect(normalizeKey('')).toBeNull();
    expect(normalizeKey('   ')).toBeNull();
    expect(normalizeKey('Xyz')).toBeNull();
    expect(normalizeKey('13A')).toBeNull();
    expect(normalizeKey(null)).toBeNull();
    expect(normalizeKey(undefined)).toBeNull();
    expect(normalizeKey(8)).toBeNull();
    expect(normalizeKey({ key: '8A' })).toBeNull();
  });

  it('should only accept the 24 wheel codes as Camelot keys', () => {
    expect(CAMELOT_KEYS).toHaveLength(24);
    expect(isCamelotKey('12B')).toBe(true);
    expect(isCamelotKey('0A')).toBe(false);
    expect(isCamelotKey('8a')).toBe(false);
  });
});

describe('Camelot distance', () => {
  it('should be zero for identical keys', () => {
    for (const key of CAMELOT_KEYS) {
      expect(getCamelotDistance(key, key)).toBe(0);
    }
  });

  it('should be symmetric and bounded for distinct keys', () => {
    for (const a of CAMELOT_KEYS) {
      for (const b of CAMELOT_KEYS) {
        const distance = getCamelotDistance(a, b);
        expect(distance).toBe(getCamelotDistance(b, a));
        if (a !== b) {
          expect(distance).toBeGreaterThanOrEqual(1);
          expect(distance).toBeLessThanOrEqual(MAX_CAMELOT_DISTANCE);
        }
      }
    }
  });

  it('should treat relative major and minor as neighbours', () => {
    expect(getCamelotDistance('8A', '8B')).toBe(1);
    expect(getCamelotDistance('12B', '12A')).toBe(1);
  });

  it('should wrap around the wheel', () => {
    expect(getCamelotDistance('1A', '12A')).toBe(1);
    expect(getCamelotDistance('2B', '11B')).toBe(3);
  });

  it('should add one step for a ring change between different numbers', () => {
    expect(getCamelotDistance('8A', '9B')).toBe(2);
    expect(getCamelotDistance('1A', '7A')).toBe(6);
    expect(getCamelotDistance('1A', '7B')).toBe(7);
  });

  it('should return the sentinel when either side is not a wheel code', () => {
    expect(getCamelotDistance('8A', null)).toBe(UNKNOWN_KEY_DISTANCE);
    expect(getCamelotDistance(undefined, '8A')).toBe(UNKNOWN_KEY_DISTANCE);
    expect(getCamelotDistance('Am', '8A')).toBe(UNKNOWN_KEY_DISTANCE);
    expect(getCamelotDistance('Xyz', 'Xyz')).toBe(UNKNOWN_KEY_DISTANCE);
  });
});

describe('Camelot key names', () => {
  it('should name minor and major keys', () => {
    expect(camelotToKeyName('8A')).toBe('A minor');
    expect(camelotToKeyName('8B')).toBe('C major');
    expect(camelotToKeyName('1B')).toBe('B major');
    expect(camelotToKeyName('12A')).toBe('Db minor');
  });

  it('should name keys that normalize back to the same code', () => {
    for (const key of CAMELOT_KEYS) {
      expect(normalizeKey(camelotToKeyName(key))).toBe(key);
    }
  });
});
