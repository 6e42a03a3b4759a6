/**
 * @file Transition Quality
 * @description Aggregate harmonic statistics over a finished track order.
 * Purely informational: nothing here changes the order it is given.
 */

import { CamelotKey, TransitionGrade, TransitionQuality } from '../types/track.js';
import { getCamelotDistance } from './harmonic.js';

/**
 * Grades a single transition: same key or relative swap is perfect,
 * two steps is good, anything further is an unavoidable gap.
 */
export const classifyTransition = (distance: number): TransitionGrade => {
  if (distance <= 1) return 'perfect';
  if (distance === 2) return 'good';
  return 'bad';
};

/**
 * Walks adjacent pairs of the final order. Pairs where either side has no
 * Camelot key are skipped.
 */
export function reportTransitionQuality(keys: ReadonlyArray<CamelotKey | null>): TransitionQuality {
  const quality: TransitionQuality = {
    totalDistance: 0,
    perfectCount: 0,
    goodCount: 0,
    badCount: 0,
    worstJump: 0,
    transitionCount: 0,
  };

  for (let i = 1; i < keys.length; i++) {
    const from = keys[i - 1];
    const to = keys[i];
    if (from === null || to === null) continue;

    const distance = getCamelotDistance(from, to);
    quality.totalDistance += distance;
    quality.transitionCount++;
    quality.worstJump = Math.max(quality.worstJump, distance);

    switch (classifyTransition(distance)) {
      case 'perfect':
        quality.perfectCount++;
        break;
      case 'good':
        quality.goodCount++;
        break;
      case 'bad':
        quality.badCount++;
        break;
    }
  }

  return quality;
}
