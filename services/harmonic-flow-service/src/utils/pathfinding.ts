import { CamelotKey, PathAlgorithm } from '../types/track.js';
import { getCamelotDistance } from './harmonic.js';

/**
 * Largest distinct-key count solved exactly. Subset DP needs 2^n * n states,
 * so beyond this the solver switches to the greedy construction.
 */
export const EXACT_SOLVER_MAX_KEYS = 18;

// Ceiling for caller-supplied thresholds (2^20 * 20 states is ~60MB of tables)
export const EXACT_SOLVER_HARD_LIMIT = 20;

export interface KeyPathOptions {
  exactThreshold?: number;
}

export interface KeyPathResult {
  path: CamelotKey[];
  totalDistance: number;
  algorithm: PathAlgorithm;
}

/**
 * Symmetric distance matrix over the given keys only, indexed by position
 */
export function buildDistanceMatrix(keys: readonly CamelotKey[]): number[][] {
  return keys.map(a => keys.map(b => getCamelotDistance(a, b)));
}

/**
 * Sum of harmonic distances between consecutive keys
 */
export function pathDistance(path: readonly CamelotKey[]): number {
  let total = 0;
  for (let i = 1; i < path.length; i++) {
    total += getCamelotDistance(path[i - 1], path[i]);
  }
  return total;
}

/**
 * Held-Karp over subsets for the shortest open Hamiltonian path.
 * cost[mask * n + j] is the cheapest walk covering `mask` and ending at j.
 */
function solveExact(matrix: number[][]): number[] {
  const n = matrix.length;
  const full = (1 << n) - 1;
  const states = (1 << n) * n;

  // Uint16 holds any real path cost (at most 7 per edge); the max value marks unreachable states
  const UNREACHED = 0xffff;
  const cost = new Uint16Array(states).fill(UNREACHED);
  const parent = new Int8Array(states).fill(-1);

  for (let j = 0; j < n; j++) {
    cost[(1 << j) * n + j] = 0;
  }

  for (let mask = 1; mask <= full; mask++) {
    for (let j = 0; j < n; j++) {
      if (!(mask & (1 << j))) continue;
      const current = cost[mask * n + j];
      if (current === UNREACHED) continue;

      for (let k = 0; k < n; k++) {
        if (mask & (1 << k)) continue;
        const next = mask | (1 << k);
        const candidate = current + matrix[j][k];
        if (candidate < cost[next * n + k]) {
          cost[next * n + k] = candidate;
          parent[next * n + k] = j;
        }
      }
    }
  }

  let end = 0;
  for (let j = 1; j < n; j++) {
    if (cost[full * n + j] < cost[full * n + end]) {
      end = j;
    }
  }

  const order: number[] = [];
  let mask = full;
  let node = end;
  while (node !== -1) {
    order.push(node);
    const prev = parent[mask * n + node];
    mask &= ~(1 << node);
    node = prev;
  }
  return order.reverse();
}

/**
 * Nearest-unvisited-neighbour walk from the first key; ties go to the earlier key
 */
function solveGreedy(matrix: number[][]): number[] {
  const n = matrix.length;
  const visited = new Array<boolean>(n).fill(false);
  const order = [0];
  visited[0] = true;

  while (order.length < n) {
    const last = order[order.length - 1];
    let best = -1;
    for (let k = 0; k < n; k++) {
      if (visited[k]) continue;
      if (best === -1 || matrix[last][k] < matrix[last][best]) {
        best = k;
      }
    }
    visited[best] = true;
    order.push(best);
  }

  return order;
}

/**
 * Order the distinct keys of a playlist so the summed transition distance is
 * minimal. Duplicates are dropped keeping first occurrence; input order is the
 * tie-break order, so identical inputs always give the same path.
 */
export function solveKeyPath(keys: readonly CamelotKey[], options: KeyPathOptions = {}): KeyPathResult {
  const { exactThreshold = EXACT_SOLVER_MAX_KEYS } = options;
  const unique = Array.from(new Set(keys));

  if (unique.length <= 2) {
    return { path: unique, totalDistance: pathDistance(unique), algorithm: 'trivial' };
  }

  const matrix = buildDistanceMatrix(unique);
  const limit = Math.min(exactThreshold, EXACT_SOLVER_HARD_LIMIT);
  const algorithm: PathAlgorithm = unique.length <= limit ? 'exact' : 'greedy';
  const order = algorithm === 'exact' ? solveExact(matrix) : solveGreedy(matrix);
  const path = order.map(i => unique[i]);

  return { path, totalDistance: pathDistance(path), algorithm };
}
