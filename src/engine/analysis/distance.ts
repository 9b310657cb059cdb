/**
 * Distance metrics between embedding vectors
 */

import type { DistanceSet } from '../types/experiment.js';
import { DimensionMismatchError, ValidationError } from '../errors.js';

type Vector = readonly number[];

function assertComparable(a: Vector, b: Vector): void {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }
  if (a.length === 0) {
    throw new ValidationError('EMPTY_VECTOR', 'Vectors must not be empty');
  }
}

/**
 * 1 - cos(a, b), in [0, 2]. Identical directions give 0, opposite give 2.
 *
 * Zero vectors have no direction: two zero vectors are at distance 0 (so
 * cosine(v, v) is always 0), a zero and a non-zero vector at distance 1.
 */
export function cosineDistance(a: Vector, b: Vector): number {
  assertComparable(a, b);

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 && normB === 0) return 0;
  if (normA === 0 || normB === 0) return 1;

  const similarity = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  const distance = 1 - Math.min(1, Math.max(-1, similarity));
  // Rounding noise around the identical-vector case
  return Math.abs(distance) < 1e-12 ? 0 : distance;
}

export function euclideanDistance(a: Vector, b: Vector): number {
  assertComparable(a, b);
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

export function manhattanDistance(a: Vector, b: Vector): number {
  assertComparable(a, b);
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += Math.abs(a[i] - b[i]);
  }
  return sum;
}

export function allDistances(a: Vector, b: Vector): DistanceSet {
  return {
    cosine: cosineDistance(a, b),
    euclidean: euclideanDistance(a, b),
    manhattan: manhattanDistance(a, b),
  };
}

export const DistanceMetrics = {
  cosine: cosineDistance,
  euclidean: euclideanDistance,
  manhattan: manhattanDistance,
  allMetrics: allDistances,
} as const;

export type DistanceMetric = keyof DistanceSet;
