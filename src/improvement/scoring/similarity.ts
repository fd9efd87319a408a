/**
 * Similarity Scorer
 *
 * Cosine similarity between two embedding vectors. Pure and total: every
 * degenerate input scores 0 instead of throwing.
 */

import type { EmbeddingVector } from '../types';

/**
 * Flatten a possibly nested vector ([[0.1, 0.2]] -> [0.1, 0.2])
 */
export function flattenVector(vector: EmbeddingVector): number[] {
  const flat: number[] = [];
  const visit = (values: EmbeddingVector): void => {
    for (const value of values) {
      if (typeof value === 'number') {
        flat.push(value);
      } else {
        visit(value);
      }
    }
  };
  visit(vector);
  return flat;
}

function largestMagnitude(values: readonly number[]): number {
  let largest = 0;
  for (const value of values) {
    const magnitude = Math.abs(value);
    if (Number.isNaN(magnitude)) {
      return Number.NaN;
    }
    largest = Math.max(largest, magnitude);
  }
  return largest;
}

/**
 * Divide by the largest magnitude so squares neither underflow nor overflow.
 * Null when the vector is all zeros or holds a non-finite component.
 */
function rescale(values: readonly number[]): number[] | null {
  const largest = largestMagnitude(values);
  if (largest === 0 || !Number.isFinite(largest)) {
    return null;
  }
  return values.map(value => value / largest);
}

function sumOfSquares(values: readonly number[]): number {
  let sum = 0;
  for (const value of values) {
    sum += value * value;
  }
  return sum;
}

export function vectorNorm(values: readonly number[]): number {
  const largest = largestMagnitude(values);
  if (largest === 0 || !Number.isFinite(largest)) {
    return largest;
  }
  return largest * Math.sqrt(sumOfSquares(values.map(value => value / largest)));
}

/**
 * Cosine similarity in [-1, 1].
 *
 * Returns 0 when either vector is absent or empty, when either norm is zero,
 * when the flattened lengths differ, or when a component is not finite.
 */
export function cosineSimilarity(
  a: EmbeddingVector | null | undefined,
  b: EmbeddingVector | null | undefined
): number {
  if (!a || !b) {
    return 0;
  }

  const flatA = flattenVector(a);
  const flatB = flattenVector(b);
  if (flatA.length === 0 || flatA.length !== flatB.length) {
    return 0;
  }

  // Cosine is scale invariant, so each side is scored at unit peak magnitude
  const x = rescale(flatA);
  const y = rescale(flatB);
  if (!x || !y) {
    return 0;
  }

  let dot = 0;
  for (let i = 0; i < x.length; i++) {
    dot += x[i] * y[i];
  }

  const score = dot / (Math.sqrt(sumOfSquares(x)) * Math.sqrt(sumOfSquares(y)));
  if (!Number.isFinite(score)) {
    return 0;
  }
  // Rounding can push parallel vectors a hair past 1
  return Math.max(-1, Math.min(1, score));
}
