/**
 * Tests for the cosine similarity scorer
 */

import fc from 'fast-check';
import { cosineSimilarity, flattenVector, vectorNorm } from '../../improvement/scoring/similarity';

describe('cosineSimilarity', () => {
  it('scores identical directions as 1', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
  });

  it('scores orthogonal vectors as 0', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('scores opposite vectors as -1', () => {
    expect(cosineSimilarity([1, 1], [-1, -1])).toBeCloseTo(-1, 10);
  });

  it('computes the angle between arbitrary vectors', () => {
    expect(cosineSimilarity([1, 0], [1, 1])).toBeCloseTo(Math.SQRT1_2, 10);
  });

  it('flattens nested vectors before scoring', () => {
    expect(cosineSimilarity([[1, 0]], [1, 1])).toBeCloseTo(Math.SQRT1_2, 10);
  });

  describe('degenerate input', () => {
    it('returns 0 for null or undefined vectors', () => {
      expect(cosineSimilarity(null, [1, 2])).toBe(0);
      expect(cosineSimilarity([1, 2], undefined)).toBe(0);
    });

    it('returns 0 for empty vectors', () => {
      expect(cosineSimilarity([], [])).toBe(0);
    });

    it('returns 0 for a zero vector', () => {
      expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0);
    });

    it('returns 0 when lengths differ', () => {
      expect(cosineSimilarity([1, 2, 3], [1, 2])).toBe(0);
    });

    it('returns 0 when a component is not finite', () => {
      expect(cosineSimilarity([Number.NaN, 1], [1, 1])).toBe(0);
      expect(cosineSimilarity([Number.POSITIVE_INFINITY, 1], [1, 1])).toBe(0);
    });
  });

  describe('extreme magnitudes', () => {
    it('scores tiny parallel vectors as 1', () => {
      expect(cosineSimilarity([1e-200, 1e-200], [1e-200, 1e-200])).toBeCloseTo(1, 10);
    });

    it('scores huge parallel vectors as 1', () => {
      expect(cosineSimilarity([1e200, 1e200], [1e200, 1e200])).toBeCloseTo(1, 10);
    });

    it('compares vectors whose magnitudes differ by hundreds of orders', () => {
      expect(cosineSimilarity([1e-200, 0], [1e200, 1e200])).toBeCloseTo(Math.SQRT1_2, 10);
    });
  });

  describe('properties', () => {
    const vector = fc.array(fc.double({ min: -1000, max: 1000, noNaN: true }), { minLength: 1, maxLength: 16 });

    it('always lies in [-1, 1]', () => {
      fc.assert(
        fc.property(vector, vector, (a, b) => {
          const score = cosineSimilarity(a, b);
          return score >= -1 && score <= 1;
        })
      );
    });

    it('is symmetric', () => {
      fc.assert(
        fc.property(vector, vector, (a, b) => cosineSimilarity(a, b) === cosineSimilarity(b, a))
      );
    });

    const anyMagnitude = fc.array(
      fc.double({ noNaN: true, noDefaultInfinity: true }),
      { minLength: 1, maxLength: 16 }
    );
    const nonZero = anyMagnitude.filter(values => values.some(value => value !== 0));

    it('scores every non-zero vector as 1 against itself', () => {
      fc.assert(
        fc.property(nonZero, v => Math.abs(cosineSimilarity(v, v) - 1) < 1e-9)
      );
    });

    it('scores a zero vector as 0 on either side', () => {
      fc.assert(
        fc.property(anyMagnitude, v => {
          const zero = v.map(() => 0);
          return cosineSimilarity(zero, v) === 0 && cosineSimilarity(v, zero) === 0;
        })
      );
    });
  });
});

describe('flattenVector', () => {
  it('flattens any depth in order', () => {
    expect(flattenVector([[1, [2, 3]], 4])).toEqual([1, 2, 3, 4]);
  });
});

describe('vectorNorm', () => {
  it('computes the euclidean norm', () => {
    expect(vectorNorm([3, 4])).toBe(5);
  });

  it('keeps tiny and huge components representable', () => {
    expect(vectorNorm([3e-200, 4e-200]) / 1e-200).toBeCloseTo(5, 10);
    expect(vectorNorm([3e200, 4e200]) / 1e200).toBeCloseTo(5, 10);
  });

  it('is 0 for a zero vector', () => {
    expect(vectorNorm([0, 0])).toBe(0);
  });
});
