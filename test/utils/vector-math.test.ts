/**
 * Tests for vector helpers.
 */

import { describe, it, expect } from 'vitest';
import {
  cosineSimilarity,
  deserializeEmbedding,
  isDegenerate,
  serializeEmbedding,
} from '../../src/utils/vector-math.js';

describe('vector-math', () => {
  describe('isDegenerate', () => {
    it('flags empty, zero, tiny and non-finite vectors', () => {
      expect(isDegenerate([])).toBe(true);
      expect(isDegenerate([0, 0, 0])).toBe(true);
      expect(isDegenerate([1e-9, 0])).toBe(true);
      expect(isDegenerate([1, Number.NaN])).toBe(true);
      expect(isDegenerate([Infinity, 0])).toBe(true);
    });

    it('accepts a normal vector', () => {
      expect(isDegenerate([0.6, 0.8])).toBe(false);
    });
  });

  describe('cosineSimilarity', () => {
    it('is 1 for parallel and -1 for opposite vectors', () => {
      expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
      expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
    });

    it('is 0 for orthogonal, degenerate or mismatched inputs', () => {
      expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
      expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
      expect(cosineSimilarity([1, 0, 0], [1, 0])).toBe(0);
    });
  });

  describe('serialization', () => {
    it('stores four bytes per component', () => {
      expect(serializeEmbedding([1, 2, 3]).length).toBe(12);
    });

    it('reads back values representable in float32', () => {
      expect(deserializeEmbedding(serializeEmbedding([0.5, -1, 0.25]))).toEqual([0.5, -1, 0.25]);
    });

    it('reads from an unaligned buffer slice', () => {
      const padded = Buffer.concat([Buffer.from([7]), serializeEmbedding([1.5, 2])]);

      expect(deserializeEmbedding(padded.subarray(1))).toEqual([1.5, 2]);
    });
  });
});
