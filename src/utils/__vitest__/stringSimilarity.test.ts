import { describe, it, expect } from 'vitest';
import {
  areLineTextsSimilar,
  compactText,
  levenshteinDistance,
  levenshteinSimilarity,
} from '../stringSimilarity.js';

describe('stringSimilarity', () => {
  describe('levenshteinDistance', () => {
    it('should count insertions, deletions and substitutions', () => {
      expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
      expect(levenshteinDistance('AT66202', 'AT66202')).toBe(0);
      expect(levenshteinDistance('', 'ABC')).toBe(3);
    });

    it('should be symmetric', () => {
      expect(levenshteinDistance('0909W1D', '909W1')).toBe(levenshteinDistance('909W1', '0909W1D'));
    });
  });

  describe('levenshteinSimilarity', () => {
    it('should normalize by the longer string', () => {
      expect(levenshteinSimilarity('AT64202', 'AT64203')).toBeCloseTo(6 / 7);
    });

    it('should treat two empty strings as identical', () => {
      expect(levenshteinSimilarity('', '')).toBe(1);
      expect(levenshteinSimilarity('ABC', '')).toBe(0);
    });
  });

  describe('compactText', () => {
    it('should remove spaces and upper-case', () => {
      expect(compactText('0909 w1d')).toBe('0909W1D');
    });
  });

  describe('areLineTextsSimilar', () => {
    it('should match texts equal after compaction', () => {
      expect(areLineTextsSimilar('0909 W1D', '0909w1d')).toBe(true);
    });

    it('should match readings one character apart', () => {
      expect(areLineTextsSimilar('AT64202', 'AT64203')).toBe(true);
      expect(areLineTextsSimilar('AT64202', 'AT64203', 0.9)).toBe(false);
    });

    it('should reject texts whose lengths differ by more than 30%', () => {
      expect(areLineTextsSimilar('AT64202', 'XY99')).toBe(false);
      expect(areLineTextsSimilar('AT64202', 'AT642')).toBe(false);
    });
  });
});
