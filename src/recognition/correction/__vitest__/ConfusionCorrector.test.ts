import { describe, it, expect } from 'vitest';
import { ConfusionCorrector, batchCorrect, correct } from '../ConfusionCorrector.js';

describe('ConfusionCorrector', () => {
  describe('correct', () => {
    it('should return a boosted single candidate when the text already matches a grammar', () => {
      const candidates = correct('AT66202', 0.9);

      expect(candidates).toHaveLength(1);
      expect(candidates[0].text).toBe('AT66202');
      expect(candidates[0].confidence).toBeCloseTo(1.08);
      expect(candidates[0].edits).toEqual([]);
      expect(candidates[0].patternMatch).toBe(true);
    });

    it('should rank the grammar-matching rewrite first', () => {
      const candidates = correct('AT6O2O2', 0.8);

      expect(candidates.map((candidate) => candidate.text)).toEqual([
        'AT60202',
        'AT6O2O2',
        '4T6O2O2',
        'A76O2O2',
        'A16O2O2',
      ]);

      const [best, original, firstSingle] = candidates;
      expect(best.patternMatch).toBe(true);
      expect(best.confidence).toBeCloseTo(1.2);
      expect(best.edits).toEqual([
        { position: 3, fromChar: 'O', toChar: '0' },
        { position: 5, fromChar: 'O', toChar: '0' },
      ]);
      expect(original.confidence).toBe(0.8);
      expect(original.edits).toEqual([]);
      expect(firstSingle.confidence).toBeCloseTo(0.72);
    });

    it('should only try single substitutions on short texts', () => {
      const candidates = correct('A1', 0.5);

      expect(candidates.map((candidate) => candidate.text)).toEqual(['A1', '41', 'AI', 'Al', 'A|']);
      expect(candidates.every((candidate) => candidate.edits.length <= 1)).toBe(true);
    });

    it('should use custom grammars', () => {
      const corrector = new ConfusionCorrector({ grammars: [/^JWL$/] });

      expect(corrector.matchesGrammar('JWL')).toBe(true);
      expect(corrector.matchesGrammar('AT66202')).toBe(false);
      expect(corrector.correct('JWL', 0.5)[0].confidence).toBeCloseTo(0.6);
    });
  });

  describe('batchCorrect', () => {
    it('should replace each record with its best candidate', () => {
      const [corrected, unchanged] = batchCorrect([
        { text: 'AT6O2O2', confidence: 0.8 },
        { text: 'AT66202', confidence: 0.9 },
      ]);

      expect(corrected.text).toBe('AT60202');
      expect(corrected.originalText).toBe('AT6O2O2');
      expect(corrected.patternMatch).toBe(true);
      expect(corrected.corrections).toHaveLength(2);
      expect(corrected.alternatives).toEqual(['AT6O2O2', '4T6O2O2']);

      expect(unchanged.text).toBe('AT66202');
      expect(unchanged.originalText).toBe('AT66202');
      expect(unchanged.confidence).toBeCloseTo(1.08);
      expect(unchanged.corrections).toBeUndefined();
      expect(unchanged.alternatives).toBeUndefined();
    });
  });
});
