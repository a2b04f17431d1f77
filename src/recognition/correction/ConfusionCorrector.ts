/**
 * Confusion Corrector
 *
 * Re-ranks a single OCR reading by searching character substitutions that
 * OCR engines commonly make on engraved metal, preferring rewrites that match
 * a known wheel-code grammar.
 *
 * The search is bounded to two simultaneous substitutions.
 */

import type {
  CharacterEdit,
  CorrectedRecord,
  CorrectionCandidate,
  CorrectionInput,
} from '../../types/correction.js';
import { logger } from '../../utils/logger.js';

/**
 * Characters each glyph is commonly misread as. Asymmetric on purpose:
 * '6' is confused with several glyphs, 'A' only with '4'.
 */
export const CONFUSION_MAP: Readonly<Record<string, readonly string[]>> = {
  '0': ['O', 'Q', 'D'],
  O: ['0', 'Q', 'D'],
  '1': ['I', 'l', '|', 'i'],
  I: ['1', 'l', '|'],
  '2': ['Z', '3'],
  '3': ['8', '2'],
  '4': ['A', '6'],
  '5': ['S', '6'],
  '6': ['G', '8', '5', '4', '9'],
  '7': ['T', '1', '6'],
  '8': ['B', '3', '6'],
  '9': ['g', 'q', '6'],
  B: ['8', 'R'],
  G: ['6', 'C'],
  S: ['5', '8'],
  Z: ['2', '7'],
  T: ['7', '1'],
  A: ['4'],
};

/**
 * Known wheel-code layouts, e.g. AT66202 or 0909W1D
 */
export const WHEEL_CODE_GRAMMARS: readonly RegExp[] = [
  /^[A-Z]{2}\d{5}$/,
  /^[A-Z]{3}\d{4}$/,
  /^\d{4}[A-Z]\d$/,
  /^\d{4}[A-Z]{2}\d$/,
];

const MAX_CANDIDATES = 5;
const ORIGINAL_MATCH_BOOST = 1.2;
const CORRECTED_MATCH_BOOST = 1.5;
const PER_EDIT_PENALTY = 0.9;

export interface ConfusionCorrectorOptions {
  confusionMap?: Readonly<Record<string, readonly string[]>>;
  grammars?: readonly RegExp[];
}

interface RawCandidate {
  text: string;
  edits: CharacterEdit[];
}

export class ConfusionCorrector {
  private readonly confusionMap: Readonly<Record<string, readonly string[]>>;
  private readonly grammars: readonly RegExp[];

  constructor(options: ConfusionCorrectorOptions = {}) {
    this.confusionMap = options.confusionMap ?? CONFUSION_MAP;
    this.grammars = options.grammars ?? WHEEL_CODE_GRAMMARS;
  }

  /**
   * Whether a text matches any wheel-code grammar
   */
  matchesGrammar(text: string): boolean {
    return this.grammars.some((grammar) => grammar.test(text));
  }

  /**
   * Produce up to five ranked candidates for one reading
   */
  correct(text: string, confidence: number): CorrectionCandidate[] {
    if (this.matchesGrammar(text)) {
      logger.debug(`'${text}' matches a wheel-code grammar`);
      return [{ text, confidence: confidence * ORIGINAL_MATCH_BOOST, edits: [], patternMatch: true }];
    }

    const candidates: CorrectionCandidate[] = [
      { text, confidence, edits: [], patternMatch: false },
    ];

    for (const raw of this.generateCandidates(text)) {
      const patternMatch = this.matchesGrammar(raw.text);
      const adjusted = patternMatch
        ? confidence * CORRECTED_MATCH_BOOST
        : confidence * PER_EDIT_PENALTY ** raw.edits.length;

      if (patternMatch) {
        logger.debug(`Correction suggestion: '${text}' -> '${raw.text}' (grammar match)`);
      }

      candidates.push({ text: raw.text, confidence: adjusted, edits: raw.edits, patternMatch });
    }

    // Stable sort keeps generation order among equal candidates
    candidates.sort((a, b) => {
      if (a.patternMatch !== b.patternMatch) {
        return a.patternMatch ? -1 : 1;
      }
      return b.confidence - a.confidence;
    });

    return candidates.slice(0, MAX_CANDIDATES);
  }

  /**
   * Replace each record with its best candidate
   */
  batchCorrect(records: readonly CorrectionInput[]): CorrectedRecord[] {
    return records.map((record) => {
      const candidates = this.correct(record.text, record.confidence);
      const best = candidates[0];

      const corrected: CorrectedRecord = {
        ...record,
        originalText: record.text,
        text: best.text,
        confidence: best.confidence,
        patternMatch: best.patternMatch,
      };

      if (best.edits.length === 0) {
        return corrected;
      }

      return {
        ...corrected,
        corrections: best.edits,
        alternatives: candidates.slice(1, 3).map((candidate) => candidate.text),
      };
    });
  }

  /**
   * All single substitutions, then all position pairs when the text has five or more characters
   */
  private generateCandidates(text: string): RawCandidate[] {
    const chars = [...text];
    const candidates: RawCandidate[] = [];

    chars.forEach((char, i) => {
      for (const replacement of this.confusionsOf(char)) {
        candidates.push({
          text: this.substitute(chars, [[i, replacement]]),
          edits: [{ position: i, fromChar: char, toChar: replacement }],
        });
      }
    });

    if (chars.length < 5) {
      return candidates;
    }

    for (let i = 0; i < chars.length; i++) {
      for (const first of this.confusionsOf(chars[i])) {
        for (let j = i + 1; j < chars.length; j++) {
          for (const second of this.confusionsOf(chars[j])) {
            candidates.push({
              text: this.substitute(chars, [[i, first], [j, second]]),
              edits: [
                { position: i, fromChar: chars[i], toChar: first },
                { position: j, fromChar: chars[j], toChar: second },
              ],
            });
          }
        }
      }
    }

    return candidates;
  }

  private confusionsOf(char: string): readonly string[] {
    return this.confusionMap[char] ?? [];
  }

  private substitute(chars: readonly string[], replacements: ReadonlyArray<[number, string]>): string {
    const next = [...chars];
    for (const [position, replacement] of replacements) {
      next[position] = replacement;
    }
    return next.join('');
  }
}

const defaultCorrector = new ConfusionCorrector();

/**
 * Correct one reading with the default confusion map and grammars
 */
export function correct(text: string, confidence: number): CorrectionCandidate[] {
  return defaultCorrector.correct(text, confidence);
}

export function batchCorrect(records: readonly CorrectionInput[]): CorrectedRecord[] {
  return defaultCorrector.batchCorrect(records);
}
