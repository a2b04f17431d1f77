/**
 * Types produced by the standalone confusion corrector
 */

/**
 * A single character substitution applied to an input text
 */
export interface CharacterEdit {
  readonly position: number;
  readonly fromChar: string;
  readonly toChar: string;
}

/**
 * A ranked rewrite of one input text
 */
export interface CorrectionCandidate {
  readonly text: string;
  /**
   * Ranking confidence; grammar matches are boosted above the input confidence
   */
  readonly confidence: number;
  readonly edits: readonly CharacterEdit[];
  /**
   * Whether the text matches one of the known wheel-code grammars
   */
  readonly patternMatch: boolean;
}

/**
 * Input record for batch correction
 */
export interface CorrectionInput {
  readonly text: string;
  readonly confidence: number;
}

/**
 * A record replaced by its best correction candidate
 */
export interface CorrectedRecord extends CorrectionInput {
  readonly originalText: string;
  readonly patternMatch: boolean;
  /**
   * Present only when the best candidate changed the text
   */
  readonly corrections?: readonly CharacterEdit[];
  /**
   * Up to two runner-up texts, present alongside corrections
   */
  readonly alternatives?: readonly string[];
}
