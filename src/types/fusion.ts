/**
 * Multi-image fusion types
 */

import type { Line, TextObservation } from './observation.js';

export const FUSION_METHODS = ['voting', 'weighted', 'smart', 'merge'] as const;

export type FusionMethod = (typeof FUSION_METHODS)[number];

export function isFusionMethod(value: string): value is FusionMethod {
  return FUSION_METHODS.some((method) => method === value);
}

/**
 * Output of one image's recognition, as handed to fusion
 */
export interface PerImageResult {
  readonly success: boolean;
  readonly observations: readonly TextObservation[];
  readonly lines?: readonly Line[];
}

/**
 * One flattened observation in the cross-image pool
 */
export interface PooledText {
  readonly text: string;
  readonly confidence: number;
  readonly sourceIndex: number;
}

/**
 * Scored text during fusion
 */
export interface FusionCandidate {
  readonly text: string;
  readonly score: number;
  readonly count: number;
  readonly frequency: number;
  readonly avgConfidence: number;
}

/**
 * A runner-up text; smart fusion reports confidence only
 */
export interface FusionAlternative {
  readonly text: string;
  readonly score?: number;
  readonly confidence: number;
}

export interface FusedLine {
  readonly text: string;
  readonly confidence: number;
  /**
   * Number of images whose line at this position joined the winning group
   */
  readonly occurrenceCount: number;
}

/**
 * Winner chosen by one flat-text strategy
 */
export interface StrategyOutcome {
  readonly mergedText: string;
  readonly confidence: number;
  readonly alternatives: readonly FusionAlternative[];
}

export interface FusedResult {
  readonly success: true;
  readonly mergedText: string;
  readonly confidence: number;
  readonly sourceCount: number;
  readonly fusionMethod: FusionMethod;
  readonly lines: readonly FusedLine[];
  readonly totalLines: number;
  readonly totalMergedTexts: number;
  /**
   * Present when alternatives are requested and at least one qualifies
   */
  readonly alternatives?: readonly FusionAlternative[];
}

export type FusionErrorCode = 'EMPTY_INPUT' | 'UNSUPPORTED_FUSION_METHOD';

export interface FusionFailure {
  readonly success: false;
  readonly code: FusionErrorCode;
  readonly error: string;
}

export type FusionOutcome = FusedResult | FusionFailure;
