/**
 * Recognizer result types
 */

import type { Line, TextObservation } from './observation.js';
import type { FusedResult, FusionFailure } from './fusion.js';
import type { OcrError } from '../recognition/sources/types.js';

export interface RecognitionResult {
  readonly success: true;
  /** Filtered and ranked observations */
  readonly results: readonly TextObservation[];
  readonly lines: readonly Line[];
  readonly totalTexts: number;
  readonly totalLines: number;
  /** Observation count before filtering */
  readonly rawCount: number;
  readonly processingTimeMs: number;
  readonly engineUsed: string;
}

export interface RecognitionFailure {
  readonly success: false;
  readonly error: OcrError;
  readonly processingTimeMs: number;
}

export type RecognitionOutcome = RecognitionResult | RecognitionFailure;

export type MultiAngleOutcome =
  | (FusedResult & { readonly individualResults: readonly RecognitionOutcome[] })
  | (FusionFailure & { readonly individualResults: readonly RecognitionOutcome[] });
