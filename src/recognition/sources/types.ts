/**
 * Collaborator contracts for turning images into observations
 */

import type { TextObservation } from '../../types/observation.js';

export type ImageInput =
  | { kind: 'buffer'; buffer: Buffer; filenameHint?: string }
  | { kind: 'path'; path: string };

export type OcrErrorCode =
  | 'INVALID_IMAGE'
  | 'ENGINE_FAILED'
  | 'TIMEOUT'
  | 'UNAUTHORIZED'
  | 'RATE_LIMITED'
  | 'SERVER_ERROR'
  | 'BAD_RESPONSE'
  | 'UNKNOWN';

export type OcrError = {
  code: OcrErrorCode;
  message: string;
  /** Whether the same request may succeed later */
  retryable: boolean;
  cause?: string;
};

export type ObservationSuccess = {
  ok: true;
  observations: TextObservation[];
  /** Name of the source that produced the observations */
  engine: string;
};

export type ObservationFailure = {
  ok: false;
  error: OcrError;
};

export type ObservationOutcome = ObservationSuccess | ObservationFailure;

/**
 * OCR detection and recognition behind one call
 */
export interface ObservationSource {
  readonly name: string;
  observe(image: ImageInput): Promise<ObservationOutcome>;
}

/**
 * Optional preprocessing step applied before observation
 */
export interface ImageEnhancer {
  enhance(image: ImageInput): Promise<ImageInput>;
}

const RETRYABLE_CODES: ReadonlySet<OcrErrorCode> = new Set(['TIMEOUT', 'RATE_LIMITED', 'SERVER_ERROR']);

export function ocrError(code: OcrErrorCode, message: string, cause?: string): OcrError {
  return { code, message, retryable: RETRYABLE_CODES.has(code), ...(cause ? { cause } : {}) };
}

export function ocrFailure(code: OcrErrorCode, message: string, cause?: string): ObservationFailure {
  return { ok: false, error: ocrError(code, message, cause) };
}
