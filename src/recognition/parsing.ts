/**
 * Parsing of observation payloads arriving from OCR services, files and HTTP bodies.
 * Accepts both `bbox` and `boundingQuad` for the region corners.
 */

import { ObservationValidator, type Line, type TextObservation } from '../types/observation.js';
import type { PerImageResult } from '../types/fusion.js';

export function asRecord(value: unknown): { [key: string]: unknown } | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }
  return { ...value };
}

function clampConfidence(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * One observation, or null when it has no text.
 * Malformed geometry is dropped rather than rejected.
 */
export function parseObservation(raw: unknown): TextObservation | null {
  const record = asRecord(raw);
  if (!record || typeof record.text !== 'string') {
    return null;
  }

  const quad = record.boundingQuad ?? record.bbox;
  const observation: TextObservation = {
    text: record.text,
    confidence: clampConfidence(record.confidence),
    ...(ObservationValidator.isBoundingQuad(quad) ? { boundingQuad: quad } : {}),
    ...(typeof record.sourceImageIndex === 'number' ? { sourceImageIndex: record.sourceImageIndex } : {}),
  };

  return observation;
}

/**
 * Every parseable observation of a list; null when the value is not a list
 */
export function parseObservationList(raw: unknown): TextObservation[] | null {
  if (!Array.isArray(raw)) {
    return null;
  }
  const observations: TextObservation[] = [];
  for (const item of raw) {
    const observation = parseObservation(item);
    if (observation) observations.push(observation);
  }
  return observations;
}

function parseLine(raw: unknown): Line | null {
  const record = asRecord(raw);
  if (!record || typeof record.text !== 'string') {
    return null;
  }
  return {
    text: record.text,
    confidence: clampConfidence(record.confidence),
    members: parseObservationList(record.members) ?? [],
  };
}

/**
 * One image's result. Observations are read from `observations`, or `results`
 * as written by the recognizer; `success` defaults to true.
 */
export function parsePerImageResult(raw: unknown): PerImageResult | null {
  const record = asRecord(raw);
  if (!record) {
    return null;
  }

  const observations = parseObservationList(record.observations ?? record.results);
  if (!observations) {
    return null;
  }

  const lines = Array.isArray(record.lines)
    ? record.lines.map(parseLine).filter((line): line is Line => line !== null)
    : undefined;

  return {
    success: typeof record.success === 'boolean' ? record.success : true,
    observations,
    ...(lines ? { lines } : {}),
  };
}
