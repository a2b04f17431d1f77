/**
 * Request body parsing for the recognition routes.
 * Config overrides use the same snake_case sections as config/recognition.json.
 */

import type {
  FilterConfigInput,
  FusionConfigInput,
  LineGroupingConfig,
  RecognitionConfigOverrides,
  RegionFilterConfig,
} from '../config/ConfigSchema.js';
import type { CorrectionInput } from '../types/correction.js';
import type { PerImageResult } from '../types/fusion.js';
import type { TextObservation } from '../types/observation.js';
import { asRecord, parseObservationList, parsePerImageResult } from '../recognition/parsing.js';
import { ValidationError } from './middleware/errorHandler.js';

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

function setIfDefined<T, K extends keyof T>(target: T, key: K, value: T[K] | undefined): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

/**
 * Typed reads from one optional section of a request body
 */
class SectionReader {
  private readonly section: { [key: string]: unknown };

  constructor(body: { [key: string]: unknown }, private readonly name: string) {
    const raw = body[name];
    if (raw === undefined) {
      this.section = {};
      return;
    }
    const section = asRecord(raw);
    if (!section) {
      throw new ValidationError(`config.${name} must be an object`);
    }
    this.section = section;
  }

  number(key: string): number | undefined {
    const value = this.section[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new ValidationError(`config.${this.name}.${key} must be a number`);
    }
    return value;
  }

  boolean(key: string): boolean | undefined {
    const value = this.section[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'boolean') {
      throw new ValidationError(`config.${this.name}.${key} must be a boolean`);
    }
    return value;
  }

  string(key: string): string | undefined {
    const value = this.section[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
      throw new ValidationError(`config.${this.name}.${key} must be a string`);
    }
    return value;
  }
}

function parseFilterOverrides(config: { [key: string]: unknown }): FilterConfigInput {
  const pp = new SectionReader(config, 'postprocessing');
  const filter: Mutable<FilterConfigInput> = {};
  const region: Mutable<Partial<RegionFilterConfig>> = {};

  setIfDefined(filter, 'minConfidence', pp.number('min_confidence'));
  setIfDefined(filter, 'minLength', pp.number('min_length'));
  setIfDefined(filter, 'maxLength', pp.number('max_length'));
  setIfDefined(filter, 'enableCharFilter', pp.boolean('enable_char_filter'));
  setIfDefined(filter, 'allowedChars', pp.string('allowed_chars'));
  setIfDefined(filter, 'enableCorrection', pp.boolean('enable_correction'));
  setIfDefined(filter, 'enableDeduplication', pp.boolean('enable_deduplication'));
  setIfDefined(filter, 'similarityThreshold', pp.number('similarity_threshold'));
  setIfDefined(filter, 'minResults', pp.number('min_results'));
  setIfDefined(filter, 'enableRegionFilter', pp.boolean('enable_region_filter'));

  setIfDefined(region, 'minAreaRatio', pp.number('min_area_ratio'));
  setIfDefined(region, 'maxAreaRatio', pp.number('max_area_ratio'));
  setIfDefined(region, 'minAspectRatio', pp.number('min_aspect_ratio'));
  setIfDefined(region, 'maxAspectRatio', pp.number('max_aspect_ratio'));
  setIfDefined(region, 'centerRegionOnly', pp.boolean('center_region_only'));
  setIfDefined(region, 'centerRegionRatio', pp.number('center_region_ratio'));

  if (Object.keys(region).length > 0) {
    filter.region = region;
  }
  return filter;
}

function parseFusionOverrides(config: { [key: string]: unknown }): FusionConfigInput {
  const ma = new SectionReader(config, 'multi_angle');
  const fusion: Mutable<FusionConfigInput> = {};

  setIfDefined(fusion, 'fusionMethod', ma.string('fusion_method'));
  setIfDefined(fusion, 'minImages', ma.number('min_images'));
  setIfDefined(fusion, 'maxImages', ma.number('max_images'));
  setIfDefined(fusion, 'returnAlternatives', ma.boolean('return_alternatives'));
  setIfDefined(fusion, 'alternativeThreshold', ma.number('alternative_threshold'));

  return fusion;
}

/**
 * Partial config overrides from the optional `config` field of a request body
 */
export function parseConfigOverrides(raw: unknown): RecognitionConfigOverrides {
  if (raw === undefined) {
    return {};
  }
  const config = asRecord(raw);
  if (!config) {
    throw new ValidationError('config must be an object');
  }

  const lineGrouping: Mutable<Partial<LineGroupingConfig>> = {};
  setIfDefined(lineGrouping, 'yThreshold', new SectionReader(config, 'line_grouping').number('y_threshold'));

  return {
    postprocessing: parseFilterOverrides(config),
    multiAngle: parseFusionOverrides(config),
    lineGrouping,
  };
}

export function requireBody(raw: unknown): { [key: string]: unknown } {
  const body = asRecord(raw);
  if (!body) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return body;
}

export function requireObservations(raw: unknown): TextObservation[] {
  const observations = parseObservationList(raw);
  if (!observations) {
    throw new ValidationError('observations array is required');
  }
  return observations;
}

export function requirePerImageResults(raw: unknown): PerImageResult[] {
  if (!Array.isArray(raw)) {
    throw new ValidationError('results array is required');
  }
  return raw.map((item, index) => {
    const result = parsePerImageResult(item);
    if (!result) {
      throw new ValidationError(`results[${index}] must have an observations array`);
    }
    return result;
  });
}

/**
 * Candidate generation grows with the square of the text length, so texts
 * longer than the filter's max length are refused.
 */
export function requireCorrectionInput(raw: unknown, label: string, maxLength: number): CorrectionInput {
  const record = asRecord(raw);
  if (!record || typeof record.text !== 'string' || record.text.length === 0) {
    throw new ValidationError(`${label}.text must be a non-empty string`);
  }
  if ([...record.text].length > maxLength) {
    throw new ValidationError(`${label}.text must be at most ${maxLength} characters`);
  }
  if (typeof record.confidence !== 'number' || !Number.isFinite(record.confidence)) {
    throw new ValidationError(`${label}.confidence must be a number`);
  }
  return { text: record.text, confidence: record.confidence };
}
