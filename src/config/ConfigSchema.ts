/**
 * Configuration schema for wheel code recognition
 * Files use nested snake_case sections; code works on the camelCase snapshot below
 */

import { FUSION_METHODS, isFusionMethod } from '../types/fusion.js';
import type { LogLevel } from '../utils/logger.js';

/**
 * Geometric thresholds used to reject sticker and label regions
 */
export interface RegionFilterConfig {
  readonly minAreaRatio: number;
  readonly maxAreaRatio: number;
  readonly minAspectRatio: number;
  readonly maxAspectRatio: number;
  readonly centerRegionOnly: boolean;
  readonly centerRegionRatio: number;
}

/**
 * Per-image result filtering configuration
 */
export interface FilterConfig {
  readonly minConfidence: number;
  readonly minLength: number;
  readonly maxLength: number;
  readonly enableCharFilter: boolean;
  /** Empty string disables the allow-list */
  readonly allowedChars: string;
  readonly enableCorrection: boolean;
  readonly enableDeduplication: boolean;
  readonly similarityThreshold: number;
  /** 0 disables backfill */
  readonly minResults: number;
  readonly enableRegionFilter: boolean;
  readonly region: RegionFilterConfig;
}

/**
 * Multi-image fusion configuration
 */
export interface FusionConfig {
  /** One of voting | weighted | smart | merge; anything else fails at fusion time */
  readonly fusionMethod: string;
  readonly minImages: number;
  readonly maxImages: number;
  readonly returnAlternatives: boolean;
  readonly alternativeThreshold: number;
}

export interface LineGroupingConfig {
  /** Maximum vertical distance, in bbox pixels, between a row anchor and its members */
  readonly yThreshold: number;
}

export interface ProcessingConfig {
  readonly maxConcurrent: number;
  readonly sourceTimeoutMs: number;
  readonly logLevel?: LogLevel;
}

export interface SourcesConfig {
  readonly ocrEndpoint?: string;
  readonly cloudOcrEndpoint?: string;
  readonly apiKey?: string;
}

/**
 * Complete recognition configuration snapshot
 */
export interface RecognitionConfig {
  readonly postprocessing: FilterConfig;
  readonly multiAngle: FusionConfig;
  readonly lineGrouping: LineGroupingConfig;
  readonly processing: ProcessingConfig;
  readonly sources: SourcesConfig;
}

/**
 * Partial filter settings accepted by the pipeline; gaps take defaults
 */
export type FilterConfigInput = Partial<Omit<FilterConfig, 'region'>> & {
  readonly region?: Partial<RegionFilterConfig>;
};

export type FusionConfigInput = Partial<FusionConfig>;

/**
 * Partial overrides applied on top of a loaded snapshot
 */
export interface RecognitionConfigOverrides {
  postprocessing?: FilterConfigInput;
  multiAngle?: FusionConfigInput;
  lineGrouping?: Partial<LineGroupingConfig>;
  processing?: Partial<ProcessingConfig>;
  sources?: Partial<SourcesConfig>;
}

export const DEFAULT_REGION_FILTER_CONFIG: RegionFilterConfig = {
  minAreaRatio: 0.0001,
  maxAreaRatio: 0.1,
  minAspectRatio: 0.2,
  maxAspectRatio: 10,
  centerRegionOnly: false,
  centerRegionRatio: 0.6,
};

export const DEFAULT_FILTER_CONFIG: FilterConfig = {
  minConfidence: 0.6,
  minLength: 1,
  maxLength: 30,
  enableCharFilter: true,
  allowedChars: '',
  enableCorrection: true,
  enableDeduplication: true,
  similarityThreshold: 0.9,
  minResults: 0,
  enableRegionFilter: false,
  region: DEFAULT_REGION_FILTER_CONFIG,
};

export const DEFAULT_FUSION_CONFIG: FusionConfig = {
  fusionMethod: 'voting',
  minImages: 2,
  maxImages: 10,
  returnAlternatives: true,
  alternativeThreshold: 0.85,
};

export const DEFAULT_LINE_GROUPING_CONFIG: LineGroupingConfig = {
  yThreshold: 50,
};

export const DEFAULT_PROCESSING_CONFIG: ProcessingConfig = {
  maxConcurrent: 4,
  sourceTimeoutMs: 30000,
};

export const DEFAULT_RECOGNITION_CONFIG: RecognitionConfig = {
  postprocessing: DEFAULT_FILTER_CONFIG,
  multiAngle: DEFAULT_FUSION_CONFIG,
  lineGrouping: DEFAULT_LINE_GROUPING_CONFIG,
  processing: DEFAULT_PROCESSING_CONFIG,
  sources: {},
};

/**
 * Fill gaps in partial filter settings with defaults
 */
export function resolveFilterConfig(input: FilterConfigInput = {}): FilterConfig {
  return {
    ...DEFAULT_FILTER_CONFIG,
    ...input,
    region: {
      ...DEFAULT_REGION_FILTER_CONFIG,
      ...input.region,
    },
  };
}

export function resolveFusionConfig(input: FusionConfigInput = {}): FusionConfig {
  return { ...DEFAULT_FUSION_CONFIG, ...input };
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

function inUnitRange(value: number): boolean {
  return value >= 0 && value <= 1;
}

/**
 * Validate a recognition configuration
 */
export function validateRecognitionConfig(config: RecognitionConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const { postprocessing: pp, multiAngle, lineGrouping, processing } = config;

  if (!inUnitRange(pp.minConfidence)) {
    errors.push('postprocessing.min_confidence must be between 0 and 1');
  }
  if (pp.minLength < 0) {
    errors.push('postprocessing.min_length must not be negative');
  }
  if (pp.maxLength < pp.minLength) {
    errors.push('postprocessing.max_length must be at least min_length');
  }
  if (!inUnitRange(pp.similarityThreshold)) {
    errors.push('postprocessing.similarity_threshold must be between 0 and 1');
  }
  if (pp.minResults < 0) {
    errors.push('postprocessing.min_results must not be negative');
  }
  if (pp.region.minAreaRatio > pp.region.maxAreaRatio) {
    errors.push('postprocessing.min_area_ratio must not exceed max_area_ratio');
  }
  if (pp.region.minAspectRatio > pp.region.maxAspectRatio) {
    errors.push('postprocessing.min_aspect_ratio must not exceed max_aspect_ratio');
  }
  if (!inUnitRange(pp.region.centerRegionRatio)) {
    errors.push('postprocessing.center_region_ratio must be between 0 and 1');
  }

  if (!isFusionMethod(multiAngle.fusionMethod)) {
    warnings.push(
      `multi_angle.fusion_method "${multiAngle.fusionMethod}" is not one of ${FUSION_METHODS.join(', ')}; fusion will fail`
    );
  }
  if (multiAngle.maxImages < 1) {
    errors.push('multi_angle.max_images must be at least 1');
  }
  if (multiAngle.minImages < 0) {
    errors.push('multi_angle.min_images must not be negative');
  }
  if (multiAngle.minImages > multiAngle.maxImages) {
    warnings.push('multi_angle.min_images exceeds max_images; every batch will be reported as undersized');
  }
  if (!inUnitRange(multiAngle.alternativeThreshold)) {
    errors.push('multi_angle.alternative_threshold must be between 0 and 1');
  }

  if (lineGrouping.yThreshold < 0) {
    errors.push('line_grouping.y_threshold must not be negative');
  }

  if (processing.maxConcurrent < 1) {
    errors.push('processing.max_concurrent must be at least 1');
  }
  if (processing.sourceTimeoutMs <= 0) {
    errors.push('processing.source_timeout_ms must be positive');
  }

  if (!config.sources.ocrEndpoint) {
    warnings.push('sources.ocr_endpoint is not set; image recognition requires an injected source');
  }

  return { valid: errors.length === 0, errors, warnings };
}
