import { readFile } from 'fs/promises';
import path from 'path';
import type {
  FilterConfig,
  FusionConfig,
  LineGroupingConfig,
  ProcessingConfig,
  RecognitionConfig,
  RecognitionConfigOverrides,
  SourcesConfig,
} from './ConfigSchema.js';
import {
  DEFAULT_FILTER_CONFIG,
  DEFAULT_FUSION_CONFIG,
  DEFAULT_LINE_GROUPING_CONFIG,
  DEFAULT_PROCESSING_CONFIG,
  DEFAULT_RECOGNITION_CONFIG,
  DEFAULT_REGION_FILTER_CONFIG,
  validateRecognitionConfig,
} from './ConfigSchema.js';
import { isLogLevel, logger } from '../utils/logger.js';

/**
 * Read a value by dotted key path, e.g. "postprocessing.min_confidence".
 * Returns the fallback when any segment is missing.
 */
export function getConfigValue(raw: unknown, keyPath: string, fallback?: unknown): unknown {
  let value: unknown = raw;

  for (const key of keyPath.split('.')) {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      return fallback;
    }
    const section = new Map(Object.entries(value));
    if (!section.has(key)) {
      return fallback;
    }
    value = section.get(key);
  }

  return value;
}

function readNumber(raw: unknown, keyPath: string, fallback: number): number {
  const value = getConfigValue(raw, keyPath);
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function readBoolean(raw: unknown, keyPath: string, fallback: boolean): boolean {
  const value = getConfigValue(raw, keyPath);
  return typeof value === 'boolean' ? value : fallback;
}

function readString(raw: unknown, keyPath: string, fallback: string): string {
  const value = getConfigValue(raw, keyPath);
  return typeof value === 'string' ? value : fallback;
}

function readOptionalString(raw: unknown, keyPath: string): string | undefined {
  const value = getConfigValue(raw, keyPath);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function envNumber(name: string, fallback: number): number {
  const value = process.env[name];
  if (value === undefined || value === '') return fallback;
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Recursively freeze a configuration snapshot
 */
function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Configuration loader for recognition settings
 * Supports loading from files and environment variables
 */
export class ConfigLoader {

  /**
   * Load recognition configuration from file or environment
   */
  static async loadRecognitionConfig(configPath?: string): Promise<RecognitionConfig> {

    // Priority order:
    // 1. Explicit config file path
    // 2. CONFIG_PATH environment variable
    // 3. Default: ./config/recognition.json

    const finalPath = configPath
      || process.env.CONFIG_PATH
      || path.join(process.cwd(), 'config', 'recognition.json');

    let raw: unknown = {};
    try {
      const configData = await readFile(finalPath, 'utf-8');
      raw = JSON.parse(configData);
      logger.info(`Loaded recognition config from: ${finalPath}`);
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new Error(`Config load error: ${finalPath} is not valid JSON (${error.message})`);
      }
      logger.warn(`Config file not found: ${finalPath}, using defaults`);
    }

    const config = this.mergeWithEnv(this.fromRaw(raw));

    const validation = validateRecognitionConfig(config);
    if (!validation.valid) {
      logger.error('Invalid configuration:', validation.errors);
      throw new Error(`Configuration validation failed: ${validation.errors.join(', ')}`);
    }

    if (validation.warnings.length > 0) {
      logger.warn('Configuration warnings:', validation.warnings);
    }

    return deepFreeze(config);
  }

  /**
   * Map a nested snake_case record onto the typed snapshot.
   * Missing or mistyped keys take their defaults.
   */
  static fromRaw(raw: unknown): RecognitionConfig {
    const region = DEFAULT_REGION_FILTER_CONFIG;
    const pp = DEFAULT_FILTER_CONFIG;

    const postprocessing: FilterConfig = {
      minConfidence: readNumber(raw, 'postprocessing.min_confidence', pp.minConfidence),
      minLength: readNumber(raw, 'postprocessing.min_length', pp.minLength),
      maxLength: readNumber(raw, 'postprocessing.max_length', pp.maxLength),
      enableCharFilter: readBoolean(raw, 'postprocessing.enable_char_filter', pp.enableCharFilter),
      allowedChars: readString(raw, 'postprocessing.allowed_chars', pp.allowedChars),
      enableCorrection: readBoolean(raw, 'postprocessing.enable_correction', pp.enableCorrection),
      enableDeduplication: readBoolean(raw, 'postprocessing.enable_deduplication', pp.enableDeduplication),
      similarityThreshold: readNumber(raw, 'postprocessing.similarity_threshold', pp.similarityThreshold),
      minResults: readNumber(raw, 'postprocessing.min_results', pp.minResults),
      enableRegionFilter: readBoolean(raw, 'postprocessing.enable_region_filter', pp.enableRegionFilter),
      region: {
        minAreaRatio: readNumber(raw, 'postprocessing.min_area_ratio', region.minAreaRatio),
        maxAreaRatio: readNumber(raw, 'postprocessing.max_area_ratio', region.maxAreaRatio),
        minAspectRatio: readNumber(raw, 'postprocessing.min_aspect_ratio', region.minAspectRatio),
        maxAspectRatio: readNumber(raw, 'postprocessing.max_aspect_ratio', region.maxAspectRatio),
        centerRegionOnly: readBoolean(raw, 'postprocessing.center_region_only', region.centerRegionOnly),
        centerRegionRatio: readNumber(raw, 'postprocessing.center_region_ratio', region.centerRegionRatio),
      },
    };

    const fusion = DEFAULT_FUSION_CONFIG;
    const multiAngle: FusionConfig = {
      fusionMethod: readString(raw, 'multi_angle.fusion_method', fusion.fusionMethod),
      minImages: readNumber(raw, 'multi_angle.min_images', fusion.minImages),
      maxImages: readNumber(raw, 'multi_angle.max_images', fusion.maxImages),
      returnAlternatives: readBoolean(raw, 'multi_angle.return_alternatives', fusion.returnAlternatives),
      alternativeThreshold: readNumber(raw, 'multi_angle.alternative_threshold', fusion.alternativeThreshold),
    };

    const lineGrouping: LineGroupingConfig = {
      yThreshold: readNumber(raw, 'line_grouping.y_threshold', DEFAULT_LINE_GROUPING_CONFIG.yThreshold),
    };

    const logLevel = readString(raw, 'processing.log_level', '');
    const processing: ProcessingConfig = {
      maxConcurrent: readNumber(raw, 'processing.max_concurrent', DEFAULT_PROCESSING_CONFIG.maxConcurrent),
      sourceTimeoutMs: readNumber(raw, 'processing.source_timeout_ms', DEFAULT_PROCESSING_CONFIG.sourceTimeoutMs),
      logLevel: isLogLevel(logLevel) ? logLevel : undefined,
    };

    const sources: SourcesConfig = {
      ocrEndpoint: readOptionalString(raw, 'sources.ocr_endpoint'),
      cloudOcrEndpoint: readOptionalString(raw, 'sources.cloud_ocr_endpoint'),
      apiKey: readOptionalString(raw, 'sources.api_key'),
    };

    return { postprocessing, multiAngle, lineGrouping, processing, sources };
  }

  /**
   * Merge config with environment variable overrides
   */
  static mergeWithEnv(config: RecognitionConfig): RecognitionConfig {
    const logLevel = process.env.LOG_LEVEL?.toLowerCase();

    return {
      ...config,
      postprocessing: {
        ...config.postprocessing,
        minConfidence: envNumber('MIN_CONFIDENCE', config.postprocessing.minConfidence),
        similarityThreshold: envNumber('SIMILARITY_THRESHOLD', config.postprocessing.similarityThreshold),
      },
      multiAngle: {
        ...config.multiAngle,
        fusionMethod: process.env.FUSION_METHOD || config.multiAngle.fusionMethod,
        minImages: envNumber('MIN_IMAGES', config.multiAngle.minImages),
        maxImages: envNumber('MAX_IMAGES', config.multiAngle.maxImages),
      },
      lineGrouping: {
        yThreshold: envNumber('Y_THRESHOLD', config.lineGrouping.yThreshold),
      },
      processing: {
        ...config.processing,
        maxConcurrent: envNumber('MAX_CONCURRENT', config.processing.maxConcurrent),
        sourceTimeoutMs: envNumber('SOURCE_TIMEOUT_MS', config.processing.sourceTimeoutMs),
        logLevel: isLogLevel(logLevel) ? logLevel : config.processing.logLevel,
      },
      sources: {
        ocrEndpoint: process.env.OCR_ENDPOINT || config.sources.ocrEndpoint,
        cloudOcrEndpoint: process.env.CLOUD_OCR_ENDPOINT || config.sources.cloudOcrEndpoint,
        apiKey: process.env.OCR_API_KEY || config.sources.apiKey,
      },
    };
  }

  /**
   * Build a new frozen snapshot with per-call overrides; the base is never modified
   */
  static withOverrides(
    config: RecognitionConfig,
    overrides: RecognitionConfigOverrides = {}
  ): RecognitionConfig {
    return deepFreeze({
      postprocessing: {
        ...config.postprocessing,
        ...overrides.postprocessing,
        region: {
          ...config.postprocessing.region,
          ...overrides.postprocessing?.region,
        },
      },
      multiAngle: { ...config.multiAngle, ...overrides.multiAngle },
      lineGrouping: { ...config.lineGrouping, ...overrides.lineGrouping },
      processing: { ...config.processing, ...overrides.processing },
      sources: { ...config.sources, ...overrides.sources },
    });
  }

  /**
   * Frozen copy of the built-in defaults
   */
  static getDefaultConfig(): RecognitionConfig {
    return this.withOverrides(DEFAULT_RECOGNITION_CONFIG);
  }
}
