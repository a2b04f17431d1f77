/**
 * Central configuration exports for recognition
 */

export { ConfigLoader, getConfigValue } from './ConfigLoader.js';
export {
  DEFAULT_FILTER_CONFIG,
  DEFAULT_FUSION_CONFIG,
  DEFAULT_LINE_GROUPING_CONFIG,
  DEFAULT_PROCESSING_CONFIG,
  DEFAULT_RECOGNITION_CONFIG,
  DEFAULT_REGION_FILTER_CONFIG,
  resolveFilterConfig,
  resolveFusionConfig,
  validateRecognitionConfig,
} from './ConfigSchema.js';
export type {
  ConfigValidationResult,
  FilterConfig,
  FilterConfigInput,
  FusionConfig,
  FusionConfigInput,
  LineGroupingConfig,
  ProcessingConfig,
  RecognitionConfig,
  RecognitionConfigOverrides,
  RegionFilterConfig,
  SourcesConfig,
} from './ConfigSchema.js';
