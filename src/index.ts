/**
 * Wheel hub code recognition: result filtering, confusion correction,
 * line grouping and multi-image fusion.
 */

export * from './recognition/index.js';
export * from './config/index.js';
export type { TextObservation, Line, Point, BoundingQuad } from './types/observation.js';
export { ObservationValidator } from './types/observation.js';
export * from './types/fusion.js';
export type { CharacterEdit, CorrectionCandidate, CorrectionInput, CorrectedRecord } from './types/correction.js';
export type {
  RecognitionResult,
  RecognitionFailure,
  RecognitionOutcome,
  MultiAngleOutcome,
} from './types/recognition.js';
export { createApiServer, startApiServer, type ApiServerOptions, type ApiServerDependencies } from './api/server.js';
export { logger, setLogLevel, type LogLevel } from './utils/logger.js';
