import type { ProcessingConfig, SourcesConfig } from '../../config/ConfigSchema.js';
import { logger } from '../../utils/logger.js';
import { FallbackObservationSource } from './FallbackObservationSource.js';
import { HttpObservationSource } from './HttpObservationSource.js';
import type { ObservationSource } from './types.js';

export * from './types.js';
export { HttpObservationSource, type HttpObservationSourceConfig } from './HttpObservationSource.js';
export { FallbackObservationSource } from './FallbackObservationSource.js';

/**
 * Build the configured source chain: the local service, backed by the cloud
 * service when one is configured. Returns null when no endpoint is set.
 */
export function createObservationSourceFromConfig(
  sources: SourcesConfig,
  processing: Pick<ProcessingConfig, 'sourceTimeoutMs'>
): ObservationSource | null {
  const local = sources.ocrEndpoint
    ? new HttpObservationSource({
        endpoint: sources.ocrEndpoint,
        name: 'local',
        timeout: processing.sourceTimeoutMs,
      })
    : null;

  const cloud = sources.cloudOcrEndpoint
    ? new HttpObservationSource({
        endpoint: sources.cloudOcrEndpoint,
        apiKey: sources.apiKey,
        name: 'cloud',
        timeout: processing.sourceTimeoutMs,
      })
    : null;

  if (local && cloud) {
    logger.info('Using local OCR service with cloud fallback');
    return new FallbackObservationSource(local, cloud);
  }
  return local ?? cloud;
}
