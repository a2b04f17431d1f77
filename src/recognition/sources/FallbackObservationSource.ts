import { logger } from '../../utils/logger.js';
import type { ImageInput, ObservationOutcome, ObservationSource } from './types.js';

/**
 * Tries the primary source first and falls back to the secondary one
 * when the primary fails or sees no text.
 */
export class FallbackObservationSource implements ObservationSource {
  readonly name: string;

  constructor(
    private readonly primary: ObservationSource,
    private readonly fallback: ObservationSource
  ) {
    this.name = `${primary.name}+${fallback.name}`;
  }

  async observe(image: ImageInput): Promise<ObservationOutcome> {
    const first = await this.primary.observe(image);
    if (first.ok && first.observations.length > 0) {
      return first;
    }

    if (first.ok) {
      logger.info(`${this.primary.name} found no text, trying ${this.fallback.name}`);
    } else {
      logger.warn(`${this.primary.name} failed (${first.error.code}), trying ${this.fallback.name}`);
    }

    const second = await this.fallback.observe(image);
    if (second.ok) {
      return second;
    }

    logger.warn(`${this.fallback.name} failed as well (${second.error.code})`);
    // An empty primary read is still a valid answer
    return first.ok ? first : second;
  }
}
