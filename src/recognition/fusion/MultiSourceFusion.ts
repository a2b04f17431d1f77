/**
 * Multi-Source Fusion
 *
 * Combines the per-image results for several photos of the same hub into one
 * answer. Failures are returned as values, never thrown.
 */

import { isFusionMethod } from '../../types/fusion.js';
import type {
  FusedResult,
  FusionFailure,
  FusionOutcome,
  PerImageResult,
  PooledText,
} from '../../types/fusion.js';
import {
  resolveFusionConfig,
  type FusionConfig,
  type FusionConfigInput,
} from '../../config/ConfigSchema.js';
import { logger } from '../../utils/logger.js';
import { FUSION_STRATEGIES } from './strategies.js';
import { fuseLines } from './lineFusion.js';

function failure(code: FusionFailure['code'], error: string): FusionFailure {
  return { success: false, code, error };
}

export class MultiSourceFusion {
  private readonly config: FusionConfig;

  constructor(config: FusionConfigInput = {}) {
    this.config = resolveFusionConfig(config);
  }

  fuse(results: readonly PerImageResult[]): FusionOutcome {
    const { fusionMethod, minImages, maxImages, returnAlternatives, alternativeThreshold } = this.config;

    if (results.length === 0) {
      return failure('EMPTY_INPUT', 'No recognition results to fuse');
    }

    if (!isFusionMethod(fusionMethod)) {
      logger.error(`Unsupported fusion method: ${fusionMethod}`);
      return failure('UNSUPPORTED_FUSION_METHOD', `Unsupported fusion method: ${fusionMethod}`);
    }

    if (results.length < minImages) {
      logger.warn(`Only ${results.length} image(s) supplied, at least ${minImages} recommended`);
    }

    let used = results;
    if (results.length > maxImages) {
      logger.warn(`${results.length} images supplied, only the first ${maxImages} will be used`);
      used = results.slice(0, maxImages);
    }

    const pool: PooledText[] = used.flatMap((result, sourceIndex) =>
      result.success
        ? result.observations.map((observation) => ({
            text: observation.text,
            confidence: observation.confidence,
            sourceIndex,
          }))
        : []
    );

    if (pool.length === 0) {
      return failure('EMPTY_INPUT', 'Recognition failed for every image');
    }

    const outcome = FUSION_STRATEGIES[fusionMethod](pool, alternativeThreshold);
    const lines = fuseLines(used);

    const fused: FusedResult = {
      success: true,
      mergedText: outcome.mergedText,
      confidence: outcome.confidence,
      sourceCount: used.length,
      fusionMethod,
      lines,
      totalLines: lines.length,
      totalMergedTexts: outcome.mergedText.split(/\s+/).filter(Boolean).length,
    };

    if (returnAlternatives && outcome.alternatives.length > 0) {
      return { ...fused, alternatives: outcome.alternatives };
    }
    return fused;
  }
}

/**
 * Fuse per-image results with the given settings; gaps take defaults
 */
export function fuse(results: readonly PerImageResult[], config: FusionConfigInput = {}): FusionOutcome {
  return new MultiSourceFusion(config).fuse(results);
}
