/**
 * Wheel Code Recognizer
 *
 * Runs one or more images through enhancement, observation, filtering and
 * line grouping, and fuses several photos of the same hub into one answer.
 */

import type { RecognitionConfig, FusionConfigInput } from '../config/ConfigSchema.js';
import { ConfigLoader } from '../config/ConfigLoader.js';
import type { PerImageResult } from '../types/fusion.js';
import type {
  MultiAngleOutcome,
  RecognitionFailure,
  RecognitionOutcome,
} from '../types/recognition.js';
import { logger } from '../utils/logger.js';
import { filterAndRank } from './filtering/ResultFilterPipeline.js';
import { groupLines } from './lines/LineGrouper.js';
import { fuse } from './fusion/MultiSourceFusion.js';
import {
  ocrFailure,
  type ImageEnhancer,
  type ImageInput,
  type ObservationOutcome,
  type ObservationSource,
} from './sources/types.js';

export interface WheelCodeRecognizerDependencies {
  source: ObservationSource;
  enhancer?: ImageEnhancer;
}

export class WheelCodeRecognizer {
  private readonly source: ObservationSource;
  private readonly enhancer?: ImageEnhancer;
  private readonly config: RecognitionConfig;

  constructor(dependencies: WheelCodeRecognizerDependencies, config?: RecognitionConfig) {
    this.source = dependencies.source;
    this.enhancer = dependencies.enhancer;
    this.config = config ?? ConfigLoader.getDefaultConfig();
  }

  /**
   * Recognize the codes on a single image
   */
  async recognize(image: ImageInput): Promise<RecognitionOutcome> {
    const startTime = Date.now();

    const prepared = await this.enhance(image);
    const outcome = await this.observeWithTimeout(prepared);

    if (!outcome.ok) {
      logger.error(`Recognition failed: ${outcome.error.message}`);
      const failure: RecognitionFailure = {
        success: false,
        error: outcome.error,
        processingTimeMs: Date.now() - startTime,
      };
      return failure;
    }

    const results = filterAndRank(outcome.observations, this.config.postprocessing);
    const lines = groupLines(results, this.config.lineGrouping.yThreshold);

    logger.info(
      `Recognized ${results.length} text(s) in ${lines.length} line(s) from ${outcome.observations.length} observation(s)`
    );

    return {
      success: true,
      results,
      lines,
      totalTexts: results.length,
      totalLines: lines.length,
      rawCount: outcome.observations.length,
      processingTimeMs: Date.now() - startTime,
      engineUsed: outcome.engine,
    };
  }

  /**
   * Recognize several images with bounded concurrency; results keep submission order
   */
  async recognizeBatch(images: readonly ImageInput[]): Promise<RecognitionOutcome[]> {
    const outcomes: RecognitionOutcome[] = new Array(images.length);
    const workerCount = Math.max(1, Math.min(this.config.processing.maxConcurrent, images.length));
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < images.length) {
        const index = next++;
        outcomes[index] = await this.recognize(images[index]);
      }
    };

    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    const succeeded = outcomes.filter((outcome) => outcome.success).length;
    logger.info(`Batch recognition: ${succeeded}/${images.length} image(s) succeeded`);
    return outcomes;
  }

  /**
   * Recognize several photos of the same hub and fuse them
   */
  async recognizeMultiAngle(
    images: readonly ImageInput[],
    fusionOverrides: FusionConfigInput = {}
  ): Promise<MultiAngleOutcome> {
    const individualResults = await this.recognizeBatch(images);

    const perImage: PerImageResult[] = individualResults.map((outcome, index) =>
      outcome.success
        ? {
            success: true,
            observations: outcome.results.map((observation) => ({ ...observation, sourceImageIndex: index })),
            lines: outcome.lines,
          }
        : { success: false, observations: [] }
    );

    const fused = fuse(perImage, { ...this.config.multiAngle, ...fusionOverrides });
    return { ...fused, individualResults };
  }

  private async enhance(image: ImageInput): Promise<ImageInput> {
    if (!this.enhancer) {
      return image;
    }
    try {
      return await this.enhancer.enhance(image);
    } catch (error) {
      logger.warn('Image enhancement failed, using the original image', {
        error: error instanceof Error ? error.message : String(error),
      });
      return image;
    }
  }

  private async observeWithTimeout(image: ImageInput): Promise<ObservationOutcome> {
    const timeoutMs = this.config.processing.sourceTimeoutMs;
    let timeoutId: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<ObservationOutcome>((resolve) => {
      timeoutId = setTimeout(
        () => resolve(ocrFailure('TIMEOUT', `${this.source.name} timed out after ${timeoutMs}ms`)),
        timeoutMs
      );
    });

    try {
      return await Promise.race([this.source.observe(image), timeoutPromise]);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return ocrFailure('ENGINE_FAILED', `${this.source.name} failed: ${message}`);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
