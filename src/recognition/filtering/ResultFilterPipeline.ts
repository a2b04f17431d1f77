/**
 * Result Filter Pipeline
 *
 * Turns the raw observations of one image into a ranked, deduplicated
 * candidate list. Stages run in a fixed order; each consumes the cleaned
 * output of the previous one:
 *
 * 1. Region filter (stickers, labels)
 * 2. Confidence filter
 * 3. Length filter
 * 4. Character allow-list
 * 5. Inline confusion correction
 * 6. Deduplication
 * 7. Backfill to a minimum count
 * 8. Final ranking
 */

import type { TextObservation } from '../../types/observation.js';
import {
  resolveFilterConfig,
  type FilterConfig,
  type FilterConfigInput,
} from '../../config/ConfigSchema.js';
import { levenshteinSimilarity } from '../../utils/stringSimilarity.js';
import { logger } from '../../utils/logger.js';
import { boundsOf, inferImageExtent } from '../geometry.js';
import { applyInlineCorrection } from '../correction/inlineCorrection.js';
import { classifyRegion } from './regionRules.js';

const BACKFILL_MIN_LENGTH = 4;

/**
 * Ranking score used by the final stage: confidence plus domain bonuses
 */
export function rankingScore(text: string, confidence: number): number {
  let bonus = 0;
  if (/^AT[0-9]{3,}$/.test(text)) {
    bonus += 2.0;
  } else if (text.startsWith('AT')) {
    bonus += 1.5;
  }
  if (text.length >= 6 && text.length <= 8) {
    bonus += 0.5;
  }
  if (/^[0-9]+$/.test(text)) {
    bonus += 0.5;
  }
  return confidence + bonus;
}

export class ResultFilterPipeline {
  private readonly config: FilterConfig;
  private readonly allowedSet: ReadonlySet<string> | null;

  constructor(config: FilterConfigInput = {}) {
    this.config = resolveFilterConfig(config);
    this.allowedSet = this.config.allowedChars ? new Set(this.config.allowedChars) : null;
  }

  /**
   * Run every enabled stage over one image's observations
   */
  process(observations: readonly TextObservation[]): TextObservation[] {
    if (observations.length === 0) {
      return [];
    }

    let results: TextObservation[] = [...observations];

    if (this.config.enableRegionFilter) {
      results = this.filterByRegion(results);
    }

    results = this.filterByConfidence(results);
    results = this.filterByLength(results);

    if (this.config.enableCharFilter && this.allowedSet) {
      results = this.filterByChars(results);
    }

    if (this.config.enableCorrection) {
      results = this.correctCharacters(results);
    }

    if (this.config.enableDeduplication) {
      results = this.deduplicate(results);
    }

    if (this.config.minResults > 0 && results.length < this.config.minResults) {
      results = this.backfill(results, observations);
    }

    return this.rank(results);
  }

  private filterByRegion(results: TextObservation[]): TextObservation[] {
    const { width, height } = inferImageExtent(results);

    if (width === 0 || height === 0) {
      logger.warn('Cannot infer image size from bounding boxes, skipping region filter');
      return results;
    }

    const imageArea = width * height;
    const centerX = width / 2;
    const centerY = height / 2;
    const maxDist = Math.hypot(centerX, centerY);

    const filtered = results.filter((result) => {
      const bounds = boundsOf(result);
      if (!bounds) {
        return true;
      }

      const distToCenter = Math.hypot(bounds.centerX - centerX, bounds.centerY - centerY);
      const verdict = classifyRegion(
        {
          text: result.text,
          areaRatio: (bounds.width * bounds.height) / imageArea,
          aspectRatio: bounds.height > 0 ? bounds.width / bounds.height : 0,
          distRatio: maxDist > 0 ? distToCenter / maxDist : 1,
          centerX: bounds.centerX,
          centerY: bounds.centerY,
          imageWidth: width,
          imageHeight: height,
        },
        this.config.region
      );

      if (!verdict.keep) {
        logger.debug(`Region filter: ${result.text} - ${verdict.reasons.join(', ')}`);
      }
      return verdict.keep;
    });

    logger.info(`Region filter: ${results.length} -> ${filtered.length}`);
    return filtered;
  }

  private filterByConfidence(results: TextObservation[]): TextObservation[] {
    const filtered = results.filter((result) => {
      if (result.confidence >= this.config.minConfidence) {
        return true;
      }
      logger.debug(`Dropping low-confidence result: ${result.text} (confidence: ${result.confidence})`);
      return false;
    });

    logger.info(`Confidence filter: ${results.length} -> ${filtered.length}`);
    return filtered;
  }

  private filterByLength(results: TextObservation[]): TextObservation[] {
    const { minLength, maxLength } = this.config;
    const filtered = results.filter((result) => {
      const length = result.text.trim().length;
      if (length >= minLength && length <= maxLength) {
        return true;
      }
      logger.debug(`Dropping result with unusual length: ${result.text} (length: ${length})`);
      return false;
    });

    logger.info(`Length filter: ${results.length} -> ${filtered.length}`);
    return filtered;
  }

  private filterByChars(results: TextObservation[]): TextObservation[] {
    const filtered: TextObservation[] = [];

    for (const result of results) {
      const stripped = this.stripDisallowed(result.text);
      if (!stripped) {
        logger.debug(`Dropping result with no allowed characters: ${result.text}`);
        continue;
      }
      if (stripped !== result.text) {
        logger.debug(`Character filter: ${result.text} -> ${stripped}`);
        filtered.push({ ...result, text: stripped });
      } else {
        filtered.push(result);
      }
    }

    logger.info(`Character filter: ${results.length} -> ${filtered.length}`);
    return filtered;
  }

  private correctCharacters(results: TextObservation[]): TextObservation[] {
    return results.map((result) => {
      const corrected = applyInlineCorrection(result.text);
      if (corrected === result.text) {
        return result;
      }
      logger.debug(`Character correction: ${result.text} -> ${corrected}`);
      return { ...result, text: corrected, corrected: true, originalText: result.text };
    });
  }

  private deduplicate(results: TextObservation[]): TextObservation[] {
    const unique: TextObservation[] = [];
    const seenTexts: string[] = [];

    for (const result of results) {
      const duplicateOf = seenTexts.find((seen) => this.isDuplicate(result.text, seen));
      if (duplicateOf !== undefined) {
        logger.debug(`Removing duplicate result: ${result.text} (similar to ${duplicateOf})`);
        continue;
      }
      unique.push(result);
      seenTexts.push(result.text);
    }

    logger.info(`Deduplication: ${results.length} -> ${unique.length}`);
    return unique;
  }

  /**
   * Top up from the unfiltered observations, most confident first
   */
  private backfill(results: TextObservation[], original: readonly TextObservation[]): TextObservation[] {
    const { minResults } = this.config;
    const existingTexts = results.map((result) => result.text);
    const supplemented: TextObservation[] = [];
    const byConfidence = [...original].sort((a, b) => b.confidence - a.confidence);

    for (const item of byConfidence) {
      if (results.length + supplemented.length >= minResults) {
        break;
      }

      const cleaned = this.allowedSet ? this.stripDisallowed(item.text) : item.text;
      if (cleaned.length < BACKFILL_MIN_LENGTH) {
        continue;
      }
      if (existingTexts.some((existing) => this.isDuplicate(cleaned, existing))) {
        continue;
      }

      supplemented.push(cleaned === item.text ? item : { ...item, text: cleaned });
      existingTexts.push(cleaned);
    }

    if (supplemented.length > 0) {
      logger.info(`Backfilled ${supplemented.length} result(s) to reach minimum of ${minResults}`);
    }

    return [...results, ...supplemented].slice(0, minResults);
  }

  private rank(results: TextObservation[]): TextObservation[] {
    return results
      .map((result) => ({ result, score: rankingScore(result.text, result.confidence) }))
      .sort((a, b) => b.score - a.score)
      .map(({ result }) => result);
  }

  private stripDisallowed(text: string): string {
    const allowed = this.allowedSet;
    if (!allowed) return text;
    return [...text].filter((char) => allowed.has(char)).join('');
  }

  private isDuplicate(text: string, seen: string): boolean {
    return levenshteinSimilarity(text, seen) >= this.config.similarityThreshold;
  }
}

/**
 * Filter and rank one image's observations
 */
export function filterAndRank(
  observations: readonly TextObservation[],
  config: FilterConfigInput = {}
): TextObservation[] {
  return new ResultFilterPipeline(config).process(observations);
}
