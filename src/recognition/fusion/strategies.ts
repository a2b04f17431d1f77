/**
 * Flat-text fusion strategies
 *
 * Each strategy picks one answer from the texts pooled across all images.
 * The pool is never empty when a strategy runs.
 */

import type {
  FusionAlternative,
  FusionCandidate,
  FusionMethod,
  PooledText,
  StrategyOutcome,
} from '../../types/fusion.js';
import { logger } from '../../utils/logger.js';

export type FusionStrategy = (pool: readonly PooledText[], alternativeThreshold: number) => StrategyOutcome;

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Confidences per distinct text, in first-seen order
 */
function groupByText(pool: readonly PooledText[]): Map<string, number[]> {
  const groups = new Map<string, number[]>();
  for (const item of pool) {
    const confidences = groups.get(item.text);
    if (confidences) {
      confidences.push(item.confidence);
    } else {
      groups.set(item.text, [item.confidence]);
    }
  }
  return groups;
}

/**
 * Winner is the top-scored candidate; runners-up within the threshold become alternatives
 */
function pickByScore(scored: FusionCandidate[], alternativeThreshold: number): {
  best: FusionCandidate;
  alternatives: FusionAlternative[];
} {
  // Stable sort keeps first-seen order among equal scores
  const ranked = [...scored].sort((a, b) => b.score - a.score);
  const [best, ...rest] = ranked;

  const alternatives = rest
    .filter((candidate) => candidate.score >= best.score * alternativeThreshold)
    .map((candidate) => ({
      text: candidate.text,
      score: candidate.score,
      confidence: candidate.avgConfidence,
    }));

  return { best, alternatives };
}

/**
 * Frequency x average confidence x length weight, favouring longer readings
 */
export const votingFusion: FusionStrategy = (pool, alternativeThreshold) => {
  const scored: FusionCandidate[] = [];

  for (const [text, confidences] of groupByText(pool)) {
    const count = confidences.length;
    const frequency = count / pool.length;
    const avgConfidence = mean(confidences);
    const lengthWeight = Math.min(text.length / 3, 1.5);

    scored.push({ text, score: frequency * avgConfidence * lengthWeight, count, frequency, avgConfidence });
  }

  const { best, alternatives } = pickByScore(scored, alternativeThreshold);
  logger.info(
    `Voting fusion: ${best.text} (score: ${best.score.toFixed(3)}, frequency: ${best.frequency.toFixed(2)})`
  );

  return { mergedText: best.text, confidence: best.avgConfidence, alternatives };
};

/**
 * Sum of confidences per text
 */
export const weightedFusion: FusionStrategy = (pool, alternativeThreshold) => {
  const scored: FusionCandidate[] = [];

  for (const [text, confidences] of groupByText(pool)) {
    scored.push({
      text,
      score: confidences.reduce((sum, value) => sum + value, 0),
      count: confidences.length,
      frequency: confidences.length / pool.length,
      avgConfidence: mean(confidences),
    });
  }

  const { best, alternatives } = pickByScore(scored, alternativeThreshold);
  logger.info(`Weighted fusion: ${best.text} (total weight: ${best.score.toFixed(3)})`);

  return { mergedText: best.text, confidence: best.avgConfidence, alternatives };
};

/**
 * Single most confident reading
 */
export const smartFusion: FusionStrategy = (pool, alternativeThreshold) => {
  const sorted = [...pool].sort((a, b) => b.confidence - a.confidence);
  const [best, ...rest] = sorted;

  const alternatives: FusionAlternative[] = [];
  const seenTexts = new Set([best.text]);

  for (const item of rest) {
    if (seenTexts.has(item.text) || item.confidence < best.confidence * alternativeThreshold) {
      continue;
    }
    alternatives.push({ text: item.text, confidence: item.confidence });
    seenTexts.add(item.text);
  }

  logger.info(`Smart fusion: ${best.text} (confidence: ${best.confidence.toFixed(3)})`);
  return { mergedText: best.text, confidence: best.confidence, alternatives };
};

/**
 * Every distinct text, most confident first
 */
export const mergeFusion: FusionStrategy = (pool) => {
  const unique = new Map<string, number>();
  for (const item of pool) {
    const previous = unique.get(item.text);
    if (previous === undefined || item.confidence > previous) {
      unique.set(item.text, item.confidence);
    }
  }

  const sorted = [...unique.entries()].sort((a, b) => b[1] - a[1]);
  const mergedText = sorted.map(([text]) => text).join(' ');
  const confidence = mean(sorted.map(([, value]) => value));

  logger.info(`Merge fusion: ${mergedText} (average confidence: ${confidence.toFixed(3)})`);
  return { mergedText, confidence, alternatives: [] };
};

export const FUSION_STRATEGIES: Readonly<Record<FusionMethod, FusionStrategy>> = {
  voting: votingFusion,
  weighted: weightedFusion,
  smart: smartFusion,
  merge: mergeFusion,
};
