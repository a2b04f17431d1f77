/**
 * Positional line fusion: line i of every image is assumed to show the same
 * physical row, so rows are fused position by position.
 */

import type { FusedLine, PerImageResult } from '../../types/fusion.js';
import type { Line } from '../../types/observation.js';
import { areLineTextsSimilar } from '../../utils/stringSimilarity.js';
import { logger } from '../../utils/logger.js';

interface TextGroup {
  text: string;
  confidences: number[];
  maxConfidence: number;
}

function averageOf(group: TextGroup): number {
  return group.confidences.reduce((sum, value) => sum + value, 0) / group.confidences.length;
}

/**
 * Cluster line texts by similarity to each group's representative.
 * The representative moves to a member read with higher confidence.
 */
export function groupSimilarTexts(lines: readonly Pick<Line, 'text' | 'confidence'>[]): TextGroup[] {
  const groups: TextGroup[] = [];

  for (const line of lines) {
    const text = line.text.trim();
    if (!text) continue;

    const group = groups.find((candidate) => areLineTextsSimilar(text, candidate.text));
    if (!group) {
      groups.push({ text, confidences: [line.confidence], maxConfidence: line.confidence });
      continue;
    }

    group.confidences.push(line.confidence);
    if (line.confidence > group.maxConfidence) {
      group.text = text;
      group.maxConfidence = line.confidence;
    }
  }

  return groups;
}

function pickBestGroup(groups: readonly TextGroup[]): TextGroup {
  return groups.reduce((best, group) => {
    const count = group.confidences.length;
    const bestCount = best.confidences.length;
    if (count !== bestCount) {
      return count > bestCount ? group : best;
    }
    return averageOf(group) > averageOf(best) ? group : best;
  });
}

/**
 * Fuse the line lists of every successful result, one output line per row position
 */
export function fuseLines(results: readonly PerImageResult[]): FusedLine[] {
  const linesByImage = results
    .filter((result) => result.success && result.lines && result.lines.length > 0)
    .map((result) => result.lines ?? []);

  if (linesByImage.length === 0) {
    return [];
  }

  const maxLines = Math.max(...linesByImage.map((lines) => lines.length));
  const fused: FusedLine[] = [];

  for (let position = 0; position < maxLines; position++) {
    const linesAtPosition = linesByImage
      .filter((lines) => position < lines.length)
      .map((lines) => lines[position]);

    const groups = groupSimilarTexts(linesAtPosition);
    if (groups.length === 0) {
      continue;
    }

    const best = pickBestGroup(groups);
    const confidence = averageOf(best);
    logger.debug(
      `Line ${position + 1}: '${best.text}' (${best.confidences.length} occurrence(s), confidence: ${confidence.toFixed(2)})`
    );

    fused.push({ text: best.text, confidence, occurrenceCount: best.confidences.length });
  }

  logger.info(`Line fusion produced ${fused.length} line(s)`);
  return fused;
}
