/**
 * Groups observations into rows by vertical proximity
 */

import type { Line, TextObservation } from '../../types/observation.js';
import { DEFAULT_LINE_GROUPING_CONFIG } from '../../config/ConfigSchema.js';
import { logger } from '../../utils/logger.js';
import { boundsOf } from '../geometry.js';

interface PositionedObservation {
  observation: TextObservation;
  centerX: number;
  centerY: number;
}

function position(observation: TextObservation): PositionedObservation {
  const bounds = boundsOf(observation);
  return {
    observation,
    centerX: bounds?.centerX ?? 0,
    centerY: bounds?.centerY ?? 0,
  };
}

function toLine(cluster: PositionedObservation[]): Line {
  const members = [...cluster]
    .sort((a, b) => a.centerX - b.centerX)
    .map((entry) => entry.observation);

  const confidence = members.reduce((sum, member) => sum + member.confidence, 0) / members.length;

  return {
    text: members.map((member) => member.text).join(' '),
    confidence,
    members,
  };
}

/**
 * Cluster observations into lines, top to bottom.
 * A row starts at its first member; later observations join while their
 * vertical center stays within yThreshold of it.
 */
export function groupLines(
  observations: readonly TextObservation[],
  yThreshold: number = DEFAULT_LINE_GROUPING_CONFIG.yThreshold
): Line[] {
  if (observations.length === 0) {
    return [];
  }

  const sorted = observations.map(position).sort((a, b) => a.centerY - b.centerY);

  const clusters: PositionedObservation[][] = [];
  let current: PositionedObservation[] = [];

  for (const entry of sorted) {
    const anchor = current[0];
    if (anchor && Math.abs(entry.centerY - anchor.centerY) > yThreshold) {
      clusters.push(current);
      current = [];
    }
    current.push(entry);
  }
  clusters.push(current);

  const lines = clusters.map(toLine);
  logger.debug(`Grouped ${observations.length} observation(s) into ${lines.length} line(s)`);
  return lines;
}
