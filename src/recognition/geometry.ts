/**
 * Bounding box helpers over possibly malformed quads
 */

import { ObservationValidator, type TextObservation } from '../types/observation.js';

export interface BoxBounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
  width: number;
  height: number;
  centerX: number;
  centerY: number;
}

/**
 * Axis-aligned bounds of an observation's quad, or null when it has no usable geometry
 */
export function boundsOf(observation: TextObservation): BoxBounds | null {
  const quad = observation.boundingQuad;
  if (!ObservationValidator.isBoundingQuad(quad)) {
    return null;
  }

  const xs = quad.map((point) => point[0]);
  const ys = quad.map((point) => point[1]);
  const minX = Math.min(...xs);
  const maxX = Math.max(...xs);
  const minY = Math.min(...ys);
  const maxY = Math.max(...ys);

  return {
    minX,
    minY,
    maxX,
    maxY,
    width: maxX - minX,
    height: maxY - minY,
    centerX: (minX + maxX) / 2,
    centerY: (minY + maxY) / 2,
  };
}

/**
 * Image extent inferred from the furthest observed corner.
 * Returns zero dimensions when no observation carries geometry.
 */
export function inferImageExtent(observations: readonly TextObservation[]): { width: number; height: number } {
  let width = 0;
  let height = 0;

  for (const observation of observations) {
    const bounds = boundsOf(observation);
    if (!bounds) continue;
    width = Math.max(width, bounds.maxX);
    height = Math.max(height, bounds.maxY);
  }

  return { width, height };
}
