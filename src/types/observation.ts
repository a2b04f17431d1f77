/**
 * Observation types shared by the filtering, line grouping and fusion stages
 */

/**
 * A pixel-space coordinate pair: [x, y]
 */
export type Point = readonly [number, number];

/**
 * Corners of a detected text region, clockwise from top-left.
 * Normally four points, but OCR engines occasionally report degenerate boxes.
 */
export type BoundingQuad = readonly Point[];

/**
 * One detected text region as reported by an OCR engine
 */
export interface TextObservation {
  /**
   * Recognized glyphs
   */
  readonly text: string;

  /**
   * Recognition confidence (0.0-1.0)
   */
  readonly confidence: number;

  /**
   * Region corners; absent when the engine reports no geometry
   */
  readonly boundingQuad?: BoundingQuad;

  /**
   * Index of the image in a multi-image batch that produced this observation
   */
  readonly sourceImageIndex?: number;

  /**
   * Set when in-pipeline confusion correction changed the text
   */
  readonly corrected?: boolean;

  /**
   * Text before confusion correction
   */
  readonly originalText?: string;
}

/**
 * A row of observations merged into one logical unit of text
 */
export interface Line {
  /**
   * Member texts joined with single spaces, left to right
   */
  readonly text: string;

  /**
   * Arithmetic mean of member confidences
   */
  readonly confidence: number;

  /**
   * Members sorted by horizontal center
   */
  readonly members: readonly TextObservation[];
}

/**
 * Structural checks for observations arriving from outside the process
 */
export class ObservationValidator {
  static isPoint(value: unknown): value is Point {
    return (
      Array.isArray(value) &&
      value.length >= 2 &&
      typeof value[0] === 'number' &&
      typeof value[1] === 'number' &&
      Number.isFinite(value[0]) &&
      Number.isFinite(value[1])
    );
  }

  /**
   * At least two finite points are needed to derive a bounding box
   */
  static isBoundingQuad(value: unknown): value is BoundingQuad {
    return Array.isArray(value) && value.length >= 2 && value.every((p) => this.isPoint(p));
  }
}
