/**
 * Region classification rules
 *
 * Separates engraved hub text from stickers, labels and noise by geometry.
 * Hard rules always reject; label heuristics reject unless the region's
 * size falls in the band typical of engraved characters.
 */

import type { RegionFilterConfig } from '../../config/ConfigSchema.js';

/**
 * Geometry of one observation relative to the inferred image
 */
export interface RegionFeatures {
  text: string;
  areaRatio: number;
  aspectRatio: number;
  /** Distance from image center, 1.0 at a corner */
  distRatio: number;
  centerX: number;
  centerY: number;
  imageWidth: number;
  imageHeight: number;
}

export type RegionRuleKind = 'hard' | 'label';

export interface RegionRule {
  readonly name: string;
  readonly kind: RegionRuleKind;
  /** Returns a rejection reason, or null when the rule does not fire */
  readonly check: (features: RegionFeatures, config: RegionFilterConfig) => string | null;
}

export interface RegionVerdict {
  keep: boolean;
  reasons: string[];
  exempt: boolean;
}

/** Area band characteristic of characters engraved on the hub */
export const ENGRAVED_TEXT_AREA_BAND = { min: 0.0005, max: 0.008 } as const;

const EDGE_MARGIN = 0.15;

export const REGION_RULES: readonly RegionRule[] = [
  {
    name: 'area-bounds',
    kind: 'hard',
    check: ({ areaRatio }, config) => {
      if (areaRatio < config.minAreaRatio) return `area too small (${areaRatio.toFixed(4)})`;
      if (areaRatio > config.maxAreaRatio) return `area too large (${areaRatio.toFixed(4)})`;
      return null;
    },
  },
  {
    name: 'aspect-bounds',
    kind: 'hard',
    check: ({ aspectRatio }, config) => {
      if (aspectRatio < config.minAspectRatio) return `aspect ratio too small (${aspectRatio.toFixed(2)})`;
      if (aspectRatio > config.maxAspectRatio) return `aspect ratio too large (${aspectRatio.toFixed(2)})`;
      return null;
    },
  },
  {
    name: 'center-region',
    kind: 'hard',
    check: ({ distRatio }, config) => {
      if (config.centerRegionOnly && distRatio > 1 - config.centerRegionRatio) {
        return `outside center region (${distRatio.toFixed(2)})`;
      }
      return null;
    },
  },
  {
    name: 'long-numeric-label',
    kind: 'label',
    check: ({ text, aspectRatio }) => {
      if (/^[0-9]+$/.test(text) && text.length >= 7 && aspectRatio >= 0.8 && aspectRatio <= 3.0) {
        return `long numeric label (${aspectRatio.toFixed(2)})`;
      }
      return null;
    },
  },
  {
    name: 'large-regular-blob',
    kind: 'label',
    check: ({ areaRatio, aspectRatio }) => {
      if (areaRatio > 0.015 && aspectRatio >= 0.8 && aspectRatio <= 4.0) {
        return `large regular region (${areaRatio.toFixed(4)})`;
      }
      return null;
    },
  },
  {
    name: 'peripheral-sticker',
    kind: 'label',
    check: ({ centerX, centerY, imageWidth, imageHeight, areaRatio }) => {
      const nearEdge =
        centerX < imageWidth * EDGE_MARGIN ||
        centerX > imageWidth * (1 - EDGE_MARGIN) ||
        centerY < imageHeight * EDGE_MARGIN ||
        centerY > imageHeight * (1 - EDGE_MARGIN);
      return nearEdge && areaRatio > 0.005 ? 'near image edge' : null;
    },
  },
];

export function isEngravedTextSize(areaRatio: number): boolean {
  return areaRatio >= ENGRAVED_TEXT_AREA_BAND.min && areaRatio <= ENGRAVED_TEXT_AREA_BAND.max;
}

/**
 * Evaluate every rule in order and decide whether the region is kept
 */
export function classifyRegion(
  features: RegionFeatures,
  config: RegionFilterConfig,
  rules: readonly RegionRule[] = REGION_RULES
): RegionVerdict {
  const exempt = isEngravedTextSize(features.areaRatio);
  const reasons: string[] = [];

  for (const rule of rules) {
    if (rule.kind === 'label' && exempt) continue;
    const reason = rule.check(features, config);
    if (reason) reasons.push(reason);
  }

  return { keep: reasons.length === 0, reasons, exempt };
}
