import type { Disposition, WasteCategory } from './types';

export const DEFAULT_ENVIRONMENTAL_MULTIPLIER = 1.0;
const SCORE_PRECISION = 2;

export type WasteScore = {
  environmentalScore: number;
  pointsAwarded: number;
};

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Score a record at its terminal transition. Points are only earned when the
 * waste was recycled; the environmental score is kept either way.
 */
export function computeScore(quantity: number, category: WasteCategory, disposition: Disposition): WasteScore {
  const multiplier = category.environmentalMultiplier ?? DEFAULT_ENVIRONMENTAL_MULTIPLIER;
  return {
    environmentalScore: roundTo(quantity * multiplier, SCORE_PRECISION),
    pointsAwarded: disposition === 'recycled' ? Math.round(category.basePoints * quantity) : 0,
  };
}
