/**
 * Composite Builder
 * Short/Mid/Long-term blends of the five sub-scores (each 1-20)
 */

import { DEFAULT_SCORING_CONFIG } from './scoring_defaults';
import { SUB_SCORE_KEYS, type HorizonWeights, type WeightVector } from './scoring_config';
import type { CompositeScores, SubScores } from './pure/types';

export const DEFAULT_HORIZON_WEIGHTS: HorizonWeights = DEFAULT_SCORING_CONFIG.horizonWeights;

export function weightedComposite(subScores: SubScores, weights: WeightVector): number {
  return SUB_SCORE_KEYS.reduce((sum, key) => sum + subScores[key] * weights[key], 0);
}

/**
 * Weights sum to 1 and every sub-score is already in [1, 20], so the
 * composites land in [1, 20] without further clamping.
 */
export function buildComposites(
  subScores: SubScores,
  weights: HorizonWeights = DEFAULT_HORIZON_WEIGHTS
): CompositeScores {
  return {
    shortTerm: weightedComposite(subScores, weights.shortTerm),
    midTerm: weightedComposite(subScores, weights.midTerm),
    longTerm: weightedComposite(subScores, weights.longTerm),
  };
}
