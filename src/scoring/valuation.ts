/**
 * Valuation Model
 * Price against Graham intrinsic value, mapped onto 1-20
 */

import { inverseLinearScale, SCORE_MAX, SCORE_MIN, toSubScore } from './normalize';
import { calculateIntrinsicValue } from './formulas/graham';
import type { ScoringConfig } from './scoring_config';
import type { SecuritySnapshot } from './pure/types';

export interface ValuationScoreResult {
  score: number;
  intrinsicValue: number | null;
  priceToValue: number | null;
}

export function mapPriceToValueToScore(ratio: number, config: ScoringConfig): number {
  const { ratioFloor, ratioCeiling } = config.valuation;
  if (ratio <= ratioFloor) return SCORE_MAX;
  if (ratio >= ratioCeiling) return SCORE_MIN;
  return toSubScore(inverseLinearScale(ratio, ratioFloor, ratioCeiling));
}

export function scoreValuation(
  snapshot: SecuritySnapshot,
  config: ScoringConfig
): ValuationScoreResult {
  const { intrinsicValue } = calculateIntrinsicValue(
    snapshot.trailingEps,
    snapshot.expectedGrowthRate,
    snapshot.bondYield,
    config.valuation
  );

  // Loss-making (or zero-earnings) companies have no meaningful earnings value.
  if (intrinsicValue === null || intrinsicValue <= 0) {
    return { score: SCORE_MIN, intrinsicValue, priceToValue: null };
  }

  const priceToValue = snapshot.currentPrice / intrinsicValue;
  return {
    score: mapPriceToValueToScore(priceToValue, config),
    intrinsicValue,
    priceToValue,
  };
}
