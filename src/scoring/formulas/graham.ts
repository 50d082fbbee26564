import type { ValuationConstants } from '@/scoring/scoring_config';

export interface IntrinsicValueResult {
  intrinsicValue: number | null;
  growthUsed: number;
  yieldFactor: number;
  skipped: boolean;
  reason?: string;
}

const clamp = (value: number, min: number, max: number): number =>
  Math.max(min, Math.min(max, value));

/**
 * Growth-adjusted capitalization of earnings:
 *   V = EPS * (baseMultiple + growthMultiplier * g) * (referenceYield / bondYield)
 *
 * g is the expected growth rate in percent, held inside [growthFloor, growthCap].
 * Without a bond yield the yield factor is 1.
 */
export function calculateIntrinsicValue(
  trailingEps: number,
  expectedGrowthRate: number,
  bondYield: number | null | undefined,
  constants: ValuationConstants
): IntrinsicValueResult {
  const growthUsed = clamp(expectedGrowthRate, constants.growthFloor, constants.growthCap);
  const yieldFactor =
    bondYield != null && Number.isFinite(bondYield) && bondYield > 0
      ? constants.referenceYield / bondYield
      : 1;

  if (!Number.isFinite(trailingEps) || trailingEps <= 0) {
    return {
      intrinsicValue: null,
      growthUsed,
      yieldFactor,
      skipped: true,
      reason: 'non_positive_eps',
    };
  }

  const multiple = constants.baseMultiple + constants.growthMultiplier * growthUsed;
  return {
    intrinsicValue: trailingEps * multiple * yieldFactor,
    growthUsed,
    yieldFactor,
    skipped: false,
  };
}
