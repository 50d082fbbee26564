/**
 * Metric Normalizer
 * Moat (market cap), Growth (EPS growth) and Balance (debt/equity) on the 1-20 scale
 */

import { lookupStep } from './normalize';
import type { ScoringConfig } from './scoring_config';
import type { SecuritySnapshot } from './pure/types';

export interface FundamentalSubScores {
  moat: number;
  growth: number;
  balance: number;
}

export function scoreMoat(marketCap: number, config: ScoringConfig): number {
  return lookupStep(marketCap, config.moat);
}

export function scoreGrowth(epsGrowthRate: number, config: ScoringConfig): number {
  return lookupStep(epsGrowthRate, config.growth);
}

export function scoreBalance(debtToEquity: number, config: ScoringConfig): number {
  return lookupStep(debtToEquity, config.balance);
}

export function calculateFundamentalScores(
  snapshot: SecuritySnapshot,
  config: ScoringConfig
): FundamentalSubScores {
  return {
    moat: scoreMoat(snapshot.marketCap, config),
    growth: scoreGrowth(snapshot.epsGrowthRate, config),
    balance: scoreBalance(snapshot.debtToEquity, config),
  };
}
