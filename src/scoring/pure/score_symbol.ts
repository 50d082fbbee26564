import type { ScoringConfig } from '@/scoring/scoring_config';
import { calculateFundamentalScores } from '@/scoring/fundamental';
import { scoreValuation } from '@/scoring/valuation';
import { scoreSentiment } from '@/scoring/sentiment';
import { buildComposites } from '@/scoring/composite';
import { classifyActivity } from '@/scoring/activity';
import { matchStep } from '@/scoring/normalize';
import { collectDataWarnings } from '@/scoring/warnings';
import type { MatchedBands, ScoredTicker, SecuritySnapshot, SubScores } from './types';

function matchBands(snapshot: SecuritySnapshot, config: ScoringConfig): MatchedBands {
  return {
    moat: matchStep(snapshot.marketCap, config.moat).bound,
    growth: matchStep(snapshot.epsGrowthRate, config.growth).bound,
    balance: matchStep(snapshot.debtToEquity, config.balance).bound,
    dividend: matchStep(snapshot.dividendYield, config.sentiment.dividend).bound,
  };
}

/**
 * Scores one snapshot that has already passed validation.
 * Pure: same snapshot and config, same result.
 */
export function scoreSnapshotPure(snapshot: SecuritySnapshot, config: ScoringConfig): ScoredTicker {
  const fundamentals = calculateFundamentalScores(snapshot, config);
  const valuation = scoreValuation(snapshot, config);
  const sentiment = scoreSentiment(snapshot, config);

  const subScores: SubScores = {
    moat: fundamentals.moat,
    growth: fundamentals.growth,
    balance: fundamentals.balance,
    valuation: valuation.score,
    sentiment: sentiment.score,
  };

  return {
    ok: true,
    ticker: snapshot.ticker,
    subScores,
    composites: buildComposites(subScores, config.horizonWeights),
    breakdown: {
      intrinsicValue: valuation.intrinsicValue,
      priceToValue: valuation.priceToValue,
      canonicalSector: sentiment.canonicalSector,
      momentumPercent: sentiment.momentumPercent,
      sentimentComponents: sentiment.components,
      bands: matchBands(snapshot, config),
      warnings: collectDataWarnings(snapshot),
    },
    activity: classifyActivity(snapshot),
  };
}
