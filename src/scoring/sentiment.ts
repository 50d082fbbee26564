/**
 * Sentiment Aggregator
 * Dividend yield, sector favorability and recent price momentum blended into one 1-20 score
 */

import { clamp, lookupStep, toSubScore } from './normalize';
import { calculateMomentum } from './formulas/momentum';
import type { ScoringConfig, SentimentConfig } from './scoring_config';
import type { SecuritySnapshot } from './pure/types';

export interface SentimentScoreResult {
  score: number;
  components: {
    dividend: number;
    sector: number;
    momentum: number;
  };
  canonicalSector: string;
  momentumPercent: number | null;
}

/**
 * Maps a provider's sector label onto a key of the sector bonus table.
 * Exact (case-insensitive) matches win; otherwise the first alias keyword
 * contained in the label decides. Unmatched labels are returned trimmed.
 */
export function resolveSector(rawSector: string, config: SentimentConfig): string {
  const label = rawSector.trim();
  const upper = label.toUpperCase();

  const exact = Object.keys(config.sectorBonus).find((sector) => sector.toUpperCase() === upper);
  if (exact) return exact;

  for (const [keyword, sector] of Object.entries(config.sectorAliases)) {
    if (upper.includes(keyword.toUpperCase())) return sector;
  }
  return label;
}

export function scoreDividendComponent(dividendYield: number, config: SentimentConfig): number {
  return lookupStep(dividendYield, config.dividend);
}

export function scoreSectorComponent(canonicalSector: string, config: SentimentConfig): number {
  // Own keys only: labels such as "constructor" must not resolve to prototype members
  const bonus = Object.hasOwn(config.sectorBonus, canonicalSector)
    ? config.sectorBonus[canonicalSector]
    : config.defaultSectorBonus;
  return clamp(config.neutral + bonus);
}

export function scoreMomentumComponent(
  momentumPercent: number | null,
  config: SentimentConfig
): number {
  if (momentumPercent === null) return config.neutral;
  return clamp(config.neutral + momentumPercent * config.momentumPointsPerPercent);
}

export function scoreSentiment(
  snapshot: SecuritySnapshot,
  config: ScoringConfig
): SentimentScoreResult {
  const cfg = config.sentiment;
  const canonicalSector = resolveSector(snapshot.sector, cfg);
  const momentum = calculateMomentum(snapshot.recentPriceHistory);

  const components = {
    dividend: scoreDividendComponent(snapshot.dividendYield, cfg),
    sector: scoreSectorComponent(canonicalSector, cfg),
    momentum: scoreMomentumComponent(momentum.changePercent, cfg),
  };

  const blended =
    components.dividend * cfg.weights.dividend +
    components.sector * cfg.weights.sector +
    components.momentum * cfg.weights.momentum;

  return {
    score: toSubScore(blended),
    components,
    canonicalSector,
    momentumPercent: momentum.changePercent,
  };
}
