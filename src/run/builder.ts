/**
 * Run Record Builder
 * Constructs the run.json output structure handed to the presentation layer
 */

import { formatDate, getRunId } from '@/core/time';
import { contentHash } from '@/core/seed';
import { roundScore } from '@/scoring/normalize';
import type { BatchResult } from '@/scoring/engine';
import type { ScoringConfig, WeightVector } from '@/scoring/scoring_config';
import type { TickerResult } from '@/scoring/pure/types';
import type { RunEntry, RunRecordV1, RunWeightRow } from './types';

export const ENGINE_VERSION = '1.0.0';

export interface BuildRunOptions {
  watchlistName: string;
  tickers: string[];
  config: ScoringConfig;
  preset?: string | null;
  runDate?: Date;
}

const roundOrNull = (value: number | null, decimals: number): number | null =>
  value === null ? null : roundScore(value, decimals);

function toWeightRow(weights: WeightVector): RunWeightRow {
  return {
    moat: weights.moat,
    growth: weights.growth,
    balance: weights.balance,
    valuation: weights.valuation,
    sentiment: weights.sentiment,
  };
}

export function toRunEntry(result: TickerResult): RunEntry {
  if (!result.ok) {
    return {
      ticker: result.ticker,
      status: 'failed',
      error: { kind: result.error.kind, issues: [...result.error.issues] },
    };
  }

  const { subScores, composites, breakdown } = result;
  return {
    ticker: result.ticker,
    status: 'scored',
    sector: breakdown.canonicalSector,
    sub_scores: { ...subScores },
    composites: {
      short_term: roundScore(composites.shortTerm),
      mid_term: roundScore(composites.midTerm),
      long_term: roundScore(composites.longTerm),
    },
    valuation: {
      intrinsic_value: roundOrNull(breakdown.intrinsicValue, 2),
      price_to_value: roundOrNull(breakdown.priceToValue, 3),
    },
    sentiment: {
      dividend: roundScore(breakdown.sentimentComponents.dividend, 2),
      sector: roundScore(breakdown.sentimentComponents.sector, 2),
      momentum: roundScore(breakdown.sentimentComponents.momentum, 2),
      momentum_percent: roundOrNull(breakdown.momentumPercent, 2),
    },
    activity: result.activity,
    bands: { ...breakdown.bands },
    warnings: [...breakdown.warnings],
  };
}

export function buildRunRecord(batch: BatchResult, options: BuildRunOptions): RunRecordV1 {
  const runDate = options.runDate ?? new Date();
  const configHash = contentHash(options.config);
  const results = batch.results.map(toRunEntry);
  const runId = getRunId(runDate, contentHash({ configHash, results }));

  return {
    run_id: runId,
    run_date: formatDate(runDate),
    generated_at: runDate.toISOString(),
    engine_version: ENGINE_VERSION,
    watchlist: {
      name: options.watchlistName,
      tickers: [...options.tickers],
    },
    scoring: {
      preset: options.preset ?? null,
      config_hash: configHash,
      horizon_weights: {
        short_term: toWeightRow(options.config.horizonWeights.shortTerm),
        mid_term: toWeightRow(options.config.horizonWeights.midTerm),
        long_term: toWeightRow(options.config.horizonWeights.longTerm),
      },
    },
    summary: { ...batch.summary },
    results,
  };
}
