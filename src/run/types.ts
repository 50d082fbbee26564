import type { ActivityState } from '@/scoring/pure/types';

export interface RunWeightRow {
  moat: number;
  growth: number;
  balance: number;
  valuation: number;
  sentiment: number;
}

export interface RunScoredEntry {
  ticker: string;
  status: 'scored';
  sector: string;
  sub_scores: RunWeightRow;
  composites: {
    short_term: number;
    mid_term: number;
    long_term: number;
  };
  valuation: {
    intrinsic_value: number | null;
    price_to_value: number | null;
  };
  sentiment: {
    dividend: number;
    sector: number;
    momentum: number;
    momentum_percent: number | null;
  };
  activity: ActivityState | null;
  /** Bound of the matched band per table, null for the fallback. */
  bands: {
    moat: number | null;
    growth: number | null;
    balance: number | null;
    dividend: number | null;
  };
  warnings: string[];
}

export interface RunFailedEntry {
  ticker: string;
  status: 'failed';
  error: {
    kind: 'InvalidSnapshot';
    issues: string[];
  };
}

export type RunEntry = RunScoredEntry | RunFailedEntry;

/** Shape of data/runs/<run_id>.json, described by schemas/run.v1.schema.json. */
export interface RunRecordV1 {
  run_id: string;
  run_date: string;
  generated_at: string;
  engine_version: string;
  watchlist: {
    name: string;
    tickers: string[];
  };
  scoring: {
    preset: string | null;
    config_hash: string;
    horizon_weights: {
      short_term: RunWeightRow;
      mid_term: RunWeightRow;
      long_term: RunWeightRow;
    };
  };
  summary: {
    total: number;
    scored: number;
    failed: number;
  };
  results: RunEntry[];
}
