/**
 * Main Scoring Engine
 * Validates each snapshot and scores it independently; a bad ticker never blocks the rest
 */

import { createChildLogger } from '@/utils/logger';
import { InvalidSnapshotError } from './errors';
import { finalizeScoringConfig, type ScoringConfig } from './scoring_config';
import { DEFAULT_SCORING_CONFIG } from './scoring_defaults';
import { assertValidSnapshot, parseSnapshot, tickerOf } from './snapshot';
import { scoreSnapshotPure } from './pure/score_symbol';
import type { FailedTicker, SecuritySnapshot, TickerResult } from './pure/types';

const logger = createChildLogger('scoring_engine');

export interface BatchResult {
  /** One entry per input, in input order. */
  results: TickerResult[];
  summary: {
    total: number;
    scored: number;
    failed: number;
  };
  errors: string[];
}

function toFailure(error: InvalidSnapshotError): FailedTicker {
  return {
    ok: false,
    ticker: error.ticker,
    error: { kind: 'InvalidSnapshot', issues: error.issues },
  };
}

export class ScoringEngine {
  readonly config: ScoringConfig;

  /** @throws ConfigurationError when a weight row or breakpoint table is unusable */
  constructor(config: ScoringConfig = DEFAULT_SCORING_CONFIG) {
    this.config = finalizeScoringConfig(config);
  }

  scoreSnapshot(snapshot: SecuritySnapshot): TickerResult {
    return this.guard(() => scoreSnapshotPure(assertValidSnapshot(snapshot), this.config));
  }

  scoreBatch(snapshots: readonly SecuritySnapshot[]): BatchResult {
    return this.runBatch(snapshots, tickerOf, (snapshot) => this.scoreSnapshot(snapshot));
  }

  /** Same as scoreBatch, for records still in the provider's JSON wire format. */
  scoreRawBatch(inputs: readonly unknown[]): BatchResult {
    return this.runBatch(inputs, tickerOf, (input) =>
      this.guard(() => scoreSnapshotPure(parseSnapshot(input), this.config))
    );
  }

  private guard(score: () => TickerResult): TickerResult {
    try {
      return score();
    } catch (error) {
      if (error instanceof InvalidSnapshotError) {
        return toFailure(error);
      }
      throw error;
    }
  }

  private runBatch<T>(
    items: readonly T[],
    tickerFor: (item: T) => string,
    score: (item: T) => TickerResult
  ): BatchResult {
    const seen = new Set<string>();
    const results: TickerResult[] = [];
    const errors: string[] = [];

    logger.info({ tickerCount: items.length }, 'Starting batch scoring');

    for (const item of items) {
      const ticker = tickerFor(item);
      let result: TickerResult;

      if (ticker && seen.has(ticker)) {
        result = toFailure(new InvalidSnapshotError(ticker, ['duplicate ticker in batch']));
      } else {
        if (ticker) seen.add(ticker);
        result = score(item);
      }

      if (result.ok) {
        logger.debug(
          { ticker: result.ticker, subScores: result.subScores, composites: result.composites },
          'Ticker scored'
        );
      } else {
        errors.push(`${result.ticker || '<unknown>'}: ${result.error.issues.join('; ')}`);
        logger.warn({ ticker: result.ticker, issues: result.error.issues }, 'Invalid snapshot');
      }
      results.push(result);
    }

    const scored = results.filter((r) => r.ok).length;
    const summary = { total: results.length, scored, failed: results.length - scored };
    logger.info(summary, 'Batch scoring complete');

    return { results, summary, errors };
  }
}

export function scoreWatchlist(
  snapshots: readonly SecuritySnapshot[],
  config: ScoringConfig = DEFAULT_SCORING_CONFIG
): BatchResult {
  return new ScoringEngine(config).scoreBatch(snapshots);
}
