/**
 * Watchlist run: lines provider records up with the watchlist and scores them.
 * Results come back in watchlist order; tickers without a record fail individually.
 */

import { createChildLogger } from '@/utils/logger';
import type { BatchResult, ScoringEngine } from '@/scoring/engine';
import { tickerOf } from '@/scoring/snapshot';
import type { TickerResult } from '@/scoring/pure/types';

const logger = createChildLogger('run_pipeline');

export const MISSING_SNAPSHOT_ISSUE = 'no snapshot supplied by the market data provider';

export interface WatchlistBatchResult extends BatchResult {
  /** Records whose ticker is not on the watchlist, or has no ticker at all. */
  ignored: string[];
  /** Tickers with more than one record; only the first is scored. */
  duplicates: string[];
}

export function scoreWatchlistRecords(
  engine: ScoringEngine,
  tickers: readonly string[],
  records: readonly unknown[]
): WatchlistBatchResult {
  const onWatchlist = new Set(tickers);
  const byTicker = new Map<string, unknown>();
  const ignored: string[] = [];
  const duplicates: string[] = [];

  for (const record of records) {
    const ticker = tickerOf(record);
    if (!ticker || !onWatchlist.has(ticker)) {
      ignored.push(ticker || '<missing ticker>');
      continue;
    }
    if (byTicker.has(ticker)) {
      duplicates.push(ticker);
      continue;
    }
    byTicker.set(ticker, record);
  }

  if (ignored.length > 0) {
    logger.warn({ ignored }, 'Ignoring records that are not on the watchlist');
  }
  if (duplicates.length > 0) {
    logger.warn({ duplicates }, 'Ignoring duplicate records');
  }

  const present = tickers.filter((ticker) => byTicker.has(ticker));
  const batch = engine.scoreRawBatch(present.map((ticker) => byTicker.get(ticker)));
  const scoredByTicker = new Map<string, TickerResult>();
  present.forEach((ticker, i) => scoredByTicker.set(ticker, batch.results[i]));

  const results: TickerResult[] = tickers.map(
    (ticker) =>
      scoredByTicker.get(ticker) ?? {
        ok: false,
        ticker,
        error: { kind: 'InvalidSnapshot', issues: [MISSING_SNAPSHOT_ISSUE] },
      }
  );

  const missing = tickers.filter((ticker) => !byTicker.has(ticker));
  const scored = results.filter((r) => r.ok).length;

  return {
    results,
    summary: { total: results.length, scored, failed: results.length - scored },
    errors: [...batch.errors, ...missing.map((ticker) => `${ticker}: ${MISSING_SNAPSHOT_ISSUE}`)],
    ignored,
    duplicates,
  };
}
