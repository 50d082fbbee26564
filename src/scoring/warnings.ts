/**
 * Data-quality warnings for a snapshot that passed validation.
 * They flag values that are legal but often mean the provider's record is incomplete;
 * they never change a score.
 */

import type { SecuritySnapshot } from './pure/types';

/** Market cap above which a zero trailing EPS is treated as suspect. */
export const LARGE_CAP_THRESHOLD = 50e9;

export const DATA_WARNINGS = {
  ZERO_DEBT_TO_EQUITY: 'debt_to_equity is 0 - data may be incomplete',
  ZERO_EPS_LARGE_CAP: 'trailing_eps is 0 for a large-cap company - verify data',
  SHORT_PRICE_HISTORY: 'recent_price_history has fewer than 2 points - momentum held at neutral',
} as const;

export function collectDataWarnings(snapshot: SecuritySnapshot): string[] {
  const warnings: string[] = [];

  if (snapshot.debtToEquity === 0) {
    warnings.push(DATA_WARNINGS.ZERO_DEBT_TO_EQUITY);
  }
  if (snapshot.trailingEps === 0 && snapshot.marketCap > LARGE_CAP_THRESHOLD) {
    warnings.push(DATA_WARNINGS.ZERO_EPS_LARGE_CAP);
  }
  if (snapshot.recentPriceHistory.length < 2) {
    warnings.push(DATA_WARNINGS.SHORT_PRICE_HISTORY);
  }

  return warnings;
}
