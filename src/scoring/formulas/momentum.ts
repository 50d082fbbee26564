import type { PricePoint } from '@/scoring/pure/types';

export interface MomentumResult {
  /** Percent change from the first to the last price in the window. */
  changePercent: number | null;
  skipped: boolean;
  reason?: string;
}

export function calculateMomentum(history: readonly PricePoint[]): MomentumResult {
  if (history.length < 2) {
    return { changePercent: null, skipped: true, reason: 'insufficient_history' };
  }

  const first = history[0].price;
  const last = history[history.length - 1].price;
  if (!Number.isFinite(first) || !Number.isFinite(last) || first <= 0) {
    return { changePercent: null, skipped: true, reason: 'invalid_price' };
  }

  return { changePercent: ((last - first) / first) * 100, skipped: false };
}
