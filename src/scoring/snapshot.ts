/**
 * Snapshot intake: wire-format validation, mapping to the domain shape and
 * domain constraint checks. Any violation is an InvalidSnapshotError for that ticker.
 */

import { parseDate, isValidTimestamp } from '@/core/time';
import { validateSnapshotRecord } from '@/validation/ajv_instance';
import { InvalidSnapshotError } from './errors';
import type { PricePoint, RawSecuritySnapshot, SecuritySnapshot } from './pure/types';

export function normalizeTicker(ticker: string): string {
  return ticker.trim().toUpperCase();
}

export function toSecuritySnapshot(raw: RawSecuritySnapshot): SecuritySnapshot {
  return {
    ticker: normalizeTicker(raw.ticker),
    name: raw.name,
    marketCap: raw.market_cap,
    epsGrowthRate: raw.eps_growth_rate,
    debtToEquity: raw.debt_to_equity,
    trailingEps: raw.trailing_eps,
    expectedGrowthRate: raw.expected_growth_rate,
    currentPrice: raw.current_price,
    dividendYield: raw.dividend_yield,
    sector: raw.sector,
    recentPriceHistory: raw.recent_price_history.map((point) => ({ ...point })),
    bondYield: raw.bond_yield ?? null,
    volume: raw.volume ?? null,
    averageVolume: raw.average_volume ?? null,
    changePercent: raw.change_percent ?? null,
  };
}

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value);

function checkOptional(
  issues: string[],
  field: string,
  value: number | null | undefined,
  rule: (v: number) => boolean,
  expectation: string
): void {
  if (value == null) return;
  if (!isFiniteNumber(value) || !rule(value)) {
    issues.push(`${field} must be ${expectation}`);
  }
}

function isPricePoint(value: unknown): value is Partial<Record<keyof PricePoint, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Domain checks on an already-shaped snapshot. Returns one message per violation. */
export function checkSnapshot(snapshot: SecuritySnapshot): string[] {
  const issues: string[] = [];

  if (typeof snapshot.ticker !== 'string' || snapshot.ticker.trim() === '') {
    issues.push('ticker must be a non-empty string');
  }
  if (!isFiniteNumber(snapshot.marketCap) || snapshot.marketCap <= 0) {
    issues.push('market_cap must be a positive number');
  }
  if (!isFiniteNumber(snapshot.epsGrowthRate)) {
    issues.push('eps_growth_rate must be a finite number');
  }
  if (!isFiniteNumber(snapshot.debtToEquity) || snapshot.debtToEquity < 0) {
    issues.push('debt_to_equity must be a non-negative number');
  }
  if (!isFiniteNumber(snapshot.trailingEps)) {
    issues.push('trailing_eps must be a finite number');
  }
  if (!isFiniteNumber(snapshot.expectedGrowthRate)) {
    issues.push('expected_growth_rate must be a finite number');
  }
  if (!isFiniteNumber(snapshot.currentPrice) || snapshot.currentPrice <= 0) {
    issues.push('current_price must be a positive number');
  }
  if (!isFiniteNumber(snapshot.dividendYield) || snapshot.dividendYield < 0) {
    issues.push('dividend_yield must be a non-negative number');
  }
  if (typeof snapshot.sector !== 'string' || snapshot.sector.trim() === '') {
    issues.push('sector must be a non-empty string');
  }

  if (!Array.isArray(snapshot.recentPriceHistory)) {
    issues.push('recent_price_history must be an array');
  } else {
    let previous: number | null = null;
    snapshot.recentPriceHistory.forEach((point: unknown, i) => {
      if (!isPricePoint(point)) {
        issues.push(`recent_price_history[${i}] must be an object`);
        return;
      }
      if (!isFiniteNumber(point.price) || point.price <= 0) {
        issues.push(`recent_price_history[${i}].price must be a positive number`);
      }
      if (typeof point.timestamp !== 'string' || !isValidTimestamp(point.timestamp)) {
        issues.push(`recent_price_history[${i}].timestamp must be an ISO timestamp`);
        return;
      }
      const at = parseDate(point.timestamp).getTime();
      if (previous !== null && at < previous) {
        issues.push(`recent_price_history[${i}] is older than the point before it`);
      }
      previous = at;
    });
  }

  checkOptional(issues, 'bond_yield', snapshot.bondYield, (v) => v > 0, 'a positive number');
  checkOptional(issues, 'volume', snapshot.volume, (v) => v >= 0, 'a non-negative number');
  checkOptional(issues, 'average_volume', snapshot.averageVolume, (v) => v >= 0, 'a non-negative number');
  checkOptional(issues, 'change_percent', snapshot.changePercent, () => true, 'a finite number');

  return issues;
}

export function assertValidSnapshot(snapshot: SecuritySnapshot): SecuritySnapshot {
  const issues = checkSnapshot(snapshot);
  if (issues.length > 0) {
    throw new InvalidSnapshotError(tickerOf(snapshot), issues);
  }
  return snapshot;
}

/** Best-effort ticker of an unvalidated record, for failure reporting. */
export function tickerOf(input: unknown): string {
  if (input && typeof input === 'object' && 'ticker' in input && typeof input.ticker === 'string') {
    return normalizeTicker(input.ticker);
  }
  return '';
}

export function parseSnapshot(input: unknown): SecuritySnapshot {
  const result = validateSnapshotRecord(input);
  if (!result.valid || !result.data) {
    throw new InvalidSnapshotError(tickerOf(input), result.errors ?? ['invalid snapshot']);
  }
  return assertValidSnapshot(toSecuritySnapshot(result.data));
}
