import { describe, expect, it } from 'vitest';
import { ScoringEngine, scoreWatchlist } from '@/scoring/engine';
import { ConfigurationError } from '@/scoring/errors';
import { DEFAULT_SCORING_CONFIG } from '@/scoring/scoring_defaults';
import type { ScoringConfig } from '@/scoring/scoring_config';
import type { PricePoint, SecuritySnapshot, TickerResult } from '@/scoring/pure/types';
import { makeRawSnapshot, makeSnapshot, untyped } from '../helpers/snapshots';

function expectScored(result: TickerResult) {
  if (!result.ok) {
    throw new Error(`expected ${result.ticker} to score: ${result.error.issues.join('; ')}`);
  }
  return result;
}

describe('ScoringEngine', () => {
  const engine = new ScoringEngine();

  it('scores a large, fairly valued tech company', () => {
    const result = expectScored(engine.scoreSnapshot(makeSnapshot()));

    expect(result.subScores).toEqual({ moat: 20, growth: 14, balance: 18, valuation: 15, sentiment: 11 });
    expect(result.composites.shortTerm).toBeCloseTo(14.65, 9);
    expect(result.composites.midTerm).toBeCloseTo(15.6, 9);
    expect(result.composites.longTerm).toBeCloseTo(16.7, 9);
    expect(result.breakdown.intrinsicValue).toBeCloseTo(195, 9);
    expect(result.breakdown.canonicalSector).toBe('Technology');
    expect(result.activity).toBeNull();
  });

  it('turns a bad snapshot into a failed result', () => {
    const result = engine.scoreSnapshot(makeSnapshot({ marketCap: -1 }));
    expect(result).toEqual({
      ok: false,
      ticker: 'TEST',
      error: { kind: 'InvalidSnapshot', issues: ['market_cap must be a positive number'] },
    });
  });

  it('keeps scoring the rest of a batch after a failure', () => {
    const batch = engine.scoreBatch([
      makeSnapshot({ ticker: 'AAA' }),
      makeSnapshot({ ticker: 'BBB', marketCap: -1 }),
      makeSnapshot({ ticker: 'CCC', trailingEps: 0 }),
    ]);

    expect(batch.results.map((r) => [r.ticker, r.ok])).toEqual([
      ['AAA', true],
      ['BBB', false],
      ['CCC', true],
    ]);
    expect(batch.summary).toEqual({ total: 3, scored: 2, failed: 1 });
    expect(batch.errors).toEqual(['BBB: market_cap must be a positive number']);
    expect(expectScored(batch.results[2]).subScores.valuation).toBe(1);
  });

  it('fails a record with no ticker without stopping the batch', () => {
    const { ticker: _dropped, ...rest } = makeSnapshot({ ticker: 'BBB' });
    const batch = engine.scoreBatch([
      makeSnapshot({ ticker: 'AAA' }),
      untyped<SecuritySnapshot>(rest),
      makeSnapshot({ ticker: 'CCC' }),
    ]);

    expect(batch.summary).toEqual({ total: 3, scored: 2, failed: 1 });
    expect(batch.results[1]).toEqual({
      ok: false,
      ticker: '',
      error: { kind: 'InvalidSnapshot', issues: ['ticker must be a non-empty string'] },
    });
    expect(batch.errors).toEqual(['<unknown>: ticker must be a non-empty string']);
  });

  it('fails a record whose price history holds a null point', () => {
    const batch = engine.scoreBatch([
      makeSnapshot({ ticker: 'AAA' }),
      makeSnapshot({
        ticker: 'BBB',
        recentPriceHistory: untyped<PricePoint[]>([null, { timestamp: '2026-01-06T21:00:00Z', price: 100 }]),
      }),
    ]);

    expect(batch.summary).toEqual({ total: 2, scored: 1, failed: 1 });
    expect(batch.results[1]).toEqual({
      ok: false,
      ticker: 'BBB',
      error: { kind: 'InvalidSnapshot', issues: ['recent_price_history[0] must be an object'] },
    });
  });

  it('gives a sector named like an object built-in the default bonus', () => {
    const result = expectScored(engine.scoreSnapshot(makeSnapshot({ sector: 'constructor' })));
    expect(result.breakdown.sentimentComponents).toEqual({ dividend: 10, sector: 10, momentum: 10 });
    expect(result.subScores.sentiment).toBe(10);
    expect(result.breakdown.canonicalSector).toBe('constructor');
  });

  it('fails the second occurrence of a ticker', () => {
    const batch = engine.scoreBatch([makeSnapshot(), makeSnapshot({ currentPrice: 90 })]);
    expect(batch.results[0].ok).toBe(true);
    expect(batch.results[1]).toEqual({
      ok: false,
      ticker: 'TEST',
      error: { kind: 'InvalidSnapshot', issues: ['duplicate ticker in batch'] },
    });
  });

  it('scores wire-format records', () => {
    const batch = engine.scoreRawBatch([
      makeRawSnapshot({ ticker: 'aaa' }),
      makeRawSnapshot({ ticker: 'BBB', market_cap: 0 }),
      'not a snapshot',
    ]);

    expect(expectScored(batch.results[0]).ticker).toBe('AAA');
    expect(batch.results[1]).toEqual({
      ok: false,
      ticker: 'BBB',
      error: { kind: 'InvalidSnapshot', issues: ['/market_cap: must be > 0'] },
    });
    expect(batch.results[2].ok).toBe(false);
    expect(batch.results[2].ticker).toBe('');
    expect(batch.summary).toEqual({ total: 3, scored: 1, failed: 2 });
  });

  it('returns identical output for identical input', () => {
    const snapshots = [makeSnapshot({ ticker: 'AAA' }), makeSnapshot({ ticker: 'BBB', dividendYield: 3.5 })];
    expect(engine.scoreBatch(snapshots)).toEqual(engine.scoreBatch(snapshots));
  });

  it('keeps every score in [1, 20] for extreme inputs', () => {
    const extremes = [
      makeSnapshot({ ticker: 'TINY', marketCap: 1, epsGrowthRate: -99, debtToEquity: 50, trailingEps: -10 }),
      makeSnapshot({ ticker: 'HUGE', marketCap: 1e15, epsGrowthRate: 500, debtToEquity: 0, currentPrice: 0.01 }),
      makeSnapshot({
        ticker: 'CRASH',
        dividendYield: 40,
        sector: 'Real Estate',
        recentPriceHistory: [
          { timestamp: '2026-01-05T21:00:00Z', price: 100 },
          { timestamp: '2026-01-06T21:00:00Z', price: 5 },
        ],
      }),
    ];

    for (const result of engine.scoreBatch(extremes).results) {
      const scored = expectScored(result);
      for (const value of [...Object.values(scored.subScores), ...Object.values(scored.composites)]) {
        expect(value).toBeGreaterThanOrEqual(1);
        expect(value).toBeLessThanOrEqual(20);
      }
    }
  });

  it('freezes its configuration', () => {
    expect(Object.isFrozen(engine.config)).toBe(true);
    expect(Object.isFrozen(engine.config.horizonWeights.shortTerm)).toBe(true);
  });

  it('rejects horizon weights that do not sum to 1', () => {
    const broken: ScoringConfig = {
      ...DEFAULT_SCORING_CONFIG,
      horizonWeights: {
        ...DEFAULT_SCORING_CONFIG.horizonWeights,
        midTerm: { moat: 0.3, growth: 0.2, balance: 0.2, valuation: 0.2, sentiment: 0.2 },
      },
    };
    expect(() => new ScoringEngine(broken)).toThrow(ConfigurationError);
  });

  it('uses the weights it was given', () => {
    const valuationHeavy: ScoringConfig = {
      ...DEFAULT_SCORING_CONFIG,
      horizonWeights: {
        ...DEFAULT_SCORING_CONFIG.horizonWeights,
        shortTerm: { moat: 0, growth: 0, balance: 0, valuation: 1, sentiment: 0 },
      },
    };
    const result = expectScored(new ScoringEngine(valuationHeavy).scoreSnapshot(makeSnapshot()));
    expect(result.composites.shortTerm).toBe(15);
  });
});

describe('scoreWatchlist', () => {
  it('scores with the default configuration', () => {
    const batch = scoreWatchlist([makeSnapshot()]);
    expect(batch.summary).toEqual({ total: 1, scored: 1, failed: 0 });
  });
});
