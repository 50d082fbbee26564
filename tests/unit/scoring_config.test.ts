import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync, mkdirSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { fileURLToPath } from 'url';
import {
  getScoringConfig,
  mergeScoringConfig,
  validateScoringConfig,
  validateStepTable,
  type ScoringConfig,
} from '@/scoring/scoring_config';
import { DEFAULT_SCORING_CONFIG } from '@/scoring/scoring_defaults';
import { ConfigurationError } from '@/scoring/errors';

const repoRoot = fileURLToPath(new URL('../..', import.meta.url));

let tempDir: string;

function captureConfigError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error('expected ConfigurationError');
}

describe('scoring config validation', () => {
  it('accepts the defaults', () => {
    expect(validateScoringConfig(DEFAULT_SCORING_CONFIG)).toEqual([]);
  });

  it('flags unsorted bounds', () => {
    expect(
      validateStepTable('t', {
        direction: 'higher_is_better',
        bands: [
          { bound: 5, score: 10 },
          { bound: 1, score: 12 },
        ],
        fallback: 4,
      })
    ).toEqual(['t.bands must be sorted by strictly increasing bound (index 1)']);
  });

  it('flags non-monotonic scores', () => {
    expect(
      validateStepTable('t', {
        direction: 'lower_is_better',
        bands: [
          { bound: 1, score: 10 },
          { bound: 2, score: 12 },
        ],
        fallback: 4,
      })
    ).toEqual(['t.bands are not monotonic at index 1']);
  });

  it('flags scores outside [1, 20]', () => {
    expect(
      validateStepTable('t', {
        direction: 'higher_is_better',
        bands: [{ bound: 0, score: 21 }],
        fallback: 4,
      })
    ).toEqual(['t.bands[0].score must be an integer in [1, 20]']);
  });

  it('flags a fallback better than the weakest band', () => {
    expect(
      validateStepTable('t', {
        direction: 'higher_is_better',
        bands: [{ bound: 0, score: 6 }],
        fallback: 9,
      })
    ).toEqual(['t.fallback must not exceed the score of the weakest band']);
  });

  it('flags a horizon row that does not sum to 1', () => {
    const config: ScoringConfig = {
      ...DEFAULT_SCORING_CONFIG,
      horizonWeights: {
        ...DEFAULT_SCORING_CONFIG.horizonWeights,
        longTerm: { moat: 0.3, growth: 0.15, balance: 0.25, valuation: 0.2, sentiment: 0.2 },
      },
    };
    const issues = validateScoringConfig(config);
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^horizonWeights\.longTerm must sum to 1\.0/);
  });

  it('keeps the dividend component below 20', () => {
    const config: ScoringConfig = {
      ...DEFAULT_SCORING_CONFIG,
      sentiment: {
        ...DEFAULT_SCORING_CONFIG.sentiment,
        dividend: {
          ...DEFAULT_SCORING_CONFIG.sentiment.dividend,
          bands: [...DEFAULT_SCORING_CONFIG.sentiment.dividend.bands, { bound: 6, score: 20 }],
        },
      },
    };
    expect(validateScoringConfig(config)).toEqual(['sentiment.dividend must stay below 20']);
  });

  it('rejects inverted valuation ratio bounds', () => {
    const config: ScoringConfig = {
      ...DEFAULT_SCORING_CONFIG,
      valuation: { ...DEFAULT_SCORING_CONFIG.valuation, ratioFloor: 2, ratioCeiling: 0.5 },
    };
    expect(validateScoringConfig(config)).toEqual([
      'valuation ratio bounds must satisfy 0 < ratioFloor < ratioCeiling',
    ]);
  });
});

describe('mergeScoringConfig', () => {
  it('returns the base when there is no override', () => {
    expect(mergeScoringConfig(DEFAULT_SCORING_CONFIG, null)).toBe(DEFAULT_SCORING_CONFIG);
  });

  it('overrides single fields and keeps the rest', () => {
    const merged = mergeScoringConfig(DEFAULT_SCORING_CONFIG, {
      valuation: { growth_cap: 10 },
      sentiment: { sector_bonus: { Technology: 2 } },
    });
    expect(merged.valuation.growthCap).toBe(10);
    expect(merged.valuation.baseMultiple).toBe(8.5);
    expect(merged.sentiment.sectorBonus.Technology).toBe(2);
    expect(merged.sentiment.sectorBonus.Communication).toBe(3);
  });
});

describe('scoring config loader', () => {
  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'scoring-config-'));
    mkdirSync(join(tempDir, 'config', 'presets'), { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('loads defaults when no scoring.json exists', () => {
    const config = getScoringConfig({ projectRoot: tempDir, presetName: null });
    expect(config).toEqual(DEFAULT_SCORING_CONFIG);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('applies config/scoring.json over the defaults', () => {
    writeFileSync(
      join(tempDir, 'config', 'scoring.json'),
      JSON.stringify({ moat: { fallback: 3 }, sentiment: { neutral: 9 } })
    );
    const config = getScoringConfig({ projectRoot: tempDir, presetName: null });
    expect(config.moat.fallback).toBe(3);
    expect(config.moat.bands).toEqual(DEFAULT_SCORING_CONFIG.moat.bands);
    expect(config.sentiment.neutral).toBe(9);
  });

  it('applies a preset on top of scoring.json', () => {
    writeFileSync(join(tempDir, 'config', 'scoring.json'), JSON.stringify({ moat: { fallback: 3 } }));
    writeFileSync(
      join(tempDir, 'config', 'presets', 'flat.json'),
      JSON.stringify({
        name: 'Flat',
        horizon_weights: {
          short_term: { moat: 0.2, growth: 0.2, balance: 0.2, valuation: 0.2, sentiment: 0.2 },
        },
      })
    );
    const config = getScoringConfig({ projectRoot: tempDir, presetName: 'flat' });
    expect(config.moat.fallback).toBe(3);
    expect(config.horizonWeights.shortTerm).toEqual({
      moat: 0.2,
      growth: 0.2,
      balance: 0.2,
      valuation: 0.2,
      sentiment: 0.2,
    });
    expect(config.horizonWeights.longTerm).toEqual(DEFAULT_SCORING_CONFIG.horizonWeights.longTerm);
  });

  it('loads the bundled defensive preset', () => {
    const config = getScoringConfig({ projectRoot: repoRoot, presetName: 'defensive' });
    expect(config.valuation.growthCap).toBe(10);
    expect(config.sentiment.weights.dividend).toBe(0.5);
    expect(config.horizonWeights.longTerm.balance).toBe(0.35);
  });

  it('fails on a missing preset', () => {
    const error = captureConfigError(() => getScoringConfig({ projectRoot: tempDir, presetName: 'nope' }));
    expect(error.issues[0]).toMatch(/^preset_not_found: /);
  });

  it('fails on a preset name that leaves the presets directory', () => {
    expect(() => getScoringConfig({ projectRoot: tempDir, presetName: '../scoring' })).toThrow(
      ConfigurationError
    );
  });

  it('fails on malformed JSON', () => {
    writeFileSync(join(tempDir, 'config', 'scoring.json'), '{ "moat": ');
    const error = captureConfigError(() => getScoringConfig({ projectRoot: tempDir, presetName: null }));
    expect(error.issues[0]).toMatch(/^unreadable JSON: /);
  });

  it('fails on unknown keys', () => {
    writeFileSync(join(tempDir, 'config', 'scoring.json'), JSON.stringify({ pillar_weights: {} }));
    const error = captureConfigError(() => getScoringConfig({ projectRoot: tempDir, presetName: null }));
    expect(error.issues).toEqual(['root: must NOT have additional properties']);
  });

  it('fails when an override breaks monotonicity', () => {
    writeFileSync(
      join(tempDir, 'config', 'scoring.json'),
      JSON.stringify({
        moat: {
          bands: [
            { bound: 1e9, score: 12 },
            { bound: 1e10, score: 8 },
          ],
        },
      })
    );
    const error = captureConfigError(() => getScoringConfig({ projectRoot: tempDir, presetName: null }));
    expect(error.issues).toEqual(['moat.bands are not monotonic at index 1']);
    expect(error.message).toContain('config/scoring.json');
  });
});
