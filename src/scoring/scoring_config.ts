/**
 * Scoring configuration loader with preset overrides.
 *
 * The resolved config is a frozen value handed to the engine at construction, so
 * several configurations (e.g. alternate weightings for a backtest) can coexist.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { getEnvConfig } from '@/core/env';
import { validateScoringOverride } from '@/validation/ajv_instance';
import { createChildLogger } from '@/utils/logger';
import { ConfigurationError } from './errors';
import { SCORE_MAX, SCORE_MIN } from './normalize';
import { DEFAULT_SCORING_CONFIG } from './scoring_defaults';
import type { SubScoreKey } from './pure/types';

const logger = createChildLogger('scoring_config');

export const WEIGHT_TOLERANCE = 1e-9;

export type StepDirection = 'higher_is_better' | 'lower_is_better';

export interface StepBand {
  bound: number;
  score: number;
}

export interface StepTable {
  direction: StepDirection;
  /** Sorted by strictly increasing bound. */
  bands: StepBand[];
  fallback: number;
}

export interface ValuationConstants {
  baseMultiple: number;
  growthMultiplier: number;
  /** Yield the no-growth multiple was calibrated against, percent. */
  referenceYield: number;
  growthFloor: number;
  growthCap: number;
  /** Price/value at or below this scores 20. */
  ratioFloor: number;
  /** Price/value at or above this scores 1. */
  ratioCeiling: number;
}

export interface SentimentWeights {
  dividend: number;
  sector: number;
  momentum: number;
}

export interface SentimentConfig {
  neutral: number;
  weights: SentimentWeights;
  dividend: StepTable;
  sectorBonus: Record<string, number>;
  defaultSectorBonus: number;
  /** Upper-case keyword found in a raw sector label -> canonical sector. */
  sectorAliases: Record<string, string>;
  momentumPointsPerPercent: number;
}

export type WeightVector = Record<SubScoreKey, number>;

export type HorizonKey = 'shortTerm' | 'midTerm' | 'longTerm';

export type HorizonWeights = Record<HorizonKey, WeightVector>;

export interface ScoringConfig {
  moat: StepTable;
  growth: StepTable;
  balance: StepTable;
  valuation: ValuationConstants;
  sentiment: SentimentConfig;
  horizonWeights: HorizonWeights;
}

interface RawStepTable {
  direction?: StepDirection;
  bands?: StepBand[];
  fallback?: number;
}

type RawWeightVector = Partial<WeightVector>;

/** Shape of config/scoring.json and config/presets/*.json. */
export interface RawScoringConfig {
  name?: string;
  description?: string;
  moat?: RawStepTable;
  growth?: RawStepTable;
  balance?: RawStepTable;
  valuation?: {
    base_multiple?: number;
    growth_multiplier?: number;
    reference_yield?: number;
    growth_floor?: number;
    growth_cap?: number;
    ratio_floor?: number;
    ratio_ceiling?: number;
  };
  sentiment?: {
    neutral?: number;
    weights?: Partial<SentimentWeights>;
    dividend?: RawStepTable;
    sector_bonus?: Record<string, number>;
    default_sector_bonus?: number;
    sector_aliases?: Record<string, string>;
    momentum_points_per_percent?: number;
  };
  horizon_weights?: {
    short_term?: RawWeightVector;
    mid_term?: RawWeightVector;
    long_term?: RawWeightVector;
  };
}

export const SUB_SCORE_KEYS: readonly SubScoreKey[] = [
  'moat',
  'growth',
  'balance',
  'valuation',
  'sentiment',
];

export const HORIZON_KEYS: readonly HorizonKey[] = ['shortTerm', 'midTerm', 'longTerm'];

function readOverrideFile(path: string): RawScoringConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError([`unreadable JSON: ${reason}`], path);
  }

  const result = validateScoringOverride(parsed);
  if (!result.valid || !result.data) {
    throw new ConfigurationError(result.errors ?? ['invalid override'], path);
  }
  return result.data;
}

function loadRawConfig(projectRoot: string): RawScoringConfig | null {
  const path = join(projectRoot, 'config', 'scoring.json');
  if (!existsSync(path)) {
    return null;
  }
  return readOverrideFile(path);
}

export interface LoadedPreset {
  name: string;
  path: string;
  config: RawScoringConfig;
}

export function loadPresetConfig(projectRoot: string, presetName: string): LoadedPreset {
  const name = presetName.trim();
  if (!/^[a-z0-9_-]+$/i.test(name)) {
    throw new ConfigurationError([`preset name "${presetName}" contains invalid characters`]);
  }
  const presetPath = join(projectRoot, 'config', 'presets', `${name}.json`);
  if (!existsSync(presetPath)) {
    throw new ConfigurationError([`preset_not_found: ${presetPath}`]);
  }
  return { name, path: presetPath, config: readOverrideFile(presetPath) };
}

function mergeTable(base: StepTable, override?: RawStepTable): StepTable {
  if (!override) return base;
  return {
    direction: override.direction ?? base.direction,
    bands: override.bands ? override.bands.map((band) => ({ ...band })) : base.bands,
    fallback: override.fallback ?? base.fallback,
  };
}

function mergeWeightVector(base: WeightVector, override?: RawWeightVector): WeightVector {
  if (!override) return base;
  return {
    moat: override.moat ?? base.moat,
    growth: override.growth ?? base.growth,
    balance: override.balance ?? base.balance,
    valuation: override.valuation ?? base.valuation,
    sentiment: override.sentiment ?? base.sentiment,
  };
}

function mergeValuation(
  base: ValuationConstants,
  override?: RawScoringConfig['valuation']
): ValuationConstants {
  if (!override) return base;
  return {
    baseMultiple: override.base_multiple ?? base.baseMultiple,
    growthMultiplier: override.growth_multiplier ?? base.growthMultiplier,
    referenceYield: override.reference_yield ?? base.referenceYield,
    growthFloor: override.growth_floor ?? base.growthFloor,
    growthCap: override.growth_cap ?? base.growthCap,
    ratioFloor: override.ratio_floor ?? base.ratioFloor,
    ratioCeiling: override.ratio_ceiling ?? base.ratioCeiling,
  };
}

function mergeSentiment(
  base: SentimentConfig,
  override?: RawScoringConfig['sentiment']
): SentimentConfig {
  if (!override) return base;
  return {
    neutral: override.neutral ?? base.neutral,
    weights: {
      dividend: override.weights?.dividend ?? base.weights.dividend,
      sector: override.weights?.sector ?? base.weights.sector,
      momentum: override.weights?.momentum ?? base.weights.momentum,
    },
    dividend: mergeTable(base.dividend, override.dividend),
    sectorBonus: { ...base.sectorBonus, ...override.sector_bonus },
    defaultSectorBonus: override.default_sector_bonus ?? base.defaultSectorBonus,
    sectorAliases: { ...base.sectorAliases, ...override.sector_aliases },
    momentumPointsPerPercent:
      override.momentum_points_per_percent ?? base.momentumPointsPerPercent,
  };
}

export function mergeScoringConfig(base: ScoringConfig, override?: RawScoringConfig | null): ScoringConfig {
  if (!override) return base;
  return {
    moat: mergeTable(base.moat, override.moat),
    growth: mergeTable(base.growth, override.growth),
    balance: mergeTable(base.balance, override.balance),
    valuation: mergeValuation(base.valuation, override.valuation),
    sentiment: mergeSentiment(base.sentiment, override.sentiment),
    horizonWeights: {
      shortTerm: mergeWeightVector(base.horizonWeights.shortTerm, override.horizon_weights?.short_term),
      midTerm: mergeWeightVector(base.horizonWeights.midTerm, override.horizon_weights?.mid_term),
      longTerm: mergeWeightVector(base.horizonWeights.longTerm, override.horizon_weights?.long_term),
    },
  };
}

function isSubScore(value: number): boolean {
  return Number.isInteger(value) && value >= SCORE_MIN && value <= SCORE_MAX;
}

export function validateStepTable(name: string, table: StepTable): string[] {
  const issues: string[] = [];
  if (table.direction !== 'higher_is_better' && table.direction !== 'lower_is_better') {
    issues.push(`${name}.direction must be higher_is_better or lower_is_better`);
  }
  if (table.bands.length === 0) {
    issues.push(`${name}.bands must not be empty`);
    return issues;
  }
  if (!isSubScore(table.fallback)) {
    issues.push(`${name}.fallback must be an integer in [${SCORE_MIN}, ${SCORE_MAX}]`);
  }

  table.bands.forEach((band, i) => {
    if (!Number.isFinite(band.bound)) {
      issues.push(`${name}.bands[${i}].bound must be finite`);
    }
    if (!isSubScore(band.score)) {
      issues.push(`${name}.bands[${i}].score must be an integer in [${SCORE_MIN}, ${SCORE_MAX}]`);
    }
    if (i === 0) return;
    const prev = table.bands[i - 1];
    if (band.bound <= prev.bound) {
      issues.push(`${name}.bands must be sorted by strictly increasing bound (index ${i})`);
    }
    const ascending = table.direction === 'higher_is_better';
    if (ascending ? band.score < prev.score : band.score > prev.score) {
      issues.push(`${name}.bands are not monotonic at index ${i}`);
    }
  });

  // The fallback covers the worst end of the range.
  const worstBand =
    table.direction === 'higher_is_better' ? table.bands[0] : table.bands[table.bands.length - 1];
  if (table.fallback > worstBand.score) {
    issues.push(`${name}.fallback must not exceed the score of the weakest band`);
  }

  return issues;
}

function validateWeightSum(name: string, weights: Record<string, number>): string[] {
  const issues: string[] = [];
  let total = 0;
  for (const [key, value] of Object.entries(weights)) {
    if (!Number.isFinite(value) || value < 0) {
      issues.push(`${name}.${key} must be a non-negative number`);
    }
    total += value;
  }
  if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
    issues.push(`${name} must sum to 1.0 (got ${total})`);
  }
  return issues;
}

export function validateScoringConfig(config: ScoringConfig): string[] {
  const issues: string[] = [
    ...validateStepTable('moat', config.moat),
    ...validateStepTable('growth', config.growth),
    ...validateStepTable('balance', config.balance),
    ...validateStepTable('sentiment.dividend', config.sentiment.dividend),
  ];

  if (config.moat.direction !== 'higher_is_better') {
    issues.push('moat must be higher_is_better');
  }
  if (config.growth.direction !== 'higher_is_better') {
    issues.push('growth must be higher_is_better');
  }
  if (config.balance.direction !== 'lower_is_better') {
    issues.push('balance must be lower_is_better');
  }
  if (config.sentiment.dividend.direction !== 'higher_is_better') {
    issues.push('sentiment.dividend must be higher_is_better');
  }

  const v = config.valuation;
  if (!(v.baseMultiple >= 0) || !Number.isFinite(v.baseMultiple)) {
    issues.push('valuation.baseMultiple must be a non-negative number');
  }
  if (!(v.growthMultiplier >= 0) || !Number.isFinite(v.growthMultiplier)) {
    issues.push('valuation.growthMultiplier must be a non-negative number');
  }
  if (!(v.referenceYield > 0) || !Number.isFinite(v.referenceYield)) {
    issues.push('valuation.referenceYield must be positive');
  }
  if (!(v.growthFloor <= v.growthCap)) {
    issues.push('valuation.growthFloor must not exceed valuation.growthCap');
  }
  if (!(v.ratioFloor > 0 && v.ratioFloor < v.ratioCeiling) || !Number.isFinite(v.ratioCeiling)) {
    issues.push('valuation ratio bounds must satisfy 0 < ratioFloor < ratioCeiling');
  }

  const s = config.sentiment;
  if (!(s.neutral >= SCORE_MIN && s.neutral <= SCORE_MAX)) {
    issues.push(`sentiment.neutral must lie in [${SCORE_MIN}, ${SCORE_MAX}]`);
  }
  issues.push(...validateWeightSum('sentiment.weights', { ...s.weights }));
  const dividendCeiling = Math.max(s.dividend.fallback, ...s.dividend.bands.map((b) => b.score));
  if (dividendCeiling >= SCORE_MAX) {
    issues.push(`sentiment.dividend must stay below ${SCORE_MAX}`);
  }
  for (const [sector, bonus] of Object.entries(s.sectorBonus)) {
    if (!Number.isFinite(bonus)) {
      issues.push(`sentiment.sectorBonus.${sector} must be finite`);
    }
  }
  if (!Number.isFinite(s.defaultSectorBonus)) {
    issues.push('sentiment.defaultSectorBonus must be finite');
  }
  if (!(s.momentumPointsPerPercent >= 0) || !Number.isFinite(s.momentumPointsPerPercent)) {
    issues.push('sentiment.momentumPointsPerPercent must be a non-negative number');
  }

  for (const horizon of HORIZON_KEYS) {
    issues.push(...validateWeightSum(`horizonWeights.${horizon}`, { ...config.horizonWeights[horizon] }));
  }

  return issues;
}

export function assertValidScoringConfig(config: ScoringConfig, source?: string): void {
  const issues = validateScoringConfig(config);
  if (issues.length > 0) {
    throw new ConfigurationError(issues, source);
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/** Validates and freezes a config; throws ConfigurationError when it is unusable. */
export function finalizeScoringConfig(config: ScoringConfig, source?: string): ScoringConfig {
  assertValidScoringConfig(config, source);
  return deepFreeze(structuredClone(config));
}

export interface ScoringConfigOptions {
  projectRoot?: string;
  presetName?: string | null;
}

export function getScoringConfig(options: ScoringConfigOptions = {}): ScoringConfig {
  const projectRoot = options.projectRoot ?? process.cwd();
  const presetName =
    options.presetName === undefined ? getEnvConfig().scoringPreset : options.presetName;

  const raw = loadRawConfig(projectRoot);
  let config = mergeScoringConfig(DEFAULT_SCORING_CONFIG, raw);
  let source = raw ? 'config/scoring.json' : 'defaults';

  if (presetName) {
    const preset = loadPresetConfig(projectRoot, presetName);
    config = mergeScoringConfig(config, preset.config);
    source = `${source} + preset ${preset.name}`;
    logger.info({ preset: preset.name, path: preset.path }, 'Applied scoring preset');
  }

  return finalizeScoringConfig(config, source);
}
