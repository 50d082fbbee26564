/**
 * Score normalization utilities
 * Sub-scores live on the 1-20 scale
 */

import type { StepTable } from './scoring_config';

export const SCORE_MIN = 1;
export const SCORE_MAX = 20;

export function clamp(value: number, min: number = SCORE_MIN, max: number = SCORE_MAX): number {
  return Math.min(Math.max(value, min), max);
}

export function inverseLinearScale(
  value: number,
  inputMin: number,
  inputMax: number,
  outputMin: number = SCORE_MIN,
  outputMax: number = SCORE_MAX
): number {
  // Lower input values = higher output scores
  if (inputMax === inputMin) return (outputMin + outputMax) / 2;

  const normalized = (value - inputMin) / (inputMax - inputMin);
  return clamp(outputMax - normalized * (outputMax - outputMin), outputMin, outputMax);
}

/**
 * Rounds to the nearest integer and pins the result to [1, 20].
 * Non-finite input lands on the floor.
 */
export function toSubScore(value: number): number {
  if (!Number.isFinite(value)) return SCORE_MIN;
  return clamp(Math.round(value));
}

export interface StepMatch {
  score: number;
  /** Bound of the band that matched; null when the fallback applied. */
  bound: number | null;
}

/**
 * Finds the band a value falls in.
 *
 * `higher_is_better`: the band with the greatest bound <= value (lower edge inclusive).
 * `lower_is_better`: the band with the smallest bound > value (upper edge exclusive).
 * A value outside every band takes the table's fallback.
 */
export function matchStep(value: number, table: StepTable): StepMatch {
  const { bands, fallback, direction } = table;

  if (direction === 'higher_is_better') {
    for (let i = bands.length - 1; i >= 0; i -= 1) {
      if (value >= bands[i].bound) return { score: toSubScore(bands[i].score), bound: bands[i].bound };
    }
    return { score: toSubScore(fallback), bound: null };
  }

  for (const band of bands) {
    if (value < band.bound) return { score: toSubScore(band.score), bound: band.bound };
  }
  return { score: toSubScore(fallback), bound: null };
}

export function lookupStep(value: number, table: StepTable): number {
  return matchStep(value, table).score;
}

export function roundScore(score: number, decimals: number = 1): number {
  const factor = Math.pow(10, decimals);
  return Math.round(score * factor) / factor;
}
