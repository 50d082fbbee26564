/**
 * Market activity state from the last session's volume and price move.
 * Informational only, it never feeds the sub-scores.
 */

import type { ActivityState, SecuritySnapshot } from './pure/types';

export const ACTIVITY_THRESHOLDS = {
  VOLUME_RATIO_SURGE: 2.5,
  VOLUME_RATIO_HIGH: 1.5,
  VOLUME_RATIO_ABOVE_AVG: 1.0,
  VOLUME_RATIO_QUIET: 0.5,
  MOVE_LARGE: 5,
  MOVE_MEDIUM: 3,
  MOVE_SMALL: 1.5,
  HOT: 5,
  WARM: 3,
  COLD: 1,
} as const;

export function calculateActivityPoints(
  volume: number,
  averageVolume: number,
  changePercent: number
): number {
  const t = ACTIVITY_THRESHOLDS;
  let points = 0;

  if (averageVolume > 0) {
    const ratio = volume / averageVolume;
    if (ratio > t.VOLUME_RATIO_SURGE) points += 3;
    else if (ratio > t.VOLUME_RATIO_HIGH) points += 2;
    else if (ratio > t.VOLUME_RATIO_ABOVE_AVG) points += 1;
    else if (ratio < t.VOLUME_RATIO_QUIET) points -= 1;
  }

  const move = Math.abs(changePercent);
  if (move > t.MOVE_LARGE) points += 3;
  else if (move > t.MOVE_MEDIUM) points += 2;
  else if (move > t.MOVE_SMALL) points += 1;

  return points;
}

export function classifyActivity(snapshot: SecuritySnapshot): ActivityState | null {
  const { volume, averageVolume, changePercent } = snapshot;
  if (volume == null || averageVolume == null || changePercent == null) {
    return null;
  }

  const points = calculateActivityPoints(volume, averageVolume, changePercent);
  if (points >= ACTIVITY_THRESHOLDS.HOT) return 'HOT';
  if (points >= ACTIVITY_THRESHOLDS.WARM) return 'WARM';
  if (points >= ACTIVITY_THRESHOLDS.COLD) return 'COLD';
  return 'FROZEN';
}
