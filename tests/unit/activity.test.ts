import { describe, expect, it } from 'vitest';
import { calculateActivityPoints, classifyActivity } from '@/scoring/activity';
import { makeSnapshot } from '../helpers/snapshots';

describe('activity state', () => {
  it('adds volume and move points', () => {
    expect(calculateActivityPoints(3_000_000, 1_000_000, 6)).toBe(6);
    expect(calculateActivityPoints(1_600_000, 1_000_000, -1.6)).toBe(3);
    expect(calculateActivityPoints(400_000, 1_000_000, 0)).toBe(-1);
  });

  it('ignores volume when there is no average', () => {
    expect(calculateActivityPoints(500_000, 0, 4)).toBe(2);
  });

  it('classifies by total points', () => {
    const classify = (volume: number, averageVolume: number, changePercent: number) =>
      classifyActivity(makeSnapshot({ volume, averageVolume, changePercent }));

    expect(classify(3_000_000, 1_000_000, 6)).toBe('HOT');
    expect(classify(1_600_000, 1_000_000, 1.6)).toBe('WARM');
    expect(classify(1_200_000, 1_000_000, 0.5)).toBe('COLD');
    expect(classify(400_000, 1_000_000, 0)).toBe('FROZEN');
  });

  it('is null when any input is missing', () => {
    expect(classifyActivity(makeSnapshot())).toBeNull();
    expect(classifyActivity(makeSnapshot({ volume: 1_000_000, averageVolume: 1_000_000 }))).toBeNull();
    expect(
      classifyActivity(makeSnapshot({ volume: null, averageVolume: 1_000_000, changePercent: 2 }))
    ).toBeNull();
  });
});
