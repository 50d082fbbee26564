/**
 * Default scoring tables.
 * Every number the scoring stages use comes from here unless config/scoring.json
 * or a preset overrides it.
 */

import type { ScoringConfig } from './scoring_config';

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  // Market cap in currency units. Size as a proxy for a durable competitive position.
  moat: {
    direction: 'higher_is_better',
    bands: [
      { bound: 1e9, score: 6 },
      { bound: 5e9, score: 8 },
      { bound: 10e9, score: 10 },
      { bound: 20e9, score: 12 },
      { bound: 50e9, score: 14 },
      { bound: 100e9, score: 16 },
      { bound: 200e9, score: 17 },
      { bound: 500e9, score: 18 },
      { bound: 1e12, score: 19 },
      { bound: 2e12, score: 20 },
    ],
    fallback: 4,
  },
  // EPS growth rate, percent
  growth: {
    direction: 'higher_is_better',
    bands: [
      { bound: -25, score: 4 },
      { bound: -10, score: 6 },
      { bound: 0, score: 8 },
      { bound: 5, score: 10 },
      { bound: 10, score: 12 },
      { bound: 15, score: 14 },
      { bound: 25, score: 16 },
      { bound: 35, score: 18 },
      { bound: 50, score: 20 },
    ],
    fallback: 2,
  },
  // Debt / equity ratio
  balance: {
    direction: 'lower_is_better',
    bands: [
      { bound: 0.1, score: 20 },
      { bound: 0.3, score: 18 },
      { bound: 0.5, score: 16 },
      { bound: 0.7, score: 14 },
      { bound: 1.0, score: 12 },
      { bound: 1.5, score: 10 },
      { bound: 2.0, score: 8 },
      { bound: 3.0, score: 6 },
    ],
    fallback: 4,
  },
  // Graham: V = EPS * (8.5 + 2g) * 4.4 / Y
  valuation: {
    baseMultiple: 8.5,
    growthMultiplier: 2,
    referenceYield: 4.4,
    growthFloor: 0,
    growthCap: 15,
    ratioFloor: 0.5,
    ratioCeiling: 2.0,
  },
  sentiment: {
    neutral: 10,
    weights: {
      dividend: 0.3,
      sector: 0.3,
      momentum: 0.4,
    },
    // Dividend yield, percent. Tops out at 18 so dividends alone never max the score.
    dividend: {
      direction: 'higher_is_better',
      bands: [
        { bound: 0.01, score: 10 },
        { bound: 1, score: 12 },
        { bound: 2, score: 14 },
        { bound: 3, score: 16 },
        { bound: 4, score: 18 },
      ],
      fallback: 8,
    },
    sectorBonus: {
      Technology: 4,
      Communication: 3,
      Healthcare: 2,
      Consumer: 1,
      Industrial: 0,
      Financial: 0,
      Energy: -1,
      Materials: -1,
      Utilities: -1,
      'Real Estate': -2,
    },
    defaultSectorBonus: 0,
    sectorAliases: {
      COMPUTER: 'Technology',
      SOFTWARE: 'Technology',
      SEMICONDUCTOR: 'Technology',
      ELECTRONIC: 'Technology',
      TECH: 'Technology',
      TELEPHONE: 'Communication',
      BROADCASTING: 'Communication',
      PHARMACEUTICAL: 'Healthcare',
      MEDICAL: 'Healthcare',
      RETAIL: 'Consumer',
      'MOTOR VEHICLE': 'Consumer',
      WAREHOUSING: 'Consumer',
      BANK: 'Financial',
      INSURANCE: 'Financial',
      PETROLEUM: 'Energy',
      'REAL ESTATE': 'Real Estate',
    },
    momentumPointsPerPercent: 0.5,
  },
  horizonWeights: {
    shortTerm: { moat: 0.15, growth: 0.2, balance: 0.1, valuation: 0.25, sentiment: 0.3 },
    midTerm: { moat: 0.2, growth: 0.2, balance: 0.2, valuation: 0.2, sentiment: 0.2 },
    longTerm: { moat: 0.3, growth: 0.15, balance: 0.25, valuation: 0.2, sentiment: 0.1 },
  },
};
