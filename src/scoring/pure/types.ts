export interface PricePoint {
  timestamp: string;
  price: number;
}

export interface SecuritySnapshot {
  ticker: string;
  name?: string;
  marketCap: number;
  epsGrowthRate: number;
  debtToEquity: number;
  trailingEps: number;
  expectedGrowthRate: number;
  currentPrice: number;
  dividendYield: number;
  sector: string;
  recentPriceHistory: PricePoint[];
  bondYield?: number | null;
  volume?: number | null;
  averageVolume?: number | null;
  changePercent?: number | null;
}

/** Wire form of a snapshot as supplied by the market data provider. */
export interface RawSecuritySnapshot {
  ticker: string;
  name?: string;
  market_cap: number;
  eps_growth_rate: number;
  debt_to_equity: number;
  trailing_eps: number;
  expected_growth_rate: number;
  current_price: number;
  dividend_yield: number;
  sector: string;
  recent_price_history: PricePoint[];
  bond_yield?: number | null;
  volume?: number | null;
  average_volume?: number | null;
  change_percent?: number | null;
}

export interface SubScores {
  moat: number;
  growth: number;
  balance: number;
  valuation: number;
  sentiment: number;
}

export type SubScoreKey = keyof SubScores;

export interface CompositeScores {
  shortTerm: number;
  midTerm: number;
  longTerm: number;
}

export type ActivityState = 'HOT' | 'WARM' | 'COLD' | 'FROZEN';

/** Bound of the band each table lookup matched; null where the table's fallback applied. */
export interface MatchedBands {
  moat: number | null;
  growth: number | null;
  balance: number | null;
  dividend: number | null;
}

export interface ScoreBreakdown {
  intrinsicValue: number | null;
  priceToValue: number | null;
  canonicalSector: string;
  momentumPercent: number | null;
  sentimentComponents: {
    dividend: number;
    sector: number;
    momentum: number;
  };
  bands: MatchedBands;
  warnings: string[];
}

export interface ScoredTicker {
  ok: true;
  ticker: string;
  subScores: SubScores;
  composites: CompositeScores;
  breakdown: ScoreBreakdown;
  activity: ActivityState | null;
}

export interface FailedTicker {
  ok: false;
  ticker: string;
  error: {
    kind: 'InvalidSnapshot';
    issues: string[];
  };
}

export type TickerResult = ScoredTicker | FailedTicker;
