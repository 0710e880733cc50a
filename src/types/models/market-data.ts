/**
 * Treasury yields in percent, keyed by label (e.g. "US 10Y")
 */
export type TreasuryYields = Record<string, number>;

export interface BenchmarkQuote {
  price: number | null;
  change: number | null;
  /** Percentage change with two decimals, e.g. "-0.42" */
  changePct: string;
}

export type BenchmarkQuotes = Record<string, BenchmarkQuote>;

export type MoverType = 'gainers' | 'losers';

export interface MarketMover {
  symbol: string;
  name: string;
  /** Percentage change with two decimals and a % suffix, e.g. "12.50%" */
  changePct: string;
  price?: number | null;
  volume?: number | null;
  type: MoverType;
}

/**
 * Everything collected for a single briefing
 */
export interface MarketSnapshot {
  headlines: string[];
  yields: TreasuryYields;
  benchmarks: BenchmarkQuotes;
  movers: MarketMover[];
}
