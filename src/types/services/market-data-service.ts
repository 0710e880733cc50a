import {
  BenchmarkQuotes,
  MarketMover,
  MarketSnapshot,
  TreasuryYields,
} from '../models/market-data';

/**
 * Interface for the market data service
 */
export interface IMarketDataService {
  fetchHeadlines(): Promise<string[]>;
  fetchYields(): Promise<TreasuryYields>;
  fetchBenchmarks(): Promise<BenchmarkQuotes>;
  fetchMajorMovers(): Promise<MarketMover[]>;
  collectSnapshot(): Promise<MarketSnapshot>;
}
