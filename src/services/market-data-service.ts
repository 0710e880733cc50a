import { FmpApiRepository } from '../repositories/fmp-api-repository';
import { IMarketDataService } from '../types/services/market-data-service';
import {
  BenchmarkQuotes,
  MarketMover,
  MarketSnapshot,
  MoverType,
  TreasuryYields,
} from '../types/models/market-data';
import {
  benchmarkSymbolListSchema,
  FmpMover,
  moverListSchema,
  quoteListSchema,
  titledNewsItemSchema,
  wrappedNewsFeedSchema,
} from '../types/schemas/fmp';
import benchmarkSymbols from '../data/benchmark-symbols.json';

interface NewsSource {
  name: string;
  path: string;
  limit: number;
}

export const NEWS_SOURCES: NewsSource[] = [
  { name: 'stock_news', path: '/stable/news/stock-latest', limit: 100 },
  { name: 'forex_news', path: '/stable/news/forex-latest', limit: 20 },
  { name: 'crypto_news', path: '/stable/news/crypto-latest', limit: 20 },
  { name: 'general_news', path: '/stable/news/general-latest', limit: 100 },
];

export const TREASURY_SYMBOLS: Record<string, string> = {
  'US 13W': '^IRX',
  'US 5Y': '^FVX',
  'US 10Y': '^TNX',
  'US 30Y': '^TYX',
};

export const BENCHMARK_SYMBOLS: string[] = benchmarkSymbolListSchema
  .parse(benchmarkSymbols)
  .map(entry => entry.symbol);

export const MAX_HEADLINES = 300;
const ACTIVES_CONSIDERED = 50;
const MOVERS_PER_SIDE = 10;

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const titlesFrom = (items: unknown[]): string[] =>
  items.flatMap(item => {
    const parsed = titledNewsItemSchema.safeParse(item);
    return parsed.success ? [parsed.data.title] : [];
  });

const changeOf = (mover: FmpMover): number => mover.changesPercentage ?? 0;

/**
 * Collects market data from Financial Modeling Prep.
 *
 * Every fetch degrades to an empty value instead of failing, so a single
 * broken endpoint never prevents the briefing from being written.
 */
export class MarketDataService implements IMarketDataService {
  constructor(
    private readonly fmpApi: FmpApiRepository,
    private readonly benchmarkSymbols: string[] = BENCHMARK_SYMBOLS,
  ) {}

  /**
   * Fetches financial and macroeconomic headlines from every news feed
   * @returns Unique headlines in feed order, at most MAX_HEADLINES
   */
  async fetchHeadlines(): Promise<string[]> {
    if (!this.fmpApi.hasApiKey()) {
      console.warn('FMP API key not found.');
      return [];
    }

    const allHeadlines: string[] = [];

    for (const source of NEWS_SOURCES) {
      console.log(`Attempting to fetch from ${source.name}...`);
      try {
        const data = await this.fmpApi.get(
          source.path,
          { page: 0, limit: source.limit },
          source.name,
        );
        allHeadlines.push(...this.extractHeadlines(source.name, data));
      } catch (error) {
        console.error(`✗ Error fetching ${source.name}: ${errorMessage(error)}`);
      }
    }

    const uniqueHeadlines = [...new Set(allHeadlines)];
    console.log(`📊 Total unique headlines collected: ${uniqueHeadlines.length}`);

    return uniqueHeadlines.slice(0, MAX_HEADLINES);
  }

  /**
   * A feed answers either with a list of articles or with `{ data: [...] }`
   */
  private extractHeadlines(sourceName: string, data: unknown): string[] {
    if (Array.isArray(data) && data.length > 0) {
      const headlines = titlesFrom(data);
      console.log(`✓ Fetched ${headlines.length} headlines from ${sourceName}`);
      return headlines;
    }

    const wrapped = wrappedNewsFeedSchema.safeParse(data);
    if (wrapped.success) {
      const headlines = titlesFrom(wrapped.data.data);
      console.log(`✓ Fetched ${headlines.length} headlines from ${sourceName} (dict format)`);
      return headlines;
    }

    if (data !== null && typeof data === 'object' && !Array.isArray(data)) {
      console.warn(
        `⚠ ${sourceName} returned dict but no 'data' key. Keys: ${Object.keys(data).join(', ')}`,
      );
    } else {
      console.warn(`⚠ ${sourceName} returned unexpected format or empty data`);
    }
    return [];
  }

  /**
   * Fetches current treasury yields, one quote per maturity
   * @returns Yields keyed by label, or an empty object if any request fails
   */
  async fetchYields(): Promise<TreasuryYields> {
    if (!this.fmpApi.hasApiKey()) {
      return {};
    }

    const yields: TreasuryYields = {};
    try {
      for (const [label, symbol] of Object.entries(TREASURY_SYMBOLS)) {
        const data = quoteListSchema.parse(
          await this.fmpApi.get(`/api/v3/quote/${symbol}`, {}, `yield ${label}`),
        );
        const price = data[0]?.price;
        if (typeof price === 'number') {
          yields[label] = price;
        }
      }
      return yields;
    } catch (error) {
      console.error(`Error fetching yields from FMP: ${errorMessage(error)}`);
      return {};
    }
  }

  /**
   * Fetches the benchmark quotes in a single batch request
   * @returns Quotes keyed by instrument name, or an empty object on failure
   */
  async fetchBenchmarks(): Promise<BenchmarkQuotes> {
    if (!this.fmpApi.hasApiKey() || this.benchmarkSymbols.length === 0) {
      return {};
    }

    try {
      const data = quoteListSchema.parse(
        await this.fmpApi.get(
          `/api/v3/quote/${this.benchmarkSymbols.join(',')}`,
          {},
          'benchmarks',
        ),
      );

      const benchmarks: BenchmarkQuotes = {};
      for (const item of data) {
        const key = item.name ?? item.symbol;
        if (!key) {
          continue;
        }
        benchmarks[key] = {
          price: item.price ?? null,
          change: item.change ?? null,
          changePct: (item.changesPercentage ?? 0).toFixed(2),
        };
      }
      return benchmarks;
    } catch (error) {
      console.error(`Error fetching benchmarks from FMP: ${errorMessage(error)}`);
      return {};
    }
  }

  /**
   * Fetches the biggest intraday movers among the most active stocks,
   * falling back to the plain gainers and losers lists
   */
  async fetchMajorMovers(): Promise<MarketMover[]> {
    if (!this.fmpApi.hasApiKey()) {
      return [];
    }

    try {
      const actives = moverListSchema.parse(
        await this.fmpApi.get('/api/v3/stock_market/actives', {}, 'actives'),
      );

      const sortedByChange = actives
        .slice(0, ACTIVES_CONSIDERED)
        .sort((a, b) => Math.abs(changeOf(b)) - Math.abs(changeOf(a)));

      const gainers = sortedByChange.filter(item => changeOf(item) > 0).slice(0, MOVERS_PER_SIDE);
      const losers = sortedByChange.filter(item => changeOf(item) < 0).slice(0, MOVERS_PER_SIDE);

      const movers = [
        ...gainers.map(item => this.toMover(item, 'gainers', true)),
        ...losers.map(item => this.toMover(item, 'losers', true)),
      ];

      if (movers.length > 0) {
        return movers;
      }
    } catch (error) {
      console.error(
        `Error fetching active stocks, falling back to regular movers: ${errorMessage(error)}`,
      );
    }

    const movers: MarketMover[] = [];
    try {
      for (const moveType of ['gainers', 'losers'] as const) {
        const data = moverListSchema.parse(
          await this.fmpApi.get(`/api/v3/stock_market/${moveType}`, {}, moveType),
        );
        movers.push(
          ...data.slice(0, MOVERS_PER_SIDE).map(item => this.toMover(item, moveType, false)),
        );
      }
      return movers;
    } catch (error) {
      console.error(`Error fetching movers from FMP: ${errorMessage(error)}`);
      return [];
    }
  }

  private toMover(item: FmpMover, type: MoverType, withMarketData: boolean): MarketMover {
    const mover: MarketMover = {
      symbol: item.symbol,
      name: item.name ?? item.symbol,
      changePct: `${changeOf(item).toFixed(2)}%`,
      type,
    };
    if (withMarketData) {
      mover.price = item.price ?? null;
      mover.volume = item.volume ?? null;
    }
    return mover;
  }

  /**
   * Runs all fetches concurrently; a rejected fetch yields its empty value
   */
  async collectSnapshot(): Promise<MarketSnapshot> {
    const [headlines, yields, benchmarks, movers] = await Promise.allSettled([
      this.fetchHeadlines(),
      this.fetchYields(),
      this.fetchBenchmarks(),
      this.fetchMajorMovers(),
    ]);

    const settle = <T>(name: string, result: PromiseSettledResult<T>, empty: T): T => {
      if (result.status === 'fulfilled') {
        return result.value;
      }
      console.error(`${name} fetch failed: ${errorMessage(result.reason)}`);
      return empty;
    };

    const snapshot: MarketSnapshot = {
      headlines: settle('Headlines', headlines, []),
      yields: settle('Yields', yields, {}),
      benchmarks: settle('Benchmarks', benchmarks, {}),
      movers: settle('Movers', movers, []),
    };

    console.log(
      `Data collected - Headlines: ${snapshot.headlines.length}, ` +
        `Yields: ${Object.keys(snapshot.yields).length}, ` +
        `Benchmarks: ${Object.keys(snapshot.benchmarks).length}, ` +
        `Movers: ${snapshot.movers.length}`,
    );

    return snapshot;
  }
}

/**
 * True when no part of the snapshot holds any data
 */
export const isSnapshotEmpty = (snapshot: MarketSnapshot): boolean =>
  snapshot.headlines.length === 0 &&
  Object.keys(snapshot.yields).length === 0 &&
  Object.keys(snapshot.benchmarks).length === 0 &&
  snapshot.movers.length === 0;
