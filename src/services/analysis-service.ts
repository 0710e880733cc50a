import { format } from 'date-fns';
import { IAnalysisService } from '../types/services/analysis-service';
import { IMarketDataService } from '../types/services/market-data-service';
import { ILlmRepository } from '../types/services/llm-repository';
import {
  BenchmarkQuotes,
  MarketMover,
  MarketSnapshot,
  TreasuryYields,
} from '../types/models/market-data';
import { LlmConfig } from '../types/models/config';
import { MARKET_BRIEFING_TEMPLATE } from '../prompts/market-briefing';
import { renderTemplate } from '../utils/template';
import { LlmError } from '../utils/errors/llm-error';
import { isSnapshotEmpty } from './market-data-service';

export const DATA_NOT_AVAILABLE = 'Data not available.';
export const NO_MARKET_DATA_MESSAGE =
  'Failed to collect any market data. All sources may be down or API keys invalid. Aborting analysis.';
export const EMPTY_ANALYSIS_MESSAGE = 'Error: Could not generate analysis.';

export const formatYields = (yields: TreasuryYields): string => {
  const lines = Object.entries(yields).map(([label, value]) => `${label}: ${value.toFixed(2)}%`);
  return lines.length > 0 ? lines.join('\n') : DATA_NOT_AVAILABLE;
};

export const formatBenchmarks = (benchmarks: BenchmarkQuotes): string => {
  const lines = Object.entries(benchmarks).map(
    ([name, quote]) => `- ${name}: ${quote.price ?? 'N/A'} (${quote.changePct} %)`,
  );
  return lines.length > 0 ? lines.join('\n') : DATA_NOT_AVAILABLE;
};

export const formatMovers = (movers: MarketMover[]): string => {
  const lines = movers.map(
    mover => `- ${mover.name} (${mover.symbol}): ${mover.changePct} (${mover.type})`,
  );
  return lines.length > 0 ? lines.join('\n') : DATA_NOT_AVAILABLE;
};

export const formatHeadlines = (headlines: string[]): string =>
  headlines.length > 0 ? headlines.join('\n') : DATA_NOT_AVAILABLE;

/**
 * Fills the briefing template with the collected data
 */
export const buildPrompt = (snapshot: MarketSnapshot, date: Date): string =>
  renderTemplate(MARKET_BRIEFING_TEMPLATE, {
    current_date: format(date, 'EEEE, MMMM dd, yyyy'),
    headlines: formatHeadlines(snapshot.headlines),
    formatted_yields: formatYields(snapshot.yields),
    formatted_benchmarks: formatBenchmarks(snapshot.benchmarks),
    formatted_movers: formatMovers(snapshot.movers),
  });

/**
 * Coordinates data collection and the LLM briefing
 */
export class AnalysisService implements IAnalysisService {
  constructor(
    private readonly marketDataService: IMarketDataService,
    private readonly llmRepository: ILlmRepository,
    private readonly models: Pick<LlmConfig, 'primaryModel' | 'fallbackModel'>,
  ) {}

  /**
   * Tries the primary model, then the fallback model
   * @throws LlmError naming both failures when neither model answers
   */
  async completeWithFallback(prompt: string): Promise<string> {
    const { primaryModel, fallbackModel } = this.models;

    try {
      console.log(`🤖 Attempting analysis with primary model (${primaryModel})...`);
      const response = await this.llmRepository.complete(primaryModel, prompt);
      console.log('✅ Primary model succeeded');
      return response;
    } catch (primaryError) {
      const primaryMessage = primaryError instanceof Error ? primaryError.message : String(primaryError);
      console.warn(`⚠️ Primary model failed: ${primaryMessage}`);
      console.log(`🔄 Falling back to ${fallbackModel}...`);

      try {
        const response = await this.llmRepository.complete(fallbackModel, prompt);
        console.log('✅ Fallback model succeeded');
        return response;
      } catch (fallbackError) {
        const fallbackMessage =
          fallbackError instanceof Error ? fallbackError.message : String(fallbackError);
        console.error(`❌ Fallback model also failed: ${fallbackMessage}`);
        throw new LlmError(
          `Both models failed. Primary: ${primaryMessage}, Fallback: ${fallbackMessage}`,
          fallbackModel,
          fallbackError,
        );
      }
    }
  }

  /**
   * Collects market data and asks the LLM for a markdown briefing.
   * Data and LLM failures are reported in the returned text.
   */
  async analyzeMarket(now: Date = new Date()): Promise<string> {
    const snapshot = await this.marketDataService.collectSnapshot();

    if (isSnapshotEmpty(snapshot)) {
      console.error(NO_MARKET_DATA_MESSAGE);
      return NO_MARKET_DATA_MESSAGE;
    }

    try {
      const analysis = await this.completeWithFallback(buildPrompt(snapshot, now));
      return analysis.trim().length > 0 ? analysis : EMPTY_ANALYSIS_MESSAGE;
    } catch (error) {
      const message = `An error occurred during AI analysis: ${
        error instanceof Error ? error.message : String(error)
      }`;
      console.error(message);
      return message;
    }
  }
}
