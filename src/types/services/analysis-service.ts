/**
 * Interface for the analysis service
 */
export interface IAnalysisService {
  analyzeMarket(now?: Date): Promise<string>;
}
