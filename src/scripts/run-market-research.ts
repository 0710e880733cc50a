import { loadConfig } from '../config/env';
import { MarketResearchService } from '../services/market-research-service';

/**
 * Runs the market research workflow once
 * @returns Process exit code
 */
async function main(): Promise<number> {
  try {
    const service = MarketResearchService.initialize(loadConfig());
    const result = await service.run();
    return result.success ? 0 : 1;
  } catch (error) {
    console.error('Error running market research:', error);
    return 1;
  }
}

main()
  .then(exitCode => process.exit(exitCode))
  .catch(error => {
    console.error('Unexpected error:', error);
    process.exit(1);
  });
