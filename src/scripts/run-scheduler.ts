import { loadConfig } from '../config/env';
import { MarketResearchService } from '../services/market-research-service';
import { SchedulerService } from '../services/scheduler-service';

try {
  const config = loadConfig();
  const service = MarketResearchService.initialize(config);
  const scheduler = new SchedulerService(() => service.run(), config.schedule, {
    runOnStart: config.runOnStart,
  });

  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`Received ${signal}, shutting down`);
    scheduler.stop();
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  scheduler.start();
} catch (error) {
  console.error('Error starting market research scheduler:', error);
  process.exit(1);
}
