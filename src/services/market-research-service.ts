import { format } from 'date-fns';
import { AppConfig } from '../types/models/config';
import { RunResult } from '../types/models/report';
import { IEmailService } from '../types/models/email';
import { IAnalysisService } from '../types/services/analysis-service';
import { IReportService } from '../types/services/report-service';
import { ISlackService } from '../types/services/slack-service';
import { IReportArchive } from '../types/services/report-archive';
import { FmpApiRepository } from '../repositories/fmp-api-repository';
import { LlmRepository } from '../repositories/llm-repository';
import { ReportArchiveRepository } from '../repositories/report-archive-repository';
import { MarketDataService } from './market-data-service';
import { AnalysisService } from './analysis-service';
import { ReportService } from './report-service';
import { EmailService } from './email-service';
import { SlackService } from './slack-service';

export const REPORT_EMAIL_SUBJECT = 'Daily Market Research Report';

export interface MarketResearchDependencies {
  analysisService: IAnalysisService;
  reportService: IReportService;
  emailService: IEmailService;
  slackService: ISlackService;
  reportArchive: IReportArchive;
}

const SEPARATOR = '='.repeat(50);

/**
 * Runs the complete market research workflow: analysis, notifications and archive
 */
export class MarketResearchService {
  constructor(private readonly deps: MarketResearchDependencies) {}

  /**
   * Creates a MarketResearchService wired from the application configuration
   */
  public static initialize(config: AppConfig): MarketResearchService {
    const fmpApiRepository = new FmpApiRepository({
      baseURL: config.fmp.baseURL,
      apiKey: config.fmp.apiKey ?? '',
    });
    const marketDataService = new MarketDataService(fmpApiRepository);
    const llmRepository = new LlmRepository(config.llm);

    return new MarketResearchService({
      analysisService: new AnalysisService(marketDataService, llmRepository, config.llm),
      reportService: new ReportService(),
      emailService: new EmailService(config.email),
      slackService: new SlackService(config.slack),
      reportArchive: new ReportArchiveRepository(config.reportsDir),
    });
  }

  async run(now: Date = new Date()): Promise<RunResult> {
    const { analysisService, reportService, emailService, slackService, reportArchive } = this.deps;
    const timestamp = format(now, 'yyyy-MM-dd HH:mm:ss');

    console.log(`\n${SEPARATOR}`);
    console.log(`Market Research Agent - ${timestamp}`);
    console.log(`${SEPARATOR}\n`);

    try {
      console.log('Starting market analysis...');
      const analysis = await analysisService.analyzeMarket(now);
      console.log(`\n${analysis}\n`);

      console.log('Sending notifications...');
      const emailContent = reportService.formatEmailContent(analysis, now);
      const emailSent = await emailService.send(REPORT_EMAIL_SUBJECT, emailContent);
      console.log(emailSent ? '✓ Email sent successfully' : '✗ Failed to send email');

      let slackSent = true;
      if (slackService.isConfigured()) {
        slackSent = await slackService.send(reportService.formatSlackMessage(analysis, now));
        console.log(slackSent ? '✓ Slack message sent successfully' : '✗ Failed to send Slack message');
      } else {
        console.log('ℹ Slack notification skipped (not configured)');
      }

      const reportPath = await this.archive(reportService.buildReportFilename(now), emailContent);

      console.log(`\n${SEPARATOR}`);
      console.log('Market research completed successfully!');
      console.log(`${SEPARATOR}\n`);

      return {
        success: true,
        timestamp,
        emailSent,
        slackSent,
        reportPath,
        message: 'Market research completed successfully',
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`\n✗ Error running market research: ${message}`, error);
      return {
        success: false,
        timestamp,
        error: message,
        message: 'Market research failed',
      };
    }
  }

  /**
   * A failed write is logged; the report was already delivered
   */
  private async archive(filename: string, html: string): Promise<string | null> {
    try {
      const reportPath = await this.deps.reportArchive.save(filename, html);
      console.log(`✓ Report saved to ${reportPath}`);
      return reportPath;
    } catch (error) {
      console.error(`✗ Failed to save report ${filename}:`, error);
      return null;
    }
  }
}
