/**
 * Interface for the report service
 */
export interface IReportService {
  formatEmailContent(analysis: string, date?: Date): string;
  formatSlackMessage(analysis: string, date?: Date): string;
  buildReportFilename(date?: Date): string;
}
