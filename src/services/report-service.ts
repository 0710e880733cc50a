import MarkdownIt from 'markdown-it';
import { format } from 'date-fns';
import { IReportService } from '../types/services/report-service';

const markdown = new MarkdownIt({
  html: false,
  linkify: true,
  breaks: true,
});

const REPORT_STYLES = `
    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Oxygen, Ubuntu, Cantarell, sans-serif;
      line-height: 1.6;
      color: #333;
      max-width: 800px;
      margin: 0 auto;
      padding: 20px;
      background-color: #f8f9fa;
    }
    .header {
      background: linear-gradient(135deg, #667eea 0%, #764ba2 100%);
      color: white;
      padding: 30px;
      border-radius: 10px;
      text-align: center;
      margin-bottom: 30px;
      box-shadow: 0 4px 6px rgba(0, 0, 0, 0.1);
    }
    .header h1 { margin: 0; font-size: 28px; font-weight: 600; }
    .header .date { margin: 10px 0 0 0; font-size: 16px; opacity: 0.9; }
    .content {
      background: white;
      border-radius: 10px;
      padding: 30px;
      box-shadow: 0 2px 4px rgba(0, 0, 0, 0.1);
      font-size: 14px;
    }
    .content p { margin: 12px 0; line-height: 1.7; }
    .content h1, .content h2, .content h3 {
      color: #2c3e50;
      padding-bottom: 8px;
      border-bottom: 2px solid #e9ecef;
    }
    .content table { border-collapse: collapse; width: 100%; margin-bottom: 20px; }
    .content th, .content td { border: 1px solid #ddd; padding: 8px; text-align: left; }
    .content th { background-color: #f2f2f2; }
    .content code {
      background: #f8f9fa;
      padding: 2px 4px;
      border-radius: 4px;
      font-family: 'Monaco', 'Menlo', monospace;
      font-size: 13px;
    }
    .footer {
      text-align: center;
      margin-top: 30px;
      padding: 20px;
      background: #f8f9fa;
      border-radius: 10px;
      font-size: 12px;
      color: #6c757d;
    }
    .footer a { color: #007bff; text-decoration: none; }
`;

/**
 * Renders the markdown briefing for email, Slack and the archive
 */
export class ReportService implements IReportService {
  /**
   * Converts markdown to HTML. Raw HTML in the briefing is escaped.
   */
  renderMarkdown(analysis: string): string {
    return markdown.render(analysis);
  }

  /**
   * Formats the briefing as a complete HTML email
   * @param analysis Markdown produced by the analysis service
   * @param date Date shown in the report header
   */
  formatEmailContent(analysis: string, date: Date = new Date()): string {
    const contentHtml = this.renderMarkdown(analysis);
    const currentDate = format(date, 'MMMM dd, yyyy');

    return `<!DOCTYPE html>
<html>
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Market Research Report</title>
  <style>${REPORT_STYLES}</style>
</head>
<body>
  <div class="header">
    <h1>📊 Market Research Report</h1>
    <div class="date">${currentDate}</div>
  </div>

  <div class="content">
${contentHtml}
  </div>

  <div class="footer">
    <p>This report was generated automatically by your Market Research Agent.</p>
    <p>Powered by Financial Modeling Prep API &amp; Groq AI</p>
  </div>
</body>
</html>
`;
  }

  formatSlackMessage(analysis: string, date: Date = new Date()): string {
    return `*Market Research Report - ${format(date, 'MMMM dd, yyyy')}*\n\n\`\`\`${analysis}\`\`\``;
  }

  buildReportFilename(date: Date = new Date()): string {
    return `market_report_${format(date, 'yyyyMMdd_HHmmss')}.html`;
  }
}
