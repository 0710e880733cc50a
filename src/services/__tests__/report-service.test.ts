import { ReportService } from '../report-service';

describe('ReportService', () => {
  const service = new ReportService();
  const date = new Date(2026, 9, 19, 9, 30, 5);

  describe('renderMarkdown', () => {
    it('should render markdown to HTML', () => {
      expect(service.renderMarkdown('## 📈 Markets:\n**Stocks** rose')).toBe(
        '<h2>📈 Markets:</h2>\n<p><strong>Stocks</strong> rose</p>\n',
      );
    });

    it('should escape raw HTML', () => {
      expect(service.renderMarkdown('<script>alert(1)</script>')).toBe(
        '<p>&lt;script&gt;alert(1)&lt;/script&gt;</p>\n',
      );
    });

    it('should keep single line breaks', () => {
      expect(service.renderMarkdown('first\nsecond')).toBe('<p>first<br>\nsecond</p>\n');
    });
  });

  describe('formatEmailContent', () => {
    it('should wrap the rendered briefing in the report layout', () => {
      const html = service.formatEmailContent('**Up** day', date);

      expect(html.startsWith('<!DOCTYPE html>')).toBe(true);
      expect(html).toContain('<h1>📊 Market Research Report</h1>');
      expect(html).toContain('<div class="date">October 19, 2026</div>');
      expect(html).toContain('<p><strong>Up</strong> day</p>');
      expect(html).toContain('<p>Powered by Financial Modeling Prep API &amp; Groq AI</p>');
    });
  });

  describe('formatSlackMessage', () => {
    it('should put the briefing in a code block under a bold title', () => {
      expect(service.formatSlackMessage('Stocks rose', date)).toBe(
        '*Market Research Report - October 19, 2026*\n\n```Stocks rose```',
      );
    });
  });

  describe('buildReportFilename', () => {
    it('should timestamp the file name', () => {
      expect(service.buildReportFilename(date)).toBe('market_report_20261019_093005.html');
    });
  });
});
