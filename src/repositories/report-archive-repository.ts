import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { IReportArchive } from '../types/services/report-archive';

/**
 * Stores rendered reports as HTML files under the reports directory
 */
export class ReportArchiveRepository implements IReportArchive {
  constructor(private readonly reportsDir: string) {}

  /**
   * @returns Path of the written file
   */
  async save(filename: string, html: string): Promise<string> {
    await mkdir(this.reportsDir, { recursive: true });
    const filePath = path.join(this.reportsDir, path.basename(filename));
    await writeFile(filePath, html, 'utf8');
    return filePath;
  }
}
