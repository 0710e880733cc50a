/**
 * Interface for report archive storage
 */
export interface IReportArchive {
  save(filename: string, html: string): Promise<string>;
}
