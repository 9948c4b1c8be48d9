import type { AnalyzedContext } from '../analysis/types.js';
import { CsvReportWriter } from './CsvReportWriter.js';
import { PdfReportWriter } from './PdfReportWriter.js';

export interface ReportOutputs {
  combinedCsv: string;
  tableCsvs: string[];
  pdf: string;
  pageCount: number;
  subsetBStartPage: number;
}

/**
 * Report Sink
 *
 * Hands the analysed contexts to the CSV and PDF writers. Contexts arrive in
 * presentation order (consolidated first, then regional files).
 */
export class ReportSink {
  private readonly csvWriter: CsvReportWriter;
  private readonly pdfWriter: PdfReportWriter;

  constructor(reportsDir: string, delimiter: string, topN: number) {
    this.csvWriter = new CsvReportWriter(reportsDir, delimiter, topN);
    this.pdfWriter = new PdfReportWriter(reportsDir, topN);
  }

  async publish(contexts: readonly AnalyzedContext[]): Promise<ReportOutputs> {
    const csv = await this.csvWriter.write(contexts);
    const pdf = await this.pdfWriter.write(contexts);

    return {
      combinedCsv: csv.combined,
      tableCsvs: csv.tables,
      pdf: pdf.file,
      pageCount: pdf.pageCount,
      subsetBStartPage: pdf.subsetBStartPage,
    };
  }
}
