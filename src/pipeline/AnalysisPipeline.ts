/**
 * Analysis Pipeline
 *
 * Reads the persisted consolidated and regional extracts back from disk,
 * computes the frequency tables of each and publishes the reports.
 */

import fs from 'fs/promises';
import { FrequencyAnalyzer } from '../analysis/FrequencyAnalyzer.js';
import type { AnalysisContext, AnalyzedContext } from '../analysis/types.js';
import type { PipelineConfig } from '../config/pipeline.js';
import { Consolidator } from '../core/Consolidator.js';
import { ConsolidationError } from '../core/errors.js';
import { parseTable } from '../core/TableCodec.js';
import { ReportSink, type ReportOutputs } from '../reports/ReportSink.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('AnalysisPipeline');

export const CONSOLIDATED_LABEL = 'Brasil Consolidado';

export interface AnalysisSource {
  label: string;
  file: string;
}

export interface AnalysisRunSummary {
  contexts: AnalyzedContext[];
  reports: ReportOutputs;
}

export class AnalysisPipeline {
  private readonly analyzer: FrequencyAnalyzer;
  private readonly consolidator: Consolidator;
  private readonly sink: ReportSink;

  constructor(private readonly config: PipelineConfig) {
    this.analyzer = new FrequencyAnalyzer({
      analysisColumns: config.analysisColumns,
      defendantNatureColumn: config.defendantNatureColumn,
      publicEntityKeywords: config.publicEntityKeywords,
      neutralMarker: config.neutralMarker,
    });
    this.consolidator = new Consolidator(
      config.consolidatedFile,
      config.delimiter,
      config.neutralMarker
    );
    this.sink = new ReportSink(config.reportsDir, config.delimiter, config.topN);
  }

  /**
   * Consolidated file first, then one regional export per configured
   * region, in region order
   *
   * @throws ConsolidationError when the consolidated file does not exist
   */
  async listSources(): Promise<AnalysisSource[]> {
    try {
      await fs.access(this.config.consolidatedFile);
    } catch (error) {
      throw new ConsolidationError(
        `Consolidated file not found: ${this.config.consolidatedFile}. Run the filter command first.`,
        { cause: error }
      );
    }

    const regional = await this.consolidator.findRegionalExports(
      this.config.regionalDir,
      this.config.regions
    );
    return [
      { label: CONSOLIDATED_LABEL, file: this.config.consolidatedFile },
      ...regional.map((source) => ({ label: `Regional ${source.groupName}`, file: source.file })),
    ];
  }

  async loadContext(source: AnalysisSource): Promise<AnalysisContext> {
    let content: Buffer;
    try {
      content = await fs.readFile(source.file);
    } catch (error) {
      throw new ConsolidationError(`Cannot read ${source.label}: ${source.file}`, { cause: error });
    }

    return {
      label: source.label,
      source: source.file,
      rows: parseTable(content, { delimiter: this.config.delimiter }).rows,
    };
  }

  async run(): Promise<AnalysisRunSummary> {
    logger.info('>>> Starting health-litigation analysis <<<', {
      consolidatedFile: this.config.consolidatedFile,
      reportsDir: this.config.reportsDir,
    });

    // Rows of a context are dropped once its tables are computed
    const contexts: AnalyzedContext[] = [];
    for (const source of await this.listSources()) {
      const analyzed = this.analyzer.analyzeContext(await this.loadContext(source));
      logger.info(`Analyzed ${source.label}`, { subsetSizes: analyzed.subsetSizes });
      contexts.push(analyzed);
    }

    const reports = await this.sink.publish(contexts);

    logger.info('>>> Analysis complete <<<', {
      contexts: contexts.length,
      tables: reports.tableCsvs.length,
      pdfPages: reports.pageCount,
    });
    return { contexts, reports };
  }
}
