/**
 * Filter Pipeline
 *
 * Archive discovery -> extraction -> subject filter -> projection ->
 * regional export -> consolidation. One sequential pass per batch; every
 * output is overwritten, so a re-run on the same inputs reproduces it.
 */

import fs from 'fs/promises';
import type { PipelineConfig } from '../config/pipeline.js';
import { extractTabularEntries } from '../core/ArchiveExtractor.js';
import { locateSourceGroups, type SourceGroup } from '../core/ArchiveLocator.js';
import { ColumnProjector } from '../core/ColumnProjector.js';
import { Consolidator, type ConsolidationResult } from '../core/Consolidator.js';
import { ConfigurationError, CorruptArchiveError } from '../core/errors.js';
import { RegionalExporter, type RegionalExport } from '../core/RegionalExporter.js';
import { filterBySubject } from '../core/SubjectFilter.js';
import { parseTable, type Table, type TableRow } from '../core/TableCodec.js';
import type { GroupSummary } from '../core/types.js';
import { createLogger, errorMeta } from '../utils/logger.js';

const logger = createLogger('FilterPipeline');

export interface FilterRunSummary {
  groups: GroupSummary[];
  archivesProcessed: number;
  archivesSkipped: number;
  rowsRead: number;
  rowsRetained: number;
  consolidation: ConsolidationResult;
}

interface ArchiveResult {
  tables: number;
  rows: TableRow[];
  read: number;
  rejected: number;
  skipped: number;
  schemaMismatches: number;
}

export class FilterPipeline {
  private readonly projector: ColumnProjector;
  private readonly exporter: RegionalExporter;
  private readonly consolidator: Consolidator;

  constructor(private readonly config: PipelineConfig) {
    this.projector = new ColumnProjector(config.projectedColumns, config.neutralMarker);
    this.exporter = new RegionalExporter(
      config.regionalDir,
      config.delimiter,
      config.neutralMarker
    );
    this.consolidator = new Consolidator(
      config.consolidatedFile,
      config.delimiter,
      config.neutralMarker
    );
  }

  /**
   * Run the whole batch
   *
   * @throws ConfigurationError before any processing when directories are unusable
   * @throws ConsolidationError when no source group produced data
   */
  async run(): Promise<FilterRunSummary> {
    logger.info('>>> Starting health-litigation filter run <<<', {
      inputDir: this.config.inputDir,
      outputDir: this.config.outputDir,
    });

    await this.prepareOutput();

    const exported: RegionalExport[] = [];
    const groups: GroupSummary[] = [];

    for (const group of locateSourceGroups(this.config.inputDir, this.config.regions)) {
      logger.info(`--- Processing region: ${group.name} (${group.archives.length} archives) ---`);
      const { regionalExport, summary } = await this.processGroup(group);

      if (regionalExport) {
        summary.exportPath = regionalExport.file;
        exported.push(regionalExport);
      }
      groups.push(summary);
    }

    // Exports of groups absent from this batch, or without readable data
    await this.exporter.prune(exported.map((regionalExport) => regionalExport.groupName));

    const consolidation = await this.consolidator.consolidate(exported);

    const summary: FilterRunSummary = {
      groups,
      archivesProcessed: groups.reduce((sum, g) => sum + g.archives - g.archivesSkipped, 0),
      archivesSkipped: groups.reduce((sum, g) => sum + g.archivesSkipped, 0),
      rowsRead: groups.reduce((sum, g) => sum + g.rowsRead, 0),
      rowsRetained: groups.reduce((sum, g) => sum + g.rowsRetained, 0),
      consolidation,
    };

    logger.info('>>> Filter run complete <<<', {
      archivesProcessed: summary.archivesProcessed,
      archivesSkipped: summary.archivesSkipped,
      rowsRead: summary.rowsRead,
      rowsRetained: summary.rowsRetained,
    });
    return summary;
  }

  private async prepareOutput(): Promise<void> {
    try {
      await fs.mkdir(this.config.regionalDir, { recursive: true });
    } catch (error) {
      throw new ConfigurationError(
        `Cannot create output directory: ${this.config.regionalDir}`,
        { cause: error }
      );
    }
  }

  /**
   * Filter every archive of a group into its export; corrupt archives are
   * skipped whole
   */
  private async processGroup(group: SourceGroup): Promise<{
    regionalExport: RegionalExport | null;
    summary: GroupSummary;
  }> {
    const summary: GroupSummary = {
      groupName: group.name,
      archives: group.archives.length,
      archivesSkipped: 0,
      tables: 0,
      rowsRead: 0,
      rowsRetained: 0,
      rowsRejected: 0,
      rowsSkipped: 0,
      schemaMismatches: 0,
      exportPath: null,
    };
    const writer = this.exporter.begin(group.name, this.projector.columns);

    try {
      for (const archivePath of group.archives) {
        let result: ArchiveResult;
        try {
          result = this.processArchive(archivePath);
        } catch (error) {
          if (!(error instanceof CorruptArchiveError)) throw error;
          summary.archivesSkipped++;
          logger.error(`Skipping corrupt archive: ${archivePath}`, errorMeta(error));
          continue;
        }

        summary.tables += result.tables;
        summary.rowsRead += result.read;
        summary.rowsRetained += result.rows.length;
        summary.rowsRejected += result.rejected;
        summary.rowsSkipped += result.skipped;
        summary.schemaMismatches += result.schemaMismatches;
        await writer.append(result.rows);
      }
    } catch (error) {
      await writer.discard();
      throw error;
    }

    logger.info(`Region ${group.name}: ${summary.rowsRetained} of ${summary.rowsRead} rows retained`, {
      tables: summary.tables,
      archivesSkipped: summary.archivesSkipped,
    });

    if (summary.tables === 0) {
      logger.warn(`Region ${group.name} produced no readable tables`);
      await writer.discard();
      return { regionalExport: null, summary };
    }

    return { regionalExport: await writer.commit(), summary };
  }

  /**
   * Drain one archive completely before committing any of its rows
   */
  private processArchive(archivePath: string): ArchiveResult {
    const result: ArchiveResult = {
      tables: 0,
      rows: [],
      read: 0,
      rejected: 0,
      skipped: 0,
      schemaMismatches: 0,
    };

    for (const entry of extractTabularEntries(archivePath)) {
      const source = `${archivePath}:${entry.entryName}`;
      logger.info(`Filtering ${entry.entryName}`, { archive: archivePath });

      let table: Table;
      try {
        table = parseTable(entry.data, { delimiter: this.config.delimiter });
      } catch (error) {
        throw new CorruptArchiveError(
          archivePath,
          `${entry.entryName}: ${errorMeta(error).error}`,
          { cause: error }
        );
      }

      if (this.projector.checkSchema(source, table.columns)) {
        result.schemaMismatches++;
      }

      const filtered = filterBySubject(
        table,
        this.config.subjectColumn,
        this.config.subjectCodes,
        source
      );

      result.tables++;
      result.read += filtered.read;
      result.rejected += filtered.rejected;
      result.skipped += filtered.skipped;
      for (const row of filtered.rows) {
        result.rows.push(this.projector.project(row));
      }
    }

    return result;
  }
}
