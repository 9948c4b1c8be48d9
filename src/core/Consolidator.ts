import fs from 'fs/promises';
import path from 'path';
import { ConsolidationError } from './errors.js';
import {
  groupNameFromFile,
  isRegionalFileName,
  regionalFileName,
  type RegionalExport,
} from './RegionalExporter.js';
import { parseTable, readTableHeader, serializeTable, type TableRow } from './TableCodec.js';
import { AtomicFileWriter } from '../utils/atomicWrite.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('Consolidator');

export interface ConsolidationResult {
  file: string;
  columns: string[];
  rowCount: number;
  sources: string[];
}

/**
 * Union of the given headers, in first-seen order
 */
export function unionColumns(headers: readonly (readonly string[])[]): string[] {
  const seen = new Set<string>();
  for (const header of headers) {
    for (const column of header) {
      seen.add(column);
    }
  }
  return [...seen];
}

/**
 * Regional export files ordered by the configured regions; files of other
 * groups follow, sorted by name
 */
export function orderRegionalFiles(files: readonly string[], regions: readonly string[]): string[] {
  const remaining = new Set(files);
  const ordered: string[] = [];

  for (const region of regions) {
    const name = regionalFileName(region);
    if (remaining.delete(name)) {
      ordered.push(name);
    }
  }
  return [...ordered, ...[...remaining].sort()];
}

/**
 * Consolidator
 *
 * Stacks the regional exports of a batch into the national file, one
 * export in memory at a time.
 */
export class Consolidator {
  constructor(
    private readonly consolidatedFile: string,
    private readonly delimiter: string,
    private readonly neutralMarker: string = ''
  ) {}

  /**
   * Write the national file from the given exports, in the given order
   *
   * @throws ConsolidationError when there is no export to consolidate
   */
  async consolidate(sources: readonly RegionalExport[]): Promise<ConsolidationResult> {
    if (sources.length === 0) {
      throw new ConsolidationError(
        'No regional datasets to consolidate: no source group produced readable data'
      );
    }

    const headers: string[][] = [];
    for (const source of sources) {
      headers.push(readTableHeader(await this.readExport(source), { delimiter: this.delimiter }));
    }
    const columns = unionColumns(headers);

    const writer = new AtomicFileWriter(this.consolidatedFile);
    let rowCount = 0;
    try {
      await writer.write(serializeTable(columns, [], { delimiter: this.delimiter }));

      for (const source of sources) {
        const table = parseTable(await this.readExport(source), { delimiter: this.delimiter });
        const rows: TableRow[] = [];
        for (const row of table.rows) {
          const reprojected: TableRow = {};
          for (const column of columns) {
            reprojected[column] = Object.hasOwn(row, column) ? row[column] : this.neutralMarker;
          }
          rows.push(reprojected);
        }

        await writer.write(
          serializeTable(columns, rows, {
            delimiter: this.delimiter,
            missing: this.neutralMarker,
            header: false,
          })
        );
        rowCount += rows.length;
        logger.info(`Added ${rows.length} rows from ${source.groupName}`);
      }

      await writer.commit();
    } catch (error) {
      await writer.discard();
      throw error;
    }

    logger.info(`Consolidation complete: ${rowCount} rows`, {
      file: this.consolidatedFile,
      sources: sources.length,
    });

    return {
      file: this.consolidatedFile,
      columns,
      rowCount,
      sources: sources.map((source) => source.groupName),
    };
  }

  /**
   * Persisted regional exports, in the order of `regions`
   */
  async findRegionalExports(
    regionalDir: string,
    regions: readonly string[] = []
  ): Promise<RegionalExport[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(regionalDir);
    } catch (error) {
      throw new ConsolidationError(`Regional directory not readable: ${regionalDir}`, {
        cause: error,
      });
    }

    const exports = orderRegionalFiles(entries.filter(isRegionalFileName), regions).map(
      (name) => ({ groupName: groupNameFromFile(name), file: path.join(regionalDir, name) })
    );

    logger.info(`Found ${exports.length} regional exports`, { regionalDir });
    return exports;
  }

  private async readExport(source: RegionalExport): Promise<Buffer> {
    try {
      return await fs.readFile(source.file);
    } catch (error) {
      throw new ConsolidationError(`Regional export not readable: ${source.file}`, {
        cause: error,
      });
    }
  }
}
