import fs from 'fs/promises';
import path from 'path';
import { serializeTable, type TableRow } from './TableCodec.js';
import { AtomicFileWriter } from '../utils/atomicWrite.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('RegionalExporter');

export const REGIONAL_FILE_PREFIX = 'dados_saude_';

/**
 * A regional export on disk
 */
export interface RegionalExport {
  groupName: string;
  file: string;
}

/**
 * Deterministic export file name for a source group
 */
export function regionalFileName(groupName: string): string {
  const safeName = groupName.replace(/[^A-Za-z0-9_-]/g, '_');
  return `${REGIONAL_FILE_PREFIX}${safeName}.csv`;
}

/**
 * Recover the group name from an export file name
 */
export function groupNameFromFile(fileName: string): string {
  const stem = path.basename(fileName, path.extname(fileName));
  return stem.startsWith(REGIONAL_FILE_PREFIX) ? stem.slice(REGIONAL_FILE_PREFIX.length) : stem;
}

export function isRegionalFileName(fileName: string): boolean {
  return fileName.startsWith(REGIONAL_FILE_PREFIX) && fileName.toLowerCase().endsWith('.csv');
}

/**
 * Export of one group, written archive by archive
 *
 * Nothing replaces the previous export until `commit`.
 */
export class RegionalExportWriter {
  private readonly file: AtomicFileWriter;
  private headerWritten = false;
  private written = 0;

  constructor(
    readonly groupName: string,
    readonly filePath: string,
    private readonly columns: readonly string[],
    private readonly delimiter: string,
    private readonly neutralMarker: string
  ) {
    this.file = new AtomicFileWriter(filePath);
  }

  get rowCount(): number {
    return this.written;
  }

  async append(rows: readonly TableRow[]): Promise<void> {
    const content = serializeTable(this.columns, rows, {
      delimiter: this.delimiter,
      missing: this.neutralMarker,
      header: !this.headerWritten,
    });
    this.headerWritten = true;

    if (content.length > 0) {
      await this.file.write(content);
    }
    this.written += rows.length;
  }

  async commit(): Promise<RegionalExport> {
    if (!this.headerWritten) {
      await this.append([]);
    }
    await this.file.commit();

    logger.info(`Exported ${this.written} rows for ${this.groupName}`, { file: this.filePath });
    return { groupName: this.groupName, file: this.filePath };
  }

  discard(): Promise<void> {
    return this.file.discard();
  }
}

/**
 * Regional Exporter
 *
 * Writes one CSV per source group into the regional directory, replacing
 * any previous export of the same group.
 */
export class RegionalExporter {
  constructor(
    private readonly regionalDir: string,
    private readonly delimiter: string,
    private readonly neutralMarker: string = ''
  ) {}

  pathFor(groupName: string): string {
    return path.join(this.regionalDir, regionalFileName(groupName));
  }

  begin(groupName: string, columns: readonly string[]): RegionalExportWriter {
    return new RegionalExportWriter(
      groupName,
      this.pathFor(groupName),
      columns,
      this.delimiter,
      this.neutralMarker
    );
  }

  /**
   * Remove every export whose group is not in `exportedGroups`
   *
   * @returns paths of the removed files
   */
  async prune(exportedGroups: readonly string[]): Promise<string[]> {
    const keep = new Set(exportedGroups.map(regionalFileName));

    let entries: string[];
    try {
      entries = await fs.readdir(this.regionalDir);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const removed: string[] = [];
    for (const name of entries.filter(isRegionalFileName).sort()) {
      if (keep.has(name)) continue;

      const filePath = path.join(this.regionalDir, name);
      await fs.rm(filePath, { force: true });
      removed.push(filePath);
      logger.info(`Removed stale export for ${groupNameFromFile(name)}`, { file: filePath });
    }
    return removed;
  }
}
