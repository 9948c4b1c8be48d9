import fs from 'fs/promises';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import { SUBSETS, type FrequencyTable } from '../analysis/FrequencyAnalyzer.js';
import type { AnalyzedContext } from '../analysis/types.js';
import {
  buildPresentationRows,
  contextTitle,
  formatPercentage,
  SECTION_TITLES,
  slugify,
  SUBSET_TITLES,
  TABLE_HEADER,
} from './presentation.js';
import { writeFileAtomic } from '../utils/atomicWrite.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('CsvReportWriter');

export const REPORT_BASE_NAME = 'analise_saude_cnj';
export const TABLES_DIR_NAME = 'tables';

/**
 * Full table export: every category, raw values
 */
export function renderTableCsv(table: FrequencyTable, delimiter: string): string {
  const records = [
    [...TABLE_HEADER],
    ...table.entries.map((entry) => [
      entry.value,
      String(entry.count),
      formatPercentage(entry.percentage),
    ]),
  ];
  return stringify(records, { delimiter, record_delimiter: 'unix' });
}

/**
 * Combined report: all contexts of subset A, then all contexts of subset B
 */
export function renderCombinedCsv(
  contexts: readonly AnalyzedContext[],
  topN: number,
  delimiter: string
): string {
  const lines: string[] = [];

  for (const subset of SUBSETS) {
    lines.push(`##### ${SECTION_TITLES[subset].toUpperCase()} #####`);
    lines.push('');

    for (const context of contexts) {
      lines.push(`=== ${contextTitle(context.label, subset).toUpperCase()} ===`);
      lines.push('');

      for (const table of context.tables.filter((t) => t.subset === subset)) {
        lines.push(`--- Coluna: ${table.column} ---`);
        const rows = buildPresentationRows(table, topN);
        if (rows.length === 0) {
          lines.push('(Nenhum dado)');
        } else {
          const records = [
            [...TABLE_HEADER],
            ...rows.map((row) => [row.item, String(row.count), row.percentage]),
          ];
          lines.push(stringify(records, { delimiter, record_delimiter: 'unix' }).trimEnd());
        }
        lines.push('');
      }
    }
  }

  return lines.join('\n');
}

/**
 * Relative path of a per-table export
 */
export function tableExportPath(context: AnalyzedContext, table: FrequencyTable): string {
  return path.join(
    TABLES_DIR_NAME,
    slugify(SUBSET_TITLES[table.subset]),
    slugify(context.label),
    `${slugify(table.column)}.csv`
  );
}

export interface CsvReportOutputs {
  combined: string;
  tables: string[];
}

export class CsvReportWriter {
  constructor(
    private readonly reportsDir: string,
    private readonly delimiter: string,
    private readonly topN: number
  ) {}

  async write(contexts: readonly AnalyzedContext[]): Promise<CsvReportOutputs> {
    // Tables of contexts that no longer exist must not survive a re-run
    await fs.rm(path.join(this.reportsDir, TABLES_DIR_NAME), { recursive: true, force: true });

    const tables: string[] = [];
    for (const subset of SUBSETS) {
      for (const context of contexts) {
        for (const table of context.tables.filter((t) => t.subset === subset)) {
          const filePath = path.join(this.reportsDir, tableExportPath(context, table));
          await writeFileAtomic(filePath, renderTableCsv(table, this.delimiter));
          tables.push(filePath);
        }
      }
    }

    const combined = path.join(this.reportsDir, `${REPORT_BASE_NAME}.csv`);
    await writeFileAtomic(combined, renderCombinedCsv(contexts, this.topN, this.delimiter));

    logger.info(`Wrote combined CSV report and ${tables.length} table exports`, {
      file: combined,
    });
    return { combined, tables };
  }
}
