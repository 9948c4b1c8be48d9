import type { Table, TableRow } from './TableCodec.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('SubjectFilter');

export interface FilterResult {
  /** Retained rows, in source order */
  rows: TableRow[];
  read: number;
  retained: number;
  /** Rows with parsable codes, none of them allowed */
  rejected: number;
  /** Rows with a missing, empty or non-numeric subject cell */
  skipped: number;
}

/**
 * Extract the integer codes of a subject cell
 *
 * Accepts a bare code (`12480`) or the multi-valued export form (`{12480, 12491}`).
 */
export function parseSubjectCodes(cell: string | undefined): number[] {
  if (!cell) return [];

  const codes: number[] = [];
  for (const match of cell.matchAll(/\d+/g)) {
    const code = Number.parseInt(match[0], 10);
    if (Number.isSafeInteger(code)) {
      codes.push(code);
    }
  }
  return codes;
}

/**
 * Keep the rows whose subject cell carries at least one allowed code
 */
export function filterBySubject(
  table: Table,
  subjectColumn: string,
  allowedCodes: ReadonlySet<number>,
  source: string = 'table'
): FilterResult {
  const rows: TableRow[] = [];
  let rejected = 0;
  let skipped = 0;

  table.rows.forEach((row, index) => {
    const codes = parseSubjectCodes(row[subjectColumn]);

    if (codes.length === 0) {
      skipped++;
      logger.debug('Skipping row without subject code', { source, row: index + 1 });
      return;
    }

    if (codes.some((code) => allowedCodes.has(code))) {
      rows.push(row);
    } else {
      rejected++;
    }
  });

  if (skipped > 0) {
    logger.info(`Skipped ${skipped} rows without a parsable subject code`, { source });
  }

  return {
    rows,
    read: table.rows.length,
    retained: rows.length,
    rejected,
    skipped,
  };
}
