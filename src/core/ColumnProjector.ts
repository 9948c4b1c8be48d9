import { SchemaMismatchError } from './errors.js';
import type { TableRow } from './TableCodec.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ColumnProjector');

/**
 * Column Projector
 *
 * Reduces rows to a fixed, ordered column list. Columns a source does not
 * publish take the neutral marker, so exports with drifting schemas can
 * still be stacked.
 */
export class ColumnProjector {
  constructor(
    readonly columns: readonly string[],
    readonly neutralMarker: string = ''
  ) {}

  /**
   * Report required columns absent from a source header
   *
   * The mismatch is logged and returned, never thrown: projection carries on
   * with the neutral marker.
   */
  checkSchema(source: string, available: readonly string[]): SchemaMismatchError | null {
    const present = new Set(available);
    const missing = this.columns.filter((column) => !present.has(column));
    if (missing.length === 0) {
      return null;
    }

    const mismatch = new SchemaMismatchError(source, missing);
    logger.warn(mismatch.message, { source, missing });
    return mismatch;
  }

  /**
   * Build a new row with exactly the configured columns, in order
   */
  project(row: TableRow): TableRow {
    const projected: TableRow = {};
    for (const column of this.columns) {
      projected[column] = Object.hasOwn(row, column) ? row[column] : this.neutralMarker;
    }
    return projected;
  }
}
