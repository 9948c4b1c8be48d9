import type { TableRow } from '../core/TableCodec.js';
import type { FrequencyTable, SubsetId } from './FrequencyAnalyzer.js';

/**
 * A labelled dataset read back from disk for analysis
 * ("Brasil Consolidado", "Regional NE", ...)
 */
export interface AnalysisContext {
  label: string;
  source: string;
  rows: TableRow[];
}

export interface AnalyzedContext {
  label: string;
  source: string;
  subsetSizes: Record<SubsetId, number>;
  /** Subset A tables in column order, then subset B tables */
  tables: FrequencyTable[];
}
