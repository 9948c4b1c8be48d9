/**
 * Frequency Analyzer
 *
 * Count and percentage breakdowns of the categorical columns of the filtered
 * health-litigation records, for two subsets:
 *
 *   A - every record
 *   B - records whose passive party is a public entity
 *
 * Ordering: count descending, ties by category value in code-unit order, so
 * tables do not depend on input order or locale.
 */

import type { TableRow } from '../core/TableCodec.js';
import type { AnalysisContext, AnalyzedContext } from './types.js';

// ========================================
// TYPE DEFINITIONS
// ========================================

export type SubsetId = 'A' | 'B';

export const SUBSETS: readonly SubsetId[] = ['A', 'B'];

export interface FrequencyEntry {
  value: string;
  count: number;
  /** 100 * count / total, two decimals */
  percentage: number;
}

export interface FrequencyTable {
  subset: SubsetId;
  column: string;
  /** Rows in the subset */
  total: number;
  entries: FrequencyEntry[];
}

export interface FrequencyAnalyzerOptions {
  analysisColumns: readonly string[];
  defendantNatureColumn: string;
  publicEntityKeywords: readonly string[];
  neutralMarker?: string;
}

// ========================================
// HELPERS
// ========================================

/**
 * Uppercase and strip diacritics ("Município" -> "MUNICIPIO")
 */
export function normalizeForMatch(text: string): string {
  return text
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toUpperCase()
    .trim();
}

/**
 * Split a multi-valued cell ("{A, B}") into its items
 */
export function splitMultiValue(cell: string | undefined): string[] {
  if (!cell) return [];

  let text = cell.trim();
  if (text.startsWith('{') && text.endsWith('}')) {
    text = text.slice(1, -1);
  }

  return text
    .split(/\s*,\s*/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function roundPercentage(count: number, total: number): number {
  return Math.round((count / total) * 10000) / 100;
}

function compareEntries(a: FrequencyEntry, b: FrequencyEntry): number {
  if (a.count !== b.count) return b.count - a.count;
  if (a.value < b.value) return -1;
  if (a.value > b.value) return 1;
  return 0;
}

/**
 * Count the distinct values of one column over a set of rows
 */
export function computeFrequencyTable(
  rows: readonly TableRow[],
  column: string,
  subset: SubsetId,
  neutralMarker: string = ''
): FrequencyTable {
  const counts = new Map<string, number>();

  for (const row of rows) {
    const raw = Object.hasOwn(row, column) ? row[column].trim() : '';
    const value = raw.length > 0 ? raw : neutralMarker;
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  const total = rows.length;
  const entries = [...counts.entries()]
    .map(([value, count]) => ({ value, count, percentage: roundPercentage(count, total) }))
    .sort(compareEntries);

  return { subset, column, total, entries };
}

// ========================================
// ANALYZER
// ========================================

export class FrequencyAnalyzer {
  private readonly keywords: string[];
  private readonly neutralMarker: string;

  constructor(private readonly options: FrequencyAnalyzerOptions) {
    this.keywords = options.publicEntityKeywords.map(normalizeForMatch);
    this.neutralMarker = options.neutralMarker ?? '';
  }

  /**
   * Defendant-entity flag: some passive-party legal nature names a public entity
   */
  isPublicEntityDefendant(row: TableRow): boolean {
    const natures = splitMultiValue(row[this.options.defendantNatureColumn]);
    return natures.some((nature) => {
      const normalized = normalizeForMatch(nature);
      return this.keywords.some((keyword) => normalized.includes(keyword));
    });
  }

  selectSubset(rows: readonly TableRow[], subset: SubsetId): TableRow[] {
    return subset === 'A' ? [...rows] : rows.filter((row) => this.isPublicEntityDefendant(row));
  }

  /**
   * One table per (subset, column): subset A tables first, each in column order
   */
  analyze(rows: readonly TableRow[]): FrequencyTable[] {
    const tables: FrequencyTable[] = [];

    for (const subset of SUBSETS) {
      const subsetRows = this.selectSubset(rows, subset);
      for (const column of this.options.analysisColumns) {
        tables.push(computeFrequencyTable(subsetRows, column, subset, this.neutralMarker));
      }
    }

    return tables;
  }

  /**
   * Tables and subset sizes for one labelled dataset
   */
  analyzeContext(context: AnalysisContext): AnalyzedContext {
    return {
      label: context.label,
      source: context.source,
      subsetSizes: {
        A: context.rows.length,
        B: this.selectSubset(context.rows, 'B').length,
      },
      tables: this.analyze(context.rows),
    };
  }
}
