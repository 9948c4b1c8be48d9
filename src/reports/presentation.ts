/**
 * Presentation tables
 *
 * Turns a full frequency table into the rows shown in the reports:
 * top N, "Outros", "Sigiloso" and "TOTAL GERAL".
 */

import {
  normalizeForMatch,
  roundPercentage,
  type FrequencyTable,
  type SubsetId,
} from '../analysis/FrequencyAnalyzer.js';

export const TABLE_HEADER = ['Item', 'Contagem', 'Percentual'] as const;

export const SUBSET_TITLES: Record<SubsetId, string> = {
  A: 'Geral',
  B: 'vs Entes Públicos',
};

export const SECTION_TITLES: Record<SubsetId, string> = {
  A: 'Análise Geral - Todos os Processos de Saúde',
  B: 'Análise Focada - Processos contra Entes Públicos',
};

const SECRET_VALUE = 'SIGILOSO';
const EMPTY_LABEL = '(sem informação)';

export interface PresentationRow {
  item: string;
  count: number;
  percentage: string;
  kind: 'entry' | 'others' | 'secret' | 'total';
}

export function formatPercentage(value: number): string {
  return `${value.toFixed(2)}%`;
}

export function displayValue(value: string): string {
  return value.length > 0 ? value : EMPTY_LABEL;
}

export function contextTitle(label: string, subset: SubsetId): string {
  return `${label} - ${SUBSET_TITLES[subset]}`;
}

/**
 * Lowercase, accent-free slug for file names
 */
export function slugify(text: string): string {
  return normalizeForMatch(text)
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Rows displayed for one table; empty when the subset had no records
 */
export function buildPresentationRows(table: FrequencyTable, topN: number): PresentationRow[] {
  if (table.total === 0) {
    return [];
  }

  const isSecret = (value: string) => normalizeForMatch(value) === SECRET_VALUE;
  const ranked = table.entries.filter((entry) => !isSecret(entry.value));
  const secretCount = table.entries
    .filter((entry) => isSecret(entry.value))
    .reduce((sum, entry) => sum + entry.count, 0);

  const rows: PresentationRow[] = ranked.slice(0, topN).map((entry) => ({
    item: displayValue(entry.value),
    count: entry.count,
    percentage: formatPercentage(entry.percentage),
    kind: 'entry',
  }));

  const rest = ranked.slice(topN);
  if (rest.length > 0) {
    const othersCount = rest.reduce((sum, entry) => sum + entry.count, 0);
    rows.push({
      item: `Outros (${rest.length} itens)`,
      count: othersCount,
      percentage: formatPercentage(roundPercentage(othersCount, table.total)),
      kind: 'others',
    });
  }

  if (secretCount > 0) {
    rows.push({
      item: 'Sigiloso',
      count: secretCount,
      percentage: formatPercentage(roundPercentage(secretCount, table.total)),
      kind: 'secret',
    });
  }

  rows.push({
    item: 'TOTAL GERAL',
    count: table.total,
    percentage: formatPercentage(100),
    kind: 'total',
  });

  return rows;
}
