import { describe, expect, it } from 'vitest';
import { computeFrequencyTable } from '../src/analysis/FrequencyAnalyzer.js';
import type { TableRow } from '../src/core/TableCodec.js';
import {
  buildPresentationRows,
  contextTitle,
  displayValue,
  formatPercentage,
  slugify,
} from '../src/reports/presentation.js';

function rowsWith(counts: Record<string, number>): TableRow[] {
  const rows: TableRow[] = [];
  for (const [value, count] of Object.entries(counts)) {
    for (let i = 0; i < count; i++) {
      rows.push({ S: value });
    }
  }
  return rows;
}

describe('presentation helpers', () => {
  it('formats percentages with two decimals', () => {
    expect(formatPercentage(9.1)).toBe('9.10%');
    expect(formatPercentage(100)).toBe('100.00%');
  });

  it('labels empty categories', () => {
    expect(displayValue('')).toBe('(sem informação)');
    expect(displayValue('Autarquia')).toBe('Autarquia');
  });

  it('builds context titles', () => {
    expect(contextTitle('Brasil Consolidado', 'A')).toBe('Brasil Consolidado - Geral');
    expect(contextTitle('Regional NE', 'B')).toBe('Regional NE - vs Entes Públicos');
  });

  it('slugifies names for file paths', () => {
    expect(slugify('vs Entes Públicos')).toBe('vs-entes-publicos');
    expect(slugify('Polo ativo - Natureza juridica')).toBe('polo-ativo-natureza-juridica');
    expect(slugify('Regional TRFs')).toBe('regional-trfs');
  });
});

describe('buildPresentationRows', () => {
  const counts: Record<string, number> = { v01: 5, v02: 4, SIGILOSO: 3 };
  for (let i = 3; i <= 12; i++) {
    counts[`v${String(i).padStart(2, '0')}`] = 1;
  }
  const table = computeFrequencyTable(rowsWith(counts), 'S', 'A');

  it('shows the top ten, then others, secret and total', () => {
    const rows = buildPresentationRows(table, 10);

    expect(rows).toHaveLength(13);
    expect(rows[0]).toEqual({ item: 'v01', count: 5, percentage: '22.73%', kind: 'entry' });
    expect(rows[9]).toEqual({ item: 'v10', count: 1, percentage: '4.55%', kind: 'entry' });
    expect(rows.slice(10)).toEqual([
      { item: 'Outros (2 itens)', count: 2, percentage: '9.09%', kind: 'others' },
      { item: 'Sigiloso', count: 3, percentage: '13.64%', kind: 'secret' },
      { item: 'TOTAL GERAL', count: 22, percentage: '100.00%', kind: 'total' },
    ]);
  });

  it('omits the others row when everything fits', () => {
    const rows = buildPresentationRows(computeFrequencyTable(rowsWith({ a: 2, '': 1 }), 'S', 'A'), 10);

    expect(rows).toEqual([
      { item: 'a', count: 2, percentage: '66.67%', kind: 'entry' },
      { item: '(sem informação)', count: 1, percentage: '33.33%', kind: 'entry' },
      { item: 'TOTAL GERAL', count: 3, percentage: '100.00%', kind: 'total' },
    ]);
  });

  it('groups secret values regardless of case and accents', () => {
    const rows = buildPresentationRows(
      computeFrequencyTable(rowsWith({ sigiloso: 1, Sigiloso: 1, x: 1 }), 'S', 'A'),
      10
    );

    expect(rows.map((row) => [row.item, row.count])).toEqual([
      ['x', 1],
      ['Sigiloso', 2],
      ['TOTAL GERAL', 3],
    ]);
  });

  it('returns no rows for an empty table', () => {
    expect(buildPresentationRows(computeFrequencyTable([], 'S', 'B'), 10)).toEqual([]);
  });
});
