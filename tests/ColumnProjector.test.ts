import { describe, expect, it } from 'vitest';
import { ColumnProjector } from '../src/core/ColumnProjector.js';
import { SchemaMismatchError } from '../src/core/errors.js';

describe('ColumnProjector', () => {
  const projector = new ColumnProjector(['Processo', 'Codigos assuntos', 'Tribunal'], 'N/D');

  it('keeps configured columns in configured order and drops the rest', () => {
    const row = projector.project({ Tribunal: 'TJSP', Extra: 'x', Processo: '1', 'Codigos assuntos': '12480' });

    expect(Object.keys(row)).toEqual(['Processo', 'Codigos assuntos', 'Tribunal']);
    expect(row).toEqual({ Processo: '1', 'Codigos assuntos': '12480', Tribunal: 'TJSP' });
  });

  it('fills absent columns with the neutral marker and keeps empty cells empty', () => {
    const row = projector.project({ Processo: '', 'Codigos assuntos': '12480' });

    expect(row).toEqual({ Processo: '', 'Codigos assuntos': '12480', Tribunal: 'N/D' });
  });

  it('reports missing columns without throwing', () => {
    const mismatch = projector.checkSchema('ne.zip:ne.csv', ['Processo', 'Codigos assuntos']);

    expect(mismatch).toBeInstanceOf(SchemaMismatchError);
    expect(mismatch?.missingColumns).toEqual(['Tribunal']);
    expect(mismatch?.message).toBe('Columns missing in ne.zip:ne.csv: Tribunal');
  });

  it('returns null for a complete header', () => {
    expect(projector.checkSchema('t', ['Tribunal', 'Processo', 'Codigos assuntos', 'Ano'])).toBeNull();
  });
});
