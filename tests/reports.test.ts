import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FrequencyAnalyzer } from '../src/analysis/FrequencyAnalyzer.js';
import type { AnalyzedContext } from '../src/analysis/types.js';
import { COLUMNS } from '../src/config/pipeline.js';
import {
  CsvReportWriter,
  renderCombinedCsv,
  renderTableCsv,
  tableExportPath,
} from '../src/reports/CsvReportWriter.js';
import { renderPdfReport } from '../src/reports/PdfReportWriter.js';
import { ReportSink } from '../src/reports/ReportSink.js';
import { makeTempDir, readText, removeDir } from './helpers.js';

const analyzer = new FrequencyAnalyzer({
  analysisColumns: [COLUMNS.activeParty],
  defendantNatureColumn: COLUMNS.passiveNature,
  publicEntityKeywords: ['MUNICIPIO'],
});

function context(): AnalyzedContext {
  return analyzer.analyzeContext({
    label: 'Brasil Consolidado',
    source: 'consolidated.csv',
    rows: [
      { [COLUMNS.activeParty]: 'Maria', [COLUMNS.passiveNature]: '{Município}' },
      { [COLUMNS.activeParty]: 'José', [COLUMNS.passiveNature]: '{Pessoa Física}' },
    ],
  });
}

describe('CSV reports', () => {
  it('renders a full table export', () => {
    expect(renderTableCsv(context().tables[0], ';')).toBe(
      'Item;Contagem;Percentual\nJosé;1;50.00%\nMaria;1;50.00%\n'
    );
  });

  it('renders the combined report, subset A section first', () => {
    const expected = [
      '##### ANÁLISE GERAL - TODOS OS PROCESSOS DE SAÚDE #####',
      '',
      '=== BRASIL CONSOLIDADO - GERAL ===',
      '',
      '--- Coluna: Polo ativo ---',
      'Item;Contagem;Percentual',
      'José;1;50.00%',
      'Maria;1;50.00%',
      'TOTAL GERAL;2;100.00%',
      '',
      '##### ANÁLISE FOCADA - PROCESSOS CONTRA ENTES PÚBLICOS #####',
      '',
      '=== BRASIL CONSOLIDADO - VS ENTES PÚBLICOS ===',
      '',
      '--- Coluna: Polo ativo ---',
      'Item;Contagem;Percentual',
      'Maria;1;100.00%',
      'TOTAL GERAL;1;100.00%',
      '',
    ].join('\n');

    expect(renderCombinedCsv([context()], 10, ';')).toBe(expected);
  });

  it('marks tables of an empty subset', () => {
    const empty = analyzer.analyzeContext({
      label: 'Regional CO',
      source: 'CO',
      rows: [{ [COLUMNS.activeParty]: 'Ana', [COLUMNS.passiveNature]: '' }],
    });

    const lines = renderCombinedCsv([empty], 10, ';').split('\n');
    const sectionB = lines.indexOf('=== REGIONAL CO - VS ENTES PÚBLICOS ===');

    expect(lines.slice(sectionB + 2, sectionB + 4)).toEqual([
      '--- Coluna: Polo ativo ---',
      '(Nenhum dado)',
    ]);
  });

  it('places table exports by subset, context and column', () => {
    const analyzed = context();

    expect(tableExportPath(analyzed, analyzed.tables[0])).toBe(
      path.join('tables', 'geral', 'brasil-consolidado', 'polo-ativo.csv')
    );
    expect(tableExportPath(analyzed, analyzed.tables[1])).toBe(
      path.join('tables', 'vs-entes-publicos', 'brasil-consolidado', 'polo-ativo.csv')
    );
  });
});

describe('CsvReportWriter', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => removeDir(dir));

  it('writes the combined report and replaces old table exports', async () => {
    const stale = path.join(dir, 'tables', 'old', 'gone.csv');
    fs.mkdirSync(path.dirname(stale), { recursive: true });
    fs.writeFileSync(stale, 'x');

    const outputs = await new CsvReportWriter(dir, ';', 10).write([context()]);

    expect(outputs.combined).toBe(path.join(dir, 'analise_saude_cnj.csv'));
    expect(outputs.tables).toEqual([
      path.join(dir, 'tables', 'geral', 'brasil-consolidado', 'polo-ativo.csv'),
      path.join(dir, 'tables', 'vs-entes-publicos', 'brasil-consolidado', 'polo-ativo.csv'),
    ]);
    expect(readText(outputs.tables[1])).toBe('Item;Contagem;Percentual\nMaria;1;100.00%\n');
    expect(fs.existsSync(stale)).toBe(false);
  });
});

describe('PDF report', () => {
  it('renders a PDF with the public-entity section on its own page', async () => {
    const rendered = await renderPdfReport([context()], 10);

    expect(rendered.buffer.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    // divider A, context A, divider B, context B
    expect(rendered.pageCount).toBe(4);
    expect(rendered.subsetBStartPage).toBe(3);
  });

  it('starts every context on a new page', async () => {
    const regional = { ...context(), label: 'Regional NE', source: 'NE' };
    const rendered = await renderPdfReport([context(), regional], 10);

    expect(rendered.pageCount).toBe(6);
    expect(rendered.subsetBStartPage).toBe(4);
  });
});

describe('ReportSink', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => removeDir(dir));

  it('publishes CSV and PDF outputs', async () => {
    const outputs = await new ReportSink(dir, ';', 10).publish([context()]);

    expect(outputs.pdf).toBe(path.join(dir, 'analise_saude_cnj.pdf'));
    expect(fs.existsSync(outputs.pdf)).toBe(true);
    expect(fs.existsSync(outputs.combinedCsv)).toBe(true);
    expect(outputs.tableCsvs).toHaveLength(2);
    expect(outputs.subsetBStartPage).toBe(3);
  });
});
