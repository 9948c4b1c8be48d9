import path from 'path';
import PDFDocument from 'pdfkit';
import { SUBSETS } from '../analysis/FrequencyAnalyzer.js';
import type { AnalyzedContext } from '../analysis/types.js';
import {
  buildPresentationRows,
  contextTitle,
  SECTION_TITLES,
  TABLE_HEADER,
  type PresentationRow,
} from './presentation.js';
import { REPORT_BASE_NAME } from './CsvReportWriter.js';
import { writeFileAtomic } from '../utils/atomicWrite.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('PdfReportWriter');

const REPORT_TITLE = 'Relatório de Análise CNJ - Saúde';
const MARGIN = 50;
const CELL_PADDING = 3;
// Item / Contagem / Percentual, summing to the A4 content width
const COLUMN_WIDTHS = [315, 80, 100] as const;
const TABLE_WIDTH = COLUMN_WIDTHS[0] + COLUMN_WIDTHS[1] + COLUMN_WIDTHS[2];

export interface RenderedPdf {
  buffer: Buffer;
  pageCount: number;
  /** 1-based page where the public-entity section divider sits */
  subsetBStartPage: number;
}

export interface PdfReportOutput {
  file: string;
  pageCount: number;
  subsetBStartPage: number;
}

type Doc = PDFKit.PDFDocument;

function bottomLimit(doc: Doc): number {
  return doc.page.height - doc.page.margins.bottom;
}

function drawSectionDivider(doc: Doc, title: string): void {
  doc.addPage();
  doc
    .font('Helvetica-Bold')
    .fontSize(20)
    .fillColor('black')
    .text(title, MARGIN, doc.page.height / 2 - 40, { width: TABLE_WIDTH, align: 'center' });
}

function drawChapterTitle(doc: Doc, title: string): void {
  const y = doc.y;
  doc.rect(MARGIN, y, TABLE_WIDTH, 24).fill('#C8DCFF');
  doc
    .fillColor('black')
    .font('Helvetica-Bold')
    .fontSize(14)
    .text(title, MARGIN + 4, y + 5, { width: TABLE_WIDTH - 8, lineBreak: false });
  doc.x = MARGIN;
  doc.y = y + 32;
}

function drawTableHeader(doc: Doc): void {
  const y = doc.y;
  doc.font('Helvetica-Bold').fontSize(9);
  const height = doc.currentLineHeight() + CELL_PADDING * 2;

  let x = MARGIN;
  TABLE_HEADER.forEach((label, index) => {
    const width = COLUMN_WIDTHS[index];
    doc.rect(x, y, width, height).stroke();
    doc.text(label, x, y + CELL_PADDING, { width, align: 'center' });
    x += width;
  });

  doc.x = MARGIN;
  doc.y = y + height;
}

function drawTable(doc: Doc, rows: readonly PresentationRow[]): void {
  if (rows.length === 0) {
    doc.font('Helvetica-Oblique').fontSize(9).text('(Nenhum dado)', MARGIN);
    doc.moveDown();
    return;
  }

  drawTableHeader(doc);

  for (const row of rows) {
    doc.font(row.kind === 'entry' ? 'Helvetica' : 'Helvetica-Bold').fontSize(8);
    const itemHeight = doc.heightOfString(row.item, { width: COLUMN_WIDTHS[0] - CELL_PADDING * 2 });
    const height = Math.max(itemHeight, doc.currentLineHeight()) + CELL_PADDING * 2;

    if (doc.y + height > bottomLimit(doc)) {
      doc.addPage();
      drawTableHeader(doc);
      doc.font(row.kind === 'entry' ? 'Helvetica' : 'Helvetica-Bold').fontSize(8);
    }

    const y = doc.y;
    const cells = [row.item, String(row.count), row.percentage];
    let x = MARGIN;
    cells.forEach((cell, index) => {
      const width = COLUMN_WIDTHS[index];
      doc.rect(x, y, width, height).stroke();
      doc.text(cell, x + CELL_PADDING, y + CELL_PADDING, {
        width: width - CELL_PADDING * 2,
        align: index === 0 ? 'left' : 'right',
      });
      x += width;
    });

    doc.x = MARGIN;
    doc.y = y + height;
  }

  doc.moveDown();
}

function drawHeadersAndFooters(doc: Doc): number {
  const pages = doc.bufferedPageRange();
  for (let i = 0; i < pages.count; i++) {
    doc.switchToPage(pages.start + i);

    const oldTop = doc.page.margins.top;
    const oldBottom = doc.page.margins.bottom;
    doc.page.margins.top = 0;
    doc.page.margins.bottom = 0;

    doc
      .font('Helvetica-Bold')
      .fontSize(10)
      .fillColor('black')
      .text(REPORT_TITLE, MARGIN, 20, { width: TABLE_WIDTH, align: 'center', lineBreak: false });
    doc
      .font('Helvetica-Oblique')
      .fontSize(8)
      .fillColor('grey')
      .text(`Página ${i + 1}/${pages.count}`, MARGIN, doc.page.height - 35, {
        width: TABLE_WIDTH,
        align: 'center',
        lineBreak: false,
      });

    doc.page.margins.top = oldTop;
    doc.page.margins.bottom = oldBottom;
  }
  return pages.count;
}

/**
 * Render the analysed contexts as a paginated A4 document
 *
 * Section A (all records) comes first; section B (public-entity defendants)
 * opens on its own divider page. Every context starts on a new page.
 */
export async function renderPdfReport(
  contexts: readonly AnalyzedContext[],
  topN: number
): Promise<RenderedPdf> {
  const doc = new PDFDocument({
    size: 'A4',
    margin: MARGIN,
    autoFirstPage: false,
    bufferPages: true,
    info: { Title: REPORT_TITLE },
  });

  const buffers: Buffer[] = [];
  doc.on('data', (chunk: Buffer) => buffers.push(chunk));
  const finished = new Promise<Buffer>((resolve, reject) => {
    doc.on('end', () => resolve(Buffer.concat(buffers)));
    doc.on('error', reject);
  });

  let subsetBStartPage = 0;

  for (const subset of SUBSETS) {
    drawSectionDivider(doc, SECTION_TITLES[subset]);
    if (subset === 'B') {
      subsetBStartPage = doc.bufferedPageRange().count;
    }

    for (const context of contexts) {
      doc.addPage();
      drawChapterTitle(doc, contextTitle(context.label, subset));

      for (const table of context.tables.filter((t) => t.subset === subset)) {
        // Keep a column title together with its table header and first row
        if (doc.y + 60 > bottomLimit(doc)) {
          doc.addPage();
        }

        doc
          .font('Helvetica-Bold')
          .fontSize(11)
          .fillColor('black')
          .text(`Coluna: '${table.column}'`, MARGIN);
        doc.moveDown(0.3);
        drawTable(doc, buildPresentationRows(table, topN));
      }
    }
  }

  const pageCount = drawHeadersAndFooters(doc);
  doc.end();

  return { buffer: await finished, pageCount, subsetBStartPage };
}

export class PdfReportWriter {
  constructor(
    private readonly reportsDir: string,
    private readonly topN: number
  ) {}

  async write(contexts: readonly AnalyzedContext[]): Promise<PdfReportOutput> {
    const file = path.join(this.reportsDir, `${REPORT_BASE_NAME}.pdf`);
    const rendered = await renderPdfReport(contexts, this.topN);
    await writeFileAtomic(file, rendered.buffer);

    logger.info(`Wrote PDF report (${rendered.pageCount} pages)`, {
      file,
      subsetBStartPage: rendered.subsetBStartPage,
    });
    return { file, pageCount: rendered.pageCount, subsetBStartPage: rendered.subsetBStartPage };
  }
}
