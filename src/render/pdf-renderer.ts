/**
 * PDF renderer backed by pdfkit.
 *
 * Lays out the title and the parsed markdown blocks on Letter pages with
 * 0.75in margins, using the colors and fonts of the requested theme.
 */

import PDFDocument from 'pdfkit';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { DocumentType } from '../domain/document';
import { MarkdownBlock, TextRun, parseMarkdown, plainText } from './markdown';
import { DocumentRenderer, RenderInput } from './renderer';
import { PDF_THEMES, PdfTheme } from './themes';

const MARGIN = 54;
const LIST_INDENT = 20;
const CELL_PADDING = 6;

type Doc = PDFKit.PDFDocument;

function contentWidth(doc: Doc): number {
  return doc.page.width - doc.page.margins.left - doc.page.margins.right;
}

function pageBottom(doc: Doc): number {
  return doc.page.height - doc.page.margins.bottom;
}

/** Write runs as one flowing paragraph, switching between regular and bold faces. */
function writeRuns(doc: Doc, theme: PdfTheme, runs: TextRun[], x: number, width: number): void {
  const visible = runs.filter((run) => run.text.length > 0);
  const parts = visible.length > 0 ? visible : [{ text: ' ', bold: false }];
  parts.forEach((run, index) => {
    doc.font(run.bold ? theme.fonts.bold : theme.fonts.regular);
    const options = { continued: index < parts.length - 1, width, lineGap: 3 };
    if (index === 0) {
      doc.text(run.text, x, doc.y, options);
    } else {
      doc.text(run.text, options);
    }
  });
  doc.x = doc.page.margins.left;
}

function drawRule(doc: Doc, color: string, width: number): void {
  const y = doc.y;
  doc
    .moveTo(doc.page.margins.left, y)
    .lineTo(doc.page.width - doc.page.margins.right, y)
    .lineWidth(width)
    .strokeColor(color)
    .stroke();
}

function drawTitle(doc: Doc, theme: PdfTheme, title: string): void {
  doc
    .font(theme.fonts.bold)
    .fontSize(theme.sizes.title)
    .fillColor(theme.titleColor)
    .text(title, { width: contentWidth(doc) });
  doc.moveDown(0.3);
  if (theme.titleRuleWidth > 0) {
    drawRule(doc, theme.accentColor, theme.titleRuleWidth);
  }
  doc.moveDown(1);
}

function drawTable(doc: Doc, theme: PdfTheme, header: TextRun[][], rows: TextRun[][][]): void {
  const left = doc.page.margins.left;
  const columnWidth = contentWidth(doc) / Math.max(header.length, 1);
  const textWidth = columnWidth - CELL_PADDING * 2;

  doc.fontSize(theme.sizes.table);
  doc.moveDown(0.5);

  const drawRow = (cells: TextRun[][], isHeader: boolean) => {
    const texts = cells.map(plainText);
    const font = isHeader ? theme.fonts.bold : theme.fonts.regular;
    doc.font(font);
    const height =
      Math.max(...texts.map((text) => doc.heightOfString(text || ' ', { width: textWidth }))) +
      CELL_PADDING * 2;

    if (doc.y + height > pageBottom(doc)) {
      doc.addPage();
    }
    const y = doc.y;

    texts.forEach((text, col) => {
      const x = left + col * columnWidth;
      if (isHeader) {
        doc.rect(x, y, columnWidth, height).fill(theme.table.headerFill);
      }
      doc.rect(x, y, columnWidth, height).lineWidth(0.5).strokeColor(theme.table.grid).stroke();
      const bold = isHeader || cells[col].every((run) => run.bold || run.text.trim() === '');
      doc
        .font(bold ? theme.fonts.bold : theme.fonts.regular)
        .fillColor(isHeader ? theme.table.headerText : theme.textColor)
        .text(text, x + CELL_PADDING, y + CELL_PADDING, { width: textWidth });
    });

    doc.x = left;
    doc.y = y + height;
  };

  drawRow(header, true);
  rows.forEach((row) => drawRow(row, false));
  doc.moveDown(0.8);
}

function drawBlock(doc: Doc, theme: PdfTheme, block: MarkdownBlock): void {
  const left = doc.page.margins.left;
  const width = contentWidth(doc);

  switch (block.kind) {
    case 'heading': {
      const size = block.level === 1 ? theme.sizes.h1 : block.level === 2 ? theme.sizes.h2 : theme.sizes.h3;
      doc.moveDown(block.level === 1 ? 0.8 : 0.6);
      doc.font(theme.fonts.bold).fontSize(size).fillColor(theme.headingColor);
      doc.text(plainText(block.runs), left, doc.y, { width });
      doc.moveDown(0.4);
      break;
    }
    case 'paragraph':
      doc.fontSize(theme.sizes.body).fillColor(theme.textColor);
      writeRuns(doc, theme, block.runs, left, width);
      doc.moveDown(0.5);
      break;
    case 'list':
      doc.fontSize(theme.sizes.body).fillColor(theme.textColor);
      block.items.forEach((item, index) => {
        const marker = block.ordered ? `${index + 1}. ` : '• ';
        writeRuns(doc, theme, [{ text: marker, bold: false }, ...item], left + LIST_INDENT, width - LIST_INDENT);
        doc.moveDown(0.2);
      });
      doc.moveDown(0.3);
      break;
    case 'table':
      drawTable(doc, theme, block.header, block.rows);
      break;
    case 'code':
      doc
        .font(theme.fonts.mono)
        .fontSize(theme.sizes.code)
        .fillColor(theme.textColor)
        .text(block.lines.join('\n') || ' ', left + LIST_INDENT, doc.y, { width: width - LIST_INDENT });
      doc.x = left;
      doc.moveDown(0.6);
      break;
    case 'rule':
      doc.moveDown(0.3);
      drawRule(doc, theme.accentColor, 0.5);
      doc.moveDown(0.6);
      break;
  }
}

export class PdfRenderer implements DocumentRenderer {
  readonly documentType = DocumentType.Pdf;

  /**
   * Lays out one block per event-loop turn, so a render timeout can fire
   * while a long document is still being laid out.
   */
  async render(input: RenderInput): Promise<Buffer> {
    const theme = PDF_THEMES[input.style];
    const blocks = parseMarkdown(input.markdown);

    const doc = new PDFDocument({
      size: 'LETTER',
      margins: { top: MARGIN, bottom: MARGIN, left: MARGIN, right: MARGIN },
      info: {
        Title: input.title,
        Creator: 'md-render-service',
        CreationDate: new Date(),
      },
    });

    const chunks: Buffer[] = [];
    const finished = new Promise<Buffer>((resolve, reject) => {
      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);
    });

    drawTitle(doc, theme, input.title);
    for (const block of blocks) {
      drawBlock(doc, theme, block);
      await yieldToEventLoop();
    }
    doc.end();

    return finished;
  }
}
