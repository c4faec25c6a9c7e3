/**
 * DOCX renderer backed by the docx package.
 *
 * Word documents get one fixed look: centered title, built-in heading
 * styles, native bullet and numbered lists and full-width tables. The style
 * parameter is accepted for interface symmetry and ignored.
 */

import {
  AlignmentType,
  Document,
  HeadingLevel,
  LevelFormat,
  Packer,
  Paragraph,
  ShadingType,
  Table,
  TableCell,
  TableRow,
  TextRun as DocxTextRun,
  WidthType,
} from 'docx';
import { DocumentType } from '../domain/document';
import { MarkdownBlock, TextRun, parseMarkdown } from './markdown';
import { DocumentRenderer, RenderInput } from './renderer';

const NUMBERED_LIST = 'numbered-list';

const HEADINGS = {
  1: HeadingLevel.HEADING_1,
  2: HeadingLevel.HEADING_2,
  3: HeadingLevel.HEADING_3,
} as const;

function toRuns(runs: TextRun[]): DocxTextRun[] {
  return runs.map((run) => new DocxTextRun({ text: run.text, bold: run.bold }));
}

function toTable(header: TextRun[][], rows: TextRun[][][]): Table {
  const row = (cells: TextRun[][], isHeader: boolean) =>
    new TableRow({
      tableHeader: isHeader,
      children: cells.map(
        (cell) =>
          new TableCell({
            shading: isHeader ? { type: ShadingType.CLEAR, color: 'auto', fill: 'F8F9FA' } : undefined,
            children: [
              new Paragraph({
                children: isHeader
                  ? cell.map((run) => new DocxTextRun({ text: run.text, bold: true }))
                  : toRuns(cell),
              }),
            ],
          }),
      ),
    });

  return new Table({
    width: { size: 100, type: WidthType.PERCENTAGE },
    rows: [row(header, true), ...rows.map((cells) => row(cells, false))],
  });
}

/** Convert blocks to document children. `listCount` numbers each ordered list from 1. */
function toChildren(blocks: MarkdownBlock[]): Array<Paragraph | Table> {
  const children: Array<Paragraph | Table> = [];
  let listCount = 0;

  for (const block of blocks) {
    switch (block.kind) {
      case 'heading':
        children.push(new Paragraph({ heading: HEADINGS[block.level], children: toRuns(block.runs) }));
        break;
      case 'paragraph':
        children.push(new Paragraph({ children: toRuns(block.runs), spacing: { after: 120 } }));
        break;
      case 'list': {
        const instance = ++listCount;
        for (const item of block.items) {
          children.push(
            block.ordered
              ? new Paragraph({
                  children: toRuns(item),
                  numbering: { reference: NUMBERED_LIST, level: 0, instance },
                })
              : new Paragraph({ children: toRuns(item), bullet: { level: 0 } }),
          );
        }
        break;
      }
      case 'table':
        children.push(toTable(block.header, block.rows));
        children.push(new Paragraph({ children: [] }));
        break;
      case 'code':
        children.push(
          new Paragraph({
            spacing: { after: 120 },
            children: block.lines.map(
              (line, index) =>
                new DocxTextRun({ text: line, font: 'Courier New', size: 18, ...(index > 0 ? { break: 1 } : {}) }),
            ),
          }),
        );
        break;
      case 'rule':
        children.push(new Paragraph({ thematicBreak: true, children: [] }));
        break;
    }
  }

  return children;
}

export class DocxRenderer implements DocumentRenderer {
  readonly documentType = DocumentType.Docx;

  async render(input: RenderInput): Promise<Buffer> {
    const doc = new Document({
      creator: 'md-render-service',
      title: input.title,
      numbering: {
        config: [
          {
            reference: NUMBERED_LIST,
            levels: [
              {
                level: 0,
                format: LevelFormat.DECIMAL,
                text: '%1.',
                alignment: AlignmentType.START,
                style: { paragraph: { indent: { left: 720, hanging: 360 } } },
              },
            ],
          },
        ],
      },
      sections: [
        {
          children: [
            new Paragraph({
              text: input.title,
              heading: HeadingLevel.TITLE,
              alignment: AlignmentType.CENTER,
              spacing: { after: 240 },
            }),
            ...toChildren(parseMarkdown(input.markdown)),
          ],
        },
      ],
    });

    return Packer.toBuffer(doc);
  }
}
