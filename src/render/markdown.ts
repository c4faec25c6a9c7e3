/**
 * Markdown block parser.
 *
 * Both renderers consume the same block list, so PDF and DOCX agree on what
 * a document contains. Covers the subset documents sent to the tools use in
 * practice: ATX headings, paragraphs, bullet and numbered lists, pipe tables,
 * fenced code, horizontal rules and `**bold**` / `__bold__` spans. Anything
 * else is kept as paragraph text.
 */

export interface TextRun {
  text: string;
  bold: boolean;
}

export type HeadingLevel = 1 | 2 | 3;

export type MarkdownBlock =
  | { kind: 'heading'; level: HeadingLevel; runs: TextRun[] }
  | { kind: 'paragraph'; runs: TextRun[] }
  | { kind: 'list'; ordered: boolean; items: TextRun[][] }
  | { kind: 'table'; header: TextRun[][]; rows: TextRun[][][] }
  | { kind: 'code'; lines: string[] }
  | { kind: 'rule' };

const HEADING = /^(#{1,6})\s+(.*?)\s*#*$/;
const BULLET = /^[-*+]\s+(.*)$/;
const NUMBERED = /^\d+[.)]\s+(.*)$/;
const TABLE_SEPARATOR = /^\|?\s*:?-+:?\s*(\|\s*:?-+:?\s*)*\|?$/;
const RULE = /^(?:-{3,}|\*{3,}|_{3,})$/;
const FENCE = /^(`{3,}|~{3,})/;
const BOLD = /\*\*(.+?)\*\*|__(.+?)__/g;

/** Split a line of text into plain and bold runs. */
export function parseInline(text: string): TextRun[] {
  const runs: TextRun[] = [];
  let last = 0;
  for (const match of text.matchAll(BOLD)) {
    const index = match.index ?? 0;
    if (index > last) {
      runs.push({ text: text.slice(last, index), bold: false });
    }
    runs.push({ text: match[1] ?? match[2] ?? '', bold: true });
    last = index + match[0].length;
  }
  if (last < text.length) {
    runs.push({ text: text.slice(last), bold: false });
  }
  return runs.length > 0 ? runs : [{ text: '', bold: false }];
}

/** Join runs back into plain text. */
export function plainText(runs: TextRun[]): string {
  return runs.map((run) => run.text).join('');
}

function splitRow(line: string): string[] {
  let row = line.trim();
  if (row.startsWith('|')) row = row.slice(1);
  if (row.endsWith('|')) row = row.slice(0, -1);
  return row.split('|').map((cell) => cell.trim());
}

/** h4-h6 render like h3. */
function headingLevel(hashes: number): HeadingLevel {
  if (hashes <= 1) return 1;
  if (hashes === 2) return 2;
  return 3;
}

function isTableLine(line: string): boolean {
  return line.startsWith('|');
}

function isBlockStart(line: string): boolean {
  return (
    HEADING.test(line) ||
    BULLET.test(line) ||
    NUMBERED.test(line) ||
    isTableLine(line) ||
    RULE.test(line) ||
    FENCE.test(line)
  );
}

export function parseMarkdown(markdown: string): MarkdownBlock[] {
  const lines = markdown.replace(/\r\n?/g, '\n').split('\n');
  const blocks: MarkdownBlock[] = [];

  let i = 0;
  while (i < lines.length) {
    const line = lines[i].trim();

    if (!line) {
      i++;
      continue;
    }

    const fence = FENCE.exec(line);
    if (fence) {
      const marker = fence[1];
      const code: string[] = [];
      i++;
      while (i < lines.length && !lines[i].trim().startsWith(marker)) {
        code.push(lines[i].replace(/\s+$/, ''));
        i++;
      }
      i++; // closing fence (or end of input)
      blocks.push({ kind: 'code', lines: code });
      continue;
    }

    const heading = HEADING.exec(line);
    if (heading) {
      blocks.push({ kind: 'heading', level: headingLevel(heading[1].length), runs: parseInline(heading[2]) });
      i++;
      continue;
    }

    if (RULE.test(line)) {
      blocks.push({ kind: 'rule' });
      i++;
      continue;
    }

    if (BULLET.test(line) || NUMBERED.test(line)) {
      const ordered = NUMBERED.test(line);
      const pattern = ordered ? NUMBERED : BULLET;
      const items: TextRun[][] = [];
      let item = pattern.exec(line);
      while (item) {
        items.push(parseInline(item[1]));
        i++;
        item = i < lines.length ? pattern.exec(lines[i].trim()) : null;
      }
      blocks.push({ kind: 'list', ordered, items });
      continue;
    }

    if (isTableLine(line)) {
      const rows: string[][] = [];
      while (i < lines.length && isTableLine(lines[i].trim())) {
        const row = lines[i].trim();
        if (!TABLE_SEPARATOR.test(row)) {
          rows.push(splitRow(row));
        }
        i++;
      }
      const [header, ...body] = rows;
      if (header) {
        const width = header.length;
        const pad = (cells: string[]) =>
          Array.from({ length: width }, (_, col) => parseInline(cells[col] ?? ''));
        blocks.push({ kind: 'table', header: pad(header), rows: body.map(pad) });
      }
      continue;
    }

    const paragraph: string[] = [line];
    i++;
    while (i < lines.length) {
      const next = lines[i].trim();
      if (!next || isBlockStart(next)) break;
      paragraph.push(next);
      i++;
    }
    blocks.push({ kind: 'paragraph', runs: parseInline(paragraph.join(' ')) });
  }

  return blocks;
}
