import { parseInline, parseMarkdown, plainText } from '../../src/render/markdown';

describe('parseInline', () => {
  test('splits bold spans from plain text', () => {
    expect(parseInline('Total: **$15,000** due')).toEqual([
      { text: 'Total: ', bold: false },
      { text: '$15,000', bold: true },
      { text: ' due', bold: false },
    ]);
  });

  test('supports underscore bold', () => {
    expect(parseInline('__all__ bold')).toEqual([
      { text: 'all', bold: true },
      { text: ' bold', bold: false },
    ]);
  });

  test('leaves unmatched markers as text', () => {
    expect(parseInline('a ** b')).toEqual([{ text: 'a ** b', bold: false }]);
  });

  test('empty input yields one empty run', () => {
    expect(parseInline('')).toEqual([{ text: '', bold: false }]);
  });
});

describe('parseMarkdown', () => {
  test('parses headings and paragraphs', () => {
    expect(parseMarkdown('# Hello\n\nWorld')).toEqual([
      { kind: 'heading', level: 1, runs: [{ text: 'Hello', bold: false }] },
      { kind: 'paragraph', runs: [{ text: 'World', bold: false }] },
    ]);
  });

  test('maps h4 and deeper onto level 3', () => {
    const blocks = parseMarkdown('## Two\n### Three\n#### Four');
    expect(blocks.map((b) => (b.kind === 'heading' ? b.level : 0))).toEqual([2, 3, 3]);
  });

  test('requires a space after the hashes', () => {
    expect(parseMarkdown('#hashtag')).toEqual([
      { kind: 'paragraph', runs: [{ text: '#hashtag', bold: false }] },
    ]);
  });

  test('joins consecutive lines into one paragraph', () => {
    expect(parseMarkdown('first line\nsecond line')).toEqual([
      { kind: 'paragraph', runs: [{ text: 'first line second line', bold: false }] },
    ]);
  });

  test('groups bullet items into one list', () => {
    const blocks = parseMarkdown('- John Smith\n* Jane **Doe**\n+ Bob');
    expect(blocks).toHaveLength(1);
    const [list] = blocks;
    expect(list.kind).toBe('list');
    if (list.kind !== 'list') return;
    expect(list.ordered).toBe(false);
    expect(list.items.map(plainText)).toEqual(['John Smith', 'Jane Doe', 'Bob']);
    expect(list.items[1]).toEqual([
      { text: 'Jane ', bold: false },
      { text: 'Doe', bold: true },
    ]);
  });

  test('parses numbered lists separately from bullets', () => {
    const blocks = parseMarkdown('1. Budget review\n2. Roadmap\n- Loose item');
    expect(blocks.map((b) => b.kind)).toEqual(['list', 'list']);
    const [numbered, bullets] = blocks;
    expect(numbered.kind === 'list' && numbered.ordered).toBe(true);
    expect(bullets.kind === 'list' && bullets.ordered).toBe(false);
  });

  test('parses pipe tables and skips the separator row', () => {
    const md = '| Phase | Duration |\n|-------|----------|\n| Discovery | 2 weeks |\n| Design |';
    const [table] = parseMarkdown(md);
    expect(table.kind).toBe('table');
    if (table.kind !== 'table') return;
    expect(table.header.map(plainText)).toEqual(['Phase', 'Duration']);
    expect(table.rows.map((row) => row.map(plainText))).toEqual([
      ['Discovery', '2 weeks'],
      ['Design', ''],
    ]);
  });

  test('keeps fenced code verbatim', () => {
    const md = '```ts\nconst a = 1;\n  indented();\n```\nAfter';
    expect(parseMarkdown(md)).toEqual([
      { kind: 'code', lines: ['const a = 1;', '  indented();'] },
      { kind: 'paragraph', runs: [{ text: 'After', bold: false }] },
    ]);
  });

  test('recognises horizontal rules', () => {
    expect(parseMarkdown('above\n\n---\n\nbelow').map((b) => b.kind)).toEqual([
      'paragraph',
      'rule',
      'paragraph',
    ]);
  });

  test('normalises CRLF line endings', () => {
    expect(parseMarkdown('# Title\r\n\r\nBody')).toHaveLength(2);
  });

  test('returns no blocks for whitespace-only input', () => {
    expect(parseMarkdown('  \n\n  ')).toEqual([]);
  });
});
