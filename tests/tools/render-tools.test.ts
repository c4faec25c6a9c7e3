import { ArtifactSummary } from '../../src/domain/artifact';
import { DocumentType } from '../../src/domain/document';
import { createRendererRegistry } from '../../src/render';
import { MemoryArtifactStore } from '../../src/storage/memory-store';
import { ArtifactStoreOptions } from '../../src/storage/store';
import { RenderOutcome, RenderToolHandler, downloadPath } from '../../src/tools/render-tools';
import { FAKE_DOCX, FAKE_PDF, captureLogs, mockRegistry } from '../helpers/fixtures';

const logs = captureLogs();

class FailingStore extends MemoryArtifactStore {
  protected async writeContent(_summary: ArtifactSummary, _content: Buffer): Promise<void> {
    throw new Error('disk full');
  }
}

function setup(options: { store?: MemoryArtifactStore; publicBaseUrl?: string; renderTimeoutMs?: number } = {}) {
  const { pdf, docx, registry } = mockRegistry();
  const store = options.store ?? new MemoryArtifactStore({ sweepIntervalMs: 0 });
  const handler = new RenderToolHandler({
    store,
    renderers: registry,
    renderTimeoutMs: options.renderTimeoutMs ?? 1000,
    publicBaseUrl: options.publicBaseUrl,
  });
  return { pdf, docx, store, handler };
}

function storeOptions(overrides: Partial<ArtifactStoreOptions>): Partial<ArtifactStoreOptions> {
  return { sweepIntervalMs: 0, ...overrides };
}

function expectFailure(outcome: RenderOutcome, code: string): void {
  expect(outcome.success).toBe(false);
  if (outcome.success) return;
  expect(outcome.code).toBe(code);
}

describe('downloadPath', () => {
  test('encodes the filename as one path segment', () => {
    expect(downloadPath('Report.pdf')).toBe('/files/Report.pdf');
    expect(downloadPath('a b.pdf')).toBe('/files/a%20b.pdf');
  });
});

describe('RenderToolHandler.renderPdf', () => {
  test('renders, stores and describes the artifact', async () => {
    const { pdf, store, handler } = setup();

    const outcome = await handler.renderPdf({ title: 'Report', markdown: '# Hi', style: 'modern' });

    expect(pdf.render).toHaveBeenCalledWith({ title: 'Report', markdown: '# Hi', style: 'modern' });
    expect(outcome).toEqual({
      success: true,
      documentType: DocumentType.Pdf,
      id: expect.any(String),
      filename: 'Report.pdf',
      sizeBytes: FAKE_PDF.length,
      downloadUrl: '/files/Report.pdf',
    });
    if (!outcome.success) return;
    expect((await store.get(outcome.id))?.content).toEqual(FAKE_PDF);
  });

  test('defaults the style', async () => {
    const { pdf, handler } = setup();

    await handler.renderPdf({ title: 'Report', markdown: 'text' });

    expect(pdf.render).toHaveBeenCalledWith({ title: 'Report', markdown: 'text', style: 'default' });
  });

  test('trims the title', async () => {
    const { pdf, handler } = setup();

    const outcome = await handler.renderPdf({ title: '  Report  ', markdown: 'text' });

    expect(pdf.render.mock.calls[0][0].title).toBe('Report');
    expect(outcome.success && outcome.filename).toBe('Report.pdf');
  });

  test('prefixes download URLs with the public base URL', async () => {
    const { handler } = setup({ publicBaseUrl: 'https://docs.example.test' });

    const outcome = await handler.renderPdf({ title: 'Report', markdown: 'text' });

    expect(outcome.success && outcome.downloadUrl).toBe('https://docs.example.test/files/Report.pdf');
  });

  test.each([
    [{ markdown: 'text' }, 'title is required'],
    [{ title: '', markdown: 'text' }, 'title must not be empty'],
    [{ title: '   ', markdown: 'text' }, 'title must not be empty'],
    [{ title: 'Report', markdown: '' }, 'markdown must not be empty'],
    [{ title: 42, markdown: 'text' }, 'title must be a string'],
  ])('rejects %j without rendering', async (params, message) => {
    const { pdf, store, handler } = setup();

    const outcome = await handler.renderPdf(params);

    expect(outcome).toEqual({ success: false, error: message, code: 'VALIDATION.SCHEMA' });
    expect(pdf.render).not.toHaveBeenCalled();
    expect(store.stats().count).toBe(0);
  });

  test('reports every invalid field', async () => {
    const { handler } = setup();

    const outcome = await handler.renderPdf(undefined);

    expect(outcome).toEqual({
      success: false,
      error: 'title is required; markdown is required',
      code: 'VALIDATION.SCHEMA',
    });
  });

  test('rejects an unknown style', async () => {
    const { pdf, handler } = setup();

    const outcome = await handler.renderPdf({ title: 'Report', markdown: 'text', style: 'fancy' });

    expect(outcome).toEqual({
      success: false,
      error: 'Unknown style "fancy". Expected one of: default, modern, minimal',
      code: 'VALIDATION.STYLE',
    });
    expect(pdf.render).not.toHaveBeenCalled();
  });

  test('reports renderer failures', async () => {
    const { pdf, store, handler } = setup();
    pdf.render.mockRejectedValueOnce(new Error('font missing'));

    const outcome = await handler.renderPdf({ title: 'Report', markdown: 'text' });

    expect(outcome).toEqual({
      success: false,
      error: 'PDF generation failed: font missing',
      code: 'RENDER.FAILED',
    });
    expect(store.stats().count).toBe(0);
  });

  test('times out a renderer that never settles', async () => {
    const { pdf, store, handler } = setup({ renderTimeoutMs: 20 });
    pdf.render.mockReturnValueOnce(new Promise<Buffer>(() => undefined));

    const outcome = await handler.renderPdf({ title: 'Slow', markdown: 'text' });

    expectFailure(outcome, 'RENDER.TIMEOUT');
    expect(store.stats().count).toBe(0);
  });

  test('times out a long PDF layout', async () => {
    const store = new MemoryArtifactStore(storeOptions({}));
    const handler = new RenderToolHandler({ store, renderers: createRendererRegistry(), renderTimeoutMs: 5 });
    const markdown = Array.from({ length: 2000 }, (_, i) => `Paragraph ${i} of a very long report.`).join('\n\n');

    const outcome = await handler.renderPdf({ title: 'Long', markdown });

    expectFailure(outcome, 'RENDER.TIMEOUT');
    expect(store.stats().count).toBe(0);
  });

  test('reports an empty render as a store failure', async () => {
    const { pdf, handler } = setup();
    pdf.render.mockResolvedValueOnce(Buffer.alloc(0));

    expectFailure(await handler.renderPdf({ title: 'Empty', markdown: 'text' }), 'STORE.EMPTY');
  });

  test('reports an oversize render', async () => {
    const { handler } = setup({ store: new MemoryArtifactStore(storeOptions({ maxArtifactBytes: 4 })) });

    expectFailure(await handler.renderPdf({ title: 'Big', markdown: 'text' }), 'STORE.TOO_LARGE');
  });

  test('leaves nothing behind when the store write fails', async () => {
    const store = new FailingStore(storeOptions({}));
    const { handler } = setup({ store });

    const outcome = await handler.renderPdf({ title: 'Report', markdown: 'text' });

    expect(outcome).toEqual({
      success: false,
      error: 'Failed to store artifact: disk full',
      code: 'STORE.WRITE_FAILED',
    });
    expect(await store.list()).toEqual([]);
    expect(await store.getByFilename('Report.pdf')).toBeNull();
  });

  test('logs each rendered document', async () => {
    const { handler } = setup();

    await handler.renderPdf({ title: 'Report', markdown: 'text', style: 'minimal' });

    const entry = logs.find((e) => e.message === 'Document rendered');
    expect(entry?.context).toMatchObject({
      module: 'render-tools',
      documentType: 'pdf',
      filename: 'Report.pdf',
      style: 'minimal',
    });
  });
});

describe('RenderToolHandler.renderDocx', () => {
  test('renders and stores a DOCX', async () => {
    const { docx, pdf, handler } = setup();

    const outcome = await handler.renderDocx({ title: 'Meeting Notes', markdown: '## Attendees' });

    expect(docx.render).toHaveBeenCalledTimes(1);
    expect(pdf.render).not.toHaveBeenCalled();
    expect(outcome).toEqual({
      success: true,
      documentType: DocumentType.Docx,
      id: expect.any(String),
      filename: 'Meeting-Notes.docx',
      sizeBytes: FAKE_DOCX.length,
      downloadUrl: '/files/Meeting-Notes.docx',
    });
  });

  test('ignores a style argument', async () => {
    const { docx, handler } = setup();

    const outcome = await handler.renderDocx({ title: 'Notes', markdown: 'text', style: 'fancy' });

    expect(outcome.success).toBe(true);
    expect(docx.render.mock.calls[0][0].style).toBe('default');
  });

  test('rejects a missing markdown body', async () => {
    const { docx, handler } = setup();

    const outcome = await handler.renderDocx({ title: 'Notes' });

    expect(outcome).toEqual({ success: false, error: 'markdown is required', code: 'VALIDATION.SCHEMA' });
    expect(docx.render).not.toHaveBeenCalled();
  });

  test('gives repeated titles distinct filenames', async () => {
    const { handler } = setup();

    const first = await handler.renderDocx({ title: 'Notes', markdown: 'a' });
    const second = await handler.renderDocx({ title: 'Notes', markdown: 'b' });

    expect(first.success && first.filename).toBe('Notes.docx');
    expect(second.success && second.filename).toBe('Notes-2.docx');
  });
});
