import { DocumentType } from '../../src/domain/document';
import { LogEntry, configureLogging } from '../../src/logger';
import { DocumentRenderer, RenderInput, RendererRegistry } from '../../src/render/renderer';

export const FAKE_PDF = Buffer.from('%PDF-1.7\nfake pdf body\n%%EOF');
export const FAKE_DOCX = Buffer.from('PK\u0003\u0004fake docx body');

export type MockRenderer = DocumentRenderer & {
  render: jest.Mock<Promise<Buffer>, [RenderInput]>;
};

export function mockRenderer(documentType: DocumentType, output: Buffer): MockRenderer {
  return {
    documentType,
    render: jest.fn<Promise<Buffer>, [RenderInput]>(async () => Buffer.from(output)),
  };
}

export function mockRegistry(): { pdf: MockRenderer; docx: MockRenderer; registry: RendererRegistry } {
  const pdf = mockRenderer(DocumentType.Pdf, FAKE_PDF);
  const docx = mockRenderer(DocumentType.Docx, FAKE_DOCX);
  return {
    pdf,
    docx,
    registry: { [DocumentType.Pdf]: pdf, [DocumentType.Docx]: docx },
  };
}

/** Route log output into an array for the duration of a test file. */
export function captureLogs(): LogEntry[] {
  const entries: LogEntry[] = [];
  beforeEach(() => {
    entries.length = 0;
    configureLogging({ sink: (entry) => entries.push(entry) });
  });
  afterAll(() => configureLogging({ sink: null }));
  return entries;
}
