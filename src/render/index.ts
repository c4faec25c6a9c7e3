import { DocumentType } from '../domain/document';
import { DocxRenderer } from './docx-renderer';
import { PdfRenderer } from './pdf-renderer';
import { RendererRegistry } from './renderer';

export * from './renderer';
export { PdfRenderer } from './pdf-renderer';
export { DocxRenderer } from './docx-renderer';
export { PDF_THEMES } from './themes';
export type { PdfTheme } from './themes';
export { parseMarkdown, parseInline } from './markdown';
export type { MarkdownBlock, TextRun } from './markdown';

/** The two production renderers, keyed by the document type they produce. */
export function createRendererRegistry(): RendererRegistry {
  return {
    [DocumentType.Pdf]: new PdfRenderer(),
    [DocumentType.Docx]: new DocxRenderer(),
  };
}
