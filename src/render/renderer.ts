/**
 * Render adapter contract.
 *
 * A renderer turns a title and a markdown body into the bytes of one
 * standalone document. Implementations keep no state between calls.
 */

import { DocumentType, PdfStyle } from '../domain/document';

export interface RenderInput {
  title: string;
  markdown: string;
  /** Ignored by renderers with a single fixed look. */
  style: PdfStyle;
}

export interface DocumentRenderer {
  readonly documentType: DocumentType;
  render(input: RenderInput): Promise<Buffer>;
}

/** One renderer per document type, selected by tag. */
export type RendererRegistry = Record<DocumentType, DocumentRenderer>;
