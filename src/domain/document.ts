/**
 * Document types and render styles.
 */

export enum DocumentType {
  Pdf = 'pdf',
  Docx = 'docx',
}

/** Visual themes available to PDF rendering. DOCX has one fixed look. */
export const PDF_STYLES = ['default', 'modern', 'minimal'] as const;

export type PdfStyle = (typeof PDF_STYLES)[number];

export const DEFAULT_PDF_STYLE: PdfStyle = 'default';

export function isPdfStyle(value: string): value is PdfStyle {
  return PDF_STYLES.some((style) => style === value);
}

export const CONTENT_TYPES: Record<DocumentType, string> = {
  [DocumentType.Pdf]: 'application/pdf',
  [DocumentType.Docx]: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
};

export const FILE_EXTENSIONS: Record<DocumentType, string> = {
  [DocumentType.Pdf]: '.pdf',
  [DocumentType.Docx]: '.docx',
};

/** A validated request to render one document. */
export interface RenderRequest {
  title: string;
  markdown: string;
  documentType: DocumentType;
  /** Only consulted for PDF. */
  style: PdfStyle;
}
