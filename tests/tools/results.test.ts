import { DocumentType } from '../../src/domain/document';
import { RenderOutcome } from '../../src/tools/render-tools';
import { toDocxToolResult, toPdfToolResult } from '../../src/tools/results';

const success: RenderOutcome = {
  success: true,
  documentType: DocumentType.Pdf,
  id: 'a1b2c3',
  filename: 'Report.pdf',
  sizeBytes: 2048,
  downloadUrl: '/files/Report.pdf',
};

const failed: RenderOutcome = { success: false, error: 'title is required', code: 'VALIDATION.SCHEMA' };

describe('tool result shapes', () => {
  test('pdf results use snake_case and pdf_id', () => {
    expect(toPdfToolResult(success)).toEqual({
      success: true,
      pdf_id: 'a1b2c3',
      filename: 'Report.pdf',
      size_bytes: 2048,
      download_url: '/files/Report.pdf',
    });
  });

  test('docx results use docx_id', () => {
    expect(toDocxToolResult({ ...success, documentType: DocumentType.Docx, filename: 'Notes.docx' })).toEqual({
      success: true,
      docx_id: 'a1b2c3',
      filename: 'Notes.docx',
      size_bytes: 2048,
      download_url: '/files/Report.pdf',
    });
  });

  test('failures pass through unchanged', () => {
    expect(toPdfToolResult(failed)).toEqual(failed);
    expect(toDocxToolResult(failed)).toEqual(failed);
  });
});
