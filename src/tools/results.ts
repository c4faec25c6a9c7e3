/**
 * Wire shapes of the tool results.
 *
 * The handler works with camelCase outcomes; clients of the tools receive
 * snake_case fields with a per-type id key (`pdf_id` / `docx_id`).
 */

import { RenderFailure, RenderOutcome } from './render-tools';

export type ToolFailure = {
  success: false;
  error: string;
  code: string;
};

export type PdfToolResult =
  | { success: true; pdf_id: string; filename: string; size_bytes: number; download_url: string }
  | ToolFailure;

export type DocxToolResult =
  | { success: true; docx_id: string; filename: string; size_bytes: number; download_url: string }
  | ToolFailure;

function toFailure(outcome: RenderFailure): ToolFailure {
  return { success: false, error: outcome.error, code: outcome.code };
}

export function toPdfToolResult(outcome: RenderOutcome): PdfToolResult {
  if (!outcome.success) return toFailure(outcome);
  return {
    success: true,
    pdf_id: outcome.id,
    filename: outcome.filename,
    size_bytes: outcome.sizeBytes,
    download_url: outcome.downloadUrl,
  };
}

export function toDocxToolResult(outcome: RenderOutcome): DocxToolResult {
  if (!outcome.success) return toFailure(outcome);
  return {
    success: true,
    docx_id: outcome.id,
    filename: outcome.filename,
    size_bytes: outcome.sizeBytes,
    download_url: outcome.downloadUrl,
  };
}
