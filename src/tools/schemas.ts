/**
 * Tool parameter schemas.
 *
 * `*_INPUT_SCHEMA` is the JSON Schema the MCP server advertises to clients.
 * The `*ParamsSchema` objects are the checks the handler runs itself, so a
 * missing field, an empty title or an unknown style comes back as a
 * structured failure rather than a protocol error.
 */

import { z } from 'zod';
import { PDF_STYLES } from '../domain/document';

const requiredText = (field: string) =>
  z
    .string({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a string`,
    })
    .refine((value) => value.trim().length > 0, { message: `${field} must not be empty` });

export const RenderPdfParamsSchema = z.object({
  title: requiredText('title'),
  markdown: requiredText('markdown'),
  style: z.string({ invalid_type_error: 'style must be a string' }).optional(),
});

export const RenderDocxParamsSchema = z.object({
  title: requiredText('title'),
  markdown: requiredText('markdown'),
});

export type RenderPdfParams = z.infer<typeof RenderPdfParamsSchema>;
export type RenderDocxParams = z.infer<typeof RenderDocxParamsSchema>;

/** JSON Schema advertised for render_pdf. The handler re-checks every field. */
export const RENDER_PDF_INPUT_SCHEMA = {
  type: 'object' as const,
  properties: {
    title: { type: 'string', description: 'Document title (appears as heading and in filename)' },
    markdown: { type: 'string', description: 'Markdown content for the document body' },
    style: {
      type: 'string',
      enum: [...PDF_STYLES],
      description: `Visual style: ${PDF_STYLES.map((style) => `'${style}'`).join(', ')}. Defaults to 'default'`,
    },
  },
  required: ['title', 'markdown'],
};

export const RENDER_DOCX_INPUT_SCHEMA = {
  type: 'object' as const,
  properties: {
    title: { type: 'string', description: 'Document title' },
    markdown: { type: 'string', description: 'Markdown content for the document body' },
  },
  required: ['title', 'markdown'],
};
