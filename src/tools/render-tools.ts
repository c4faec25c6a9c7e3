/**
 * Request handler behind the render_pdf and render_docx tools.
 *
 * validate → render (with timeout) → store → result. Ordinary failures at
 * any stage come back as `{ success: false }` outcomes; nothing here throws
 * for bad input, a failing renderer or a full store.
 */

import { ZodType, ZodTypeDef } from 'zod';
import { DEFAULT_PDF_STYLE, DocumentType, PDF_STYLES, RenderRequest, isPdfStyle } from '../domain/document';
import {
  RenderServiceError,
  TypedError,
  errorMessage,
  internalError,
  isRenderServiceError,
  renderFailedError,
  renderTimeoutError,
  unknownStyleError,
  validationError,
} from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { RendererRegistry } from '../render/renderer';
import { ArtifactStore } from '../storage/store';
import { RenderDocxParamsSchema, RenderPdfParamsSchema } from './schemas';

export interface RenderSuccess {
  success: true;
  documentType: DocumentType;
  id: string;
  filename: string;
  sizeBytes: number;
  downloadUrl: string;
}

export interface RenderFailure {
  success: false;
  error: string;
  code: string;
}

export type RenderOutcome = RenderSuccess | RenderFailure;

export interface RenderToolHandlerOptions {
  store: ArtifactStore;
  renderers: RendererRegistry;
  renderTimeoutMs: number;
  /** Prepended to `/files/<filename>`; empty for relative URLs. */
  publicBaseUrl?: string;
  logger?: Logger;
}

/** Path the download route serves a stored file under. */
export function downloadPath(filename: string): string {
  return `/files/${encodeURIComponent(filename)}`;
}

/** Reject with a RENDER.TIMEOUT error if `fn` does not settle in time. */
async function executeWithTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  documentType: DocumentType,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(
      () => reject(new RenderServiceError(renderTimeoutError(documentType, timeoutMs))),
      timeoutMs,
    );
    fn()
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((err: unknown) => {
        clearTimeout(timer);
        reject(err);
      });
  });
}

function failure(error: TypedError): RenderFailure {
  return { success: false, error: error.message, code: error.code };
}

export class RenderToolHandler {
  private readonly store: ArtifactStore;
  private readonly renderers: RendererRegistry;
  private readonly renderTimeoutMs: number;
  private readonly publicBaseUrl: string;
  private readonly log: Logger;

  constructor(options: RenderToolHandlerOptions) {
    this.store = options.store;
    this.renderers = options.renderers;
    this.renderTimeoutMs = options.renderTimeoutMs;
    this.publicBaseUrl = options.publicBaseUrl ?? '';
    this.log = (options.logger ?? rootLogger).child({ module: 'render-tools' });
  }

  /** render_pdf(title, markdown, style?) */
  async renderPdf(params: unknown): Promise<RenderOutcome> {
    const parsed = this.parse(RenderPdfParamsSchema, params);
    if (!parsed.ok) return failure(parsed.error);

    const style = parsed.value.style ?? DEFAULT_PDF_STYLE;
    if (!isPdfStyle(style)) {
      return failure(unknownStyleError(style, PDF_STYLES));
    }

    return this.execute({
      title: parsed.value.title.trim(),
      markdown: parsed.value.markdown,
      documentType: DocumentType.Pdf,
      style,
    });
  }

  /** render_docx(title, markdown) */
  async renderDocx(params: unknown): Promise<RenderOutcome> {
    const parsed = this.parse(RenderDocxParamsSchema, params);
    if (!parsed.ok) return failure(parsed.error);

    return this.execute({
      title: parsed.value.title.trim(),
      markdown: parsed.value.markdown,
      documentType: DocumentType.Docx,
      style: DEFAULT_PDF_STYLE,
    });
  }

  private parse<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    params: unknown,
  ): { ok: true; value: T } | { ok: false; error: TypedError } {
    const result = schema.safeParse(params ?? {});
    if (result.success) return { ok: true, value: result.data };
    const issues = result.error.issues.map((issue) => issue.message);
    return {
      ok: false,
      error: validationError(issues.join('; '), { issues }),
    };
  }

  private async execute(request: RenderRequest): Promise<RenderOutcome> {
    const startedAt = Date.now();
    const log = this.log.child({ documentType: request.documentType });

    try {
      const content = await this.render(request);
      const artifact = await this.store.put({
        content,
        documentType: request.documentType,
        suggestedFilename: request.title,
      });

      log.info('Document rendered', {
        id: artifact.id,
        filename: artifact.filename,
        sizeBytes: artifact.sizeBytes,
        style: request.documentType === DocumentType.Pdf ? request.style : undefined,
        durationMs: Date.now() - startedAt,
      });

      return {
        success: true,
        documentType: request.documentType,
        id: artifact.id,
        filename: artifact.filename,
        sizeBytes: artifact.sizeBytes,
        downloadUrl: `${this.publicBaseUrl}${downloadPath(artifact.filename)}`,
      };
    } catch (err) {
      if (isRenderServiceError(err)) {
        log.warn('Render request failed', { code: err.typedError.code, error: err.message });
        return failure(err.typedError);
      }
      log.error('Unexpected render pipeline error', { err });
      return failure(internalError(errorMessage(err)));
    }
  }

  /** Run the renderer for the request's type; wrap anything it throws as RENDER.FAILED. */
  private async render(request: RenderRequest): Promise<Buffer> {
    const renderer = this.renderers[request.documentType];
    try {
      return await executeWithTimeout(
        () => renderer.render({ title: request.title, markdown: request.markdown, style: request.style }),
        this.renderTimeoutMs,
        request.documentType,
      );
    } catch (err) {
      if (isRenderServiceError(err)) throw err;
      throw new RenderServiceError(renderFailedError(request.documentType, err), { cause: err });
    }
  }
}
