/**
 * Typed error model.
 *
 * Tool calls answer with a structured failure instead of a protocol fault,
 * so every expected failure is described by a TypedError: a namespaced code,
 * a human-readable message and a retryability flag. Code that needs to abort
 * a pipeline throws a RenderServiceError carrying the TypedError, and the
 * boundary (tool handler or HTTP middleware) converts it back.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'VALIDATION'
  | 'RENDER'
  | 'STORE'
  | 'FILE'
  | 'CONFIG'
  | 'SYSTEM';

/** The core typed error structure returned in API responses and tool results. */
export interface TypedError {
  /** Namespaced error code (e.g., "RENDER.TIMEOUT"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    retryable: params.retryable ?? false,
    details: params.details,
  };
}

/** Error subclass used to carry a TypedError through throw/catch boundaries. */
export class RenderServiceError extends Error {
  readonly typedError: TypedError;

  constructor(typedError: TypedError, options?: { cause?: unknown }) {
    super(typedError.message, options);
    this.name = 'RenderServiceError';
    this.typedError = typedError;
  }
}

export function isRenderServiceError(err: unknown): err is RenderServiceError {
  return err instanceof RenderServiceError;
}

/** Message of anything thrown, without relying on `instanceof Error`. */
export function errorMessage(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}

// --- Error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    details,
  });
}

export function unknownStyleError(style: string, allowed: readonly string[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.STYLE',
    message: `Unknown style "${style}". Expected one of: ${allowed.join(', ')}`,
    details: { style, allowed: [...allowed] },
  });
}

export function renderFailedError(documentType: string, cause: unknown): TypedError {
  const reason = errorMessage(cause);
  return createTypedError({
    code: 'RENDER.FAILED',
    message: `${documentType.toUpperCase()} generation failed: ${reason}`,
    details: { documentType },
  });
}

export function renderTimeoutError(documentType: string, timeoutMs: number): TypedError {
  return createTypedError({
    code: 'RENDER.TIMEOUT',
    message: `${documentType.toUpperCase()} generation exceeded timeout of ${timeoutMs}ms`,
    retryable: true,
    details: { documentType, timeoutMs },
  });
}

export function artifactTooLargeError(sizeBytes: number, maxBytes: number): TypedError {
  return createTypedError({
    code: 'STORE.TOO_LARGE',
    message: `Artifact of ${sizeBytes} bytes exceeds the limit of ${maxBytes} bytes`,
    details: { sizeBytes, maxBytes },
  });
}

export function emptyArtifactError(): TypedError {
  return createTypedError({
    code: 'STORE.EMPTY',
    message: 'Refusing to store an empty artifact',
  });
}

export function storeWriteError(cause: unknown): TypedError {
  const reason = errorMessage(cause);
  return createTypedError({
    code: 'STORE.WRITE_FAILED',
    message: `Failed to store artifact: ${reason}`,
    retryable: true,
  });
}

export function fileNotFoundError(name: string): TypedError {
  return createTypedError({
    code: 'FILE.NOT_FOUND',
    message: `File not found: ${name}`,
  });
}

export function pathTraversalError(name: string): TypedError {
  return createTypedError({
    code: 'FILE.PATH_TRAVERSAL',
    message: 'Invalid file name',
    details: { name },
  });
}

export function internalError(message: string): TypedError {
  return createTypedError({
    code: 'SYSTEM.INTERNAL',
    message,
  });
}

/** Map a typed error onto the HTTP status the download and MCP routes answer with. */
export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code === 'FILE.PATH_TRAVERSAL') return 400;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code === 'STORE.TOO_LARGE') return 413;
  return 500;
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
