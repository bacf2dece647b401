/**
 * DOCX Error Handling
 *
 * Centralised error class and async error-wrapping utility.
 *
 * @module docx/errors
 */

export class DocxError extends Error {
  constructor(
    message: string,
    public readonly code: DocxErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DocxError';
    Error.captureStackTrace?.(this, DocxError);
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, message: this.message, code: this.code, context: this.context };
  }
}

export enum DocxErrorCode {
  INVALID_PACKAGE = 'INVALID_PACKAGE',
  UNSUPPORTED_CONTENT_TYPE = 'UNSUPPORTED_CONTENT_TYPE',
  MALFORMED_ROOT_PART = 'MALFORMED_ROOT_PART',
  MALFORMED_PART = 'MALFORMED_PART',
  CARDINALITY_VIOLATION = 'CARDINALITY_VIOLATION',
  STYLES_RESOLUTION_REENTRY = 'STYLES_RESOLUTION_REENTRY',
  MULTIPLE_COMMENTS_PARTS = 'MULTIPLE_COMMENTS_PARTS',
  DUPLICATE_COMMENT_ID = 'DUPLICATE_COMMENT_ID',
  UNKNOWN_RELATIONSHIP_ID = 'UNKNOWN_RELATIONSHIP_ID',
  EXTERNAL_TARGET = 'EXTERNAL_TARGET',
  PART_NOT_FOUND = 'PART_NOT_FOUND',
  INVALID_RELATIONSHIP_TARGET = 'INVALID_RELATIONSHIP_TARGET',
  PER_ITEM_RESOLUTION_FAILURE = 'PER_ITEM_RESOLUTION_FAILURE',
  DOCX_READ_FAILED = 'DOCX_READ_FAILED',
}

export function isDocxError(error: unknown, code?: DocxErrorCode): error is DocxError {
  return error instanceof DocxError && (code === undefined || error.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Wrap an async operation. Re-throws existing DocxErrors, wraps everything else. */
export async function withErrorContext<T>(
  operation: () => Promise<T>,
  errorCode: DocxErrorCode,
  context?: Record<string, unknown>
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof DocxError) throw error;
    throw new DocxError(errorMessage(error), errorCode, {
      ...context,
      originalError: error instanceof Error ? error.stack : String(error),
    });
  }
}
