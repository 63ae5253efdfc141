/**
 * Extract Stage Error Definitions
 *
 * All of these are non-fatal for a run: the extract stage records the
 * document as empty and carries on with the rest.
 */

export enum ExtractErrorType {
  NOT_FOUND = 'NOT_FOUND',
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
  PASSWORD_PROTECTED = 'PASSWORD_PROTECTED',
  CORRUPTED_FILE = 'CORRUPTED_FILE',
}

/**
 * Base extraction error
 */
export class ExtractionError extends Error {
  constructor(
    public readonly type: ExtractErrorType,
    public readonly documentId: string,
    public readonly filePath: string,
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'ExtractionError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class DocumentNotFoundError extends ExtractionError {
  constructor(documentId: string, filePath: string) {
    super(
      ExtractErrorType.NOT_FOUND,
      documentId,
      filePath,
      `File not found: ${filePath}`,
    );
    this.name = 'DocumentNotFoundError';
  }
}

export class UnsupportedDocumentError extends ExtractionError {
  constructor(documentId: string, filePath: string) {
    super(
      ExtractErrorType.UNSUPPORTED_FORMAT,
      documentId,
      filePath,
      `Unsupported file type: ${documentId}. Only PDF documents are analysed.`,
    );
    this.name = 'UnsupportedDocumentError';
  }
}

export class PasswordProtectedPdfError extends ExtractionError {
  constructor(documentId: string, filePath: string, originalError?: Error) {
    super(
      ExtractErrorType.PASSWORD_PROTECTED,
      documentId,
      filePath,
      'PDF file is password-protected.',
      originalError,
    );
    this.name = 'PasswordProtectedPdfError';
  }
}

export class CorruptedPdfError extends ExtractionError {
  constructor(
    documentId: string,
    filePath: string,
    message: string,
    originalError?: Error,
  ) {
    super(
      ExtractErrorType.CORRUPTED_FILE,
      documentId,
      filePath,
      `PDF file is corrupted or invalid: ${message}`,
      originalError,
    );
    this.name = 'CorruptedPdfError';
  }
}
