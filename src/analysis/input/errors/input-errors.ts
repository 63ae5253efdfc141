/**
 * Input Error Definitions
 * Both abort the run before any document is read.
 */

export class InputError extends Error {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'InputError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidInputError extends InputError {
  constructor(
    public readonly filePath: string,
    public readonly violations: string[],
    originalError?: Error,
  ) {
    super(`Invalid input file ${filePath}: ${violations.join('; ')}`, originalError);
    this.name = 'InvalidInputError';
  }
}

export class NoDocumentsError extends InputError {
  constructor(public readonly folderPath: string) {
    super(`No PDF files found in '${folderPath}'. Add PDF files and try again.`);
    this.name = 'NoDocumentsError';
  }
}
