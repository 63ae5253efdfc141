/**
 * Rank Stage Error Definitions
 */

export enum RankErrorType {
  PROVIDER_FAILURE = 'PROVIDER_FAILURE',
  SECTION_EMBEDDING_FAILED = 'SECTION_EMBEDDING_FAILED',
}

/**
 * Base rank error
 */
export class RankError extends Error {
  constructor(
    public readonly type: RankErrorType,
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'RankError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The embedding provider is unusable: misconfigured, unreachable, or it
 * failed on the query itself. Aborts the run.
 */
export class EmbeddingProviderError extends RankError {
  constructor(
    public readonly model: string,
    message: string,
    originalError?: Error,
  ) {
    super(
      RankErrorType.PROVIDER_FAILURE,
      `Embedding provider failed (model: ${model}): ${message}`,
      originalError,
    );
    this.name = 'EmbeddingProviderError';
  }
}

/**
 * One section could not be embedded or scored. The section is dropped.
 */
export class SectionEmbeddingError extends RankError {
  constructor(
    public readonly documentId: string,
    public readonly sectionTitle: string,
    message: string,
    originalError?: Error,
  ) {
    super(RankErrorType.SECTION_EMBEDDING_FAILED, message, originalError);
    this.name = 'SectionEmbeddingError';
  }
}
