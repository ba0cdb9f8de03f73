/**
 * Corpus Errors
 *
 * Error taxonomy shared by every component. Each class carries a stable
 * `code` so callers can branch without instanceof chains across bundles.
 *
 * - Validation errors are surfaced and never retried
 * - Provider errors are retried by the embedding wrapper, then surfaced
 * - Storage errors fail open on read-enhancement paths, surface on writes
 * - Series detection errors never block publishing
 */

export type CorpusErrorCode =
  | 'VALIDATION_ERROR'
  | 'TAG_VALIDATION_ERROR'
  | 'INVALID_INPUT'
  | 'PROVIDER_ERROR'
  | 'STORAGE_ERROR'
  | 'INSUFFICIENT_CORPUS'
  | 'SERIES_DETECTION_ERROR'
  | 'CONFIG_ERROR';

export class CorpusError extends Error {
  readonly code: CorpusErrorCode;

  constructor(code: CorpusErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CorpusError';
    this.code = code;
  }
}

export class ValidationError extends CorpusError {
  constructor(message: string, code: CorpusErrorCode = 'VALIDATION_ERROR') {
    super(code, message);
    this.name = 'ValidationError';
  }
}

/**
 * A tag level was empty after normalization or exceeded its length limit
 */
export class TagValidationError extends ValidationError {
  constructor(
    readonly level: 'magazine' | 'science' | 'topic' | 'content',
    readonly reason: 'empty' | 'too_long',
    message: string,
  ) {
    super(message, 'TAG_VALIDATION_ERROR');
    this.name = 'TagValidationError';
  }
}

/**
 * Empty or whitespace-only embedding input
 */
export class InvalidInputError extends ValidationError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

export class ProviderError extends CorpusError {
  /** HTTP status when the provider answered, undefined for network failures */
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super('PROVIDER_ERROR', message, { cause: options.cause });
    this.name = 'ProviderError';
    this.status = options.status;
  }
}

export class StorageError extends CorpusError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORAGE_ERROR', message, options);
    this.name = 'StorageError';
  }
}

export class InsufficientCorpusError extends CorpusError {
  constructor(
    readonly documentCount: number,
    readonly minimum: number,
  ) {
    super(
      'INSUFFICIENT_CORPUS',
      `Corpus too small for gap analysis: ${documentCount} < ${minimum} documents`,
    );
    this.name = 'InsufficientCorpusError';
  }
}

export class SeriesDetectionError extends CorpusError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SERIES_DETECTION_ERROR', message, options);
    this.name = 'SeriesDetectionError';
  }
}

export class ConfigError extends CorpusError {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super('CONFIG_ERROR', message);
    this.name = 'ConfigError';
  }
}
