import type {
  GenerationErrorKind,
  ParseErrorReason,
  RunResult,
  ValidationErrorReason,
} from '@groundwork/shared';

/**
 * Error taxonomy for a generation run.
 *
 * - ConfigError: fatal, raised before any work is admitted
 * - GenerationError: backend failures; everything but AuthError is retried
 * - ParseError / ValidationError: per item, the run continues
 * - RunAbortedError: a fatal failure stopped the run mid-way
 */

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class UnknownLensError extends ConfigError {
  constructor(public readonly lensName: string) {
    super(`Unknown lens: "${lensName}"`);
    this.name = 'UnknownLensError';
  }
}

export class GenerationError extends Error {
  public readonly retryAfterMs?: number;

  constructor(
    public readonly kind: GenerationErrorKind,
    message: string,
    options: { cause?: unknown; retryAfterMs?: number } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'GenerationError';
    this.retryAfterMs = options.retryAfterMs;
  }

  get retryable(): boolean {
    return this.kind !== 'AuthError';
  }
}

export class ParseError extends Error {
  constructor(public readonly reason: ParseErrorReason, message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

export class ValidationError extends Error {
  constructor(public readonly reason: ValidationErrorReason, message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class RunAbortedError extends Error {
  constructor(message: string, public readonly result: RunResult, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RunAbortedError';
  }
}

export class DatasetFormatError extends Error {
  constructor(public readonly line: number, message: string) {
    super(`Line ${line}: ${message}`);
    this.name = 'DatasetFormatError';
  }
}

/**
 * Message of an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
