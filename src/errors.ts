export type ErrorKind = 'invalid_request' | 'not_found' | 'transient' | 'diff_compute';

export abstract class ComparisonError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly status: number;

  /** Message shown to the person using the app. */
  abstract get userMessage(): string;
}

export class InvalidRequestError extends ComparisonError {
  readonly kind = 'invalid_request';
  readonly status = 400;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }

  get userMessage(): string {
    return this.message;
  }
}

export class NotFoundError extends ComparisonError {
  readonly kind = 'not_found';
  readonly status = 404;

  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }

  get userMessage(): string {
    return `No snapshot available: ${this.message}`;
  }
}

export class TransientFetchError extends ComparisonError {
  readonly kind = 'transient';
  readonly status = 502;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientFetchError';
  }

  get userMessage(): string {
    return `The archive could not be reached (${this.message}). Please try again.`;
  }
}

export class DiffComputeError extends ComparisonError {
  readonly kind = 'diff_compute';
  readonly status = 422;

  constructor(message: string) {
    super(message);
    this.name = 'DiffComputeError';
  }

  get userMessage(): string {
    return `Cannot diff this content: ${this.message}`;
  }
}

/** Raised by formatters; the normalizer falls back to the unformatted text. */
export class NormalizationFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NormalizationFailure';
  }
}

export function describeError(error: unknown): {
  kind: ErrorKind | 'internal';
  status: number;
  message: string;
} {
  if (error instanceof ComparisonError) {
    return { kind: error.kind, status: error.status, message: error.userMessage };
  }
  return { kind: 'internal', status: 500, message: 'Something went wrong while processing the comparison.' };
}
