export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'NOT_FOUND'
  | 'CATALOG_NOT_CONFIGURED'
  | 'INTERNAL_ERROR';

export interface ErrorBody {
  error: string;
  code: ErrorCode;
}

/** Raised while parsing inbound parameters; the pipeline is never invoked. */
export class ValidationError extends Error {
  readonly code = 'INVALID_REQUEST' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }

  toBody(): ErrorBody {
    return { error: this.message, code: this.code };
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
