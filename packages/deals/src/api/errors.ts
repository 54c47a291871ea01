export interface RequestFailure {
  operation: string;
  statusCode: number | null;
  durationMs: number;
  cause?: unknown;
}

export class RequestFailedError extends Error {
  readonly operation: string;
  readonly statusCode: number | null;
  readonly durationMs: number;

  constructor(message: string, failure: RequestFailure) {
    super(message, { cause: failure.cause });
    this.name = 'RequestFailedError';
    this.operation = failure.operation;
    this.statusCode = failure.statusCode;
    this.durationMs = failure.durationMs;
  }
}
