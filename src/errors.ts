/**
 * Errors raised by the flow engine. Each carries a stable `code` and the
 * HTTP status an API layer should answer with.
 */
export class FlowEngineError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(message: string, code: string, status: number, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

/**
 * Malformed payload. Nothing has been written.
 */
export class ValidationError extends FlowEngineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'VALIDATION_ERROR', 400);
    this.issues = issues;
  }
}

/**
 * Bot, backup or node is absent or not owned by the caller.
 */
export class NotFoundError extends FlowEngineError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
  }
}

/**
 * Unexpected failure inside a storage transaction. The transaction was
 * rolled back, so the graph is unchanged.
 */
export class TransactionError extends FlowEngineError {
  constructor(message: string, cause: unknown) {
    super(
      `${message}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'TRANSACTION_FAILED',
      500,
      cause
    );
  }
}

export function isFlowEngineError(error: unknown): error is FlowEngineError {
  return error instanceof FlowEngineError;
}
