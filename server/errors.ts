// Error taxonomy for the ledger core. Only these reach the HTTP boundary;
// anything else is reported as a generic internal error.

export class ValidationError extends Error {
  constructor(
    message: string,
    public field?: string,
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

// A referenced record does not exist (bad id from the caller)
export class NotFoundError extends ValidationError {
  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`, "id");
    this.name = "NotFoundError";
  }
}

// Batch identifier generation ran out of candidates; the caller may retry with different inputs
export class GenerationExhaustedError extends Error {
  constructor(
    public base: string,
    public attempts: number,
  ) {
    super(`Could not generate a unique batch ID for base '${base}' after ${attempts} attempts. Try a different supplier name, date or weight.`);
    this.name = "GenerationExhaustedError";
  }
}

// An invariant was found broken mid-operation. Always aborts the enclosing transaction.
export class ConsistencyError extends Error {
  constructor(
    message: string,
    public details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ConsistencyError";
  }
}

// Errors that a batch job records per item instead of aborting
export function isRecoverableRecordError(error: unknown): error is ValidationError | ConsistencyError {
  return error instanceof ValidationError || error instanceof ConsistencyError;
}
