import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { ConsistencyError, GenerationExhaustedError, NotFoundError, ValidationError } from "./errors";
import { logError } from "./log";

export interface ErrorResponse {
  status: number;
  body: { error: string; field?: string };
}

const INTERNAL_ERROR = "An internal error occurred. The change was not saved.";

// Maps a thrown error to what the client sees; internals never reach the body
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof z.ZodError) {
    const field = error.issues[0]?.path.join(".");
    return { status: 400, body: { error: fromZodError(error).message, ...(field ? { field } : {}) } };
  }
  if (error instanceof NotFoundError) {
    return { status: 404, body: { error: error.message } };
  }
  if (error instanceof ValidationError) {
    return { status: 400, body: { error: error.message, ...(error.field ? { field: error.field } : {}) } };
  }
  if (error instanceof GenerationExhaustedError) {
    return { status: 409, body: { error: error.message } };
  }
  if (error instanceof ConsistencyError) {
    logError("Consistency check failed", error.details ? { message: error.message, ...error.details } : error);
    return { status: 500, body: { error: INTERNAL_ERROR } };
  }
  logError("Unhandled error", error);
  return { status: 500, body: { error: INTERNAL_ERROR } };
}
