/**
 * Error taxonomy for the continuation engine.
 *
 * Transports throw `ModelServiceError`; executors may throw anything, which
 * the engine converts into an `Error: ...` tool output.
 */

export type ErrorKind = "transport" | "stale-continuation" | "protocol-mismatch" | "execution" | "cancelled";

export class ModelServiceError extends Error {
  readonly status?: number;
  readonly code?: string;

  constructor(message: string, options: { status?: number; code?: string } = {}) {
    super(message);
    this.name = "ModelServiceError";
    this.status = options.status;
    this.code = options.code;
  }
}

export class CancellationError extends Error {
  constructor(message = "cancelled") {
    super(message);
    this.name = "CancellationError";
  }
}

export class ExecutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExecutionError";
  }
}

// Races the next turn resolves on its own.
const SUPPRESSED_FRAGMENTS = ["missing reasoning item", "missing reasoning", "no tool output found"];

const STALE_PATTERN = /previous_response_not_found|previous response with id/i;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isCancellation(error: unknown): boolean {
  return error instanceof CancellationError || (error instanceof Error && error.name === "AbortError");
}

export function isStaleContinuation(error: unknown): boolean {
  if (!(error instanceof ModelServiceError)) {
    return false;
  }
  if (error.code === "previous_response_not_found") {
    return true;
  }
  const statusAllows = error.status === undefined || error.status === 400 || error.status === 404;
  return statusAllows && STALE_PATTERN.test(error.message);
}

export function isProtocolMismatch(error: unknown): boolean {
  const message = errorMessage(error).toLowerCase();
  return SUPPRESSED_FRAGMENTS.some((fragment) => message.includes(fragment));
}

export function classifyError(error: unknown): ErrorKind {
  if (isCancellation(error)) return "cancelled";
  if (isStaleContinuation(error)) return "stale-continuation";
  if (isProtocolMismatch(error)) return "protocol-mismatch";
  if (error instanceof ModelServiceError) return "transport";
  return "execution";
}

/** Errors the turn-level retry may replay: stream failures, 429, 5xx and network faults. */
export function isTransientServerError(error: unknown): boolean {
  if (!(error instanceof ModelServiceError) || classifyError(error) !== "transport") {
    return false;
  }
  return error.status === undefined || error.status === 429 || error.status >= 500;
}

export function isNotFound(error: unknown): boolean {
  if (error instanceof ModelServiceError && error.status === 404) {
    return true;
  }
  return errorMessage(error).toLowerCase().includes("not found");
}

export function shouldSurface(error: unknown): boolean {
  const kind = classifyError(error);
  return kind !== "cancelled" && kind !== "protocol-mismatch";
}

export function userFacingMessage(error: unknown): string {
  if (error instanceof ModelServiceError && error.status !== undefined) {
    if (error.status === 401) {
      return "Invalid API key. Check the configured key and try again.";
    }
    if (error.status === 403) {
      return "Access denied. The API key may not have the required permissions.";
    }
    if (error.status === 404) {
      return "The requested response was not found. Send a new message to start fresh.";
    }
    if (error.status === 429) {
      return "Rate limit reached. Wait a moment before trying again.";
    }
    if (error.status >= 500) {
      return "The model service is temporarily unavailable. Try again in a moment.";
    }
    return `Request failed: ${error.message}`;
  }
  return `Error: ${errorMessage(error)}`;
}
