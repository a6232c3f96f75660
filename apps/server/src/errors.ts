// apps/server/src/errors.ts
//
// Error taxonomy shared by the simulation core and the HTTP layer.
//
// Propagation:
// - ValidationError / EmptyInputError: rejected at the boundary (400)
// - StoreUnavailableError: fatal to the requested operation (500)
// - EncodingError: per record, logged and skipped
// - FlushError: per batch, logged and the batch dropped

export type DriftErrorCode =
  | "VALIDATION_FAILED"
  | "EMPTY_INPUT"
  | "STORE_UNAVAILABLE"
  | "ENCODING_FAILED"
  | "FLUSH_FAILED";

export class DriftError extends Error {
  public readonly code: DriftErrorCode;
  public readonly status: number;

  constructor(code: DriftErrorCode, status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DriftError";
    this.code = code;
    this.status = status;
  }
}

export class ValidationError extends DriftError {
  public readonly issues: string[];

  constructor(issues: string[], code: DriftErrorCode = "VALIDATION_FAILED") {
    super(code, 400, issues.join("; "));
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class EmptyInputError extends ValidationError {
  constructor(message = "user id list cannot be empty") {
    super([message], "EMPTY_INPUT");
    this.name = "EmptyInputError";
  }
}

export class StoreUnavailableError extends DriftError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORE_UNAVAILABLE", 500, message, options);
    this.name = "StoreUnavailableError";
  }
}

export class EncodingError extends DriftError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ENCODING_FAILED", 500, message, options);
    this.name = "EncodingError";
  }
}

export class FlushError extends DriftError {
  public readonly userId: string;
  public readonly size: number;

  constructor(userId: string, size: number, options?: { cause?: unknown }) {
    super("FLUSH_FAILED", 500, `flush of ${size} samples for user ${userId} failed`, options);
    this.name = "FlushError";
    this.userId = userId;
    this.size = size;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
