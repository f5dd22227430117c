import type { TermMismatch } from "../sequence/types";

export class SequenceError extends Error {
  public readonly code: string;
  public override readonly cause?: unknown;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.code = code;
    this.cause = cause;
    this.name = "SequenceError";
  }
}

export class InputError extends SequenceError {
  constructor(message: string, cause?: unknown) {
    super(message, "INPUT_ERROR", cause);
    this.name = "InputError";
  }
}

export class ValidationError extends SequenceError {
  public readonly mismatch?: TermMismatch;

  constructor(
    message: string,
    cause?: unknown,
    details?: {
      mismatch?: TermMismatch;
    }
  ) {
    super(message, "VALIDATION_ERROR", cause);
    this.name = "ValidationError";
    this.mismatch = details?.mismatch;
  }
}
