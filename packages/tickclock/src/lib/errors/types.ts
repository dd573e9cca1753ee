/**
 * Error codes for every failure the clock, its config and the CLI can raise.
 * Timestamp synthesis itself never fails; these cover programmer errors
 * and bad input files only.
 */
export type ErrorCode =
  // Clock construction and advancement
  | "CONFIG_INVALID_TICK_DURATION"
  | "CONFIG_INVALID_SEED"
  | "CONFIG_INVALID_EPOCH"
  | "ADVANCE_INVALID_COUNT"
  | "INVALID_TIME_STEP"
  // Validation errors
  | "VALIDATION_CONFIG_INVALID"
  | "VALIDATION_INVALID_OPTION"
  // Event scripts
  | "SCRIPT_NOT_FOUND"
  | "SCRIPT_INVALID"
  | "SCRIPT_UNKNOWN_REF"
  // Generic
  | "UNKNOWN_ERROR";

export interface ClockErrorOptions {
  suggestion?: string;
  example?: string;
  details?: string;
  cause?: Error;
}

/**
 * Error carrying a stable code plus optional hints for the renderer.
 */
export class ClockError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly details?: string;

  constructor(code: ErrorCode, message: string, options?: ClockErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "ClockError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.details = options?.details;
  }
}

export function isClockError(error: unknown): error is ClockError {
  return error instanceof ClockError;
}
