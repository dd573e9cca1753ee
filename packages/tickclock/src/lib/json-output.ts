/**
 * JSON envelopes for machine-readable CLI output.
 */

import { isJsonMode } from "./cli-context.js";
import { ClockError } from "./errors/types.js";
import type { TraceEntry } from "./event-script.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
}

export interface JsonError {
  success: false;
  error: {
    code: string;
    message: string;
    suggestion?: string;
    details?: string;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface TraceResultJson {
  script: string;
  seed: number;
  tickDurationSeconds: number;
  finalTick: number;
  entries: TraceEntry[];
}

export interface RangeResultJson {
  tick: number;
  start: number;
  end: number;
  startIso: string;
  endIso: string;
}

export type ConvertResultJson =
  | { direction: "to-calendar"; virtualSeconds: number; iso: string }
  | { direction: "from-calendar"; instant: string; virtualSeconds: number };

export interface ConfigShowJson {
  effective: Record<string, unknown>;
  sources: string[];
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T): void {
  const result: JsonSuccess<T> = { success: true, data };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Output an error JSON result to stderr.
 */
export function outputError(error: ClockError | Error): void {
  const result: JsonError = {
    success: false,
    error: {
      code: error instanceof ClockError ? error.code : "UNKNOWN_ERROR",
      message: error.message,
      ...(error instanceof ClockError && error.suggestion && { suggestion: error.suggestion }),
      ...(error instanceof ClockError && error.details && { details: error.details }),
    },
  };
  console.error(JSON.stringify(result, null, 2));
}

/**
 * Print `data` as a JSON envelope when JSON mode is on.
 * Returns false so the caller falls through to human output otherwise.
 */
export function maybeOutputJson<T>(data: T): boolean {
  if (isJsonMode()) {
    outputSuccess(data);
    return true;
  }
  return false;
}
