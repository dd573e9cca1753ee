import { ClockError } from "./types.js";

/**
 * Factories for every ClockError the package raises, so messages and
 * hints stay consistent between the library and the CLI.
 */

// ============================================================================
// Clock Errors
// ============================================================================

export function invalidTickDuration(value: unknown): ClockError {
  return new ClockError(
    "CONFIG_INVALID_TICK_DURATION",
    `Tick duration must be a positive integer number of seconds (got ${String(value)})`,
    {
      suggestion: "Use a whole number of virtual seconds, e.g. 86400 for one day per tick",
    }
  );
}

export function invalidSeed(value: unknown): ClockError {
  return new ClockError("CONFIG_INVALID_SEED", `Seed must be an integer (got ${String(value)})`);
}

export function invalidEpoch(value: unknown): ClockError {
  return new ClockError("CONFIG_INVALID_EPOCH", `Can't read "${String(value)}" as a calendar instant`, {
    suggestion: "Use YYYY-MM-DD HH:MM:SS (read as UTC) or a full ISO 8601 string",
    example: "2024-01-01T00:00:00",
  });
}

export function invalidAdvanceCount(n: unknown): ClockError {
  return new ClockError(
    "ADVANCE_INVALID_COUNT",
    `Cannot advance by ${String(n)} ticks; the count must be an integer of at least 1`
  );
}

export function invalidTimeStep(value: unknown): ClockError {
  return new ClockError(
    "INVALID_TIME_STEP",
    `Time step must be a non-negative integer (got ${String(value)})`
  );
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidConfig(path: string, issues: string[]): ClockError {
  const details = issues.length > 1 ? issues.map((i) => `• ${i}`).join("\n") : issues[0];
  return new ClockError("VALIDATION_CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the listed fields or print a fresh example",
    example: "tickclock config init",
    details,
  });
}

export function invalidOption(optionName: string, reason: string): ClockError {
  return new ClockError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`);
}

// ============================================================================
// Script Errors
// ============================================================================

export function scriptNotFound(path: string): ClockError {
  return new ClockError("SCRIPT_NOT_FOUND", `Can't find event script "${path}"`, {
    suggestion: "Check the script path exists and try again",
  });
}

export function invalidScript(path: string, issues: string[]): ClockError {
  return new ClockError("SCRIPT_INVALID", `Event script ${path} is invalid`, {
    details: issues.map((i) => `• ${i}`).join("\n"),
  });
}

export function unknownEventRef(label: string, step: number): ClockError {
  return new ClockError(
    "SCRIPT_UNKNOWN_REF",
    `Step ${step} refers to parent "${label}", which no earlier step defines`,
    {
      suggestion: "Parents must be defined by an event step that runs before their children",
    }
  );
}
