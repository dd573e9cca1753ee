import chalk from "chalk";
import { ClockError, isClockError } from "./types.js";
import { getOutputMode, type OutputMode } from "../output/mode.js";
import { outputError } from "../json-output.js";

const SYM = {
  error: "✗",
  arrow: "→",
};

/**
 * Build the static (coloured) rendering of an error, one entry per line.
 */
export function formatStaticError(error: ClockError): string[] {
  const output: string[] = [""];

  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(error.message)}`);

  if (error.details) {
    output.push("");
    for (const line of error.details.split("\n")) {
      output.push(`  ${chalk.dim(line)}`);
    }
  }

  if (error.suggestion) {
    output.push("");
    output.push(`  ${chalk.yellow(SYM.arrow)} ${error.suggestion}`);
  }

  if (error.example) {
    output.push("");
    output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(error.example)}`);
  }

  output.push("");
  return output;
}

/**
 * Render an error to stderr in the given (or current) output mode.
 */
export function renderError(error: ClockError, mode?: OutputMode): void {
  const outputMode = mode ?? getOutputMode();

  switch (outputMode) {
    case "json":
      outputError(error);
      break;
    case "static":
      for (const line of formatStaticError(error)) {
        console.error(line);
      }
      break;
  }
}

/**
 * Wrap anything thrown into a ClockError and render it.
 */
export function renderUnknownError(error: unknown, mode?: OutputMode): void {
  if (isClockError(error)) {
    renderError(error, mode);
    return;
  }
  const message = error instanceof Error ? error.message : String(error);
  renderError(
    new ClockError("UNKNOWN_ERROR", message, {
      cause: error instanceof Error ? error : undefined,
    }),
    mode
  );
}
