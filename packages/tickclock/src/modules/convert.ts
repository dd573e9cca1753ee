import { Command } from "commander";
import { createClock, createRuntime, type GlobalOptions } from "../lib/runtime.js";
import { maybeOutputJson, type ConvertResultJson } from "../lib/json-output.js";
import { parseInstant } from "../lib/calendar.js";
import { invalidOption } from "../lib/errors/catalog.js";
import { renderUnknownError } from "../lib/errors/renderer.js";

interface ConvertOptions {
  fromCalendar?: boolean;
}

export function registerConvertCommand(program: Command): void {
  program
    .command("convert")
    .argument("<value>", "Virtual seconds, or a calendar instant with --from-calendar")
    .description("Convert between virtual seconds and calendar time")
    .option("-f, --from-calendar", "Read <value> as a calendar instant (offset-less values are UTC)")
    .action((value: string, options: ConvertOptions, command: Command) => {
      runConvert(value, options, command.optsWithGlobals<GlobalOptions>());
    });
}

export function convertValue(
  value: string,
  options: ConvertOptions,
  globals: GlobalOptions
): ConvertResultJson {
  const clock = createClock(createRuntime(globals));

  if (options.fromCalendar) {
    return {
      direction: "from-calendar",
      instant: value,
      virtualSeconds: clock.fromCalendar(parseInstant(value)),
    };
  }

  const virtualSeconds = Number(value);
  if (value.trim() === "" || !Number.isInteger(virtualSeconds)) {
    throw invalidOption("value", `"${value}" is not a whole number of virtual seconds`);
  }
  if (Number.isNaN(clock.toCalendar(virtualSeconds).getTime())) {
    throw invalidOption("value", `${value} virtual seconds lies outside the representable calendar range`);
  }
  return {
    direction: "to-calendar",
    virtualSeconds,
    iso: clock.toIso(virtualSeconds),
  };
}

function runConvert(value: string, options: ConvertOptions, globals: GlobalOptions): void {
  try {
    const result = convertValue(value, options, globals);
    if (maybeOutputJson(result)) return;

    console.log(result.direction === "to-calendar" ? result.iso : String(result.virtualSeconds));
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}
