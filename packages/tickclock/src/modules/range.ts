import { Command } from "commander";
import chalk from "chalk";
import { createClock, createRuntime, type GlobalOptions } from "../lib/runtime.js";
import { maybeOutputJson, type RangeResultJson } from "../lib/json-output.js";
import { invalidOption } from "../lib/errors/catalog.js";
import { renderUnknownError } from "../lib/errors/renderer.js";

interface RangeOptions {
  tick?: string;
}

export function registerRangeCommand(program: Command): void {
  program
    .command("range")
    .description("Show the virtual-second range a tick spans")
    .option("-t, --tick <n>", "Tick number", "0")
    .action((options: RangeOptions, command: Command) => {
      showRange(options, command.optsWithGlobals<GlobalOptions>());
    });
}

export function computeRange(tickText: string, globals: GlobalOptions): RangeResultJson {
  const tick = Number(tickText);
  if (tickText.trim() === "" || !Number.isInteger(tick) || tick < 0) {
    throw invalidOption("tick", `"${tickText}" is not a non-negative integer`);
  }

  const clock = createClock(createRuntime(globals));
  if (tick > 0) {
    clock.advance(tick);
  }
  const [start, end] = clock.tickRange();

  return {
    tick,
    start,
    end,
    startIso: clock.toIso(start),
    endIso: clock.toIso(end),
  };
}

function showRange(options: RangeOptions, globals: GlobalOptions): void {
  try {
    const range = computeRange(options.tick ?? "0", globals);
    if (maybeOutputJson(range)) return;

    console.log(`${chalk.bold(`Tick ${range.tick}`)}: [${range.start}, ${range.end}]`);
    console.log(chalk.gray(`${range.startIso} → ${range.endIso}`));
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}
