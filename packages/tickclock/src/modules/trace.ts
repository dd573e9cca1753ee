import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import { loadEventScript, runEventScript, type TraceResult } from "../lib/event-script.js";
import { createClock, createRuntime, type GlobalOptions } from "../lib/runtime.js";
import { maybeOutputJson, type TraceResultJson } from "../lib/json-output.js";
import { isQuietMode } from "../lib/cli-context.js";
import { renderUnknownError } from "../lib/errors/renderer.js";

export function registerTraceCommand(program: Command): void {
  program
    .command("trace")
    .argument("<script>", "YAML or JSON event script")
    .description("Replay an event script and print the timestamp each event receives")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Script format:")}
  clock:                      ${chalk.gray("optional; overrides config and flags")}
    seed: 42
  steps:
    - event: post-1           ${chalk.gray("unique label")}
      actor: 1
      hint: create_post
    - event: reply-1
      actor: 2
      parent: post-1          ${chalk.gray("must be defined earlier")}
    - advance: 1
    - reset: true
`
    )
    .action((script: string, _options: unknown, command: Command) => {
      traceScript(script, command.optsWithGlobals<GlobalOptions>());
    });
}

/**
 * Render a trace as a table; spilled timestamps are marked.
 */
export function formatTraceTable(result: TraceResult): string {
  const table = new CliTable3({
    head: ["Step", "Event", "Actor", "Hint", "Tick", "Timestamp", "Time"].map((h) => chalk.cyan(h)),
  });

  for (const entry of result.entries) {
    table.push([
      String(entry.step),
      entry.label,
      String(entry.actorId),
      entry.hint || chalk.gray("-"),
      String(entry.tick),
      entry.spilled ? `${entry.timestamp} ${chalk.yellow("(spilled)")}` : String(entry.timestamp),
      entry.iso,
    ]);
  }

  return table.toString();
}

export function traceScript(scriptPath: string, options: GlobalOptions): void {
  try {
    const runtime = createRuntime(options);
    const script = loadEventScript(scriptPath);
    const clock = createClock(runtime, script.clock);
    const result = runEventScript(script, clock);

    const json: TraceResultJson = {
      script: scriptPath,
      seed: clock.seed,
      tickDurationSeconds: clock.tickDurationSeconds,
      finalTick: result.finalTick,
      entries: result.entries,
    };
    if (maybeOutputJson(json)) return;

    console.log(formatTraceTable(result));
    if (!isQuietMode()) {
      console.log(
        chalk.gray(
          `\n${result.entries.length} events, final tick ${result.finalTick} (seed ${clock.seed}, ${clock.tickDurationSeconds}s per tick)`
        )
      );
    }
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}
