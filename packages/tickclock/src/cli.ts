import { Command } from "commander";
import { readFileSync } from "fs";
import { z } from "zod";
import { initContext } from "./lib/cli-context.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { registerTraceCommand } from "./modules/trace.js";
import { registerRangeCommand } from "./modules/range.js";
import { registerConvertCommand } from "./modules/convert.js";
import { registerConfigCommands } from "./modules/config-cmd.js";

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  return PackageJsonSchema.parse(raw).version;
}

export function createProgram(): Command {
  const program = new Command()
    .name("tickclock")
    .description("Deterministic tick clock for discrete-event simulations")
    .version(readVersion())
    .option("--config <path>", "Config file to use instead of the user and system files")
    .option("--seed <n>", "Seed for event timestamps")
    .option("--tick-duration <seconds>", "Virtual seconds per tick")
    .option("--epoch <instant>", "Calendar instant of virtual second 0")
    .option("--log-level <level>", "debug, info, warn or error")
    .option("--json", "Output JSON")
    .option("-q, --quiet", "Print results only");

  registerTraceCommand(program);
  registerRangeCommand(program);
  registerConvertCommand(program);
  registerConfigCommands(program);

  return program;
}

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}
