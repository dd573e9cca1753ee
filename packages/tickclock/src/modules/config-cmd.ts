import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import { loadConfig, loadConfigFile, USER_CONFIG_PATH, SYSTEM_CONFIG_PATH } from "../lib/config.js";
import { cliOverrides, type GlobalOptions } from "../lib/runtime.js";
import { maybeOutputJson, type ConfigShowJson } from "../lib/json-output.js";
import { renderUnknownError } from "../lib/errors/renderer.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

export const EXAMPLE_CONFIG = `# tickclock configuration
# Place at ~/.config/tickclock/config.yaml (user) or /etc/tickclock/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags (--seed, --tick-duration, --epoch, --log-level)
# 2. User config, or the file given with --config
# 3. System config
# 4. Built-in defaults

clock:
  # Virtual seconds per tick (integer >= 1). 86400 = one simulated day
  tickDurationSeconds: 86400

  # Calendar instant of virtual second 0. Values without an offset are UTC
  epoch: "2024-01-01T00:00:00"

  # Seed for every event timestamp. Same seed + same calls = same timeline
  seed: 42

logging:
  # Log level: debug, info, warn, error
  level: info

  # One JSON object per log line
  json: false
`;

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program.command("config").description("Manage tickclock configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option("-g, --global", `Create system-wide config at ${SYSTEM_CONFIG_PATH}`)
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(chalk.gray("Use a text editor to modify it, or delete it first."));
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
      } catch (error) {
        console.error(
          chalk.red(`Failed to create config: ${error instanceof Error ? error.message : String(error)}`)
        );
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .option("-c, --config <path>", "Specific config file to validate")
    .action((options: { config?: string }) => {
      const pathsToCheck = options.config ? [options.config] : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (options.config) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          console.log(chalk.green("  ✓ Valid"));
        } catch (error) {
          renderUnknownError(error);
          hasErrors = true;
        }
      }

      if (!foundAny && !options.config) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray("Run 'tickclock config init' to create one."));
      } else if (hasErrors) {
        process.exitCode = 1;
      } else {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .action((_options: unknown, command: Command) => {
      showConfig(command.optsWithGlobals<GlobalOptions>());
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      for (const [label, path] of [
        ["User config", USER_CONFIG_PATH],
        ["System config", SYSTEM_CONFIG_PATH],
      ] as const) {
        console.log(chalk.bold(`${label}:`));
        console.log(`  ${path} ${existsSync(path) ? chalk.green("(exists)") : chalk.gray("(not found)")}`);
      }
    });
}

function showConfig(globals: GlobalOptions): void {
  try {
    const { config: resolved, sources } = loadConfig(globals.config, cliOverrides(globals));
    const json: ConfigShowJson = {
      effective: { ...resolved },
      sources,
    };
    if (maybeOutputJson(json)) return;

    console.log(chalk.cyan("Effective Configuration:"));
    console.log(chalk.gray("─".repeat(40)));
    console.log(chalk.gray(`Sources: ${sources.length > 0 ? sources.join(", ") : "(defaults only)"}`));

    console.log();
    console.log(chalk.bold("Clock:"));
    console.log(`  tickDurationSeconds: ${resolved.tickDurationSeconds}`);
    console.log(`  epoch:               ${resolved.epoch}`);
    console.log(`  seed:                ${resolved.seed}`);

    console.log();
    console.log(chalk.bold("Logging:"));
    console.log(`  level:               ${resolved.logLevel}`);
    console.log(`  json:                ${resolved.logJson}`);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}
