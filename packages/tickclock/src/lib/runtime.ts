import { loadConfig, type ClockSettings, type ResolvedConfig } from "./config.js";
import { createLogger, LOG_LEVEL_NAMES, type Logger, type LogLevel } from "./logger.js";
import { TickClock } from "./tick-clock.js";
import { invalidOption } from "./errors/catalog.js";

/** Options registered on the root program and visible to every command. */
export type GlobalOptions = {
  config?: string;
  seed?: string;
  tickDuration?: string;
  epoch?: string;
  logLevel?: string;
  json?: boolean;
  quiet?: boolean;
};

export interface Runtime {
  config: ResolvedConfig;
  sources: string[];
  logger: Logger;
}

function parseInteger(optionName: string, raw: string, min?: number): number {
  const value = Number(raw.trim());
  if (raw.trim() === "" || !Number.isInteger(value)) {
    throw invalidOption(optionName, `"${raw}" is not an integer`);
  }
  if (min !== undefined && value < min) {
    throw invalidOption(optionName, `must be at least ${min}`);
  }
  return value;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVEL_NAMES as readonly string[]).includes(value);
}

/**
 * Convert raw string flags into typed config overrides.
 */
export function cliOverrides(options: GlobalOptions): Partial<ResolvedConfig> {
  const overrides: Partial<ResolvedConfig> = {};

  if (options.seed !== undefined) {
    overrides.seed = parseInteger("seed", options.seed);
  }
  if (options.tickDuration !== undefined) {
    overrides.tickDurationSeconds = parseInteger("tick-duration", options.tickDuration, 1);
  }
  if (options.epoch !== undefined) {
    overrides.epoch = options.epoch;
  }
  if (options.logLevel !== undefined) {
    if (!isLogLevel(options.logLevel)) {
      throw invalidOption("log-level", `expected one of ${LOG_LEVEL_NAMES.join(", ")}`);
    }
    overrides.logLevel = options.logLevel;
  }

  return overrides;
}

/**
 * Resolve config from files and flags and build the matching logger.
 */
export function createRuntime(options: GlobalOptions): Runtime {
  const { config, sources } = loadConfig(options.config, cliOverrides(options));
  const logger = createLogger({ level: config.logLevel, json: config.logJson });
  logger.debug("Configuration resolved", { sources });
  return { config, sources, logger };
}

/**
 * Build a fresh clock from resolved config, with per-script settings on top.
 */
export function createClock(runtime: Runtime, overrides: ClockSettings = {}): TickClock {
  return new TickClock({
    tickDurationSeconds: overrides.tickDurationSeconds ?? runtime.config.tickDurationSeconds,
    epoch: overrides.epoch ?? runtime.config.epoch,
    seed: overrides.seed ?? runtime.config.seed,
    logger: runtime.logger,
  });
}
