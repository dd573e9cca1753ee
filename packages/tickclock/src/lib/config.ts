import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { invalidConfig } from "./errors/catalog.js";
import { CLOCK_DEFAULTS } from "./tick-clock.js";
import { DEFAULT_EPOCH_TEXT, readInstant } from "./calendar.js";
import { LOG_LEVEL_NAMES, type LogLevel } from "./logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path */
export const SYSTEM_CONFIG_PATH = "/etc/tickclock/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(homedir(), ".config", "tickclock", "config.yaml");

export const CONFIG_DEFAULTS = {
  tickDurationSeconds: CLOCK_DEFAULTS.tickDurationSeconds,
  epoch: DEFAULT_EPOCH_TEXT,
  seed: CLOCK_DEFAULTS.seed,
  logLevel: "info",
  logJson: false,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

/** Clock settings, shared by config files and event scripts */
export const ClockSettingsSchema = z
  .object({
    tickDurationSeconds: z.number().int().min(1).optional(),
    epoch: z
      .string()
      .min(1)
      .refine((text) => readInstant(text) !== undefined, {
        message: "not a calendar instant (use YYYY-MM-DD HH:MM:SS or ISO 8601)",
      })
      .optional(),
    seed: z.number().int().optional(),
  })
  .strict();

export type ClockSettings = z.infer<typeof ClockSettingsSchema>;

/** Complete configuration file schema */
export const ConfigFileSchema = z
  .object({
    clock: ClockSettingsSchema.optional(),
    logging: z
      .object({
        level: z.enum(LOG_LEVEL_NAMES).optional(),
        json: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  tickDurationSeconds: number;
  epoch: string;
  seed: number;
  logLevel: LogLevel;
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/** Format zod issues as `path: message` lines. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`);
}

/**
 * Load a YAML config file from disk.
 * Returns undefined if the file doesn't exist and `{}` if it is empty.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`cannot read file: ${err instanceof Error ? err.message : String(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`invalid YAML: ${err instanceof Error ? err.message : String(err)}`]);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw invalidConfig(path, formatIssues(result.error));
  }

  return result.data;
}

function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  if (source.clock?.tickDurationSeconds !== undefined) {
    target.tickDurationSeconds = source.clock.tickDurationSeconds;
  }
  if (source.clock?.epoch !== undefined) {
    target.epoch = source.clock.epoch;
  }
  if (source.clock?.seed !== undefined) {
    target.seed = source.clock.seed;
  }
  if (source.logging?.level !== undefined) {
    target.logLevel = source.logging.level;
  }
  if (source.logging?.json !== undefined) {
    target.logJson = source.logging.json;
  }
}

/**
 * Merge configuration sources with precedence:
 * CLI options > user config > system config > defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined
): ResolvedConfig {
  const config: ResolvedConfig = {
    tickDurationSeconds: CONFIG_DEFAULTS.tickDurationSeconds,
    epoch: CONFIG_DEFAULTS.epoch,
    seed: CONFIG_DEFAULTS.seed,
    logLevel: CONFIG_DEFAULTS.logLevel,
    logJson: CONFIG_DEFAULTS.logJson,
  };

  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }
  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  if (cliOptions.tickDurationSeconds !== undefined) config.tickDurationSeconds = cliOptions.tickDurationSeconds;
  if (cliOptions.epoch !== undefined) config.epoch = cliOptions.epoch;
  if (cliOptions.seed !== undefined) config.seed = cliOptions.seed;
  if (cliOptions.logLevel !== undefined) config.logLevel = cliOptions.logLevel;
  if (cliOptions.logJson !== undefined) config.logJson = cliOptions.logJson;

  return config;
}

/**
 * Load configuration from all sources. An explicit path replaces both the
 * system and user files.
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {}
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    userConfig = loadConfigFile(explicitPath);
    if (userConfig) sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  return { config: resolveConfig(cliOptions, userConfig, systemConfig), sources };
}
