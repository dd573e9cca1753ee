export { TickClock, CLOCK_DEFAULTS, type TickClockOptions } from "./lib/tick-clock.js";
export { LegacyTickClock, systemClock } from "./lib/adapters/index.js";
export type { Clock, EventClock, TickRange } from "./lib/ports/index.js";
export {
  ActionType,
  PLATFORM_TYPES,
  defaultActionsFor,
  isActionType,
  type ActionHint,
  type PlatformType,
} from "./lib/action-type.js";
export {
  DEFAULT_EPOCH,
  addSeconds,
  formatInstant,
  parseInstant,
  readInstant,
  secondsBetween,
} from "./lib/calendar.js";
export {
  SEED_MIX_VERSION,
  createSeededSource,
  deriveEventSeed,
  eventSeedKey,
  fnv1a32,
  randomInt,
  type SeededSource,
} from "./lib/seed-mix.js";
export {
  loadEventScript,
  parseEventScript,
  runEventScript,
  type EventScript,
  type ScriptStep,
  type TraceEntry,
  type TraceResult,
} from "./lib/event-script.js";
export { loadConfig, loadConfigFile, resolveConfig, type ResolvedConfig } from "./lib/config.js";
export { createLogger, createNoopLogger, type Logger, type LogLevel } from "./lib/logger.js";
export { ClockError, isClockError, type ErrorCode } from "./lib/errors/types.js";
