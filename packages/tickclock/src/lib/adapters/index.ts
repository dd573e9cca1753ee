export { systemClock } from "./system-clock.js";
export { LegacyTickClock } from "./legacy-tick-clock.js";
