export type { Clock } from "./clock.js";
export type { EventClock, TickRange } from "./event-clock.js";
