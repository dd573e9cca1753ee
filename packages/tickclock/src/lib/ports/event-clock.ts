import type { ActionHint } from "../action-type.js";

/** Inclusive virtual-second bounds of one tick. */
export type TickRange = readonly [start: number, end: number];

/**
 * What a simulation driver needs from a tick clock.
 * Implemented by TickClock; drivers and tests depend on this instead.
 */
export interface EventClock {
  readonly currentTick: number;
  advance(n?: number): void;
  tickRange(): TickRange;
  synthesizeTimestamp(
    actorId: number,
    parentTimestamp?: number | null,
    actionHint?: ActionHint
  ): number;
  toCalendar(virtualSeconds: number): Date;
  toIso(virtualSeconds: number): string;
  fromCalendar(instant: Date): number;
  reset(): void;
}
