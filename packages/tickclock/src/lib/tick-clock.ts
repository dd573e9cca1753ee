import type { ActionHint } from "./action-type.js";
import type { EventClock, TickRange } from "./ports/event-clock.js";
import { createNoopLogger, type Logger } from "./logger.js";
import { addSeconds, DEFAULT_EPOCH, formatInstant, parseInstant, secondsBetween } from "./calendar.js";
import { createSeededSource, deriveEventSeed, randomInt } from "./seed-mix.js";
import { invalidAdvanceCount, invalidSeed, invalidTickDuration } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TickClockOptions {
  /** Virtual seconds per tick (positive integer) */
  tickDurationSeconds?: number;
  /** Calendar instant of virtual second 0; offset-less strings are UTC */
  epoch?: Date | string;
  /** Seed for every timestamp the clock derives */
  seed?: number;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const CLOCK_DEFAULTS = {
  tickDurationSeconds: 86400,
  seed: 42,
} as const;

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Deterministic simulation clock.
 *
 * Time moves only through {@link TickClock.advance}. Within a tick,
 * {@link TickClock.synthesizeTimestamp} hands out virtual-second
 * timestamps that are unique, reproducible for a given seed and call
 * order, and strictly after the causal parent when one is given.
 *
 * @example
 * const clock = new TickClock({ seed: 42 });
 * const post = clock.synthesizeTimestamp(1, null, "create_post");
 * const reply = clock.synthesizeTimestamp(2, post, "create_comment");
 * // reply > post
 * clock.advance();
 */
export class TickClock implements EventClock {
  private readonly durationSeconds: number;
  private readonly epochInstant: Date;
  private readonly baseSeed: number;
  protected readonly logger: Logger;

  protected tick = 0;
  // "<tick>:<actorId>" -> calls already served to that actor this tick
  private callCounter = new Map<string, number>();
  private usedByTick = new Map<number, Set<number>>();

  constructor(options: TickClockOptions = {}) {
    const tickDurationSeconds = options.tickDurationSeconds ?? CLOCK_DEFAULTS.tickDurationSeconds;
    if (!Number.isInteger(tickDurationSeconds) || tickDurationSeconds < 1) {
      throw invalidTickDuration(tickDurationSeconds);
    }
    const seed = options.seed ?? CLOCK_DEFAULTS.seed;
    if (!Number.isInteger(seed)) {
      throw invalidSeed(seed);
    }

    this.durationSeconds = tickDurationSeconds;
    this.baseSeed = seed;
    this.epochInstant = options.epoch === undefined ? new Date(DEFAULT_EPOCH.getTime()) : parseInstant(options.epoch);
    this.logger = (options.logger ?? createNoopLogger()).child({ component: "tick-clock" });
  }

  get tickDurationSeconds(): number {
    return this.durationSeconds;
  }

  get epoch(): Date {
    return new Date(this.epochInstant.getTime());
  }

  get seed(): number {
    return this.baseSeed;
  }

  get currentTick(): number {
    return this.tick;
  }

  // -------------------------------------------------------------------------
  // Advancement
  // -------------------------------------------------------------------------

  /**
   * Move forward `n` ticks. Per-tick call counters start over; the record
   * of timestamps already issued in earlier ticks is kept.
   */
  advance(n = 1): void {
    if (!Number.isInteger(n) || n < 1) {
      throw invalidAdvanceCount(n);
    }
    const from = this.tick;
    this.tick += n;
    this.callCounter.clear();
    this.logger.debug("Advanced tick", { from, to: this.tick });
  }

  // -------------------------------------------------------------------------
  // Introspection
  // -------------------------------------------------------------------------

  tickRange(): TickRange {
    const start = this.tick * this.durationSeconds;
    return [start, start + this.durationSeconds - 1];
  }

  /** Distinct timestamps recorded for `tick` (the current tick by default). */
  issuedCount(tick: number = this.tick): number {
    return this.usedByTick.get(tick)?.size ?? 0;
  }

  // -------------------------------------------------------------------------
  // Timestamp synthesis
  // -------------------------------------------------------------------------

  /**
   * Issue a timestamp for an event by `actorId` in the current tick.
   *
   * With a parent, the result is strictly greater than it. When the parent
   * sits at or past the end of the tick there is no room left, and the
   * result is `parent + 1` even though that lies outside the tick. If the
   * whole valid range is taken, the last probed value is reused.
   * Never throws.
   */
  synthesizeTimestamp(
    actorId: number,
    parentTimestamp?: number | null,
    actionHint: ActionHint = ""
  ): number {
    const [tickStart, tickEnd] = this.tickRange();
    const parent =
      parentTimestamp === undefined || parentTimestamp === null ? undefined : Math.floor(parentTimestamp);
    // Timestamps are never negative, even after a negative parent
    const minAllowed = parent === undefined ? tickStart : Math.max(parent + 1, 0);

    if (minAllowed > tickEnd) {
      this.logger.debug("Parent at tick boundary, spilling past tick end", {
        tick: this.tick,
        parent,
        timestamp: minAllowed,
      });
      return minAllowed;
    }

    const counterKey = `${this.tick}:${actorId}`;
    const callIndex = this.callCounter.get(counterKey) ?? 0;
    this.callCounter.set(counterKey, callIndex + 1);

    const source = createSeededSource(
      deriveEventSeed(this.baseSeed, this.tick, actorId, actionHint, callIndex)
    );
    let timestamp = randomInt(source, minAllowed, tickEnd);

    let used = this.usedByTick.get(this.tick);
    if (!used) {
      used = new Set();
      this.usedByTick.set(this.tick, used);
    }

    const maxAttempts = tickEnd - minAllowed + 1;
    let attempts = 0;
    while (used.has(timestamp) && attempts < maxAttempts) {
      timestamp = timestamp + 1 > tickEnd ? minAllowed : timestamp + 1;
      attempts++;
    }
    if (used.has(timestamp)) {
      this.logger.warn("No free timestamp left in range, reusing one", {
        tick: this.tick,
        actorId,
        minAllowed,
        timestamp,
      });
    }

    used.add(timestamp);
    return timestamp;
  }

  // -------------------------------------------------------------------------
  // Calendar conversion
  // -------------------------------------------------------------------------

  toCalendar(virtualSeconds: number): Date {
    return addSeconds(this.epochInstant, virtualSeconds);
  }

  /**
   * `YYYY-MM-DD HH:MM:SS`, UTC. Only defined while the instant stays
   * within `Date`'s range (about 273,790 years either side of 1970).
   */
  toIso(virtualSeconds: number): string {
    return formatInstant(this.toCalendar(virtualSeconds));
  }

  fromCalendar(instant: Date): number {
    return secondsBetween(this.epochInstant, instant);
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Back to tick 0 with no history. Every draw is seeded from the clock
   * seed and the call's identity, so a reset clock replays exactly like a
   * new one.
   */
  reset(): void {
    this.tick = 0;
    this.callCounter = new Map();
    this.usedByTick = new Map();
    this.logger.debug("Clock reset");
  }

  toString(): string {
    const [start, end] = this.tickRange();
    return `TickClock(tick=${this.tick}, tickDurationSeconds=${this.durationSeconds}, currentRange=[${start}, ${end}])`;
  }
}
