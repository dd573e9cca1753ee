import { TickClock } from "../tick-clock.js";
import { invalidTimeStep } from "../errors/catalog.js";

/**
 * Drop-in replacement for drivers written against the older step-counter
 * clock. Only the surface matches; the old wall-clock behaviour is gone.
 *
 * Setting `timeStep` jumps the tick directly. Unlike `advance()` it does
 * not reset per-tick call counters, so it can break replay determinism.
 */
export class LegacyTickClock extends TickClock {
  get timeStep(): number {
    return this.tick;
  }

  set timeStep(value: number) {
    if (!Number.isInteger(value) || value < 0) {
      throw invalidTimeStep(value);
    }
    this.logger.warn("timeStep set directly; advance() semantics bypassed", {
      from: this.tick,
      to: value,
    });
    this.tick = value;
  }

  getTimeStep(): string {
    return String(this.tick);
  }

  /**
   * Both arguments are ignored. Returns the calendar instant at the start
   * of the current tick.
   */
  timeTransfer(_nowTime: Date, _startTime: Date): Date {
    return this.toCalendar(this.tickRange()[0]);
  }
}
