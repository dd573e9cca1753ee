/**
 * Wall-clock time, used only to stamp log lines.
 * Simulation time never reads this port.
 */
export interface Clock {
  /** Current instant as an ISO 8601 string */
  isoNow(): string;
}
