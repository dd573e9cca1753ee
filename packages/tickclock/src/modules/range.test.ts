import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";
import { computeRange, registerRangeCommand } from "./range.js";
import { initContext, resetContext } from "../lib/cli-context.js";

// No config files on disk
vi.mock("fs", () => ({
  existsSync: vi.fn(() => false),
  readFileSync: vi.fn(),
}));

vi.mock("chalk", () => {
  const plain = (s: string) => s;
  return {
    default: {
      red: Object.assign((s: string) => s, { bold: plain }),
      yellow: plain,
      cyan: plain,
      gray: plain,
      dim: plain,
      bold: plain,
    },
  };
});

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("range", () => {
  describe("computeRange", () => {
    it("covers the first day at tick 0", () => {
      expect(computeRange("0", {})).toEqual({
        tick: 0,
        start: 0,
        end: 86399,
        startIso: "2024-01-01 00:00:00",
        endIso: "2024-01-01 23:59:59",
      });
    });

    it("advances to the requested tick", () => {
      expect(computeRange("2", {})).toEqual({
        tick: 2,
        start: 172800,
        end: 259199,
        startIso: "2024-01-03 00:00:00",
        endIso: "2024-01-03 23:59:59",
      });
    });

    it("honours --tick-duration and --epoch", () => {
      expect(computeRange("3", { tickDuration: "60", epoch: "2030-06-01" })).toEqual({
        tick: 3,
        start: 180,
        end: 239,
        startIso: "2030-06-01 00:03:00",
        endIso: "2030-06-01 00:03:59",
      });
    });

    it.each(["-1", "1.5", "abc", ""])("rejects tick %j", (tick) => {
      expect(thrown(() => computeRange(tick, {}))).toMatchObject({ code: "VALIDATION_INVALID_OPTION" });
    });

    it("rejects a zero --tick-duration", () => {
      expect(thrown(() => computeRange("0", { tickDuration: "0" }))).toMatchObject({
        code: "VALIDATION_INVALID_OPTION",
        message: "Invalid --tick-duration: must be at least 1",
      });
    });
  });

  describe("command", () => {
    let program: Command;
    let consoleLogSpy: MockInstance;
    let consoleErrorSpy: MockInstance;

    beforeEach(() => {
      program = new Command();
      program.exitOverride();
      registerRangeCommand(program);
      consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
      consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
      resetContext();
      process.exitCode = undefined;
    });

    afterEach(() => {
      vi.restoreAllMocks();
      resetContext();
      process.exitCode = undefined;
    });

    it("prints the range and its calendar span", async () => {
      await program.parseAsync(["node", "test", "range", "--tick", "1"]);

      expect(consoleLogSpy.mock.calls).toEqual([
        ["Tick 1: [86400, 172799]"],
        ["2024-01-02 00:00:00 → 2024-01-02 23:59:59"],
      ]);
    });

    it("prints JSON in JSON mode", async () => {
      initContext(["node", "test", "--json"], {});

      await program.parseAsync(["node", "test", "range"]);

      expect(JSON.parse(String(consoleLogSpy.mock.calls[0][0]))).toEqual({
        success: true,
        data: {
          tick: 0,
          start: 0,
          end: 86399,
          startIso: "2024-01-01 00:00:00",
          endIso: "2024-01-01 23:59:59",
        },
      });
    });

    it("renders errors and sets the exit code", async () => {
      await program.parseAsync(["node", "test", "range", "-t", "-2"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith('✗ Invalid --tick: "-2" is not a non-negative integer');
      expect(process.exitCode).toBe(1);
    });
  });
});
