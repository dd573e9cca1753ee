import { describe, it, expect, vi, beforeEach } from "vitest";
import { cliOverrides, createClock, createRuntime } from "./runtime.js";

vi.mock("fs", () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

import { existsSync, readFileSync } from "fs";

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("runtime", () => {
  beforeEach(() => {
    vi.resetAllMocks();
    vi.mocked(existsSync).mockReturnValue(false);
  });

  describe("cliOverrides", () => {
    it("returns nothing for no flags", () => {
      expect(cliOverrides({})).toEqual({});
    });

    it("parses every clock and logging flag", () => {
      expect(
        cliOverrides({ seed: "-5", tickDuration: " 60 ", epoch: "2030-01-01", logLevel: "debug" })
      ).toEqual({
        seed: -5,
        tickDurationSeconds: 60,
        epoch: "2030-01-01",
        logLevel: "debug",
      });
    });

    it("rejects a non-integer seed", () => {
      expect(thrown(() => cliOverrides({ seed: "x" }))).toMatchObject({
        code: "VALIDATION_INVALID_OPTION",
        message: 'Invalid --seed: "x" is not an integer',
      });
    });

    it("rejects an unknown log level", () => {
      expect(thrown(() => cliOverrides({ logLevel: "loud" }))).toMatchObject({
        message: "Invalid --log-level: expected one of debug, info, warn, error",
      });
    });
  });

  describe("createRuntime", () => {
    it("combines config files with flags", () => {
      vi.mocked(existsSync).mockImplementation((path) => path === "/custom/tickclock.yaml");
      vi.mocked(readFileSync).mockReturnValue("clock:\n  seed: 3\n  tickDurationSeconds: 600\n");

      const runtime = createRuntime({ config: "/custom/tickclock.yaml", seed: "9" });

      expect(runtime.sources).toEqual(["/custom/tickclock.yaml"]);
      expect(runtime.config.seed).toBe(9);
      expect(runtime.config.tickDurationSeconds).toBe(600);
    });
  });

  describe("createClock", () => {
    it("builds a clock from resolved config", () => {
      const clock = createClock(createRuntime({ seed: "7", tickDuration: "60" }));

      expect(clock.seed).toBe(7);
      expect(clock.tickDurationSeconds).toBe(60);
      expect(clock.toIso(0)).toBe("2024-01-01 00:00:00");
    });

    it("lets per-script settings override resolved config", () => {
      const clock = createClock(createRuntime({ seed: "7" }), { seed: 1, epoch: "2025-03-01 12:00:00" });

      expect(clock.seed).toBe(1);
      expect(clock.tickDurationSeconds).toBe(86400);
      expect(clock.toIso(0)).toBe("2025-03-01 12:00:00");
    });
  });
});
