import { describe, it, expect, vi, afterEach } from "vitest";
import { getContext, initContext, isJsonMode, isQuietMode, resetContext } from "./cli-context.js";
import { maybeOutputJson } from "./json-output.js";
import { getOutputMode } from "./output/mode.js";

describe("cli-context", () => {
  afterEach(() => {
    resetContext();
    vi.restoreAllMocks();
  });

  it("defaults to human output", () => {
    initContext(["node", "tickclock", "range"], {});

    expect(getContext()).toEqual({ json: false, quiet: false });
    expect(getOutputMode()).toBe("static");
  });

  it("--json implies quiet", () => {
    initContext(["node", "tickclock", "range", "--json"], {});

    expect(isJsonMode()).toBe(true);
    expect(isQuietMode()).toBe(true);
    expect(getOutputMode()).toBe("json");
  });

  it("reads -q and --quiet", () => {
    initContext(["node", "tickclock", "-q"], {});
    expect(getContext()).toEqual({ json: false, quiet: true });

    initContext(["node", "tickclock", "--quiet"], {});
    expect(isQuietMode()).toBe(true);
  });

  it("reads the environment", () => {
    initContext(["node", "tickclock"], { TICKCLOCK_JSON: "1" });
    expect(isJsonMode()).toBe(true);

    initContext(["node", "tickclock"], { TICKCLOCK_QUIET: "true" });
    expect(getContext()).toEqual({ json: false, quiet: true });

    initContext(["node", "tickclock"], { TICKCLOCK_JSON: "0" });
    expect(isJsonMode()).toBe(false);
  });

  describe("maybeOutputJson", () => {
    it("prints and returns true in JSON mode", () => {
      const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
      initContext(["node", "tickclock", "--json"], {});

      expect(maybeOutputJson({ tick: 1 })).toBe(true);
      expect(logSpy).toHaveBeenCalledWith(JSON.stringify({ success: true, data: { tick: 1 } }, null, 2));
    });

    it("does nothing otherwise", () => {
      const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

      expect(maybeOutputJson({ tick: 1 })).toBe(false);
      expect(logSpy).not.toHaveBeenCalled();
    });
  });
});
