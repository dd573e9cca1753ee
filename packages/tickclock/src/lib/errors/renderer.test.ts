import { describe, it, expect, vi, afterEach, type MockInstance } from "vitest";
import { formatStaticError, renderError, renderUnknownError } from "./renderer.js";
import { ClockError } from "./types.js";
import { invalidConfig, unknownEventRef } from "./catalog.js";

// Mock chalk to avoid color codes in tests
vi.mock("chalk", () => {
  const plain = (s: string) => s;
  return {
    default: {
      red: Object.assign((s: string) => s, { bold: plain }),
      yellow: plain,
      cyan: plain,
      dim: plain,
    },
  };
});

describe("error renderer", () => {
  let consoleErrorSpy: MockInstance;

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("formatStaticError", () => {
    it("renders message only", () => {
      expect(formatStaticError(new ClockError("UNKNOWN_ERROR", "Something broke"))).toEqual([
        "",
        "✗ Something broke",
        "",
      ]);
    });

    it("renders details, suggestion and example blocks", () => {
      const error = invalidConfig("/etc/tickclock/config.yaml", ["clock.seed: Expected number", "logging: bad"]);

      expect(formatStaticError(error)).toEqual([
        "",
        "✗ Config file /etc/tickclock/config.yaml has errors",
        "",
        "  • clock.seed: Expected number",
        "  • logging: bad",
        "",
        "  → Fix the listed fields or print a fresh example",
        "",
        "  Try: tickclock config init",
        "",
      ]);
    });
  });

  describe("renderError", () => {
    it("prints static lines to stderr", () => {
      consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

      renderError(unknownEventRef("post", 3), "static");

      expect(consoleErrorSpy.mock.calls.map((call) => call[0])).toEqual([
        "",
        '✗ Step 3 refers to parent "post", which no earlier step defines',
        "",
        "  → Parents must be defined by an event step that runs before their children",
        "",
      ]);
    });

    it("prints a JSON envelope in json mode", () => {
      consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

      renderError(unknownEventRef("post", 3), "json");

      expect(JSON.parse(String(consoleErrorSpy.mock.calls[0][0]))).toEqual({
        success: false,
        error: {
          code: "SCRIPT_UNKNOWN_REF",
          message: 'Step 3 refers to parent "post", which no earlier step defines',
          suggestion: "Parents must be defined by an event step that runs before their children",
        },
      });
    });
  });

  describe("renderUnknownError", () => {
    it("wraps plain errors as UNKNOWN_ERROR", () => {
      consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

      renderUnknownError(new Error("disk full"), "json");

      expect(JSON.parse(String(consoleErrorSpy.mock.calls[0][0]))).toEqual({
        success: false,
        error: { code: "UNKNOWN_ERROR", message: "disk full" },
      });
    });

    it("stringifies thrown non-errors", () => {
      consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

      renderUnknownError("nope", "static");

      expect(consoleErrorSpy).toHaveBeenCalledWith("✗ nope");
    });
  });
});
