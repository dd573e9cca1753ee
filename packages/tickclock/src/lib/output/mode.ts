import { isJsonMode } from "../cli-context.js";

/**
 * How results and errors are rendered.
 *
 * - `static`: coloured text for terminals and logs
 * - `json`: structured JSON for scripting
 */
export type OutputMode = "static" | "json";

export function getOutputMode(): OutputMode {
  return isJsonMode() ? "json" : "static";
}
