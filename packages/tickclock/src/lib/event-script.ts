import { z } from "zod";
import { existsSync, readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import type { EventClock } from "./ports/event-clock.js";
import { ClockSettingsSchema, formatIssues } from "./config.js";
import { invalidScript, scriptNotFound, unknownEventRef } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const EventStepSchema = z
  .object({
    event: z.string().min(1),
    actor: z.number().int(),
    parent: z.string().min(1).optional(),
    hint: z.string().optional(),
  })
  .strict();

const AdvanceStepSchema = z
  .object({
    // `advance: true` is shorthand for one tick
    advance: z.union([z.literal(true), z.number().int().min(1)]),
  })
  .strict();

const ResetStepSchema = z.object({ reset: z.literal(true) }).strict();

export const ScriptStepSchema = z.union([EventStepSchema, AdvanceStepSchema, ResetStepSchema]);

export const EventScriptSchema = z
  .object({
    clock: ClockSettingsSchema.optional(),
    steps: z.array(ScriptStepSchema),
  })
  .strict()
  .superRefine((script, ctx) => {
    const seen = new Set<string>();
    script.steps.forEach((step, index) => {
      if (!("event" in step)) return;
      if (seen.has(step.event)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["steps", index, "event"],
          message: `duplicate event label "${step.event}"`,
        });
      }
      seen.add(step.event);
    });
  });

export type ScriptStep = z.infer<typeof ScriptStepSchema>;
export type EventScript = z.infer<typeof EventScriptSchema>;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TraceEntry {
  /** 1-based position of the step in the script */
  step: number;
  label: string;
  actorId: number;
  hint: string;
  tick: number;
  parent?: number;
  timestamp: number;
  iso: string;
  /** Timestamp landed past the tick's last second (parent overflow) */
  spilled: boolean;
}

export interface TraceResult {
  entries: TraceEntry[];
  finalTick: number;
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/** Validate an already-parsed script document. */
export function parseEventScript(document: unknown, source = "<inline>"): EventScript {
  const result = EventScriptSchema.safeParse(document);
  if (!result.success) {
    throw invalidScript(source, formatIssues(result.error));
  }
  return result.data;
}

/**
 * Read a script from disk. YAML is a superset of JSON, so both load
 * through the same parser.
 */
export function loadEventScript(path: string): EventScript {
  if (!existsSync(path)) {
    throw scriptNotFound(path);
  }

  let document: unknown;
  try {
    document = parseYaml(readFileSync(path, "utf-8"));
  } catch (err) {
    throw invalidScript(path, [`invalid YAML: ${err instanceof Error ? err.message : String(err)}`]);
  }

  return parseEventScript(document ?? {}, path);
}

// ---------------------------------------------------------------------------
// Replay
// ---------------------------------------------------------------------------

/**
 * Replay a script against `clock`, in order. Labels defined before a
 * `reset` step stay resolvable as parents afterwards.
 */
export function runEventScript(script: EventScript, clock: EventClock): TraceResult {
  const timestamps = new Map<string, number>();
  const entries: TraceEntry[] = [];

  script.steps.forEach((step, index) => {
    const stepNumber = index + 1;

    if ("advance" in step) {
      clock.advance(step.advance === true ? 1 : step.advance);
      return;
    }
    if ("reset" in step) {
      clock.reset();
      return;
    }

    let parent: number | undefined;
    if (step.parent !== undefined) {
      parent = timestamps.get(step.parent);
      if (parent === undefined) {
        throw unknownEventRef(step.parent, stepNumber);
      }
    }

    const hint = step.hint ?? "";
    const [, tickEnd] = clock.tickRange();
    const timestamp = clock.synthesizeTimestamp(step.actor, parent, hint);
    timestamps.set(step.event, timestamp);

    entries.push({
      step: stepNumber,
      label: step.event,
      actorId: step.actor,
      hint,
      tick: clock.currentTick,
      ...(parent !== undefined && { parent }),
      timestamp,
      iso: clock.toIso(timestamp),
      spilled: timestamp > tickEnd,
    });
  });

  return { entries, finalTick: clock.currentTick };
}
