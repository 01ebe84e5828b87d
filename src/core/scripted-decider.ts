import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { DecisionProducer, DecisionRequest } from "../types.js";
import { RelayError, errorMessage } from "./errors.js";
import { isRecord } from "./json-utils.js";
import { parseYamlWithDiagnostics } from "./yaml-utils.js";

export interface ScriptedDecider extends DecisionProducer {
  readonly requests: DecisionRequest[];
  remaining(): number;
}

/** Replays decisions in order, one per call. Running out is an error. */
export function createScriptedDecider(decisions: readonly unknown[]): ScriptedDecider {
  const queue = [...decisions];
  const requests: DecisionRequest[] = [];
  let cursor = 0;

  return {
    name: "scripted",
    requests,
    remaining() {
      return queue.length - cursor;
    },
    async decide(request) {
      requests.push(request);
      if (cursor >= queue.length) {
        throw new RelayError(`Scripted decider has no decision left for step ${request.step}`, "SCRIPT_EXHAUSTED", {
          provided: queue.length,
        });
      }
      return queue[cursor++];
    },
  };
}

/** Reads a decisions file: a list, or `{ decisions: [...] }`, in YAML or JSON. */
export function loadDecisionsFile(input: string): unknown[] {
  const path = resolve(process.cwd(), input);
  if (!existsSync(path)) throw new RelayError(`Decisions file not found: ${input}`, "DECISIONS_LOAD_FAILED", { path });

  let raw: unknown;
  try {
    raw = parseYamlWithDiagnostics(readFileSync(path, "utf-8"), path);
  } catch (err) {
    throw new RelayError(errorMessage(err), "DECISIONS_LOAD_FAILED", { path });
  }

  if (Array.isArray(raw)) return raw;
  if (isRecord(raw) && Array.isArray(raw.decisions)) return raw.decisions;
  throw new RelayError(`${path}: expected a list of decisions or { decisions: [...] }`, "DECISIONS_LOAD_FAILED", { path });
}
