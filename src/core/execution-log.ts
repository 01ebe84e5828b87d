import type { ActionType, AgentLogEntry, ExecutionLogEntry, StepStatus, ToolLogEntry } from "../types.js";
import { RelayError } from "./errors.js";
import { buildToolPreviews, truncate, type PreviewPolicy } from "./preview-policy.js";

export const REASONING_PREVIEW_LIMIT = 120;
export const DETAILS_PREVIEW_LIMIT = 120;
export const INPUT_PREVIEW_LIMIT = 80;
export const ERROR_PREVIEW_LIMIT = 120;

export interface AgentStepInput {
  step: number;
  epoch: number;
  agent_key: string;
  status: StepStatus;
  input: string;
  action: ActionType | null;
  reasoning: string;
  details: string;
  error?: string;
}

export interface ToolStepInput {
  step: number;
  epoch: number;
  agent_key: string;
  status: StepStatus;
  tool_key: string;
  execution_id: string;
  reasoning: string;
  request: unknown;
  response: unknown;
  duration_ms: number;
  error?: string;
}

export interface ExecutionLog {
  appendAgentStep(input: AgentStepInput): AgentLogEntry;
  appendToolStep(input: ToolStepInput): ToolLogEntry;
  entries(): readonly ExecutionLogEntry[];
  latestEpochFor(agentKey: string): number | null;
  markEpoch(agentKey: string, epoch: number): void;
  summaryLines(window: number): string[];
  readonly size: number;
}

export function summarizeEntry(entry: ExecutionLogEntry): string {
  if (entry.kind === "tool") {
    const line = `step ${entry.step}: tool ${entry.tool_key} status=${entry.status}`;
    return entry.error ? `${line} error=${entry.error}` : line;
  }
  const line = `step ${entry.step}: agent ${entry.agent_key} → ${entry.decision.action ?? "INVALID"}`;
  return entry.error ? `${line} error=${entry.error}` : line;
}

/**
 * Append-only, per-run summary log. Entries are frozen and bounded; the full
 * tool payloads live in the tool log.
 */
export function createExecutionLog(opts: { previewPolicy?: PreviewPolicy } = {}): ExecutionLog {
  const log: ExecutionLogEntry[] = [];
  const epochs = new Map<string, number>();

  function checkOrder(step: number): void {
    const last = log[log.length - 1];
    if (last && step <= last.step) {
      throw new RelayError(`Execution log step ${step} does not follow step ${last.step}`, "LOG_ORDER");
    }
  }

  function push<T extends ExecutionLogEntry>(entry: T): T {
    Object.freeze(entry);
    log.push(entry);
    const known = epochs.get(entry.agent_key);
    if (known === undefined || known < entry.epoch) epochs.set(entry.agent_key, entry.epoch);
    return entry;
  }

  return {
    appendAgentStep(input) {
      checkOrder(input.step);
      const entry: AgentLogEntry = {
        kind: "agent",
        step: input.step,
        epoch: input.epoch,
        agent_key: input.agent_key,
        status: input.status,
        input_preview: truncate(input.input, INPUT_PREVIEW_LIMIT),
        decision: Object.freeze({
          action: input.action,
          reasoning: truncate(input.reasoning, REASONING_PREVIEW_LIMIT),
          details: truncate(input.details, DETAILS_PREVIEW_LIMIT),
        }),
      };
      if (input.error !== undefined) entry.error = truncate(input.error, ERROR_PREVIEW_LIMIT);
      return push(entry);
    },

    appendToolStep(input) {
      checkOrder(input.step);
      const previews = buildToolPreviews(opts.previewPolicy, input.tool_key, input.request, input.response);
      const entry: ToolLogEntry = {
        kind: "tool",
        step: input.step,
        epoch: input.epoch,
        agent_key: input.agent_key,
        status: input.status,
        tool_key: input.tool_key,
        execution_id: input.execution_id,
        reasoning: truncate(input.reasoning, REASONING_PREVIEW_LIMIT),
        request_preview: previews.request_preview,
        response_preview: previews.response_preview,
        duration_ms: input.duration_ms,
      };
      if (previews.request_excerpt) entry.request_excerpt = Object.freeze(previews.request_excerpt);
      if (previews.response_excerpt) entry.response_excerpt = Object.freeze(previews.response_excerpt);
      if (input.error !== undefined) entry.error = truncate(input.error, ERROR_PREVIEW_LIMIT);
      return push(entry);
    },

    entries() {
      return Object.freeze([...log]);
    },

    latestEpochFor(agentKey) {
      return epochs.get(agentKey) ?? null;
    },

    markEpoch(agentKey, epoch) {
      epochs.set(agentKey, epoch);
    },

    summaryLines(window) {
      const slice = window > 0 ? log.slice(-window) : [];
      return slice.map(summarizeEntry);
    },

    get size() {
      return log.length;
    },
  };
}
