import { nanoid } from "nanoid";
import type {
  CompiledSnapshot,
  DebugStep,
  DecisionProducer,
  ExecutionLogEntry,
  ResolvedAction,
  RunError,
  RunResult,
  RuntimePolicy,
  ToolExecutionRecord,
  ToolExecutor,
} from "../types.js";
import { mergePolicy } from "./config.js";
import { buildContext, renderPrompt, DEFAULT_SUMMARY_WINDOW } from "./context-builder.js";
import { describeAction, parseDecision } from "./decision.js";
import { PermissionError, errorMessage, toRelayError } from "./errors.js";
import { createExecutionLog, type ExecutionLog } from "./execution-log.js";
import { validateSnapshot } from "./graph-validator.js";
import { stringifyPreview } from "./preview-policy.js";
import { authorize, findAgent } from "./permission-enforcer.js";
import { createToolLog, type ToolLog } from "./tool-log.js";
import { createToolRegistry, executeWithTimeout } from "./tool-registry.js";

export interface RunLoopOpts {
  /** Produces one untrusted decision per step */
  decider: DecisionProducer;

  /** Tool collaborator (default: registry with only builtin:echo) */
  tools?: ToolExecutor;

  /** Overrides applied on top of the snapshot's policy */
  policy?: Partial<RuntimePolicy>;

  /** How many recent log entries the context summary shows (default: 10) */
  summaryWindow?: number;

  generateRunId?: () => string;
  generateExecutionId?: () => string;
  now?: () => Date;

  /** Keep each step's rendered prompt and raw decision on the result */
  debug?: boolean;

  onStep?: (entry: ExecutionLogEntry, runId: string) => void;
  onToolComplete?: (record: ToolExecutionRecord, runId: string) => void;
  onRunComplete?: (result: RunResult) => void;
  onRunFail?: (result: RunResult) => void;
}

export interface RunInput {
  snapshot: CompiledSnapshot;
  userInput?: string;
  /** Start here instead of the snapshot's default agent */
  startAgent?: string;
  systemParams?: Record<string, unknown>;
  signal?: AbortSignal;
}

interface RunState {
  runId: string;
  agentKey: string;
  step: number;
  epoch: number;
  toolFailures: number;
  executionLog: ExecutionLog;
  toolLog: ToolLog;
  debugSteps: DebugStep[];
}

export function createRunLoop(opts: RunLoopOpts) {
  const tools = opts.tools ?? createToolRegistry();
  const now = opts.now ?? (() => new Date());
  const generateRunId = opts.generateRunId ?? (() => `RUN-${nanoid(8)}`);
  const generateExecutionId = opts.generateExecutionId ?? (() => `EXE-${nanoid(10)}`);
  const summaryWindow = opts.summaryWindow ?? DEFAULT_SUMMARY_WINDOW;

  function callHook<A extends unknown[]>(name: string, hook: ((...args: A) => void) | undefined, ...args: A): void {
    if (!hook) return;
    try {
      hook(...args);
    } catch (err) {
      console.error(`[run-loop] ${name} hook failed:`, errorMessage(err));
    }
  }

  function result(state: RunState, status: RunResult["status"], finalPayload: unknown, error?: RunError): RunResult {
    const out: RunResult = {
      run_id: state.runId,
      status,
      final_payload: finalPayload,
      execution_log: state.executionLog.entries(),
      tool_log_index: state.toolLog.executionIds(),
      step: state.step,
      epoch: state.epoch,
      agent_key: state.agentKey,
    };
    if (error) out.error = error;
    if (opts.debug) out.debug = { steps: state.debugSteps, tool_log: state.toolLog.records() };
    return out;
  }

  function fail(state: RunState, error: RunError): RunResult {
    const res = result(state, "failed", null, error);
    callHook("onRunFail", opts.onRunFail, res);
    return res;
  }

  function permissionFailure(err: PermissionError): RunError {
    return { kind: "PermissionError", code: err.code, message: err.message, details: { agent_key: err.agentKey, ...err.details } };
  }

  async function run(input: RunInput): Promise<RunResult> {
    const { snapshot, signal } = input;
    const policy = mergePolicy(snapshot.policy, opts.policy);
    const userInput = input.userInput ?? "";
    const startKey = input.startAgent ?? snapshot.default_agent_key;

    const state: RunState = {
      runId: generateRunId(),
      agentKey: startKey ?? "",
      step: 0,
      epoch: 0,
      toolFailures: 0,
      executionLog: createExecutionLog({ previewPolicy: snapshot.execution_log }),
      toolLog: createToolLog(),
      debugSteps: [],
    };

    // Caller overrides are checked along with the snapshot's own policy.
    const validation = validateSnapshot({ ...snapshot, policy });
    if (!validation.ok) {
      return fail(state, {
        kind: "ValidationError",
        code: "SNAPSHOT_INVALID",
        message: `Snapshot is invalid: ${validation.errors.map((v) => `${v.kind}: ${v.message}`).join("; ")}`,
        details: { violations: validation.errors },
      });
    }

    if (startKey === null || !findAgent(snapshot, startKey)) {
      const message = startKey === null ? "Snapshot has no default agent" : `Unknown start agent "${startKey}"`;
      return fail(state, permissionFailure(new PermissionError("UnknownAgent", startKey ?? "", message)));
    }
    state.executionLog.markEpoch(state.agentKey, state.epoch);

    while (state.step < policy.max_steps) {
      if (signal?.aborted) return fail(state, cancelled(signal));

      const context = buildContext({
        snapshot,
        agentKey: state.agentKey,
        executionLog: state.executionLog,
        toolLog: state.toolLog,
        userInput,
        summaryWindow,
      });
      const prompt = renderPrompt(context);

      let raw: unknown;
      try {
        raw = await opts.decider.decide({
          run_id: state.runId,
          step: state.step,
          epoch: state.epoch,
          agent_key: state.agentKey,
          context,
          prompt,
          signal: signal ?? new AbortController().signal,
        });
      } catch (err) {
        if (signal?.aborted) return fail(state, cancelled(signal));
        const e = toRelayError(err, "DECISION_PRODUCER_FAILED");
        return fail(state, {
          kind: "DecisionProducerError",
          code: e.code,
          message: `Decision producer "${opts.decider.name}" failed at step ${state.step}: ${e.message}`,
          details: { ...e.details, agent_key: state.agentKey, step: state.step },
        });
      }
      if (opts.debug) state.debugSteps.push({ step: state.step, agent_key: state.agentKey, prompt, raw_decision: raw });
      if (signal?.aborted) return fail(state, cancelled(signal));

      const parsed = parseDecision(raw);
      const authorized = parsed.ok
        ? authorize(snapshot, state.agentKey, parsed.decision, { systemParams: input.systemParams })
        : { ok: false as const, error: new PermissionError("MalformedDecision", state.agentKey, parsed.error) };

      if (!authorized.ok) {
        const err = authorized.error;
        const entry = state.executionLog.appendAgentStep({
          step: state.step,
          epoch: state.epoch,
          agent_key: state.agentKey,
          status: "error",
          input: userInput,
          action: parsed.ok ? parsed.decision.action.type : null,
          reasoning: parsed.ok ? parsed.decision.reasoning : "",
          details: parsed.ok ? describeAction(parsed.decision.action) : stringifyPreview(raw),
          error: `${err.code}: ${err.message}`,
        });
        callHook("onStep", opts.onStep, entry, state.runId);
        state.step += 1;
        if (policy.on_permission_error === "fail") return fail(state, permissionFailure(err));
        continue;
      }

      const reasoning = parsed.ok ? parsed.decision.reasoning : "";
      const action: ResolvedAction = authorized.action;

      switch (action.type) {
        case "USE_TOOL": {
          const executionId = generateExecutionId();
          const startedAt = now();
          const settlement = await executeWithTimeout(
            tools,
            {
              run_id: state.runId,
              execution_id: executionId,
              agent_key: state.agentKey,
              tool: action.tool,
              params: action.params,
              system: action.system,
            },
            policy.tool_timeout_ms,
            signal,
          );
          if (settlement.kind === "cancelled") return fail(state, cancelled(signal));

          const completedAt = now();
          const { outcome } = settlement;
          const status = outcome.ok ? "ok" : "error";
          const record: ToolExecutionRecord = {
            execution_id: executionId,
            agent_key: state.agentKey,
            tool_key: action.tool.key,
            epoch: state.epoch,
            step: state.step,
            request: { ...action.params, ...action.system },
            redacted_keys: Object.keys(action.system),
            result: outcome.ok ? outcome.result : (outcome.result ?? null),
            status,
            duration_ms: Math.max(0, completedAt.getTime() - startedAt.getTime()),
            started_at: startedAt.toISOString(),
            completed_at: completedAt.toISOString(),
          };
          if (!outcome.ok) record.error = outcome.error;
          state.toolLog.put(record);

          const entry = state.executionLog.appendToolStep({
            step: state.step,
            epoch: state.epoch,
            agent_key: state.agentKey,
            status,
            tool_key: action.tool.key,
            execution_id: executionId,
            reasoning,
            request: action.params,
            response: outcome.ok ? outcome.result : { error: outcome.error },
            duration_ms: record.duration_ms,
            error: outcome.ok ? undefined : outcome.error,
          });
          callHook("onToolComplete", opts.onToolComplete, record, state.runId);
          callHook("onStep", opts.onStep, entry, state.runId);
          state.toolFailures = outcome.ok ? 0 : state.toolFailures + 1;
          break;
        }
        case "ROUTE_TO_AGENT": {
          const entry = state.executionLog.appendAgentStep({
            step: state.step,
            epoch: state.epoch,
            agent_key: state.agentKey,
            status: "ok",
            input: userInput,
            action: "ROUTE_TO_AGENT",
            reasoning,
            details: describeAction({ type: "ROUTE_TO_AGENT", target_agent_key: action.target.key, context: action.context }),
          });
          callHook("onStep", opts.onStep, entry, state.runId);
          if (action.target.key !== state.agentKey) {
            state.agentKey = action.target.key;
            state.epoch += 1;
            state.executionLog.markEpoch(state.agentKey, state.epoch);
          }
          break;
        }
        case "RESPOND": {
          const entry = state.executionLog.appendAgentStep({
            step: state.step,
            epoch: state.epoch,
            agent_key: state.agentKey,
            status: "ok",
            input: userInput,
            action: "RESPOND",
            reasoning,
            details: describeAction({ type: "RESPOND", payload: action.payload }),
          });
          callHook("onStep", opts.onStep, entry, state.runId);
          state.step += 1;
          const res = result(state, "done", action.payload);
          callHook("onRunComplete", opts.onRunComplete, res);
          return res;
        }
        default: {
          const unreachable: never = action;
          throw new Error(`Unhandled action ${JSON.stringify(unreachable)}`);
        }
      }

      state.step += 1;
      if (state.toolFailures >= policy.max_tool_errors) {
        return fail(state, {
          kind: "GuardTripped",
          code: "max_tool_errors",
          message: `${state.toolFailures} consecutive tool failures reached max_tool_errors=${policy.max_tool_errors}`,
          details: { reason: "max_tool_errors", consecutive_failures: state.toolFailures },
        });
      }
    }

    return fail(state, {
      kind: "GuardTripped",
      code: "max_steps",
      message: `Run reached max_steps=${policy.max_steps} without a response`,
      details: { reason: "max_steps", max_steps: policy.max_steps },
    });
  }

  return { run };
}

function cancelled(signal: AbortSignal | undefined): RunError {
  const reason: unknown = signal?.reason;
  return {
    kind: "Cancelled",
    code: "CANCELLED",
    message: "Run cancelled",
    details: reason === undefined ? undefined : { reason: reason instanceof Error ? reason.message : String(reason) },
  };
}

export async function runGraph(input: RunInput & RunLoopOpts): Promise<RunResult> {
  return createRunLoop(input).run(input);
}
