// relaygraph: run graphs of decision-driven agents under a compiled permission graph.
// Public API for programmatic usage

export { validateSnapshot } from "./core/graph-validator.js";
export { parseSnapshot, normalizeSnapshot, SnapshotSchema, DEFAULT_POLICY } from "./core/snapshot-schema.js";
export {
  serializeSnapshot,
  snapshotChecksum,
  publishSnapshot,
  createSnapshotCatalog,
  loadSnapshotFile,
} from "./core/snapshot.js";
export type { SnapshotCatalog, PublishOutcome, SnapshotFormat } from "./core/snapshot.js";
export { parseDecision } from "./core/decision.js";
export { authorize } from "./core/permission-enforcer.js";
export type { AuthorizeResult, AuthorizeOptions } from "./core/permission-enforcer.js";
export { createExecutionLog } from "./core/execution-log.js";
export type { ExecutionLog } from "./core/execution-log.js";
export { createToolLog } from "./core/tool-log.js";
export type { ToolLog } from "./core/tool-log.js";
export { buildContext, renderPrompt } from "./core/context-builder.js";
export { buildToolPreviews, PreviewPolicySchema, truncate } from "./core/preview-policy.js";
export type { PreviewPolicy } from "./core/preview-policy.js";
export { createToolRegistry, executeWithTimeout, ECHO_PROVIDER } from "./core/tool-registry.js";
export type { ToolRegistry, ToolHandler } from "./core/tool-registry.js";
export { createScriptedDecider, loadDecisionsFile } from "./core/scripted-decider.js";
export { createRunLoop, runGraph } from "./core/run-loop.js";
export type { RunLoopOpts, RunInput } from "./core/run-loop.js";
export { loadConfig, mergeSystemParams, mergePolicy } from "./core/config.js";
export type { RelayConfig } from "./core/config.js";
export {
  RelayError,
  SnapshotValidationError,
  SnapshotLoadError,
  PermissionError,
  toRelayError,
} from "./core/errors.js";
export type { PermissionErrorCode } from "./core/errors.js";

export type {
  CompiledSnapshot,
  CompiledAgent,
  CompiledTool,
  ToolParamSpec,
  RouteEdge,
  RuntimePolicy,
  PublishedSnapshot,
  ValidationResult,
  GraphViolation,
  Decision,
  DecisionAction,
  ResolvedAction,
  ExecutionLogEntry,
  AgentLogEntry,
  ToolLogEntry,
  ToolExecutionRecord,
  ContextPayload,
  DecisionProducer,
  DecisionRequest,
  ToolExecutor,
  ToolInvocation,
  ToolOutcome,
  RunResult,
  RunError,
} from "./types.js";
