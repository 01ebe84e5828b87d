import type { PreviewPolicy } from "./core/preview-policy.js";

// ── Snapshot types (compiled, read-only graph description) ──

export type ParamSource = "agent" | "system" | "default";

export interface ToolParamSpec {
  name: string;
  source: ParamSource;
  required: boolean;
  default_value?: unknown;
  description?: string;
}

export interface CompiledTool {
  key: string;
  description?: string;
  provider_type?: string;
  params: ToolParamSpec[];
  metadata: Record<string, unknown>;
}

export interface CompiledAgent {
  key: string;
  display_name?: string;
  description?: string;
  allow_respond: boolean;
  is_default: boolean;
  equipped_tools: string[];
  allowed_routes: string[];
  prompt: string | null;
}

export interface RouteEdge {
  from: string;
  to: string;
}

export type PermissionErrorPolicy = "fail" | "report";

export interface RuntimePolicy {
  max_steps: number;
  max_tool_errors: number;
  tool_timeout_ms: number;
  on_permission_error: PermissionErrorPolicy;
}

export interface RespondConfig {
  payload_guidance?: string;
  payload_example?: unknown;
  payload_schema?: Record<string, unknown>;
}

export interface CompiledSnapshot {
  name?: string;
  version_id?: string | number;
  agents: CompiledAgent[];
  tools: CompiledTool[];
  routes: RouteEdge[];
  default_agent_key: string | null;
  policy: RuntimePolicy;
  respond?: RespondConfig;
  execution_log?: PreviewPolicy;
}

export interface PublishedSnapshot {
  snapshot: Readonly<CompiledSnapshot>;
  checksum: string;
  published_at: string;
  warnings: GraphViolation[];
}

// ── Validation ──

export type ValidationErrorKind =
  | "DefaultAgentUniqueness"
  | "RespondCapabilityExists"
  | "RouteReferentialIntegrity"
  | "Reachability"
  | "DuplicateKey"
  | "ToolReferentialIntegrity"
  | "DefaultAgentKeyMismatch"
  | "RouteAdjacencyMismatch"
  | "InvalidPolicy";

export type ValidationWarningKind = "TrappedCycle" | "UnreachableAgent";

export interface GraphViolation {
  kind: ValidationErrorKind | ValidationWarningKind;
  message: string;
  agents?: string[];
}

export type ValidationResult =
  | { ok: true; warnings: GraphViolation[] }
  | { ok: false; errors: GraphViolation[]; warnings: GraphViolation[] };

// ── Decisions ──

export type ActionType = "USE_TOOL" | "ROUTE_TO_AGENT" | "RESPOND";

export interface UseToolAction {
  type: "USE_TOOL";
  tool_key: string;
  arguments: Record<string, unknown>;
}

export interface RouteToAgentAction {
  type: "ROUTE_TO_AGENT";
  target_agent_key: string;
  context: Record<string, unknown>;
}

export interface RespondAction {
  type: "RESPOND";
  payload: unknown;
}

export type DecisionAction = UseToolAction | RouteToAgentAction | RespondAction;

export interface Decision {
  reasoning: string;
  action: DecisionAction;
}

export type ResolvedAction =
  | {
      type: "USE_TOOL";
      tool: CompiledTool;
      /** Agent-supplied and defaulted values */
      params: Record<string, unknown>;
      /** Values injected from the run's system parameters */
      system: Record<string, unknown>;
      /** Decision arguments that were dropped (system-sourced or undeclared) */
      ignored_params: string[];
    }
  | { type: "ROUTE_TO_AGENT"; target: CompiledAgent; context: Record<string, unknown> }
  | { type: "RESPOND"; payload: unknown };

// ── Logs ──

export type StepStatus = "ok" | "error";

interface LogEntryBase {
  step: number;
  epoch: number;
  agent_key: string;
  status: StepStatus;
  error?: string;
}

export interface AgentLogEntry extends LogEntryBase {
  kind: "agent";
  input_preview: string;
  decision: {
    action: ActionType | null;
    reasoning: string;
    details: string;
  };
}

export interface ToolLogEntry extends LogEntryBase {
  kind: "tool";
  tool_key: string;
  execution_id: string;
  reasoning: string;
  request_preview: string;
  response_preview: string;
  request_excerpt?: Record<string, string>;
  response_excerpt?: Record<string, string>;
  duration_ms: number;
}

export type ExecutionLogEntry = AgentLogEntry | ToolLogEntry;

export interface ToolExecutionRecord {
  execution_id: string;
  agent_key: string;
  tool_key: string;
  epoch: number;
  step: number;
  /** Full resolved request, system values included */
  request: Record<string, unknown>;
  /** Request keys that were system-injected and must stay out of prompts */
  redacted_keys: string[];
  result: unknown;
  status: StepStatus;
  error?: string;
  duration_ms: number;
  started_at: string;
  completed_at: string;
}

// ── Context ──

export interface ContextToolOutput {
  execution_id: string;
  tool_key: string;
  status: StepStatus;
  request: Record<string, unknown>;
  result: unknown;
  error?: string;
}

export interface PromptFragment {
  agent_key: string;
  display_name: string;
  base_prompt: string | null;
  tools: Array<{
    key: string;
    description?: string;
    params: Array<{ name: string; required: boolean; description?: string }>;
  }>;
  routes: Array<{ key: string; description?: string }>;
  allow_respond: boolean;
  respond?: RespondConfig;
}

export interface ContextPayload {
  agent_key: string;
  epoch: number | null;
  user_input: string;
  tool_outputs: ContextToolOutput[];
  log_summary: string[];
  prompt: PromptFragment;
}

// ── Collaborators ──

export interface DecisionRequest {
  run_id: string;
  step: number;
  epoch: number;
  agent_key: string;
  context: ContextPayload;
  prompt: string;
  signal: AbortSignal;
}

export interface DecisionProducer {
  name: string;
  /** Returns the raw decision object; it is validated before use. */
  decide(request: DecisionRequest): Promise<unknown>;
}

export interface ToolInvocation {
  run_id: string;
  execution_id: string;
  agent_key: string;
  tool: CompiledTool;
  params: Record<string, unknown>;
  system: Record<string, unknown>;
  signal: AbortSignal;
}

export type ToolOutcome =
  | { ok: true; result: unknown }
  | { ok: false; error: string; result?: unknown };

export interface ToolExecutor {
  execute(invocation: ToolInvocation): Promise<ToolOutcome>;
}

// ── Run ──

export type RunStatus = "running" | "done" | "failed";

export type RunErrorKind =
  | "ValidationError"
  | "PermissionError"
  | "GuardTripped"
  | "DecisionProducerError"
  | "Cancelled";

export interface RunError {
  kind: RunErrorKind;
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface DebugStep {
  step: number;
  agent_key: string;
  prompt: string;
  raw_decision: unknown;
}

export interface RunResult {
  run_id: string;
  status: Exclude<RunStatus, "running">;
  final_payload: unknown;
  execution_log: readonly ExecutionLogEntry[];
  tool_log_index: string[];
  error?: RunError;
  step: number;
  epoch: number;
  agent_key: string;
  debug?: {
    steps: DebugStep[];
    tool_log: ToolExecutionRecord[];
  };
}
