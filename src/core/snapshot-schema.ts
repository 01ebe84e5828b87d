import { z, type ZodIssue } from "zod";
import type { CompiledAgent, CompiledSnapshot, CompiledTool, RouteEdge, ToolParamSpec } from "../types.js";
import { SnapshotLoadError } from "./errors.js";
import { PreviewPolicySchema } from "./preview-policy.js";

export const DEFAULT_POLICY = {
  max_steps: 10,
  max_tool_errors: 3,
  tool_timeout_ms: 30_000,
  on_permission_error: "fail",
} as const;

const KeySchema = z.string().trim().min(1);

export const ParamSourceSchema = z.enum(["agent", "system", "default"]);

export const ToolParamSchema = z.object({
  name: KeySchema,
  source: ParamSourceSchema.default("agent"),
  required: z.boolean().default(false),
  default_value: z.unknown().optional(),
  description: z.string().optional(),
});

// Map form: `params_schema: { query: { required: true } }`
const ParamsSchemaEntry = z.object({
  source: ParamSourceSchema.default("agent"),
  required: z.boolean().default(false),
  default: z.unknown().optional(),
  default_value: z.unknown().optional(),
  description: z.string().optional(),
});

export const ToolSchema = z.object({
  key: KeySchema,
  description: z.string().optional(),
  provider_type: z.string().min(1).optional(),
  params: z.array(ToolParamSchema).optional(),
  params_schema: z.record(z.string(), ParamsSchemaEntry).optional(),
  metadata: z.record(z.string(), z.unknown()).default({}),
});

export const AgentSchema = z.object({
  key: KeySchema,
  display_name: z.string().optional(),
  description: z.string().optional(),
  allow_respond: z.boolean().default(false),
  is_default: z.boolean().default(false),
  equipped_tools: z.array(KeySchema).default([]),
  allowed_routes: z.array(KeySchema).optional(),
  prompt: z.string().nullable().default(null),
});

export const RouteSchema = z.union([
  z.object({ from: KeySchema, to: KeySchema }),
  z.tuple([KeySchema, KeySchema]).transform(([from, to]) => ({ from, to })),
]);

export const PolicySchema = z.object({
  max_steps: z.number().int().default(DEFAULT_POLICY.max_steps),
  max_tool_errors: z.number().int().default(DEFAULT_POLICY.max_tool_errors),
  tool_timeout_ms: z.number().default(DEFAULT_POLICY.tool_timeout_ms),
  on_permission_error: z.enum(["fail", "report"]).default(DEFAULT_POLICY.on_permission_error),
});

export const RespondSchema = z.object({
  payload_guidance: z.string().optional(),
  payload_example: z.unknown().optional(),
  payload_schema: z.record(z.string(), z.unknown()).optional(),
});

export const SnapshotSchema = z.object({
  name: z.string().optional(),
  version_id: z.union([z.string(), z.number()]).optional(),
  agents: z.array(AgentSchema).min(1),
  tools: z.array(ToolSchema).default([]),
  routes: z.array(RouteSchema).optional(),
  default_agent_key: KeySchema.nullable().optional(),
  policy: PolicySchema.default({}),
  respond: RespondSchema.optional(),
  execution_log: PreviewPolicySchema.optional(),
});

export type RawSnapshot = z.infer<typeof SnapshotSchema>;

export function formatIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

function normalizeTool(raw: z.infer<typeof ToolSchema>): CompiledTool {
  const params: ToolParamSpec[] = [...(raw.params ?? [])];
  const seen = new Set(params.map((p) => p.name));
  for (const [name, entry] of Object.entries(raw.params_schema ?? {})) {
    if (seen.has(name)) continue;
    const param: ToolParamSpec = { name, source: entry.source, required: entry.required };
    const defaultValue = entry.default_value !== undefined ? entry.default_value : entry.default;
    if (defaultValue !== undefined) param.default_value = defaultValue;
    if (entry.description !== undefined) param.description = entry.description;
    params.push(param);
  }

  const tool: CompiledTool = { key: raw.key, params, metadata: raw.metadata };
  if (raw.description !== undefined) tool.description = raw.description;
  if (raw.provider_type !== undefined) tool.provider_type = raw.provider_type;
  return tool;
}

function dedupe(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Fills in what a hand-written snapshot may leave out: the route list from
 * `allowed_routes` (or the reverse) and `default_agent_key` from the
 * `is_default` flag. Explicit values are kept as written.
 */
export function normalizeSnapshot(raw: RawSnapshot): CompiledSnapshot {
  const explicitRoutes: RouteEdge[] | undefined = raw.routes?.map((r) => ({ from: r.from, to: r.to }));

  const agents: CompiledAgent[] = raw.agents.map((a) => {
    const allowed = a.allowed_routes ?? dedupe((explicitRoutes ?? []).filter((r) => r.from === a.key).map((r) => r.to));
    const agent: CompiledAgent = {
      key: a.key,
      allow_respond: a.allow_respond,
      is_default: a.is_default,
      equipped_tools: a.equipped_tools,
      allowed_routes: allowed,
      prompt: a.prompt,
    };
    if (a.display_name !== undefined) agent.display_name = a.display_name;
    if (a.description !== undefined) agent.description = a.description;
    return agent;
  });

  const routes = explicitRoutes ?? agents.flatMap((a) => a.allowed_routes.map((to) => ({ from: a.key, to })));

  const defaultAgentKey =
    raw.default_agent_key !== undefined ? raw.default_agent_key : (agents.find((a) => a.is_default)?.key ?? null);

  const snapshot: CompiledSnapshot = {
    agents,
    tools: raw.tools.map(normalizeTool),
    routes,
    default_agent_key: defaultAgentKey,
    policy: raw.policy,
  };
  if (raw.name !== undefined) snapshot.name = raw.name;
  if (raw.version_id !== undefined) snapshot.version_id = raw.version_id;
  if (raw.respond !== undefined) snapshot.respond = raw.respond;
  if (raw.execution_log !== undefined) snapshot.execution_log = raw.execution_log;
  return snapshot;
}

export function parseSnapshot(input: unknown, source = "snapshot"): CompiledSnapshot {
  const parsed = SnapshotSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error.issues);
    throw new SnapshotLoadError(`${source}: invalid snapshot (${issues.join("; ")})`, { issues });
  }
  return normalizeSnapshot(parsed.data);
}
