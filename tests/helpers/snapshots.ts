import type { CompiledAgent, CompiledSnapshot, CompiledTool, ToolParamSpec } from "../../src/types.js";
import { DEFAULT_POLICY } from "../../src/core/snapshot-schema.js";

export function agent(key: string, overrides: Partial<CompiledAgent> = {}): CompiledAgent {
  return {
    key,
    allow_respond: false,
    is_default: false,
    equipped_tools: [],
    allowed_routes: [],
    prompt: null,
    ...overrides,
  };
}

export function tool(key: string, params: ToolParamSpec[] = [], overrides: Partial<CompiledTool> = {}): CompiledTool {
  return { key, params, metadata: {}, ...overrides };
}

export function param(name: string, overrides: Partial<ToolParamSpec> = {}): ToolParamSpec {
  return { name, source: "agent", required: false, ...overrides };
}

/** Routes mirror `allowed_routes`; the default key is the first `is_default` agent. */
export function makeSnapshot(
  agents: CompiledAgent[],
  tools: CompiledTool[] = [],
  overrides: Partial<CompiledSnapshot> = {},
): CompiledSnapshot {
  return {
    agents,
    tools,
    routes: agents.flatMap((a) => a.allowed_routes.map((to) => ({ from: a.key, to }))),
    default_agent_key: agents.find((a) => a.is_default)?.key ?? null,
    policy: { ...DEFAULT_POLICY },
    ...overrides,
  };
}

/** triage (default) routes to writer (responds). */
export function triageWriter(overrides: Partial<CompiledSnapshot> = {}): CompiledSnapshot {
  return makeSnapshot(
    [
      agent("triage", { is_default: true, allowed_routes: ["writer"], description: "Sorts incoming requests" }),
      agent("writer", { allow_respond: true, description: "Writes the final answer" }),
    ],
    [],
    overrides,
  );
}

export const echoTool = tool("echo", [param("text", { required: true })], {
  provider_type: "builtin:echo",
  description: "Echoes its arguments",
});
