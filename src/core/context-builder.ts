import type { CompiledAgent, CompiledSnapshot, ContextPayload, ContextToolOutput, PromptFragment } from "../types.js";
import { PermissionError } from "./errors.js";
import type { ExecutionLog } from "./execution-log.js";
import { omitKeys, safeJsonStringify } from "./json-utils.js";
import { findAgent, findTool } from "./permission-enforcer.js";
import type { ToolLog } from "./tool-log.js";

export const DEFAULT_SUMMARY_WINDOW = 10;

export interface BuildContextInput {
  snapshot: CompiledSnapshot;
  agentKey: string;
  executionLog: ExecutionLog;
  toolLog: ToolLog;
  userInput: string;
  summaryWindow?: number;
}

export function agentBasePrompt(agent: CompiledAgent): string | null {
  const parts = [agent.description, agent.prompt].filter((p): p is string => typeof p === "string" && p.trim().length > 0);
  return parts.length > 0 ? parts.join("\n\n") : null;
}

export function buildPromptFragment(snapshot: CompiledSnapshot, agent: CompiledAgent): PromptFragment {
  const tools: PromptFragment["tools"] = [];
  for (const key of agent.equipped_tools) {
    const tool = findTool(snapshot, key);
    if (!tool) continue;
    tools.push({
      key: tool.key,
      description: tool.description,
      params: tool.params
        .filter((p) => p.source !== "system")
        .map((p) => ({ name: p.name, required: p.required && p.default_value === undefined, description: p.description })),
    });
  }

  const routes = agent.allowed_routes.flatMap((key) => {
    const target = findAgent(snapshot, key);
    return target ? [{ key, description: target.description }] : [];
  });

  const fragment: PromptFragment = {
    agent_key: agent.key,
    display_name: agent.display_name ?? agent.key,
    base_prompt: agentBasePrompt(agent),
    tools,
    routes,
    allow_respond: agent.allow_respond,
  };
  if (agent.allow_respond && snapshot.respond) fragment.respond = snapshot.respond;
  return fragment;
}

/**
 * Assembles what the current agent sees: tool outputs from its current
 * control epoch only, the recent log summary and its static prompt.
 */
export function buildContext(input: BuildContextInput): ContextPayload {
  const agent = findAgent(input.snapshot, input.agentKey);
  if (!agent) throw new PermissionError("UnknownAgent", input.agentKey, `Unknown agent "${input.agentKey}"`);

  const epoch = input.executionLog.latestEpochFor(agent.key);
  const toolOutputs: ContextToolOutput[] =
    epoch === null
      ? []
      : input.toolLog
          .collectFullFor(agent.key, epoch)
          .map((record) => {
            const out: ContextToolOutput = {
              execution_id: record.execution_id,
              tool_key: record.tool_key,
              status: record.status,
              request: omitKeys(record.request, record.redacted_keys),
              result: record.result,
            };
            if (record.error !== undefined) out.error = record.error;
            return out;
          })
          .reverse();

  return {
    agent_key: agent.key,
    epoch,
    user_input: input.userInput,
    tool_outputs: toolOutputs,
    log_summary: input.executionLog.summaryLines(input.summaryWindow ?? DEFAULT_SUMMARY_WINDOW),
    prompt: buildPromptFragment(input.snapshot, agent),
  };
}

function json(value: unknown): string {
  return safeJsonStringify(value) ?? "null";
}

function renderConstraints(fragment: PromptFragment): string[] {
  const lines = ["## Constraints"];
  if (fragment.tools.length > 0) {
    lines.push("Tools you may call:");
    for (const tool of fragment.tools) {
      const params = tool.params.map((p) => (p.required ? `${p.name}*` : p.name)).join(", ");
      lines.push(`- ${tool.key}(${params})${tool.description ? `: ${tool.description}` : ""}`);
    }
  } else {
    lines.push("Tools you may call: none");
  }

  if (fragment.routes.length > 0) {
    lines.push("Agents you may route to:");
    for (const route of fragment.routes) lines.push(`- ${route.key}${route.description ? `: ${route.description}` : ""}`);
  } else {
    lines.push("Agents you may route to: none");
  }

  lines.push(fragment.allow_respond ? "You may RESPOND with a final payload." : "You may not RESPOND.");
  if (fragment.respond?.payload_guidance) lines.push(`Payload guidance: ${fragment.respond.payload_guidance}`);
  if (fragment.respond?.payload_example !== undefined) lines.push(`Payload example: ${json(fragment.respond.payload_example)}`);
  if (fragment.respond?.payload_schema) lines.push(`Payload schema: ${json(fragment.respond.payload_schema)}`);
  lines.push(
    'Reply with one JSON decision: {"reasoning": string, "action": {"type": "USE_TOOL", "tool_key", "arguments"} | {"type": "ROUTE_TO_AGENT", "target_agent_key", "context"} | {"type": "RESPOND", "payload"}}',
  );
  return lines;
}

/** Text prompt for an LLM-backed decision producer: base prompt, context, then constraints. */
export function renderPrompt(payload: ContextPayload): string {
  const { prompt } = payload;
  const header = [`# Agent: ${prompt.display_name} (${prompt.agent_key})`];
  if (prompt.base_prompt) header.push(prompt.base_prompt);

  const context = ["## User input", payload.user_input, "", "## Tool outputs"];
  if (payload.tool_outputs.length === 0) {
    context.push("none");
  } else {
    for (const out of payload.tool_outputs) {
      context.push(`- ${out.tool_key} [${out.execution_id}] status=${out.status}`);
      context.push(`  request: ${json(out.request)}`);
      context.push(`  result: ${json(out.result)}`);
      if (out.error) context.push(`  error: ${out.error}`);
    }
  }
  context.push("", "## Recent steps");
  if (payload.log_summary.length === 0) context.push("none");
  else context.push(...payload.log_summary);

  return [header.join("\n"), context.join("\n"), renderConstraints(prompt).join("\n")].join("\n\n");
}
