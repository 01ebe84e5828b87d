import type { CompiledAgent, CompiledSnapshot, CompiledTool, Decision, ResolvedAction } from "../types.js";
import { PermissionError } from "./errors.js";
import { didYouMean } from "./graph-helpers.js";

export interface AuthorizeOptions {
  systemParams?: Record<string, unknown>;
}

export type AuthorizeResult = { ok: true; action: ResolvedAction } | { ok: false; error: PermissionError };

export function findAgent(snapshot: CompiledSnapshot, key: string): CompiledAgent | undefined {
  return snapshot.agents.find((a) => a.key === key);
}

export function findTool(snapshot: CompiledSnapshot, key: string): CompiledTool | undefined {
  return snapshot.tools.find((t) => t.key === key);
}

function has(obj: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key) && obj[key] !== undefined;
}

function resolveToolParams(
  agentKey: string,
  tool: CompiledTool,
  args: Record<string, unknown>,
  systemParams: Record<string, unknown>,
): AuthorizeResult {
  const params: Record<string, unknown> = {};
  const system: Record<string, unknown> = {};
  const ignored: string[] = [];
  const declared = new Set(tool.params.map((p) => p.name));

  for (const param of tool.params) {
    const hasDefault = param.default_value !== undefined;
    switch (param.source) {
      case "agent":
      case "default":
        if (has(args, param.name)) {
          params[param.name] = args[param.name];
        } else if (hasDefault) {
          params[param.name] = param.default_value;
        } else if (param.required) {
          return {
            ok: false,
            error: new PermissionError("MissingParameter", agentKey, `Tool "${tool.key}" requires parameter "${param.name}"`, {
              tool_key: tool.key,
              param: param.name,
            }),
          };
        }
        break;
      case "system":
        if (has(args, param.name)) ignored.push(param.name);
        if (has(systemParams, param.name)) {
          system[param.name] = systemParams[param.name];
        } else if (hasDefault) {
          system[param.name] = param.default_value;
        } else if (param.required) {
          return {
            ok: false,
            error: new PermissionError(
              "MissingSystemParameter",
              agentKey,
              `Tool "${tool.key}" requires system parameter "${param.name}", which the run did not supply`,
              { tool_key: tool.key, param: param.name },
            ),
          };
        }
        break;
    }
  }

  for (const name of Object.keys(args)) {
    if (!declared.has(name)) ignored.push(name);
  }

  return { ok: true, action: { type: "USE_TOOL", tool, params, system, ignored_params: ignored } };
}

/**
 * Checks a parsed decision against the agent's permissions and resolves tool
 * parameters. System-sourced values come only from `systemParams`.
 */
export function authorize(
  snapshot: CompiledSnapshot,
  agentKey: string,
  decision: Decision,
  opts: AuthorizeOptions = {},
): AuthorizeResult {
  const agent = findAgent(snapshot, agentKey);
  if (!agent) {
    return {
      ok: false,
      error: new PermissionError("UnknownAgent", agentKey, `Unknown agent "${agentKey}"${didYouMean(agentKey, snapshot.agents.map((a) => a.key))}`),
    };
  }

  const { action } = decision;
  switch (action.type) {
    case "USE_TOOL": {
      if (!agent.equipped_tools.includes(action.tool_key)) {
        return {
          ok: false,
          error: new PermissionError(
            "UnauthorizedTool",
            agentKey,
            `Agent "${agentKey}" is not equipped with tool "${action.tool_key}"${didYouMean(action.tool_key, agent.equipped_tools)}`,
            { tool_key: action.tool_key },
          ),
        };
      }
      const tool = findTool(snapshot, action.tool_key);
      if (!tool) {
        return {
          ok: false,
          error: new PermissionError("UnknownTool", agentKey, `Tool "${action.tool_key}" is not declared in the snapshot`, {
            tool_key: action.tool_key,
          }),
        };
      }
      return resolveToolParams(agentKey, tool, action.arguments, opts.systemParams ?? {});
    }
    case "ROUTE_TO_AGENT": {
      const target = agent.allowed_routes.includes(action.target_agent_key)
        ? findAgent(snapshot, action.target_agent_key)
        : undefined;
      if (!target) {
        return {
          ok: false,
          error: new PermissionError(
            "UnauthorizedRoute",
            agentKey,
            `Agent "${agentKey}" may not route to "${action.target_agent_key}"${didYouMean(action.target_agent_key, agent.allowed_routes)}`,
            { target_agent_key: action.target_agent_key },
          ),
        };
      }
      return { ok: true, action: { type: "ROUTE_TO_AGENT", target, context: action.context } };
    }
    case "RESPOND":
      if (!agent.allow_respond) {
        return {
          ok: false,
          error: new PermissionError("RespondNotAllowed", agentKey, `Agent "${agentKey}" is not allowed to respond`),
        };
      }
      return { ok: true, action: { type: "RESPOND", payload: action.payload } };
    default: {
      const unreachable: never = action;
      throw new Error(`Unhandled action ${JSON.stringify(unreachable)}`);
    }
  }
}
