import type { CompiledSnapshot, GraphViolation, ValidationResult } from "../types.js";
import { buildAdjacency, didYouMean, isOnCycle, reachableFrom } from "./graph-helpers.js";

function duplicates(keys: string[]): string[] {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const k of keys) {
    if (seen.has(k)) dupes.add(k);
    seen.add(k);
  }
  return [...dupes];
}

function edgeId(from: string, to: string): string {
  return `${from} → ${to}`;
}

/**
 * Checks a compiled snapshot before it may be published. Every check runs;
 * warnings never make the result fail.
 */
export function validateSnapshot(snapshot: CompiledSnapshot): ValidationResult {
  const errors: GraphViolation[] = [];
  const warnings: GraphViolation[] = [];
  const agentKeys = snapshot.agents.map((a) => a.key);
  const agentSet = new Set(agentKeys);
  const toolKeys = snapshot.tools.map((t) => t.key);
  const toolSet = new Set(toolKeys);

  const dupAgents = duplicates(agentKeys);
  if (dupAgents.length > 0) {
    errors.push({ kind: "DuplicateKey", message: `Duplicate agent key(s): ${dupAgents.join(", ")}`, agents: dupAgents });
  }
  const dupTools = duplicates(toolKeys);
  if (dupTools.length > 0) {
    errors.push({ kind: "DuplicateKey", message: `Duplicate tool key(s): ${dupTools.join(", ")}` });
  }

  const defaults = snapshot.agents.filter((a) => a.is_default).map((a) => a.key);
  if (defaults.length !== 1) {
    errors.push({
      kind: "DefaultAgentUniqueness",
      message:
        defaults.length === 0
          ? "No agent is marked is_default; exactly one is required"
          : `Exactly one default agent is required, found ${defaults.length}: ${defaults.join(", ")}`,
      agents: defaults,
    });
  }

  const responders = snapshot.agents.filter((a) => a.allow_respond).map((a) => a.key);
  if (responders.length === 0) {
    errors.push({ kind: "RespondCapabilityExists", message: "No agent has allow_respond; the graph can never finish" });
  }

  const defaultKey = snapshot.default_agent_key;
  if (defaultKey !== null) {
    if (!agentSet.has(defaultKey)) {
      errors.push({
        kind: "DefaultAgentKeyMismatch",
        message: `default_agent_key "${defaultKey}" is not an agent${didYouMean(defaultKey, agentKeys)}`,
        agents: [defaultKey],
      });
    } else if (!defaults.includes(defaultKey)) {
      errors.push({
        kind: "DefaultAgentKeyMismatch",
        message: `default_agent_key "${defaultKey}" is not the agent flagged is_default`,
        agents: [defaultKey, ...defaults],
      });
    }
  } else if (defaults.length === 1) {
    errors.push({
      kind: "DefaultAgentKeyMismatch",
      message: `default_agent_key is empty but "${defaults[0]}" is flagged is_default`,
      agents: defaults,
    });
  }

  for (const edge of snapshot.routes) {
    for (const endpoint of [edge.from, edge.to]) {
      if (agentSet.has(endpoint)) continue;
      errors.push({
        kind: "RouteReferentialIntegrity",
        message: `Route ${edgeId(edge.from, edge.to)}: unknown agent "${endpoint}"${didYouMean(endpoint, agentKeys)}`,
        agents: [edge.from, edge.to],
      });
    }
  }
  for (const agent of snapshot.agents) {
    for (const target of agent.allowed_routes) {
      if (agentSet.has(target)) continue;
      errors.push({
        kind: "RouteReferentialIntegrity",
        message: `Agent "${agent.key}" allows a route to unknown agent "${target}"${didYouMean(target, agentKeys)}`,
        agents: [agent.key, target],
      });
    }
    for (const tool of agent.equipped_tools) {
      if (toolSet.has(tool)) continue;
      errors.push({
        kind: "ToolReferentialIntegrity",
        message: `Agent "${agent.key}" equips unknown tool "${tool}"${didYouMean(tool, toolKeys)}`,
        agents: [agent.key],
      });
    }
  }

  const listed = new Set(snapshot.routes.map((r) => edgeId(r.from, r.to)));
  const allowed = new Set(snapshot.agents.flatMap((a) => a.allowed_routes.map((to) => edgeId(a.key, to))));
  const onlyListed = [...listed].filter((e) => !allowed.has(e));
  const onlyAllowed = [...allowed].filter((e) => !listed.has(e));
  if (onlyListed.length > 0 || onlyAllowed.length > 0) {
    const parts: string[] = [];
    if (onlyListed.length > 0) parts.push(`in routes but not allowed_routes: ${onlyListed.join(", ")}`);
    if (onlyAllowed.length > 0) parts.push(`in allowed_routes but not routes: ${onlyAllowed.join(", ")}`);
    errors.push({ kind: "RouteAdjacencyMismatch", message: `Route list and allowed_routes disagree (${parts.join("; ")})` });
  }

  const { policy } = snapshot;
  const policyProblems: string[] = [];
  if (!Number.isInteger(policy.max_steps) || policy.max_steps < 1) policyProblems.push(`max_steps must be an integer >= 1 (got ${policy.max_steps})`);
  if (!Number.isInteger(policy.max_tool_errors) || policy.max_tool_errors < 1) {
    policyProblems.push(`max_tool_errors must be an integer >= 1 (got ${policy.max_tool_errors})`);
  }
  if (!(policy.tool_timeout_ms > 0)) policyProblems.push(`tool_timeout_ms must be > 0 (got ${policy.tool_timeout_ms})`);
  for (const problem of policyProblems) errors.push({ kind: "InvalidPolicy", message: problem });

  const start = defaultKey !== null && agentSet.has(defaultKey) ? defaultKey : defaults.length === 1 ? defaults[0] : undefined;
  if (start !== undefined) {
    const adj = buildAdjacency(snapshot);
    const reachable = reachableFrom(adj, start);
    const responderSet = new Set(responders);

    if (responders.length > 0 && ![...reachable].some((k) => responderSet.has(k))) {
      errors.push({
        kind: "Reachability",
        message: `No respond-capable agent is reachable from default agent "${start}"`,
        agents: [start],
      });
    }

    const unreachable = agentKeys.filter((k) => !reachable.has(k));
    if (unreachable.length > 0) {
      warnings.push({
        kind: "UnreachableAgent",
        message: `Agent(s) unreachable from "${start}": ${unreachable.join(", ")}`,
        agents: unreachable,
      });
    }

    const trapped = agentKeys.filter((k) => {
      if (!reachable.has(k) || !isOnCycle(adj, k)) return false;
      return ![...reachableFrom(adj, k)].some((n) => responderSet.has(n));
    });
    if (trapped.length > 0) {
      warnings.push({
        kind: "TrappedCycle",
        message: `Agent(s) on a cycle with no way to a respond-capable agent: ${trapped.join(", ")}`,
        agents: trapped,
      });
    }
  }

  return errors.length === 0 ? { ok: true, warnings } : { ok: false, errors, warnings };
}
