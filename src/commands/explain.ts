import chalk from "chalk";
import type { CompiledSnapshot, CompiledTool } from "../types.js";
import { buildAdjacency, reachableFrom } from "../core/graph-helpers.js";
import { findTool } from "../core/permission-enforcer.js";
import { fail, loadSnapshotForCli } from "./snapshot-cli-utils.js";

function describeParams(tool: CompiledTool): string {
  if (tool.params.length === 0) return "no params";
  return tool.params
    .map((p) => {
      const flags = [p.source, p.required ? "required" : "optional"];
      if (p.default_value !== undefined) flags.push(`default=${JSON.stringify(p.default_value)}`);
      return `${p.name} (${flags.join(", ")})`;
    })
    .join(", ");
}

/** Breadth-first order of agents reachable from the default. */
export function reachOrder(snapshot: CompiledSnapshot): string[] {
  if (snapshot.default_agent_key === null) return [];
  return [...reachableFrom(buildAdjacency(snapshot), snapshot.default_agent_key)];
}

export async function explainCommand(file: string): Promise<void> {
  try {
    const { snapshot, path } = loadSnapshotForCli(file);
    const title = snapshot.name ?? "snapshot";
    console.log(chalk.bold(`${title}: ${snapshot.agents.length} agents, ${snapshot.tools.length} tools, ${snapshot.routes.length} routes`));
    console.log(chalk.dim(path));
    console.log();

    for (const agent of snapshot.agents) {
      const markers: string[] = [];
      if (agent.is_default) markers.push("default");
      if (agent.allow_respond) markers.push("responds");
      console.log(`${chalk.cyan(agent.key)}${markers.length ? chalk.yellow(` [${markers.join(", ")}]`) : ""}`);
      if (agent.description) console.log(chalk.dim(`  ${agent.description}`));
      for (const key of agent.equipped_tools) {
        const tool = findTool(snapshot, key);
        console.log(`  tool ${key}: ${tool ? describeParams(tool) : chalk.red("undeclared")}`);
      }
      console.log(`  routes: ${agent.allowed_routes.length ? agent.allowed_routes.join(", ") : "none"}`);
    }

    const { policy } = snapshot;
    console.log();
    console.log(
      `Policy: max_steps=${policy.max_steps} max_tool_errors=${policy.max_tool_errors} tool_timeout_ms=${policy.tool_timeout_ms} on_permission_error=${policy.on_permission_error}`,
    );
    const order = reachOrder(snapshot);
    console.log(`Reachable from default: ${order.length ? order.join(", ") : "none"}`);
  } catch (err) {
    fail(err);
  }
}
