import { Command } from "commander";
import chalk from "chalk";
import type { RunResult } from "../types.js";
import { loadConfig, mergeSystemParams } from "../core/config.js";
import { SnapshotValidationError } from "../core/errors.js";
import { safeJsonStringify } from "../core/json-utils.js";
import { createRunLoop } from "../core/run-loop.js";
import { createScriptedDecider, loadDecisionsFile } from "../core/scripted-decider.js";
import { publishSnapshot } from "../core/snapshot.js";
import { createToolRegistry } from "../core/tool-registry.js";
import { collect, fail, formatEntry, loadSnapshotForCli, parseParamPairs, printViolations } from "./snapshot-cli-utils.js";

export interface RunCommandOpts {
  decisions: string;
  input?: string;
  start?: string;
  param?: string[];
  config?: string;
  maxSteps?: string;
  json?: boolean;
  debug?: boolean;
}

function parseMaxSteps(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) throw new Error(`Invalid --max-steps '${raw}'. Use a positive integer.`);
  return n;
}

function printResult(result: RunResult): void {
  if (result.status === "done") {
    const payload = typeof result.final_payload === "string" ? result.final_payload : (safeJsonStringify(result.final_payload, 2) ?? "null");
    console.log(chalk.green(`✓ ${result.run_id} done at step ${result.step} (agent ${result.agent_key}, epoch ${result.epoch})`));
    console.log(payload);
    return;
  }
  const err = result.error;
  console.error(chalk.red(`✗ ${result.run_id} failed at step ${result.step}: ${err ? `${err.kind}/${err.code}: ${err.message}` : "unknown error"}`));
}

export async function runSnapshotFile(file: string, opts: RunCommandOpts): Promise<RunResult> {
  const config = loadConfig({ path: opts.config });
  const { snapshot } = loadSnapshotForCli(file);
  const published = publishSnapshot(snapshot);
  printViolations([], published.warnings);

  const decider = createScriptedDecider(loadDecisionsFile(opts.decisions));
  const loop = createRunLoop({
    decider,
    tools: createToolRegistry(),
    policy: { ...config.policy, max_steps: parseMaxSteps(opts.maxSteps) ?? config.policy.max_steps },
    summaryWindow: config.summary_window,
    debug: opts.debug === true,
    onStep: opts.json ? undefined : (entry) => console.log(formatEntry(entry)),
  });

  const ctl = new AbortController();
  const onSigint = () => ctl.abort("interrupted");
  process.once("SIGINT", onSigint);
  try {
    return await loop.run({
      snapshot: published.snapshot,
      userInput: opts.input ?? "",
      startAgent: opts.start,
      systemParams: mergeSystemParams(config.system_params, parseParamPairs(opts.param)),
      signal: ctl.signal,
    });
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

export function runCommands(parent: Command): void {
  parent
    .argument("<file>", "Snapshot file (path, snapshots/name, examples/name)")
    .requiredOption("--decisions <file>", "YAML/JSON list of decisions to replay")
    .option("--input <text>", "User message handed to every agent")
    .option("--start <agent>", "Start agent (default: the snapshot's default agent)")
    .option("--param <key=value>", "System parameter (repeatable)", collect, [])
    .option("--config <path>", "Runtime config file (default: ./relay.yaml)")
    .option("--max-steps <n>", "Override policy.max_steps")
    .option("--json", "Print the run result as JSON", false)
    .option("--debug", "Include rendered prompts in the result", false)
    .action(async (file: string, opts: RunCommandOpts) => {
      let result: RunResult;
      try {
        result = await runSnapshotFile(file, opts);
      } catch (err) {
        if (err instanceof SnapshotValidationError) printViolations(err.violations, []);
        fail(err);
      }
      if (opts.json) console.log(safeJsonStringify(result, 2));
      else printResult(result);
      if (result.status === "failed") process.exit(1);
    });
}
