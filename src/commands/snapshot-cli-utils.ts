import { existsSync } from "node:fs";
import { resolve } from "node:path";
import chalk from "chalk";
import type { CompiledSnapshot, ExecutionLogEntry, GraphViolation } from "../types.js";
import { SnapshotLoadError, errorMessage } from "../core/errors.js";
import { loadSnapshotFile } from "../core/snapshot.js";

export function resolveSnapshotPath(input: string): string {
  const candidates = [
    resolve(process.cwd(), input),
    resolve(process.cwd(), "snapshots", input),
    resolve(process.cwd(), "examples", input),
    resolve(process.cwd(), "snapshots", `${input}.yaml`),
    resolve(process.cwd(), "examples", `${input}.yaml`),
  ];

  for (const p of candidates) {
    if (existsSync(p)) return p;
  }

  throw new SnapshotLoadError(`Snapshot file not found: '${input}'. Tried current dir, snapshots/, and examples/.`);
}

export function loadSnapshotForCli(input: string): { snapshot: CompiledSnapshot; path: string } {
  return loadSnapshotFile(resolveSnapshotPath(input));
}

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function parseParamPairs(pairs: string[] | undefined): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const pair of pairs ?? []) {
    const idx = pair.indexOf("=");
    if (idx <= 0) throw new Error(`Invalid --param '${pair}'. Use --param key=value`);
    const key = pair.slice(0, idx).trim();
    if (!key) throw new Error(`Invalid --param '${pair}'. Key is empty.`);
    out[key] = coerce(pair.slice(idx + 1).trim());
  }
  return out;
}

function coerce(raw: string): unknown {
  if (raw === "true") return true;
  if (raw === "false") return false;
  if (raw === "null") return null;
  if (/^-?\d+(\.\d+)?$/.test(raw)) return Number(raw);
  if ((raw.startsWith("{") && raw.endsWith("}")) || (raw.startsWith("[") && raw.endsWith("]"))) {
    try {
      return JSON.parse(raw);
    } catch {
      return raw;
    }
  }
  return raw;
}

export function printViolations(errors: GraphViolation[], warnings: GraphViolation[]): void {
  for (const e of errors) console.error(chalk.red(`✗ ${e.kind}: ${e.message}`));
  for (const w of warnings) console.log(chalk.yellow(`! ${w.kind}: ${w.message}`));
}

export function formatEntry(entry: ExecutionLogEntry): string {
  const head = `[${entry.step}] ${entry.agent_key}@${entry.epoch}`;
  if (entry.kind === "tool") {
    const status = entry.status === "ok" ? chalk.green("ok") : chalk.red("error");
    const lines = [`${head} tool ${entry.tool_key} ${status} ${chalk.dim(`${entry.duration_ms}ms ${entry.execution_id}`)}`];
    lines.push(chalk.dim(`    request: ${entry.request_preview}`));
    lines.push(chalk.dim(`    response: ${entry.response_preview}`));
    return lines.join("\n");
  }
  const action = entry.decision.action ?? "INVALID";
  const line = `${head} ${entry.status === "ok" ? action : chalk.red(action)} ${chalk.dim(entry.decision.details)}`;
  return entry.error ? `${line}\n${chalk.red(`    ${entry.error}`)}` : line;
}

export function fail(err: unknown): never {
  console.error(chalk.red(`✗ ${errorMessage(err)}`));
  process.exit(1);
}
