import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import type { RuntimePolicy } from "../types.js";
import { RelayError, errorMessage } from "./errors.js";
import { formatIssues } from "./snapshot-schema.js";
import { parseYamlWithDiagnostics } from "./yaml-utils.js";

const CONFIG_FILES = ["relay.yaml", "relay.yml"];

export const RelayConfigSchema = z
  .object({
    policy: z
      .object({
        max_steps: z.number().int().min(1).optional(),
        max_tool_errors: z.number().int().min(1).optional(),
        tool_timeout_ms: z.number().positive().optional(),
        on_permission_error: z.enum(["fail", "report"]).optional(),
      })
      .strict()
      .default({}),
    system_params: z.record(z.string(), z.unknown()).default({}),
    summary_window: z.number().int().min(0).optional(),
  })
  .strict();

export type RelayConfig = z.infer<typeof RelayConfigSchema>;

export function defaultConfig(): RelayConfig {
  return { policy: {}, system_params: {} };
}

/** Replaces `${VAR}` and `${VAR:-default}`; an unset variable without a default is an error. */
export function substituteEnvVars(text: string, env: NodeJS.ProcessEnv = process.env): string {
  return text.replace(/\$\{([^}]+)\}/g, (_match, expr: string) => {
    const defaultSep = expr.indexOf(":-");
    if (defaultSep !== -1) {
      const varName = expr.slice(0, defaultSep).trim();
      return env[varName] ?? expr.slice(defaultSep + 2);
    }

    const varName = expr.trim();
    const value = env[varName];
    if (value === undefined) {
      throw new RelayError(`Environment variable ${varName} is not set (referenced in config)`, "CONFIG_INVALID");
    }
    return value;
  });
}

export function findConfigFile(dir: string = process.cwd()): string | null {
  for (const file of CONFIG_FILES) {
    const path = resolve(dir, file);
    if (existsSync(path)) return path;
  }
  return null;
}

/**
 * Loads runtime config from an explicit path, or from relay.yaml / relay.yml
 * in `dir`. No file means defaults.
 */
export function loadConfig(opts: { path?: string; dir?: string; env?: NodeJS.ProcessEnv } = {}): RelayConfig {
  const configPath = opts.path ? resolve(opts.dir ?? process.cwd(), opts.path) : findConfigFile(opts.dir);
  if (!configPath) return defaultConfig();
  if (!existsSync(configPath)) throw new RelayError(`Config file not found: ${configPath}`, "CONFIG_NOT_FOUND");

  let raw: unknown;
  try {
    raw = parseYamlWithDiagnostics(substituteEnvVars(readFileSync(configPath, "utf-8"), opts.env), configPath);
  } catch (err) {
    if (err instanceof RelayError) throw err;
    throw new RelayError(errorMessage(err), "CONFIG_INVALID");
  }

  const parsed = RelayConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new RelayError(`${configPath}: ${formatIssues(parsed.error.issues).join("; ")}`, "CONFIG_INVALID");
  }
  return parsed.data;
}

export function mergePolicy(base: RuntimePolicy, override?: Partial<RuntimePolicy>): RuntimePolicy {
  return {
    max_steps: override?.max_steps ?? base.max_steps,
    max_tool_errors: override?.max_tool_errors ?? base.max_tool_errors,
    tool_timeout_ms: override?.tool_timeout_ms ?? base.tool_timeout_ms,
    on_permission_error: override?.on_permission_error ?? base.on_permission_error,
  };
}

/** Caller values win over configured defaults; `undefined` never overrides. */
export function mergeSystemParams(
  defaults: Record<string, unknown>,
  overrides: Record<string, unknown> = {},
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...defaults };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }
  return merged;
}
