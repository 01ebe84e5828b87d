import type { ToolExecutor, ToolInvocation, ToolOutcome } from "../types.js";
import { errorMessage } from "./errors.js";

export const ECHO_PROVIDER = "builtin:echo";

export type ToolHandler = (invocation: ToolInvocation) => unknown;

export interface ToolRegistry extends ToolExecutor {
  register(providerType: string, handler: ToolHandler): void;
  has(providerType: string): boolean;
  providers(): string[];
}

/**
 * Default tool collaborator. Dispatches on `provider_type`, falling back to
 * the tool key. A handler's return value is the result; a throw is a failure.
 */
export function createToolRegistry(handlers: Record<string, ToolHandler> = {}): ToolRegistry {
  const table = new Map<string, ToolHandler>([[ECHO_PROVIDER, (inv) => ({ echo: inv.params })]]);
  for (const [name, handler] of Object.entries(handlers)) table.set(name, handler);

  return {
    register(providerType, handler) {
      table.set(providerType, handler);
    },
    has(providerType) {
      return table.has(providerType);
    },
    providers() {
      return [...table.keys()];
    },
    async execute(invocation): Promise<ToolOutcome> {
      const providerType = invocation.tool.provider_type ?? invocation.tool.key;
      const handler = table.get(providerType);
      if (!handler) return { ok: false, error: `No tool provider registered for "${providerType}"` };
      try {
        return { ok: true, result: await handler(invocation) };
      } catch (err) {
        return { ok: false, error: errorMessage(err) };
      }
    },
  };
}

export type ToolSettlement = { kind: "completed"; outcome: ToolOutcome } | { kind: "cancelled" };

/**
 * Runs one tool call under a timeout. A timeout or throw settles as a failed
 * outcome; an abort of `signal` settles as cancelled without waiting for the tool.
 */
export function executeWithTimeout(
  executor: ToolExecutor,
  invocation: Omit<ToolInvocation, "signal">,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<ToolSettlement> {
  if (signal?.aborted) return Promise.resolve({ kind: "cancelled" });

  const ctl = new AbortController();
  return new Promise<ToolSettlement>((resolve) => {
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const finish = (settlement: ToolSettlement) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      resolve(settlement);
    };
    const onAbort = () => {
      ctl.abort(signal?.reason ?? "run cancelled");
      finish({ kind: "cancelled" });
    };

    signal?.addEventListener("abort", onAbort, { once: true });
    if (Number.isFinite(timeoutMs) && timeoutMs > 0) {
      timer = setTimeout(() => {
        ctl.abort(`tool timed out after ${timeoutMs}ms`);
        finish({
          kind: "completed",
          outcome: { ok: false, error: `Tool "${invocation.tool.key}" timed out after ${timeoutMs}ms` },
        });
      }, timeoutMs);
    }

    void Promise.resolve()
      .then(() => executor.execute({ ...invocation, signal: ctl.signal }))
      .then(
        (outcome) => finish({ kind: "completed", outcome }),
        (err: unknown) => finish({ kind: "completed", outcome: { ok: false, error: errorMessage(err) } }),
      );
  });
}
