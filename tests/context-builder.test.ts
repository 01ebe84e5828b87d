import { describe, it, expect } from "vitest";
import { buildContext, renderPrompt } from "../src/core/context-builder.js";
import { createExecutionLog } from "../src/core/execution-log.js";
import { createToolLog } from "../src/core/tool-log.js";
import type { ToolExecutionRecord } from "../src/types.js";
import { agent, makeSnapshot, param, tool } from "./helpers/snapshots.js";

const snapshot = makeSnapshot(
  [
    agent("researcher", {
      is_default: true,
      display_name: "Researcher",
      description: "Finds facts.",
      prompt: "Cite sources.",
      equipped_tools: ["search"],
      allowed_routes: ["writer"],
    }),
    agent("writer", { allow_respond: true, description: "Writes the answer", allowed_routes: ["researcher"] }),
  ],
  [
    tool(
      "search",
      [
        param("query", { required: true }),
        param("limit", { required: true, default_value: 5 }),
        param("api_key", { source: "system", required: true }),
      ],
      { description: "Web search" },
    ),
  ],
  { respond: { payload_guidance: "Return {text}" } },
);

function record(id: string, agentKey: string, epoch: number, step: number): ToolExecutionRecord {
  return {
    execution_id: id,
    agent_key: agentKey,
    tool_key: "search",
    epoch,
    step,
    request: { query: id, api_key: "test-secret" },
    redacted_keys: ["api_key"],
    result: { hits: [id] },
    status: "ok",
    duration_ms: 0,
    started_at: "2026-01-01T00:00:00.000Z",
    completed_at: "2026-01-01T00:00:00.000Z",
  };
}

function logs() {
  return { executionLog: createExecutionLog(), toolLog: createToolLog() };
}

describe("context builder", () => {
  it("has no tool outputs before the agent has an epoch", () => {
    const ctx = buildContext({ snapshot, agentKey: "researcher", ...logs(), userInput: "hi" });
    expect(ctx.epoch).toBeNull();
    expect(ctx.tool_outputs).toEqual([]);
    expect(ctx.log_summary).toEqual([]);
  });

  it("includes only the current epoch's outputs, newest first, without system values", () => {
    const { executionLog, toolLog } = logs();
    executionLog.markEpoch("researcher", 0);
    toolLog.put(record("EXE-1", "researcher", 0, 0));
    toolLog.put(record("EXE-2", "researcher", 0, 1));
    executionLog.markEpoch("writer", 1);
    toolLog.put(record("EXE-3", "writer", 1, 3));

    const ctx = buildContext({ snapshot, agentKey: "researcher", executionLog, toolLog, userInput: "hi" });
    expect(ctx.epoch).toBe(0);
    expect(ctx.tool_outputs).toEqual([
      { execution_id: "EXE-2", tool_key: "search", status: "ok", request: { query: "EXE-2" }, result: { hits: ["EXE-2"] } },
      { execution_id: "EXE-1", tool_key: "search", status: "ok", request: { query: "EXE-1" }, result: { hits: ["EXE-1"] } },
    ]);

    executionLog.markEpoch("researcher", 2);
    const later = buildContext({ snapshot, agentKey: "researcher", executionLog, toolLog, userInput: "hi" });
    expect(later.epoch).toBe(2);
    expect(later.tool_outputs).toEqual([]);
  });

  it("builds the static prompt fragment", () => {
    const ctx = buildContext({ snapshot, agentKey: "researcher", ...logs(), userInput: "hi" });
    expect(ctx.prompt).toEqual({
      agent_key: "researcher",
      display_name: "Researcher",
      base_prompt: "Finds facts.\n\nCite sources.",
      tools: [
        {
          key: "search",
          description: "Web search",
          params: [
            { name: "query", required: true, description: undefined },
            { name: "limit", required: false, description: undefined },
          ],
        },
      ],
      routes: [{ key: "writer", description: "Writes the answer" }],
      allow_respond: false,
    });

    const writer = buildContext({ snapshot, agentKey: "writer", ...logs(), userInput: "hi" });
    expect(writer.prompt.respond).toEqual({ payload_guidance: "Return {text}" });
    expect(writer.prompt.base_prompt).toBe("Writes the answer");
  });

  it("limits the log summary to the window", () => {
    const { executionLog, toolLog } = logs();
    for (let step = 0; step < 4; step++) {
      executionLog.appendAgentStep({
        step,
        epoch: 0,
        agent_key: "researcher",
        status: "error",
        input: "hi",
        action: "RESPOND",
        reasoning: "",
        details: "",
        error: "RespondNotAllowed: no",
      });
    }
    const ctx = buildContext({ snapshot, agentKey: "researcher", executionLog, toolLog, userInput: "hi", summaryWindow: 2 });
    expect(ctx.log_summary).toEqual([
      "step 2: agent researcher → RESPOND error=RespondNotAllowed: no",
      "step 3: agent researcher → RESPOND error=RespondNotAllowed: no",
    ]);
  });

  it("rejects unknown agents", () => {
    expect(() => buildContext({ snapshot, agentKey: "ghost", ...logs(), userInput: "" })).toThrow('Unknown agent "ghost"');
  });

  it("renders base prompt, context and constraints as text", () => {
    const { executionLog, toolLog } = logs();
    executionLog.markEpoch("researcher", 0);
    toolLog.put(record("EXE-1", "researcher", 0, 0));
    const text = renderPrompt(buildContext({ snapshot, agentKey: "researcher", executionLog, toolLog, userInput: "find cats" }));
    const lines = text.split("\n");

    expect(lines.slice(0, 12)).toEqual([
      "# Agent: Researcher (researcher)",
      "Finds facts.",
      "",
      "Cite sources.",
      "",
      "## User input",
      "find cats",
      "",
      "## Tool outputs",
      "- search [EXE-1] status=ok",
      '  request: {"query":"EXE-1"}',
      '  result: {"hits":["EXE-1"]}',
    ]);
    expect(lines).toContain("- search(query*, limit): Web search");
    expect(lines).toContain("- writer: Writes the answer");
    expect(lines).toContain("You may not RESPOND.");
    expect(text).not.toContain("test-secret");
  });

  it("renders tool results JSON cannot encode", () => {
    const { executionLog, toolLog } = logs();
    executionLog.markEpoch("researcher", 0);
    const result: Record<string, unknown> = { count: 10n };
    result.self = result;
    toolLog.put({ ...record("EXE-1", "researcher", 0, 0), result });

    const lines = renderPrompt(buildContext({ snapshot, agentKey: "researcher", executionLog, toolLog, userInput: "hi" })).split("\n");
    expect(lines).toContain('  result: {"count":"10","self":"[Circular]"}');
  });
});
