import { describe, it, expect } from "vitest";
import { createToolLog } from "../src/core/tool-log.js";
import type { ToolExecutionRecord } from "../src/types.js";

function record(id: string, agentKey: string, epoch: number, step: number): ToolExecutionRecord {
  return {
    execution_id: id,
    agent_key: agentKey,
    tool_key: "search",
    epoch,
    step,
    request: { query: id },
    redacted_keys: [],
    result: { hits: [id] },
    status: "ok",
    duration_ms: 1,
    started_at: "2026-01-01T00:00:00.000Z",
    completed_at: "2026-01-01T00:00:00.001Z",
  };
}

describe("tool log", () => {
  it("stores full records by execution id", () => {
    const log = createToolLog();
    log.put(record("EXE-1", "researcher", 0, 0));
    expect(log.get("EXE-1")?.result).toEqual({ hits: ["EXE-1"] });
    expect(log.get("EXE-9")).toBeUndefined();
    expect(Object.isFrozen(log.get("EXE-1"))).toBe(true);
  });

  it("never overwrites a record", () => {
    const log = createToolLog();
    log.put(record("EXE-1", "researcher", 0, 0));
    expect(() => log.put(record("EXE-1", "writer", 1, 1))).toThrow("Tool execution EXE-1 is already recorded");
    expect(log.get("EXE-1")?.agent_key).toBe("researcher");
  });

  it("collects records for one agent and epoch in insertion order", () => {
    const log = createToolLog();
    log.put(record("EXE-1", "researcher", 0, 0));
    log.put(record("EXE-2", "writer", 1, 2));
    log.put(record("EXE-3", "researcher", 0, 1));
    log.put(record("EXE-4", "researcher", 2, 4));

    expect(log.collectFullFor("researcher", 0).map((r) => r.execution_id)).toEqual(["EXE-1", "EXE-3"]);
    expect(log.collectFullFor("researcher", 2).map((r) => r.execution_id)).toEqual(["EXE-4"]);
    expect(log.collectFullFor("writer", 0)).toEqual([]);
    expect(log.executionIds()).toEqual(["EXE-1", "EXE-2", "EXE-3", "EXE-4"]);
  });

  it("keeps a frozen copy and leaves the caller's objects alone", () => {
    const log = createToolLog();
    const shared = { hits: ["a"] };
    const entry = { ...record("EXE-1", "researcher", 0, 0), result: shared };
    log.put(entry);

    expect(Object.isFrozen(shared)).toBe(false);
    expect(Object.isFrozen(entry.request)).toBe(false);
    shared.hits.push("b");
    expect(log.get("EXE-1")?.result).toEqual({ hits: ["a"] });
    expect(Object.isFrozen(log.get("EXE-1")?.result)).toBe(true);
  });

  it("stores binary results", () => {
    const log = createToolLog();
    log.put({ ...record("EXE-1", "researcher", 0, 0), result: Buffer.from("abc") });
    expect(log.get("EXE-1")?.result).toEqual(new Uint8Array([97, 98, 99]));
  });

  it("falls back to a JSON copy for values that cannot be cloned", () => {
    const log = createToolLog();
    log.put({ ...record("EXE-1", "researcher", 0, 0), result: { n: 1, format: () => "x" } });
    expect(log.get("EXE-1")?.result).toEqual({ n: 1 });
  });
});
