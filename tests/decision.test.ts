import { describe, it, expect } from "vitest";
import { describeAction, parseDecision } from "../src/core/decision.js";

describe("decision parser", () => {
  it("accepts the nested form and fills defaults", () => {
    const res = parseDecision({ action: { type: "USE_TOOL", tool_key: "search" } });
    expect(res).toEqual({
      ok: true,
      decision: { reasoning: "", action: { type: "USE_TOOL", tool_key: "search", arguments: {} } },
    });
  });

  it("defaults a missing RESPOND payload to null", () => {
    const res = parseDecision({ reasoning: "done", action: { type: "RESPOND" } });
    expect(res).toEqual({ ok: true, decision: { reasoning: "done", action: { type: "RESPOND", payload: null } } });
  });

  it("normalises the flat form", () => {
    expect(
      parseDecision({
        action: "USE_TOOL",
        action_reasoning: "need data",
        action_details: { tool_name: "search", tool_params: { query: "cats" } },
      }),
    ).toEqual({
      ok: true,
      decision: { reasoning: "need data", action: { type: "USE_TOOL", tool_key: "search", arguments: { query: "cats" } } },
    });

    expect(parseDecision({ action: "ROUTE_TO_AGENT", action_details: { target_agent_name: "writer" } })).toEqual({
      ok: true,
      decision: { reasoning: "", action: { type: "ROUTE_TO_AGENT", target_agent_key: "writer", context: {} } },
    });
  });

  it("rejects a flat tool call without a tool name", () => {
    expect(parseDecision({ action: "USE_TOOL", action_details: {} })).toEqual({
      ok: false,
      error: "action_details.tool_name is required for USE_TOOL",
    });
  });

  it("parses a JSON-encoded decision", () => {
    const res = parseDecision('{"reasoning":"r","action":{"type":"RESPOND","payload":{"text":"hi"}}}');
    expect(res).toEqual({ ok: true, decision: { reasoning: "r", action: { type: "RESPOND", payload: { text: "hi" } } } });
  });

  it("reports malformed decisions", () => {
    const unknownType = parseDecision({ reasoning: "x", action: { type: "DANCE" } });
    expect(unknownType.ok).toBe(false);
    if (unknownType.ok) return;
    expect(unknownType.error.startsWith("Malformed decision: action")).toBe(true);

    const notJson = parseDecision("use the search tool");
    expect(notJson.ok).toBe(false);
  });

  it("describes actions for log previews", () => {
    expect(describeAction({ type: "USE_TOOL", tool_key: "search", arguments: { q: 1 } })).toBe('tool=search args={"q":1}');
    expect(describeAction({ type: "ROUTE_TO_AGENT", target_agent_key: "writer", context: {} })).toBe("target=writer");
    expect(describeAction({ type: "RESPOND", payload: "hi" })).toBe("payload=hi");
  });

  it("describes actions whose values JSON cannot encode", () => {
    const context: Record<string, unknown> = { topic: "loop" };
    context.self = context;
    expect(describeAction({ type: "ROUTE_TO_AGENT", target_agent_key: "writer", context })).toBe(
      'target=writer context={"topic":"loop","self":"[Circular]"}',
    );
    expect(describeAction({ type: "RESPOND", payload: { total: 10n } })).toBe('payload={"total":"10"}');
  });
});
