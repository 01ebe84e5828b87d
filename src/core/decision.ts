import { z } from "zod";
import type { Decision, DecisionAction } from "../types.js";
import { formatIssues } from "./snapshot-schema.js";
import { parseJsonOr, safeJsonStringify } from "./json-utils.js";

const ArgsSchema = z.record(z.string(), z.unknown());

const ActionSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("USE_TOOL"),
    tool_key: z.string().min(1),
    arguments: ArgsSchema.default({}),
  }),
  z.object({
    type: z.literal("ROUTE_TO_AGENT"),
    target_agent_key: z.string().min(1),
    context: ArgsSchema.default({}),
  }),
  z.object({
    type: z.literal("RESPOND"),
    payload: z.unknown(),
  }),
]);

export const DecisionSchema = z.object({
  reasoning: z.string().default(""),
  action: ActionSchema,
});

// Older producers emit `{ action, action_reasoning, action_details }`.
export const FlatDecisionSchema = z.object({
  action: z.enum(["USE_TOOL", "ROUTE_TO_AGENT", "RESPOND"]),
  action_reasoning: z.string().default(""),
  action_details: z
    .object({
      tool_name: z.string().min(1).optional(),
      tool_params: ArgsSchema.optional(),
      target_agent_name: z.string().min(1).optional(),
      context: ArgsSchema.optional(),
      payload: z.unknown().optional(),
    })
    .default({}),
});

export type DecisionParseResult = { ok: true; decision: Decision } | { ok: false; error: string };

function fromFlat(flat: z.infer<typeof FlatDecisionSchema>): DecisionParseResult {
  const details = flat.action_details;
  let action: DecisionAction;
  switch (flat.action) {
    case "USE_TOOL":
      if (!details.tool_name) return { ok: false, error: "action_details.tool_name is required for USE_TOOL" };
      action = { type: "USE_TOOL", tool_key: details.tool_name, arguments: details.tool_params ?? {} };
      break;
    case "ROUTE_TO_AGENT":
      if (!details.target_agent_name) {
        return { ok: false, error: "action_details.target_agent_name is required for ROUTE_TO_AGENT" };
      }
      action = { type: "ROUTE_TO_AGENT", target_agent_key: details.target_agent_name, context: details.context ?? {} };
      break;
    case "RESPOND":
      action = { type: "RESPOND", payload: details.payload ?? null };
      break;
  }
  return { ok: true, decision: { reasoning: flat.action_reasoning, action } };
}

/**
 * Shapes an untrusted decision into the closed Decision union. Accepts the
 * nested form, the flat form, or either one encoded as a JSON string.
 */
export function parseDecision(raw: unknown): DecisionParseResult {
  const input = typeof raw === "string" ? parseJsonOr(raw, raw) : raw;

  const nested = DecisionSchema.safeParse(input);
  if (nested.success) {
    const { action } = nested.data;
    if (action.type === "RESPOND") {
      return { ok: true, decision: { reasoning: nested.data.reasoning, action: { type: "RESPOND", payload: action.payload ?? null } } };
    }
    return { ok: true, decision: { reasoning: nested.data.reasoning, action } };
  }

  const flat = FlatDecisionSchema.safeParse(input);
  if (flat.success) return fromFlat(flat.data);

  return { ok: false, error: `Malformed decision: ${formatIssues(nested.error.issues).join("; ")}` };
}

export function describeAction(action: DecisionAction): string {
  switch (action.type) {
    case "USE_TOOL":
      return `tool=${action.tool_key} args=${safeJsonStringify(action.arguments) ?? "{}"}`;
    case "ROUTE_TO_AGENT":
      return `target=${action.target_agent_key}${Object.keys(action.context).length > 0 ? ` context=${safeJsonStringify(action.context) ?? "{}"}` : ""}`;
    case "RESPOND":
      return `payload=${typeof action.payload === "string" ? action.payload : (safeJsonStringify(action.payload) ?? "null")}`;
  }
}
