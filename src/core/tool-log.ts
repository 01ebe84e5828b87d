import type { ToolExecutionRecord } from "../types.js";
import { RelayError } from "./errors.js";
import { deepFreeze, detachedCopy, isRecord } from "./json-utils.js";

export interface ToolLog {
  put(record: ToolExecutionRecord): void;
  get(executionId: string): ToolExecutionRecord | undefined;
  collectFullFor(agentKey: string, epoch: number): ToolExecutionRecord[];
  executionIds(): string[];
  records(): ToolExecutionRecord[];
}

/** Full, untruncated tool payloads keyed by execution id. Records are write-once frozen copies. */
export function createToolLog(): ToolLog {
  const byId = new Map<string, ToolExecutionRecord>();

  return {
    put(record) {
      if (byId.has(record.execution_id)) {
        throw new RelayError(`Tool execution ${record.execution_id} is already recorded`, "DUPLICATE_EXECUTION_ID", {
          execution_id: record.execution_id,
        });
      }
      // Request and result may still be owned by the caller or the tool provider.
      const request = detachedCopy(record.request);
      const stored: ToolExecutionRecord = {
        ...record,
        request: isRecord(request) ? request : {},
        redacted_keys: [...record.redacted_keys],
        result: detachedCopy(record.result),
      };
      byId.set(record.execution_id, deepFreeze(stored));
    },

    get(executionId) {
      return byId.get(executionId);
    },

    collectFullFor(agentKey, epoch) {
      return [...byId.values()].filter((r) => r.agent_key === agentKey && r.epoch === epoch);
    },

    executionIds() {
      return [...byId.keys()];
    },

    records() {
      return [...byId.values()];
    },
  };
}
