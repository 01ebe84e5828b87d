import type { GraphViolation } from "../types.js";

export class RelayError extends Error {
  code: string;
  details?: Record<string, unknown>;

  constructor(message: string, code = "INTERNAL_ERROR", details?: Record<string, unknown>) {
    super(message);
    this.name = "RelayError";
    this.code = code;
    this.details = details;
  }
}

export class SnapshotValidationError extends RelayError {
  readonly violations: GraphViolation[];

  constructor(violations: GraphViolation[]) {
    const kinds = [...new Set(violations.map((v) => v.kind))].join(", ");
    super(`Snapshot failed validation (${violations.length} error${violations.length === 1 ? "" : "s"}: ${kinds})`, "SNAPSHOT_INVALID", {
      violations,
    });
    this.name = "SnapshotValidationError";
    this.violations = violations;
  }
}

export class SnapshotLoadError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "SNAPSHOT_LOAD_FAILED", details);
    this.name = "SnapshotLoadError";
  }
}

export type PermissionErrorCode =
  | "UnknownAgent"
  | "UnknownTool"
  | "UnauthorizedTool"
  | "MissingParameter"
  | "MissingSystemParameter"
  | "UnauthorizedRoute"
  | "RespondNotAllowed"
  | "MalformedDecision";

export class PermissionError extends RelayError {
  declare code: PermissionErrorCode;
  readonly agentKey: string;

  constructor(code: PermissionErrorCode, agentKey: string, message: string, details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = "PermissionError";
    this.agentKey = agentKey;
  }
}

export function toRelayError(err: unknown, fallbackCode = "INTERNAL_ERROR"): RelayError {
  if (err instanceof RelayError) return err;
  if (err instanceof Error) return new RelayError(err.message, fallbackCode);
  return new RelayError(String(err ?? "Unknown error"), fallbackCode);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
