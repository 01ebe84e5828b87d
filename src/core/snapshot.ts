import { existsSync, readFileSync } from "node:fs";
import { extname, resolve } from "node:path";
import { stringify as stringifyYaml } from "yaml";
import type { CompiledSnapshot, GraphViolation, PublishedSnapshot } from "../types.js";
import { SnapshotLoadError, SnapshotValidationError, errorMessage } from "./errors.js";
import { validateSnapshot } from "./graph-validator.js";
import { deepFreeze, sha256 } from "./json-utils.js";
import { parseSnapshot } from "./snapshot-schema.js";
import { parseYamlWithDiagnostics } from "./yaml-utils.js";

export type SnapshotFormat = "json" | "yaml";

export function serializeSnapshot(snapshot: CompiledSnapshot, format: SnapshotFormat = "json"): string {
  const plain: unknown = JSON.parse(JSON.stringify(snapshot));
  return format === "yaml" ? stringifyYaml(plain) : `${JSON.stringify(plain, null, 2)}\n`;
}

export function snapshotChecksum(snapshot: CompiledSnapshot): string {
  return sha256(snapshot);
}

/**
 * Validates and freezes a snapshot. Throws SnapshotValidationError carrying
 * every error when the graph is not runnable.
 */
export function publishSnapshot(snapshot: CompiledSnapshot, now: () => Date = () => new Date()): PublishedSnapshot {
  const result = validateSnapshot(snapshot);
  if (!result.ok) throw new SnapshotValidationError(result.errors);

  const copy = parseSnapshot(JSON.parse(serializeSnapshot(snapshot)));
  return deepFreeze({
    snapshot: copy,
    checksum: snapshotChecksum(copy),
    published_at: now().toISOString(),
    warnings: result.warnings,
  });
}

export type PublishOutcome =
  | { ok: true; version: number; published: PublishedSnapshot }
  | { ok: false; errors: GraphViolation[] };

export interface SnapshotCatalog {
  publish(snapshot: CompiledSnapshot): PublishOutcome;
  current(): PublishedSnapshot | null;
  currentVersion(): number | null;
  get(version: number): PublishedSnapshot | null;
  versions(): number[];
}

/** In-memory version store; a version only becomes current once it validates. */
export function createSnapshotCatalog(): SnapshotCatalog {
  const published = new Map<number, PublishedSnapshot>();
  let nextVersion = 1;
  let currentVersion: number | null = null;

  return {
    publish(snapshot) {
      try {
        const entry = publishSnapshot(snapshot);
        const version = nextVersion++;
        published.set(version, entry);
        currentVersion = version;
        return { ok: true, version, published: entry };
      } catch (err) {
        if (err instanceof SnapshotValidationError) return { ok: false, errors: err.violations };
        throw err;
      }
    },
    current() {
      return currentVersion === null ? null : (published.get(currentVersion) ?? null);
    },
    currentVersion() {
      return currentVersion;
    },
    get(version) {
      return published.get(version) ?? null;
    },
    versions() {
      return [...published.keys()];
    },
  };
}

export function loadSnapshotFile(input: string): { snapshot: CompiledSnapshot; path: string } {
  const path = resolve(process.cwd(), input);
  if (!existsSync(path)) throw new SnapshotLoadError(`Snapshot file not found: ${input}`, { path });

  let raw: unknown;
  try {
    const text = readFileSync(path, "utf-8");
    raw = extname(path) === ".json" ? JSON.parse(text) : parseYamlWithDiagnostics(text, path);
  } catch (err) {
    throw new SnapshotLoadError(errorMessage(err), { path });
  }
  return { snapshot: parseSnapshot(raw, path), path };
}
