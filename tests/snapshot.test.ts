import { describe, it, expect } from "vitest";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import { SnapshotLoadError, SnapshotValidationError } from "../src/core/errors.js";
import { parseSnapshot } from "../src/core/snapshot-schema.js";
import { loadDecisionsFile } from "../src/core/scripted-decider.js";
import {
  createSnapshotCatalog,
  loadSnapshotFile,
  publishSnapshot,
  serializeSnapshot,
  snapshotChecksum,
} from "../src/core/snapshot.js";
import { agent, makeSnapshot, triageWriter } from "./helpers/snapshots.js";

function withTempDir(): string {
  return mkdtempSync(join(tmpdir(), "relay-snapshot-test-"));
}

const raw = {
  name: "support",
  agents: [
    { key: "triage", is_default: true, allowed_routes: ["writer"], equipped_tools: ["search"] },
    { key: "writer", allow_respond: true, prompt: "Be brief." },
  ],
  tools: [
    {
      key: "search",
      provider_type: "builtin:echo",
      params_schema: {
        query: { required: true, description: "What to look for" },
        api_key: { source: "system", required: true },
        limit: { default: 5 },
      },
    },
  ],
  policy: { max_steps: 6 },
};

describe("snapshot parsing", () => {
  it("normalises a hand-written snapshot", () => {
    const snapshot = parseSnapshot(raw);
    expect(snapshot.default_agent_key).toBe("triage");
    expect(snapshot.routes).toEqual([{ from: "triage", to: "writer" }]);
    expect(snapshot.policy).toEqual({ max_steps: 6, max_tool_errors: 3, tool_timeout_ms: 30000, on_permission_error: "fail" });
    expect(snapshot.agents[1]).toEqual({
      key: "writer",
      allow_respond: true,
      is_default: false,
      equipped_tools: [],
      allowed_routes: [],
      prompt: "Be brief.",
    });
    expect(snapshot.tools[0]?.params).toEqual([
      { name: "query", source: "agent", required: true, description: "What to look for" },
      { name: "api_key", source: "system", required: true },
      { name: "limit", source: "agent", required: false, default_value: 5 },
    ]);
  });

  it("accepts routes as pairs and derives allowed_routes from them", () => {
    const snapshot = parseSnapshot({
      agents: [{ key: "a", is_default: true }, { key: "b", allow_respond: true }],
      routes: [["a", "b"]],
    });
    expect(snapshot.routes).toEqual([{ from: "a", to: "b" }]);
    expect(snapshot.agents[0]?.allowed_routes).toEqual(["b"]);
  });

  it("reports schema problems with their paths", () => {
    expect(() => parseSnapshot({ agents: [] })).toThrow(SnapshotLoadError);
    expect(() => parseSnapshot({ agents: [{ key: "a", is_default: "yes" }] }, "bad.yaml")).toThrow(
      "bad.yaml: invalid snapshot (agents.0.is_default: Expected boolean, received string)",
    );
  });

  it("round-trips through JSON and YAML", () => {
    const snapshot = parseSnapshot(raw);
    expect(parseSnapshot(JSON.parse(serializeSnapshot(snapshot)))).toEqual(snapshot);
    expect(parseSnapshot(parseYaml(serializeSnapshot(snapshot, "yaml")))).toEqual(snapshot);
  });
});

describe("snapshot publishing", () => {
  it("freezes a valid snapshot and fingerprints it", () => {
    const snapshot = triageWriter();
    const published = publishSnapshot(snapshot, () => new Date("2026-01-02T03:04:05.000Z"));
    expect(published.checksum).toMatch(/^[0-9a-f]{64}$/);
    expect(published.checksum).toBe(snapshotChecksum(snapshot));
    expect(published.published_at).toBe("2026-01-02T03:04:05.000Z");
    expect(Object.isFrozen(published.snapshot.agents[0])).toBe(true);
  });

  it("computes the same checksum regardless of key order", () => {
    const a = triageWriter();
    const b = { policy: a.policy, default_agent_key: a.default_agent_key, routes: a.routes, tools: a.tools, agents: a.agents };
    expect(snapshotChecksum(b)).toBe(snapshotChecksum(a));
  });

  it("refuses to publish an invalid graph", () => {
    const snapshot = makeSnapshot([agent("a", { is_default: true }), agent("b", { is_default: true, allow_respond: true })]);
    try {
      publishSnapshot(snapshot);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SnapshotValidationError);
      if (!(err instanceof SnapshotValidationError)) return;
      expect(err.violations.map((v) => v.kind)).toContain("DefaultAgentUniqueness");
      expect(err.code).toBe("SNAPSHOT_INVALID");
    }
  });

  it("never makes an invalid version current", () => {
    const catalog = createSnapshotCatalog();
    const bad = makeSnapshot([agent("a", { is_default: true }), agent("b", { is_default: true, allow_respond: true })]);

    expect(catalog.publish(bad).ok).toBe(false);
    expect(catalog.current()).toBeNull();

    const good = catalog.publish(triageWriter());
    expect(good.ok).toBe(true);
    expect(catalog.currentVersion()).toBe(1);

    expect(catalog.publish(bad).ok).toBe(false);
    expect(catalog.currentVersion()).toBe(1);
    expect(catalog.versions()).toEqual([1]);
    expect(catalog.current()?.snapshot.default_agent_key).toBe("triage");
  });
});

describe("snapshot files", () => {
  it("loads YAML from disk", () => {
    const dir = withTempDir();
    const file = join(dir, "graph.yaml");
    writeFileSync(
      file,
      "agents:\n  - key: triage\n    is_default: true\n    allowed_routes: [writer]\n  - key: writer\n    allow_respond: true\n",
    );
    const { snapshot, path } = loadSnapshotFile(file);
    expect(path).toBe(file);
    expect(snapshot.routes).toEqual([{ from: "triage", to: "writer" }]);
  });

  it("reports YAML syntax errors with a location", () => {
    const dir = withTempDir();
    const file = join(dir, "broken.yaml");
    writeFileSync(file, "agents: [\n");
    expect(() => loadSnapshotFile(file)).toThrow(`${file}:`);
  });

  it("reports a missing file", () => {
    expect(() => loadSnapshotFile(join(withTempDir(), "nope.yaml"))).toThrow("Snapshot file not found");
  });

  it("ships example files that load and publish", () => {
    const file = fileURLToPath(new URL("../examples/support.yaml", import.meta.url));
    const { snapshot } = loadSnapshotFile(file);
    const published = publishSnapshot(snapshot);
    expect(published.snapshot.default_agent_key).toBe("triage");
    expect(published.snapshot.routes).toEqual([
      { from: "triage", to: "writer" },
      { from: "writer", to: "triage" },
    ]);
    expect(loadDecisionsFile(fileURLToPath(new URL("../examples/support.decisions.yaml", import.meta.url)))).toHaveLength(3);
  });
});
