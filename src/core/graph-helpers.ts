import type { CompiledSnapshot } from "../types.js";

export type Adjacency = Map<string, string[]>;

/** Adjacency from each agent's `allowed_routes`, limited to known agents. */
export function buildAdjacency(snapshot: CompiledSnapshot): Adjacency {
  const keys = new Set(snapshot.agents.map((a) => a.key));
  const adj: Adjacency = new Map();
  for (const agent of snapshot.agents) {
    const targets = adj.get(agent.key) ?? [];
    for (const to of agent.allowed_routes) {
      if (keys.has(to) && !targets.includes(to)) targets.push(to);
    }
    adj.set(agent.key, targets);
  }
  return adj;
}

/** Iterative breadth-first search; returns every node reachable from `start`, `start` included. */
export function reachableFrom(adj: Adjacency, start: string): Set<string> {
  const visited = new Set<string>([start]);
  const queue: string[] = [start];
  let head = 0;
  while (head < queue.length) {
    const cur = queue[head++];
    if (cur === undefined) break;
    for (const nxt of adj.get(cur) ?? []) {
      if (visited.has(nxt)) continue;
      visited.add(nxt);
      queue.push(nxt);
    }
  }
  return visited;
}

export function isOnCycle(adj: Adjacency, node: string): boolean {
  for (const nxt of adj.get(node) ?? []) {
    if (nxt === node || reachableFrom(adj, nxt).has(node)) return true;
  }
  return false;
}

export function suggestClosest(input: string, options: string[]): string | null {
  let best: { value: string; distance: number } | null = null;
  for (const opt of options) {
    const d = levenshtein(input, opt);
    if (!best || d < best.distance) best = { value: opt, distance: d };
  }
  if (!best) return null;
  const threshold = Math.max(1, Math.floor(Math.max(input.length, best.value.length) * 0.4));
  return best.distance <= threshold ? best.value : null;
}

export function levenshtein(a: string, b: string): number {
  let prev: number[] = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const row: number[] = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      row.push(Math.min((prev[j] ?? 0) + 1, (row[j - 1] ?? 0) + 1, (prev[j - 1] ?? 0) + cost));
    }
    prev = row;
  }
  return prev[b.length] ?? 0;
}

export function didYouMean(input: string, options: string[]): string {
  const hint = suggestClosest(input, options);
  return hint ? ` (did you mean "${hint}"?)` : "";
}
