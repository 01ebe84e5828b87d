import { createHash } from "node:crypto";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function parseJsonOr(value: string | null | undefined, fallback: unknown): unknown {
  if (value === null || value === undefined) return fallback;
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch {
    return fallback;
  }
}

/** JSON with sorted object keys; `undefined` members are dropped like JSON.stringify does. */
export function stableStringify(value: unknown): string {
  if (value === undefined) return "null";
  if (Array.isArray(value)) return `[${value.map((v) => stableStringify(v)).join(",")}]`;
  if (!isRecord(value)) return JSON.stringify(value);
  const obj = value;
  const keys = Object.keys(obj).filter((k) => obj[k] !== undefined).sort();
  return `{${keys.map((k) => `${JSON.stringify(k)}:${stableStringify(obj[k])}`).join(",")}}`;
}

/**
 * JSON.stringify that never throws. BigInts become decimal strings and a
 * reference back to an enclosing object becomes "[Circular]". Returns
 * undefined where JSON.stringify would, or when a `toJSON` throws.
 */
export function safeJsonStringify(value: unknown, space?: number): string | undefined {
  const ancestors: unknown[] = [];
  try {
    return JSON.stringify(
      value,
      function (this: unknown, _key: string, v: unknown): unknown {
        if (typeof v === "bigint") return v.toString();
        if (v === null || typeof v !== "object") return v;
        while (ancestors.length > 0 && ancestors[ancestors.length - 1] !== this) ancestors.pop();
        if (ancestors.includes(v)) return "[Circular]";
        ancestors.push(v);
        return v;
      },
      space,
    );
  } catch {
    return undefined;
  }
}

/** A copy sharing nothing with `value`. What structuredClone rejects goes through JSON instead. */
export function detachedCopy(value: unknown): unknown {
  try {
    return structuredClone(value);
  } catch {
    return parseJsonOr(safeJsonStringify(value), null);
  }
}

export function sha256(value: unknown): string {
  return createHash("sha256").update(stableStringify(value)).digest("hex");
}

export function omitKeys(obj: Record<string, unknown>, keys: readonly string[]): Record<string, unknown> {
  if (keys.length === 0) return { ...obj };
  const drop = new Set(keys);
  return Object.fromEntries(Object.entries(obj).filter(([k]) => !drop.has(k)));
}

export function deepFreeze<T>(value: T): Readonly<T> {
  // Typed arrays with elements cannot be frozen.
  if (ArrayBuffer.isView(value) || value instanceof ArrayBuffer) return value;
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
