import { z } from "zod";
import { isRecord, safeJsonStringify } from "./json-utils.js";

export const DEFAULT_REQUEST_PREVIEW_LIMIT = 50;
export const DEFAULT_RESPONSE_PREVIEW_LIMIT = 100;

export type PathToken = string | number;

export const PreviewFieldSchema = z
  .object({
    path: z.string().min(1).refine((p) => parsePath(p) !== null, { message: "invalid field path" }),
    label: z.string().min(1).optional(),
    max_chars: z.number().int().min(0).optional(),
  })
  .strict();

export const PreviewToolSchema = z
  .object({
    request: z.array(PreviewFieldSchema).default([]),
    response: z.array(PreviewFieldSchema).default([]),
    request_max_chars: z.number().int().min(0).optional(),
    response_max_chars: z.number().int().min(0).optional(),
  })
  .strict();

export const PreviewPolicySchema = z
  .object({
    defaults: z
      .object({
        request_max_chars: z.number().int().min(0).default(120),
        response_max_chars: z.number().int().min(0).default(200),
      })
      .strict()
      .default({}),
    tools: z
      .record(z.string().trim().min(1), PreviewToolSchema)
      .default({}),
  })
  .strict();

export type PreviewField = z.infer<typeof PreviewFieldSchema>;
export type PreviewToolRules = z.infer<typeof PreviewToolSchema>;
export type PreviewPolicy = z.infer<typeof PreviewPolicySchema>;

export interface ToolPreviews {
  request_preview: string;
  response_preview: string;
  request_excerpt?: Record<string, string>;
  response_excerpt?: Record<string, string>;
}

/** Cuts `text` to `limit` characters, the trailing `…` included. A limit of 0 keeps everything. */
export function truncate(text: string, limit: number): string {
  if (limit <= 0 || text.length <= limit) return text;
  let cut = limit - 1;
  // Never split a surrogate pair.
  const last = text.charCodeAt(cut - 1);
  if (last >= 0xd800 && last <= 0xdbff) cut -= 1;
  return `${text.slice(0, cut)}…`;
}

export function stringifyPreview(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined) return "";
  return safeJsonStringify(value) ?? String(value);
}

/**
 * Splits `data.items[0]` or `["odd key"].x` into tokens.
 * Returns null for unbalanced brackets or empty segments.
 */
export function parsePath(path: string): PathToken[] | null {
  const tokens: PathToken[] = [];
  let i = 0;
  let expectSegment = true;

  while (i < path.length) {
    const ch = path[i];
    if (ch === ".") {
      if (expectSegment) return null;
      expectSegment = true;
      i++;
      continue;
    }
    if (ch === "[") {
      const close = findClosingBracket(path, i);
      if (close === -1) return null;
      const inner = path.slice(i + 1, close).trim();
      const quoted = /^(["'])(.*)\1$/.exec(inner);
      if (quoted) {
        tokens.push(quoted[2] ?? "");
      } else if (/^\d+$/.test(inner)) {
        tokens.push(Number(inner));
      } else {
        return null;
      }
      expectSegment = false;
      i = close + 1;
      continue;
    }
    if (!expectSegment) return null;
    let end = i;
    while (end < path.length && path[end] !== "." && path[end] !== "[") end++;
    tokens.push(path.slice(i, end));
    expectSegment = false;
    i = end;
  }

  if (expectSegment || tokens.length === 0) return null;
  return tokens;
}

function findClosingBracket(path: string, open: number): number {
  const first = path[open + 1];
  if (first === '"' || first === "'") {
    const endQuote = path.indexOf(first, open + 2);
    if (endQuote === -1) return -1;
    return path[endQuote + 1] === "]" ? endQuote + 1 : -1;
  }
  return path.indexOf("]", open);
}

export type PathLookup = { found: true; value: unknown } | { found: false };

function walk(payload: unknown, tokens: PathToken[]): PathLookup {
  let cur: unknown = payload;
  for (const token of tokens) {
    if (typeof token === "number") {
      if (!Array.isArray(cur) || token >= cur.length) return { found: false };
      cur = cur[token];
    } else {
      if (!isRecord(cur) || !Object.prototype.hasOwnProperty.call(cur, token)) return { found: false };
      cur = cur[token];
    }
  }
  return { found: true, value: cur };
}

/** Looks up `path`, retrying without its first segment when that misses (`result.x` finds `x`). */
export function resolvePath(payload: unknown, path: string): PathLookup {
  const tokens = parsePath(path);
  if (!tokens) return { found: false };
  const direct = walk(payload, tokens);
  if (direct.found || tokens.length < 2) return direct;
  return walk(payload, tokens.slice(1));
}

function renderFields(
  payload: unknown,
  fields: PreviewField[],
  limit: number,
): { preview: string; excerpt: Record<string, string> } | null {
  const parts: string[] = [];
  const excerpt: Record<string, string> = {};
  for (const field of fields) {
    const hit = resolvePath(payload, field.path);
    if (!hit.found) continue;
    const label = field.label ?? field.path;
    const text = field.max_chars === undefined ? stringifyPreview(hit.value) : truncate(stringifyPreview(hit.value), field.max_chars);
    excerpt[label] = text;
    parts.push(`${label}=${text}`);
  }
  if (parts.length === 0) return null;
  return { preview: truncate(parts.join("; "), limit), excerpt };
}

export function buildToolPreviews(
  policy: PreviewPolicy | undefined,
  toolKey: string,
  request: unknown,
  response: unknown,
): ToolPreviews {
  if (!policy) {
    return {
      request_preview: truncate(stringifyPreview(request), DEFAULT_REQUEST_PREVIEW_LIMIT),
      response_preview: truncate(stringifyPreview(response), DEFAULT_RESPONSE_PREVIEW_LIMIT),
    };
  }

  const rules = policy.tools[toolKey];
  const requestLimit = rules?.request_max_chars ?? policy.defaults.request_max_chars;
  const responseLimit = rules?.response_max_chars ?? policy.defaults.response_max_chars;

  const out: ToolPreviews = {
    request_preview: truncate(stringifyPreview(request), requestLimit),
    response_preview: truncate(stringifyPreview(response), responseLimit),
  };

  const req = rules ? renderFields(request, rules.request, requestLimit) : null;
  if (req) {
    out.request_preview = req.preview;
    out.request_excerpt = req.excerpt;
  }
  const res = rules ? renderFields(response, rules.response, responseLimit) : null;
  if (res) {
    out.response_preview = res.preview;
    out.response_excerpt = res.excerpt;
  }
  return out;
}
