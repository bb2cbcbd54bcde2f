import { isRecord } from "./task-validation.js";

export class JsonExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JsonExtractionError";
  }
}

const FENCED_JSON = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/;
const MAX_TRUNCATION_ATTEMPTS = 200;

const CLOSER: Record<string, string> = { "{": "}", "[": "]" };

function tryParseObject(text: string): Record<string, unknown> | undefined {
  try {
    const value: unknown = JSON.parse(text);
    return isRecord(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

const stripTrailingCommas = (text: string) => text.replace(/,(\s*[}\]])/g, "$1");

/**
 * Rewrite single-quoted strings as double-quoted ones. Apostrophes inside
 * double-quoted strings are left alone.
 */
function convertSingleQuotes(text: string): string {
  let out = "";
  let quote: '"' | "'" | null = null;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote === null) {
      if (ch === '"' || ch === "'") quote = ch;
      out += ch === "'" ? '"' : ch;
    } else if (ch === "\\" && i + 1 < text.length) {
      const escaped = text[++i];
      out += quote === "'" && escaped === "'" ? "'" : ch + escaped;
    } else if (ch === quote) {
      quote = null;
      out += '"';
    } else {
      out += quote === "'" && ch === '"' ? '\\"' : ch;
    }
  }
  return out;
}

/** Single-quoted strings to double-quoted ones and no trailing commas. */
export function repairJson(text: string): string {
  return stripTrailingCommas(convertSingleQuotes(text));
}

type Cut = { at: number; open: string[] };
type Scan = { end: number } | { cuts: Cut[] };

/**
 * Walk from the first `{`, honoring string literals. Returns the end of the
 * balanced object, or for a truncated reply every point where the text could be
 * cut and closed with the brackets still open there.
 */
function scanObject(text: string): Scan {
  const stack: string[] = [];
  const cuts: Cut[] = [];
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{" || ch === "[") stack.push(ch);
    else if (ch === "}" || ch === "]") {
      stack.pop();
      if (stack.length === 0) return { end: i + 1 };
      cuts.push({ at: i + 1, open: [...stack] });
    } else if (ch === ",") {
      cuts.push({ at: i, open: [...stack] });
    }
  }
  return { cuts };
}

function closeTruncated(text: string, cuts: Cut[]): Record<string, unknown> | undefined {
  const candidates = cuts.slice(-MAX_TRUNCATION_ATTEMPTS).reverse();
  for (const { at, open } of candidates) {
    const closers = [...open].reverse().map(b => CLOSER[b] ?? "").join("");
    const parsed = tryParseObject(stripTrailingCommas(text.slice(0, at) + closers));
    if (parsed) return parsed;
  }
  return undefined;
}

/**
 * Pull the JSON object out of an LLM reply: a fenced block, else the first
 * balanced object, with quote and trailing-comma repair and recovery of a
 * reply that was cut off mid-object.
 */
export function extractJson(content: string): Record<string, unknown> {
  const fenced = FENCED_JSON.exec(content);
  let candidate: string;

  if (fenced) {
    candidate = fenced[1];
  } else {
    const start = content.indexOf("{");
    if (start === -1) throw new JsonExtractionError("No JSON object found in LLM response");
    const body = content.slice(start);
    const scan = scanObject(body);
    if ("end" in scan) {
      candidate = body.slice(0, scan.end);
    } else {
      const closed = closeTruncated(body, scan.cuts) ?? closeTruncated(repairJson(body), scanCuts(repairJson(body)));
      if (closed) return closed;
      throw new JsonExtractionError("No valid JSON found - unbalanced braces");
    }
  }

  const direct = tryParseObject(candidate) ?? tryParseObject(stripTrailingCommas(candidate));
  if (direct) return direct;

  const repaired = repairJson(candidate);
  const fixed = tryParseObject(repaired);
  if (fixed) return fixed;

  const tasksOnly = /"tasks"\s*:\s*\[([\s\S]*)\]/.exec(repaired);
  if (tasksOnly) {
    const minimal = tryParseObject(stripTrailingCommas(`{"tasks": [${tasksOnly[1]}]}`));
    if (minimal) return minimal;
  }

  throw new JsonExtractionError(`Invalid JSON in LLM response: ${candidate.slice(0, 200)}`);
}

function scanCuts(text: string): Cut[] {
  const scan = scanObject(text);
  return "cuts" in scan ? scan.cuts : [];
}
