import { ParseError } from "./errors.js";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

const FENCE_LINE = /^\s*(?:```|~~~)[\w-]*\s*$/;

function stripFences(text: string): string {
  return text
    .split(/\r?\n/)
    .filter((line) => !FENCE_LINE.test(line))
    .join("\n");
}

function tryParse(text: string): { ok: true; value: JsonValue } | { ok: false } {
  const trimmed = text.trim();
  if (!trimmed) return { ok: false };
  try {
    const value: JsonValue = JSON.parse(trimmed);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

/**
 * End index (inclusive) of the balanced span opened at `start`, or -1.
 * Delimiters inside double-quoted strings are ignored.
 */
function matchSpan(text: string, start: number): number {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === "{" || ch === "[") {
      stack.push(ch === "{" ? "}" : "]");
    } else if (ch === "}" || ch === "]") {
      if (stack.pop() !== ch) return -1;
      if (stack.length === 0) return i;
    }
  }
  return -1;
}

/** Balanced `{…}` / `[…]` spans in order of their opening delimiter. */
export function candidateSpans(text: string): string[] {
  const spans: string[] = [];
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch !== "{" && ch !== "[") continue;
    const end = matchSpan(text, i);
    if (end !== -1) spans.push(text.slice(i, end + 1));
  }
  return spans;
}

function isStructured(value: JsonValue): boolean {
  return value !== null && typeof value === "object";
}

/**
 * Recovers a JSON mapping or list from loosely formatted generator text:
 * fenced blocks, prose around the payload, or a bare document. A bare scalar
 * is not a payload.
 */
export function extractPayload(text: string): JsonValue {
  const cleaned = stripFences(text.replace(/^\uFEFF/, ""));

  const whole = tryParse(cleaned);
  if (whole.ok && isStructured(whole.value)) return whole.value;

  for (const span of candidateSpans(cleaned)) {
    const parsed = tryParse(span);
    if (parsed.ok) return parsed.value;
  }

  throw new ParseError(text);
}

export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return value !== null && value !== undefined && typeof value === "object" && !Array.isArray(value);
}
