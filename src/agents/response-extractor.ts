/**
 * Cliniq - Response Extractor
 *
 * Pulls one JSON object out of model output that may be fenced, wrapped in
 * prose, commented, or not JSON at all. Never throws; the worst case is `{}`.
 */

import { isRecord, type JsonObject } from "../shared/json.ts";

/** Remove a leading ```lang fence and a trailing ``` fence. */
export function stripCodeFence(raw: string): string {
  return raw
    .trim()
    .replace(/^```[\w-]*[ \t]*\r?\n?/, "")
    .replace(/\r?\n?```\s*$/, "")
    .trim();
}

function parseObject(text: string): JsonObject | undefined {
  try {
    const value: unknown = JSON.parse(text);
    return isRecord(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

/** Drop `//` line comments that sit outside string literals. */
export function stripLineComments(text: string): string {
  let out = "";
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (inString) {
      out += ch;
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
      out += ch;
      continue;
    }
    if (ch === "/" && text.charAt(i + 1) === "/") {
      const newline = text.indexOf("\n", i);
      if (newline === -1) break;
      i = newline - 1;
      continue;
    }
    out += ch;
  }
  return out;
}

/** The first `{...}` span whose braces balance, ignoring braces inside strings. */
export function firstBalancedObject(text: string): string | undefined {
  const start = text.indexOf("{");
  if (start === -1) return undefined;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text.charAt(i);
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return undefined;
}

export function extractJsonObject(raw: string): JsonObject {
  const cleaned = stripCodeFence(raw);

  const direct = parseObject(cleaned);
  if (direct) return direct;

  const first = cleaned.indexOf("{");
  const last = cleaned.lastIndexOf("}");
  if (first !== -1 && last > first) {
    const greedy = parseObject(stripLineComments(cleaned.slice(first, last + 1)));
    if (greedy) return greedy;
  }

  const balanced = firstBalancedObject(stripLineComments(cleaned));
  return (balanced && parseObject(balanced)) || {};
}

/** The routed skill name, or undefined when the output names none. */
export function extractSkillChoice(raw: string): string | undefined {
  const skill = extractJsonObject(raw).skill;
  return typeof skill === "string" && skill.trim() ? skill.trim() : undefined;
}
