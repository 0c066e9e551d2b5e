/**
 * JSON extraction utilities for recovering structured outputs from LLM text.
 *
 * Each strategy is a pure `text -> candidate | null` function. They are tried in
 * a fixed order and the first one that yields an object wins. None of them
 * throws on malformed input.
 */

import { jsonrepair } from "jsonrepair";
import {
  isPlainObject,
  type ExtractionCandidate,
  type ExtractionOutcome,
  type ExtractionStrategy,
} from "./types";

const ERROR_PREVIEW_CHARS = 220;

function parseObject(text: string): ExtractionCandidate | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Strategy 1: the whole trimmed text is a JSON object.
 */
export function parseDirect(text: string): ExtractionCandidate | null {
  return parseObject(String(text ?? "").trim());
}

/**
 * Strategy 2: generic repair pass (trailing commas, missing quotes, truncated
 * brackets, capitalized True/False/None...). The repaired text may itself be a
 * JSON string that encodes the object, so one more parse is attempted then.
 */
export function parseRepaired(text: string): ExtractionCandidate | null {
  let repaired: string;
  try {
    repaired = jsonrepair(String(text ?? "").trim());
  } catch {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(repaired);
  } catch {
    return null;
  }
  if (isPlainObject(parsed)) return parsed;
  if (typeof parsed === "string") return parseObject(parsed);
  return null;
}

const FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)\s*```/i;

/**
 * Strategy 3: first fenced code block, optionally tagged `json`.
 */
export function parseFenced(text: string): ExtractionCandidate | null {
  const match = FENCE_PATTERN.exec(String(text ?? ""));
  if (!match) return null;
  return parseObject(match[1].trim());
}

/**
 * Return the first balanced `{...}` region of `text`, or null if none closes.
 *
 * Quoted strings are skipped so braces inside them do not count. A string ends
 * only at the quote character that opened it, which keeps a `"` inside a
 * single-quoted dict value (or an apostrophe inside a JSON string) from
 * derailing the scan.
 */
export function extractFirstJsonObjectFromText(text: string): string | null {
  const raw = String(text ?? "");
  const start = raw.indexOf("{");
  if (start < 0) return null;

  let depth = 0;
  let quote: '"' | "'" | null = null;

  for (let i = start; i < raw.length; i++) {
    const ch = raw[i];

    if (quote) {
      if (ch === "\\") i++;
      else if (ch === quote) quote = null;
      continue;
    }

    if (ch === '"' || ch === "'") quote = ch;
    else if (ch === "{") depth++;
    else if (ch === "}" && --depth === 0) return raw.slice(start, i + 1);
  }

  return null;
}

/**
 * Permissive literal-structure parse for dict-like output: single-quoted keys and
 * values, trailing commas, and capitalized True/False/None outside of strings.
 */
export function parseLiteralObject(text: string): ExtractionCandidate | null {
  try {
    return parseObject(jsonrepair(String(text ?? "")));
  } catch {
    return null;
  }
}

/**
 * Strategy 4: first balanced `{...}` region. When it is not valid JSON the
 * permissive literal parse is tried on the same region.
 */
export function parseBalancedBraces(
  text: string,
): { candidate: ExtractionCandidate; strategy: "brace" | "literal" } | null {
  const region = extractFirstJsonObjectFromText(text);
  if (!region) return null;

  const parsed = parseObject(region);
  if (parsed) return { candidate: parsed, strategy: "brace" };

  const literal = parseLiteralObject(region);
  if (literal) return { candidate: literal, strategy: "literal" };
  return null;
}

/**
 * Run the extraction strategies in order and return the first object found.
 * Failure is reported in the result, never thrown.
 */
export function extractJsonObject(text: string): ExtractionOutcome {
  const trimmed = String(text ?? "").trim();

  const ordered: Array<[ExtractionStrategy, (t: string) => ExtractionCandidate | null]> = [
    ["direct", parseDirect],
    ["repair", parseRepaired],
    ["fenced", parseFenced],
  ];
  for (const [strategy, run] of ordered) {
    const candidate = run(trimmed);
    if (candidate) return { ok: true, candidate, strategy };
  }

  const balanced = parseBalancedBraces(trimmed);
  if (balanced) return { ok: true, ...balanced };

  return {
    ok: false,
    error:
      "No valid JSON object found in model response. " +
      `Raw model output starts with: ${JSON.stringify(trimmed.slice(0, ERROR_PREVIEW_CHARS))}`,
  };
}
