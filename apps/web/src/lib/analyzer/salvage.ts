/**
 * Heuristic Salvage
 *
 * Last-resort, field-by-field scrape of near-JSON model output (truncated,
 * unbalanced or prose-wrapped) when no object can be parsed at all.
 *
 * Known limitation: a field's value span ends at the marker of the first key
 * that comes after it in EXPECTED_KEYS. If the model emits fields in another
 * order, spans run long and salvage quality degrades.
 *
 * @module analyzer/salvage
 */

import { EXPECTED_KEYS, isListField, type ExtractionCandidate } from "./types";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function keyMarker(key: string): RegExp {
  return new RegExp(`"${escapeRegExp(key)}"\\s*:`);
}

function nextKeyMarker(key: string): RegExp {
  return new RegExp(`,?\\s*"${escapeRegExp(key)}"\\s*:`);
}

const LIST_MARKER_CHARS = " -•\t\r\n";

function stripChars(value: string, chars: string): string {
  let start = 0;
  let end = value.length;
  while (start < end && chars.includes(value[start])) start++;
  while (end > start && chars.includes(value[end - 1])) end--;
  return value.slice(start, end);
}

function salvageList(rawValue: string): string[] {
  const bracketed = /\[([\s\S]*?)]/.exec(rawValue);
  const inside = bracketed ? bracketed[1] : rawValue;

  const quoted = Array.from(inside.matchAll(/"([^"\n]+)"/g), (m) => m[1]);
  if (quoted.length > 0) return quoted;

  return inside
    .split(/[\n;]+/)
    .map((piece) => stripChars(piece, LIST_MARKER_CHARS))
    .filter((piece) => piece.length > 0);
}

function salvageText(rawValue: string): string {
  const wrapped = /^"([\s\S]*)"$/.exec(rawValue);
  const value = wrapped ? wrapped[1] : rawValue;
  return value.replace(/\\"/g, "\"").trim();
}

/**
 * Recover whatever known fields can be found in `text`. Total: returns an
 * empty candidate when no key marker is present.
 */
export function salvageAnalysisFields(text: string): ExtractionCandidate {
  const result: ExtractionCandidate = {};
  const raw = String(text ?? "");
  if (!raw) return result;

  EXPECTED_KEYS.forEach((key, idx) => {
    const match = keyMarker(key).exec(raw);
    if (!match) return;

    const start = match.index + match[0].length;
    let end = raw.length;
    const rest = raw.slice(start);

    for (const nextKey of EXPECTED_KEYS.slice(idx + 1)) {
      const next = nextKeyMarker(nextKey).exec(rest);
      if (next) {
        end = start + next.index;
        break;
      }
    }

    const rawValue = raw.slice(start, end).trim().replace(/,$/, "").trim();
    if (!rawValue) return;

    result[key] = isListField(key) ? salvageList(rawValue) : salvageText(rawValue);
  });

  return result;
}
