/**
 * Response Normalization
 *
 * Turns any recovered mapping into a complete AnalysisResult. Total function:
 * every input, including `{}`, yields all seven keys with the right types.
 *
 * @module analyzer/normalize
 */

import {
  EXPECTED_KEYS,
  NOT_PROVIDED,
  type AnalysisResult,
  type ExtractionCandidate,
  type ListField,
  type TextField,
} from "./types";

function toText(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "object" && value !== null) {
    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

function normalizeList(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  const items: unknown[] = Array.isArray(value) ? value : [value];
  return items.map((item) => toText(item).trim()).filter((item) => item.length > 0);
}

function normalizeText(value: unknown): string {
  if (value === undefined || value === null) return NOT_PROVIDED;
  return toText(value);
}

export function normalizeAnalysisResult(payload: ExtractionCandidate): AnalysisResult {
  const text = (key: TextField) => normalizeText(payload[key]);
  const list = (key: ListField) => normalizeList(payload[key]);

  return {
    market_competition: text("market_competition"),
    monetization_potential: text("monetization_potential"),
    target_users: text("target_users"),
    feature_suggestions: list("feature_suggestions"),
    mvp_plan: list("mvp_plan"),
    risk_score: text("risk_score"),
    summary: text("summary"),
  };
}

/** Keys absent from the raw candidate, which normalization will default (for logging). */
export function missingKeys(payload: ExtractionCandidate): string[] {
  return EXPECTED_KEYS.filter((key) => !(key in payload));
}
