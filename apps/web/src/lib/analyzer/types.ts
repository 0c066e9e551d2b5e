/**
 * Idea Analyzer - Shared Types
 *
 * Output contract of the analysis pipeline and the interim shapes that flow
 * between its stages.
 *
 * @module analyzer/types
 */

// ============================================================================
// ANALYSIS RESULT
// ============================================================================

/**
 * Output keys in declaration order. The salvager relies on this order when it
 * looks for the marker that ends a field's value span.
 */
export const EXPECTED_KEYS = [
  "market_competition",
  "monetization_potential",
  "target_users",
  "feature_suggestions",
  "mvp_plan",
  "risk_score",
  "summary",
] as const;

export type AnalysisKey = (typeof EXPECTED_KEYS)[number];

export const LIST_FIELDS = ["feature_suggestions", "mvp_plan"] as const;
export type ListField = (typeof LIST_FIELDS)[number];
export type TextField = Exclude<AnalysisKey, ListField>;

export const NOT_PROVIDED = "Not provided";

export interface AnalysisResult {
  market_competition: string;
  monetization_potential: string;
  target_users: string;
  feature_suggestions: string[];
  mvp_plan: string[];
  risk_score: string;
  summary: string;
}

export function isListField(key: AnalysisKey): key is ListField {
  return key === "feature_suggestions" || key === "mvp_plan";
}

// ============================================================================
// PIPELINE INTERIM SHAPES
// ============================================================================

/** Untyped mapping recovered from model text, before validation. */
export type ExtractionCandidate = Record<string, unknown>;

/** Text and finish reason returned by one upstream call. */
export interface RawModelOutput {
  text: string;
  /** Empty when the upstream did not report one. */
  finishReason: string;
  latencyMs: number;
}

export type ExtractionStrategy = "direct" | "repair" | "fenced" | "brace" | "literal";

export type ExtractionOutcome =
  | { ok: true; candidate: ExtractionCandidate; strategy: ExtractionStrategy }
  | { ok: false; error: string };

export type CandidateSource = ExtractionStrategy | "salvage";

export interface ParsedModelOutput {
  candidate: ExtractionCandidate;
  source: CandidateSource;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
