/**
 * Analysis Schemas
 *
 * Zod schema for the public AnalysisResult and the JSON schema sent upstream
 * for schema-constrained generation.
 *
 * @module analyzer/analysis-schema
 */

import { z } from "zod";
import { EXPECTED_KEYS, type AnalysisResult } from "./types";

const listOfText = z.array(z.string().trim().min(1));

export const AnalysisResultSchema = z
  .object({
    market_competition: z.string(),
    monetization_potential: z.string(),
    target_users: z.string(),
    feature_suggestions: listOfText,
    mvp_plan: listOfText,
    risk_score: z.string(),
    summary: z.string(),
  })
  .strict() satisfies z.ZodType<AnalysisResult>;

/** Best-effort hint for the upstream; the pipeline does not rely on it being honoured. */
export const RESPONSE_JSON_SCHEMA = {
  type: "object",
  properties: {
    market_competition: { type: "string" },
    monetization_potential: { type: "string" },
    target_users: { type: "string" },
    feature_suggestions: { type: "array", items: { type: "string" } },
    mvp_plan: { type: "array", items: { type: "string" } },
    risk_score: { type: "string" },
    summary: { type: "string" },
  },
  required: [...EXPECTED_KEYS],
  additionalProperties: false,
} as const;
