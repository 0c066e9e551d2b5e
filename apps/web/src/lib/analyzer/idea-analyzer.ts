/**
 * Idea Analyzer
 *
 * Runs the upstream call and the parse → salvage → normalize pipeline, retrying
 * once with tighter instructions when the first answer is unusable. Always
 * returns a complete AnalysisResult unless the credential is missing, the
 * upstream envelope is malformed, or the final attempt fails in transport.
 *
 * @module analyzer/idea-analyzer
 */

import { hasApiKey, loadAnalyzerConfig, type AnalyzerConfig } from "../config";
import { classifyAnalysisError } from "../error-classification";
import { ConfigurationError } from "../errors";
import { AnalysisResultSchema } from "./analysis-schema";
import { generateGeminiContent, type GenerateFn } from "./gemini-client";
import { missingKeys, normalizeAnalysisResult } from "./normalize";
import { parseModelOutput } from "./parse-model-output";
import {
  FIRST_ATTEMPT,
  RETRY_ATTEMPT,
  buildAnalysisPrompt,
  buildRetryPrompt,
  type GenerationParams,
} from "./prompts";
import { NOT_PROVIDED, type AnalysisResult, type ExtractionCandidate } from "./types";

export interface AnalyzeOptions {
  config?: AnalyzerConfig;
  /** Upstream call; defaults to the Gemini client. */
  generate?: GenerateFn;
}

type AttemptResult = { candidate: ExtractionCandidate | null; finishReason: string };

async function runAttempt(
  attempt: 1 | 2,
  prompt: string,
  params: GenerationParams,
  config: AnalyzerConfig,
  generate: GenerateFn,
): Promise<AttemptResult> {
  console.log(`[Analyzer] Attempt ${attempt}/2`);
  const output = await generate({ prompt, ...params }, config);
  const { candidate, source } = parseModelOutput(output.text);

  if (Object.keys(candidate).length === 0) {
    console.warn(
      `[Analyzer] Attempt ${attempt} produced no usable fields (finishReason=${output.finishReason || "unknown"})`,
    );
    return { candidate: null, finishReason: output.finishReason };
  }

  const missing = missingKeys(candidate);
  console.log(
    `[Analyzer] Attempt ${attempt} parsed via ${source}` +
      (missing.length > 0 ? `; defaulting ${missing.join(", ")}` : ""),
  );
  return { candidate, finishReason: output.finishReason };
}

/** Normalize, then check the public shape; a failure here is a normalizer bug. */
function finalizeResult(candidate: ExtractionCandidate): AnalysisResult {
  return AnalysisResultSchema.parse(normalizeAnalysisResult(candidate));
}

export function buildPlaceholderResult(firstFinishReason: string, secondFinishReason: string): AnalysisResult {
  return finalizeResult({
    market_competition: NOT_PROVIDED,
    monetization_potential: NOT_PROVIDED,
    target_users: NOT_PROVIDED,
    feature_suggestions: [],
    mvp_plan: [],
    risk_score: NOT_PROVIDED,
    summary:
      "The model response was unusable. " +
      `finishReason(s): ${firstFinishReason || "unknown"}, ${secondFinishReason || "unknown"}.`,
  });
}

/**
 * Analyze a project idea. `idea` is expected to be non-empty; the HTTP layer
 * rejects empty input before calling this.
 */
export async function analyzeProjectIdea(idea: string, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
  const config = options.config ?? loadAnalyzerConfig();
  const generate = options.generate ?? generateGeminiContent;

  if (!hasApiKey(config)) {
    throw new ConfigurationError("Missing GEMINI_API_KEY in environment.");
  }

  let firstFinishReason = "";
  try {
    const first = await runAttempt(1, buildAnalysisPrompt(idea), FIRST_ATTEMPT, config, generate);
    if (first.candidate) return finalizeResult(first.candidate);
    firstFinishReason = first.finishReason;
  } catch (error) {
    const classified = classifyAnalysisError(error);
    if (!classified.retriable) throw error;
    console.warn(`[Analyzer] Attempt 1 failed (${classified.category}), retrying: ${classified.message}`);
  }

  // Transport failures here propagate: there is no attempt left to absorb them.
  const second = await runAttempt(2, buildRetryPrompt(idea), RETRY_ATTEMPT, config, generate);
  if (second.candidate) return finalizeResult(second.candidate);

  console.warn("[Analyzer] Both attempts unusable, returning placeholder result");
  return buildPlaceholderResult(firstFinishReason, second.finishReason);
}
