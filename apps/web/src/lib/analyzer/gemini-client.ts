/**
 * Gemini generateContent client
 *
 * https://ai.google.dev/api/generate-content
 *
 * One call per invocation, no internal retries: retry policy belongs to the
 * analyzer.
 *
 * @module analyzer/gemini-client
 */

import { z } from "zod";
import type { AnalyzerConfig } from "../config";
import { UpstreamFormatError, UpstreamTransportError } from "../errors";
import { RESPONSE_JSON_SCHEMA } from "./analysis-schema";
import type { GenerationParams } from "./prompts";
import type { RawModelOutput } from "./types";

export interface GenerateRequest extends GenerationParams {
  prompt: string;
}

export type GenerateFn = (request: GenerateRequest, config: AnalyzerConfig) => Promise<RawModelOutput>;

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string() })).min(1),
        }),
        finishReason: z.string().optional(),
      }),
    )
    .min(1),
});

const ERROR_BODY_MAX_CHARS = 2000;

export function buildGeminiRequestBody(request: GenerateRequest) {
  return {
    contents: [{ parts: [{ text: request.prompt }] }],
    generationConfig: {
      temperature: request.temperature,
      maxOutputTokens: request.maxOutputTokens,
      responseMimeType: "application/json",
      responseJsonSchema: RESPONSE_JSON_SCHEMA,
    },
  };
}

function preview(value: unknown): string {
  try {
    return JSON.stringify(value).slice(0, 500);
  } catch {
    return String(value).slice(0, 500);
  }
}

function transportFailure(error: unknown, status: number | null, timeoutMs: number): UpstreamTransportError {
  const errorMsg = error instanceof Error ? error.message : String(error);
  const timedOut = error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
  console.error(`[Gemini] ❌ ${status === null ? "Fetch" : "Body read"} failed: ${errorMsg}`);
  return new UpstreamTransportError(
    status,
    "",
    timedOut ? `Gemini request timed out after ${timeoutMs}ms` : `Gemini request failed: ${errorMsg}`,
    timedOut,
  );
}

export async function generateGeminiContent(
  request: GenerateRequest,
  config: AnalyzerConfig,
): Promise<RawModelOutput> {
  const endpoint = `${config.apiBaseUrl}/models/${encodeURIComponent(config.model)}:generateContent`;
  const params = new URLSearchParams({ key: config.apiKey });

  console.log(
    `[Gemini] Calling ${config.model} (temperature=${request.temperature}, maxOutputTokens=${request.maxOutputTokens})`,
  );

  const startTime = Date.now();
  let res: Response;
  try {
    res = await fetch(`${endpoint}?${params.toString()}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(buildGeminiRequestBody(request)),
      signal: AbortSignal.timeout(config.timeoutMs),
    });
  } catch (error) {
    throw transportFailure(error, null, config.timeoutMs);
  }
  const latencyMs = Date.now() - startTime;

  console.log(`[Gemini] Response received in ${latencyMs}ms - Status: ${res.status}`);

  if (!res.ok) {
    let errorBody = "";
    try {
      errorBody = (await res.text()).slice(0, ERROR_BODY_MAX_CHARS);
    } catch (e) {
      console.warn(`[Gemini] Could not read error body: ${e instanceof Error ? e.message : String(e)}`);
    }
    console.error(`[Gemini] ❌ HTTP error: ${res.status}`, errorBody.substring(0, 500));
    throw new UpstreamTransportError(
      res.status,
      errorBody,
      `Gemini API HTTP ${res.status}: ${errorBody.substring(0, 200) || res.statusText}`,
    );
  }

  // The timeout signal still covers the body read
  let bodyText: string;
  try {
    bodyText = await res.text();
  } catch (error) {
    throw transportFailure(error, res.status, config.timeoutMs);
  }

  let data: unknown;
  try {
    data = JSON.parse(bodyText);
  } catch (error) {
    throw new UpstreamFormatError(
      `Gemini response body is not JSON: ${error instanceof Error ? error.message : String(error)}`,
      bodyText.slice(0, 500),
    );
  }

  const parsed = GeminiResponseSchema.safeParse(data);
  if (!parsed.success) {
    const payloadPreview = preview(data);
    console.error(`[Gemini] ❌ Unexpected response format: ${payloadPreview}`);
    throw new UpstreamFormatError(`Unexpected Gemini response format: ${payloadPreview}`, payloadPreview);
  }

  const candidate = parsed.data.candidates[0];
  return {
    text: candidate.content.parts.map((part) => part.text).join(""),
    finishReason: candidate.finishReason ?? "",
    latencyMs,
  };
}
