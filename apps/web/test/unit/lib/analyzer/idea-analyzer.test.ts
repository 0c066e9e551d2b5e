/**
 * Idea Analyzer Test Suite
 *
 * Retry and fallback behaviour of analyzeProjectIdea with an injected upstream call.
 *
 * @module analyzer/idea-analyzer.test
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { analyzeProjectIdea, buildPlaceholderResult } from "@/lib/analyzer/idea-analyzer";
import { AnalysisResultSchema } from "@/lib/analyzer/analysis-schema";
import type { GenerateFn, GenerateRequest } from "@/lib/analyzer/gemini-client";
import type { RawModelOutput } from "@/lib/analyzer/types";
import type { AnalyzerConfig } from "@/lib/config";
import { ConfigurationError, UpstreamFormatError, UpstreamTransportError } from "@/lib/errors";

const CONFIG: AnalyzerConfig = {
  apiKey: "test-secret",
  model: "gemini-2.5-flash",
  apiBaseUrl: "https://example.test/v1beta",
  timeoutMs: 5000,
};

const IDEA = "A habit tracker for remote teams";

const COMPLETE = {
  market_competition: "low",
  monetization_potential: "ads",
  target_users: "devs",
  feature_suggestions: ["a", "b"],
  mvp_plan: ["step1"],
  risk_score: "low",
  summary: "ok",
};

const DEFAULTS = {
  market_competition: "Not provided",
  monetization_potential: "Not provided",
  target_users: "Not provided",
  feature_suggestions: [],
  mvp_plan: [],
  risk_score: "Not provided",
  summary: "Not provided",
};

function output(text: string, finishReason = "STOP"): RawModelOutput {
  return { text, finishReason, latencyMs: 10 };
}

function mockGenerate() {
  return vi.fn<GenerateFn>();
}

function requestOf(generate: ReturnType<typeof mockGenerate>, call: number): GenerateRequest {
  return generate.mock.calls[call][0];
}

describe("analyzeProjectIdea", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("fails fast without an API key", async () => {
    const generate = mockGenerate();
    await expect(
      analyzeProjectIdea(IDEA, { config: { ...CONFIG, apiKey: "" }, generate }),
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(generate).not.toHaveBeenCalled();
  });

  it("returns the first parsed answer without retrying", async () => {
    const generate = mockGenerate().mockResolvedValueOnce(output(JSON.stringify(COMPLETE)));

    const result = await analyzeProjectIdea(IDEA, { config: CONFIG, generate });

    expect(result).toEqual(COMPLETE);
    expect(generate).toHaveBeenCalledTimes(1);
    const request = requestOf(generate, 0);
    expect(request.temperature).toBe(0.35);
    expect(request.maxOutputTokens).toBe(1400);
    expect(request.prompt).toContain(`Project idea:\n${IDEA}`);
    expect(generate.mock.calls[0][1]).toBe(CONFIG);
  });

  it("checks the returned result against the public schema", async () => {
    const parseSpy = vi.spyOn(AnalysisResultSchema, "parse");
    const generate = mockGenerate().mockResolvedValueOnce(output('{"summary": "ok", "mvp_plan": "ship it", "extra": 1}'));

    const result = await analyzeProjectIdea(IDEA, { config: CONFIG, generate });

    expect(result).toEqual({ ...DEFAULTS, summary: "ok", mvp_plan: ["ship it"] });
    expect(parseSpy).toHaveBeenCalledTimes(1);
    expect(parseSpy).toHaveBeenCalledWith({ ...DEFAULTS, summary: "ok", mvp_plan: ["ship it"] });
  });

  it("normalizes a partial answer recovered from prose", async () => {
    const generate = mockGenerate().mockResolvedValueOnce(
      output('Here is the result: {"summary": "Good idea", "risk_score": "medium"} extra trailing text'),
    );

    const result = await analyzeProjectIdea(IDEA, { config: CONFIG, generate });

    expect(result).toEqual({ ...DEFAULTS, summary: "Good idea", risk_score: "medium" });
  });

  it("recovers a fenced answer", async () => {
    const generate = mockGenerate().mockResolvedValueOnce(
      output(`Sure, here it is:\n\`\`\`json\n${JSON.stringify(COMPLETE)}\n\`\`\``),
    );

    expect(await analyzeProjectIdea(IDEA, { config: CONFIG, generate })).toEqual(COMPLETE);
  });

  it("retries once with tighter parameters when the first answer is unusable", async () => {
    const generate = mockGenerate()
      .mockResolvedValueOnce(output("", "MAX_TOKENS"))
      .mockResolvedValueOnce(output(JSON.stringify(COMPLETE)));

    const result = await analyzeProjectIdea(IDEA, { config: CONFIG, generate });

    expect(result).toEqual(COMPLETE);
    expect(generate).toHaveBeenCalledTimes(2);
    const retry = requestOf(generate, 1);
    expect(retry.temperature).toBe(0.2);
    expect(retry.maxOutputTokens).toBe(1800);
    expect(retry.prompt.startsWith("Retry the same analysis.")).toBe(true);
    expect(retry.prompt).toContain(IDEA);
  });

  it("returns a placeholder naming both finish reasons when both answers are unusable", async () => {
    const generate = mockGenerate()
      .mockResolvedValueOnce(output("{}", "SAFETY"))
      .mockResolvedValueOnce(output("   ", ""));

    const result = await analyzeProjectIdea(IDEA, { config: CONFIG, generate });

    expect(result).toEqual({
      ...DEFAULTS,
      summary: "The model response was unusable. finishReason(s): SAFETY, unknown.",
    });
  });

  it("absorbs a transport failure on the first attempt", async () => {
    const generate = mockGenerate()
      .mockRejectedValueOnce(new UpstreamTransportError(503, "overloaded", "Gemini API HTTP 503: overloaded"))
      .mockResolvedValueOnce(output(JSON.stringify(COMPLETE)));

    expect(await analyzeProjectIdea(IDEA, { config: CONFIG, generate })).toEqual(COMPLETE);
    expect(generate).toHaveBeenCalledTimes(2);
  });

  it("reports an unknown first finish reason after a first-attempt timeout", async () => {
    const generate = mockGenerate()
      .mockRejectedValueOnce(new UpstreamTransportError(null, "", "Gemini request timed out after 5000ms", true))
      .mockResolvedValueOnce(output("no fields here", "STOP"));

    const result = await analyzeProjectIdea(IDEA, { config: CONFIG, generate });

    expect(result.summary).toBe("The model response was unusable. finishReason(s): unknown, STOP.");
  });

  it("retries when the first response body times out mid-read", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const envelope = { candidates: [{ content: { parts: [{ text: JSON.stringify(COMPLETE) }] }, finishReason: "STOP" }] };
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce({
        ok: true,
        status: 200,
        statusText: "OK",
        text: () =>
          Promise.reject(Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" })),
      })
      .mockResolvedValueOnce({
        ok: true,
        status: 200,
        statusText: "OK",
        text: () => Promise.resolve(JSON.stringify(envelope)),
      });
    vi.stubGlobal("fetch", fetchMock);

    expect(await analyzeProjectIdea(IDEA, { config: CONFIG })).toEqual(COMPLETE);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("propagates a transport failure on the final attempt", async () => {
    const generate = mockGenerate()
      .mockRejectedValueOnce(new UpstreamTransportError(500, "boom", "Gemini API HTTP 500: boom"))
      .mockRejectedValueOnce(new UpstreamTransportError(502, "bad gateway", "Gemini API HTTP 502: bad gateway"));

    await expect(analyzeProjectIdea(IDEA, { config: CONFIG, generate })).rejects.toMatchObject({
      name: "UpstreamTransportError",
      status: 502,
      body: "bad gateway",
    });
  });

  it("does not retry a malformed upstream envelope", async () => {
    const generate = mockGenerate().mockRejectedValueOnce(
      new UpstreamFormatError("Unexpected Gemini response format: {}", "{}"),
    );

    await expect(analyzeProjectIdea(IDEA, { config: CONFIG, generate })).rejects.toBeInstanceOf(UpstreamFormatError);
    expect(generate).toHaveBeenCalledTimes(1);
  });
});

describe("buildPlaceholderResult", () => {
  it("defaults every field except the summary", () => {
    expect(buildPlaceholderResult("MAX_TOKENS", "MAX_TOKENS")).toEqual({
      ...DEFAULTS,
      summary: "The model response was unusable. finishReason(s): MAX_TOKENS, MAX_TOKENS.",
    });
  });
});
