/**
 * Analyzer Configuration
 *
 * Environment-based settings for the upstream model call, validated with zod.
 * Loading never throws: invalid optional values fall back to defaults with a
 * warning, and a missing key is reported by the analyzer when it is needed.
 *
 * @module config
 */

import { z } from "zod";

export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";
export const DEFAULT_GEMINI_API_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";
export const DEFAULT_TIMEOUT_MS = 45_000;

export const AnalyzerConfigSchema = z.object({
  apiKey: z.string(),
  model: z.string().min(1).describe("Gemini model id used in the endpoint path"),
  apiBaseUrl: z.string().url(),
  timeoutMs: z.number().int().min(1000).max(120_000).describe("Per-call upstream timeout"),
});

export type AnalyzerConfig = Readonly<z.infer<typeof AnalyzerConfigSchema>>;

type Env = Record<string, string | undefined>;

function readApiKey(env: Env): string {
  const key = (env.GEMINI_API_KEY ?? "").trim();
  // Placeholder values copied from .env.example count as "not set"
  if (key.includes("PASTE")) return "";
  return key;
}

function pick<T>(schema: z.ZodType<T>, value: unknown, fallback: T, name: string): T {
  if (value === undefined || value === "") return fallback;
  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;
  console.warn(`[Config] Ignoring invalid ${name}="${String(value)}", using default`);
  return fallback;
}

/**
 * Build the analyzer config from environment variables.
 */
export function loadAnalyzerConfig(env: Env = process.env): AnalyzerConfig {
  const shape = AnalyzerConfigSchema.shape;
  const config = {
    apiKey: readApiKey(env),
    model: pick(shape.model, env.GEMINI_MODEL?.trim(), DEFAULT_GEMINI_MODEL, "GEMINI_MODEL"),
    apiBaseUrl: pick(
      shape.apiBaseUrl,
      env.GEMINI_API_BASE_URL?.trim(),
      DEFAULT_GEMINI_API_BASE_URL,
      "GEMINI_API_BASE_URL",
    ).replace(/\/+$/, ""),
    timeoutMs: pick(
      shape.timeoutMs,
      env.GEMINI_TIMEOUT_MS === undefined ? undefined : Number(env.GEMINI_TIMEOUT_MS),
      DEFAULT_TIMEOUT_MS,
      "GEMINI_TIMEOUT_MS",
    ),
  };
  return Object.freeze(config);
}

export function hasApiKey(config: AnalyzerConfig): boolean {
  return config.apiKey.length > 0;
}
