/**
 * Prompts and generation parameters for the two analysis attempts.
 *
 * @module analyzer/prompts
 */

export interface GenerationParams {
  temperature: number;
  maxOutputTokens: number;
}

export const FIRST_ATTEMPT: GenerationParams = { temperature: 0.35, maxOutputTokens: 1400 };

/** Lower randomness and more room, since the first answer was unusable. */
export const RETRY_ATTEMPT: GenerationParams = { temperature: 0.2, maxOutputTokens: 1800 };

export function buildAnalysisPrompt(idea: string): string {
  return (
    "You are a practical startup advisor for solo developers. " +
    "Analyze the project idea and keep answers concise and concrete. " +
    `Project idea:\n${idea}`
  );
}

export function buildRetryPrompt(idea: string): string {
  return (
    "Retry the same analysis. " +
    "Keep each paragraph under 40 words and arrays short." +
    `\n\nProject idea:\n${idea}`
  );
}
