/**
 * Model output parsing: extraction first, field salvage as the fallback.
 * Never throws; an empty candidate means nothing usable was found.
 *
 * @module analyzer/parse-model-output
 */

import { extractJsonObject } from "./json";
import { salvageAnalysisFields } from "./salvage";
import type { ParsedModelOutput } from "./types";

export function parseModelOutput(text: string): ParsedModelOutput {
  const extracted = extractJsonObject(text);
  if (extracted.ok) {
    return { candidate: extracted.candidate, source: extracted.strategy };
  }

  console.warn(`[Analyzer] JSON extraction failed, salvaging fields: ${extracted.error}`);
  const candidate = salvageAnalysisFields(text);
  console.log(`[Analyzer] Salvage recovered ${Object.keys(candidate).length} field(s)`);
  return { candidate, source: "salvage" };
}
