import type { CandidateSource, PlateCandidate } from "./types";
import type { TemplateMatch } from "./patterns";

/** Confidences are kept to two decimals from input to output. */
export function roundConfidence(value: number): number {
  return Math.round(value * 100) / 100;
}

export function buildCandidate(
  rawText: string,
  matched: TemplateMatch,
  confidence: number,
  order: number,
  source: CandidateSource
): PlateCandidate {
  return {
    rawText,
    normalizedText: matched.text,
    confidence: roundConfidence(confidence),
    source,
    matchedPattern: matched.template,
    order,
    corrected: matched.corrected,
    validated: false,
  };
}
