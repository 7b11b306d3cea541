import { z } from "zod";
import type {
  DetectedText,
  PatternTemplate,
  PlateCandidate,
  PlateResult,
  RecognitionReport,
  RecognizeConfig,
  TextFragment,
} from "./types";
import {
  InvalidThresholdError,
  RecognitionConfigError,
} from "./errors";
import { match, parseTemplate, PATTERN_LIBRARY } from "./patterns";
import { filter } from "./noise-filter";
import {
  byReadingOrder,
  DEFAULT_MERGE_WINDOW,
  mergeCandidates,
} from "./fragment-merger";
import { extractOverlay } from "./overlay";
import { buildCandidate, roundConfidence } from "./candidate";
import { jurisdictionOf, STATE_CODES, validate } from "./validator";

export const DEFAULT_CONFIDENCE_THRESHOLD = 60;
export const DEFAULT_LOW_CONFIDENCE_THRESHOLD = 30;
export const MAX_MERGE_WINDOW = 3;

export interface ResolvedConfig {
  confidenceThreshold: number;
  includeLowConfidence: boolean;
  lowConfidenceThreshold: number;
  templates: readonly PatternTemplate[];
  allowedPrefixes: ReadonlySet<string>;
  includeUnverified: boolean;
  mergeWindow: number;
}

const thresholdSchema = z.number().finite().min(0).max(100);
const mergeWindowSchema = z.number().int().min(1).max(MAX_MERGE_WINDOW);
const prefixesSchema = z
  .array(z.string().regex(/^[A-Za-z]{1,2}$/))
  .min(1);

const fragmentSchema = z.object({
  text: z.string().refine((t) => t.trim().length > 0),
  confidence: thresholdSchema,
  order: z.number().int(),
});

function threshold(setting: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = thresholdSchema.safeParse(value);
  if (!parsed.success) throw new InvalidThresholdError(setting, value);
  return parsed.data;
}

/**
 * Applies defaults and rejects bad settings before any fragment is read.
 *
 * @throws {InvalidThresholdError} a threshold outside [0, 100], or a
 *   low-confidence threshold above the primary one
 * @throws {InvalidPatternConfigError} a custom template that does not parse
 */
export function resolveConfig(config: RecognizeConfig = {}): ResolvedConfig {
  const confidenceThreshold = threshold(
    "confidenceThreshold",
    config.confidenceThreshold,
    DEFAULT_CONFIDENCE_THRESHOLD
  );
  const includeLowConfidence = config.includeLowConfidence ?? false;
  const lowConfidenceThreshold = threshold(
    "lowConfidenceThreshold",
    config.lowConfidenceThreshold,
    Math.min(DEFAULT_LOW_CONFIDENCE_THRESHOLD, confidenceThreshold)
  );
  if (includeLowConfidence && lowConfidenceThreshold > confidenceThreshold) {
    throw new InvalidThresholdError(
      "lowConfidenceThreshold",
      lowConfidenceThreshold,
      `must not exceed confidenceThreshold (${confidenceThreshold})`
    );
  }

  let templates = PATTERN_LIBRARY;
  if (config.customPattern !== undefined) {
    const custom = parseTemplate(config.customPattern);
    templates =
      config.patternMode === "extend"
        ? Object.freeze([custom, ...PATTERN_LIBRARY])
        : Object.freeze([custom]);
  }

  let allowedPrefixes = STATE_CODES;
  if (config.allowedPrefixes !== undefined) {
    const parsed = prefixesSchema.safeParse(config.allowedPrefixes);
    if (!parsed.success) {
      throw new RecognitionConfigError(
        "allowedPrefixes must be a non-empty list of 1-2 letter codes"
      );
    }
    allowedPrefixes = new Set(parsed.data.map((p) => p.toUpperCase()));
  }

  const mergeWindow = config.mergeWindow ?? DEFAULT_MERGE_WINDOW;
  if (!mergeWindowSchema.safeParse(mergeWindow).success) {
    throw new RecognitionConfigError(
      `mergeWindow must be an integer between 1 and ${MAX_MERGE_WINDOW}, got ${mergeWindow}`
    );
  }

  return {
    confidenceThreshold,
    includeLowConfidence,
    lowConfidenceThreshold,
    templates,
    allowedPrefixes,
    includeUnverified: config.includeUnverified ?? false,
    mergeWindow,
  };
}

/** Fragments with unusable text, confidence or order are dropped one by one. */
export function sanitizeFragments(fragments: readonly unknown[]): TextFragment[] {
  const usable: TextFragment[] = [];
  for (const fragment of fragments) {
    const parsed = fragmentSchema.safeParse(fragment);
    if (parsed.success) {
      usable.push({
        ...parsed.data,
        confidence: roundConfidence(parsed.data.confidence),
      });
    }
  }
  return usable;
}

function directCandidates(
  fragments: readonly TextFragment[],
  templates: readonly PatternTemplate[]
): PlateCandidate[] {
  const candidates: PlateCandidate[] = [];
  for (const fragment of fragments) {
    const matched = match(fragment.text, templates);
    if (matched) {
      candidates.push(
        buildCandidate(
          fragment.text,
          matched,
          fragment.confidence,
          fragment.order,
          "DIRECT"
        )
      );
    }
  }
  return candidates;
}

function outranks(a: PlateCandidate, b: PlateCandidate): boolean {
  if (a.confidence !== b.confidence) return a.confidence > b.confidence;
  return a.order < b.order;
}

function toResult(candidate: PlateCandidate, config: ResolvedConfig): PlateResult {
  return {
    text: candidate.normalizedText,
    confidence: candidate.confidence,
    isLowConfidence: candidate.confidence < config.confidenceThreshold,
    isValidated: candidate.validated,
    source: candidate.source,
    pattern: candidate.matchedPattern.name,
    jurisdiction: jurisdictionOf(candidate.normalizedText),
  };
}

function rank(candidates: readonly PlateCandidate[], config: ResolvedConfig): PlateResult[] {
  const best = new Map<string, PlateCandidate>();

  for (const candidate of candidates) {
    if (!candidate.validated && !config.includeUnverified) continue;

    if (
      candidate.confidence < config.confidenceThreshold &&
      (!config.includeLowConfidence ||
        candidate.confidence < config.lowConfidenceThreshold)
    ) {
      continue;
    }

    const current = best.get(candidate.normalizedText);
    if (!current || outranks(candidate, current)) {
      best.set(candidate.normalizedText, candidate);
    }
  }

  return [...best.values()]
    .sort((a, b) => (outranks(a, b) ? -1 : outranks(b, a) ? 1 : 0))
    .map((candidate) => toResult(candidate, config));
}

/**
 * Extracts plates from one image's OCR fragments.
 *
 * Fragments under the confidence floor are dropped, noise is filtered, and
 * the survivors are matched one by one, in adjacent pairs, and as camera
 * overlay text. Candidates are checked against the jurisdiction allow-list,
 * deduplicated on their normalized text and returned highest confidence
 * first. No plate is an empty array, not an error.
 */
export function recognize(
  fragments: readonly TextFragment[],
  config: RecognizeConfig = {}
): PlateResult[] {
  const resolved = resolveConfig(config);
  return recognizeResolved(fragments, resolved);
}

function recognizeResolved(
  fragments: readonly TextFragment[],
  config: ResolvedConfig
): PlateResult[] {
  const floor = config.includeLowConfidence
    ? config.lowConfidenceThreshold
    : config.confidenceThreshold;

  const usable = byReadingOrder(
    sanitizeFragments(fragments).filter((f) => f.confidence >= floor)
  );
  const filtered = filter(usable);

  const candidates = [
    ...directCandidates(filtered, config.templates),
    ...mergeCandidates(filtered, config.mergeWindow, config.templates),
  ];
  const overlay = extractOverlay(filtered, config.templates);
  if (overlay) candidates.push(overlay);

  return rank(
    candidates.map((c) => ({ ...c, validated: validate(c, config.allowedPrefixes) })),
    config
  );
}

export function countPlates(
  fragments: readonly TextFragment[],
  config: RecognizeConfig = {}
): number {
  return recognize(fragments, config).length;
}

export function extractPlates(
  fragments: readonly TextFragment[],
  config: RecognizeConfig = {}
): RecognitionReport {
  const resolved = resolveConfig(config);
  const plates = recognizeResolved(fragments, resolved);
  const allDetectedText: DetectedText[] = byReadingOrder(
    sanitizeFragments(fragments)
  ).map((f) => ({ text: f.text, confidence: f.confidence }));

  return {
    plates,
    plateCount: plates.length,
    allDetectedText,
    lowConfidenceIncluded: resolved.includeLowConfidence,
  };
}
