export type CharClass = "ALPHA" | "DIGIT" | "ALPHA_OR_DIGIT";

export type Join = "none" | "optional" | "required";

export type CandidateSource = "DIRECT" | "MERGED" | "OVERLAY";

export interface TextFragment {
  text: string;
  confidence: number;
  order: number;
}

export interface TemplateSegment {
  charClass: CharClass;
  min: number;
  max: number;
}

export interface PatternTemplate {
  name: string;
  segments: readonly TemplateSegment[];
  /** joins[i] sits between segments[i] and segments[i + 1] */
  joins: readonly Join[];
  allowedSeparators: ReadonlySet<string>;
  /** bounds on the plate length without separators */
  minLength: number;
  maxLength: number;
}

export interface PlateCandidate {
  rawText: string;
  normalizedText: string;
  confidence: number;
  source: CandidateSource;
  matchedPattern: PatternTemplate;
  order: number;
  corrected: boolean;
  validated: boolean;
}

export interface Jurisdiction {
  code: string;
  name: string;
}

export interface PlateResult {
  text: string;
  confidence: number;
  isLowConfidence: boolean;
  isValidated: boolean;
  source: CandidateSource;
  pattern: string;
  jurisdiction: Jurisdiction | null;
}

export interface DetectedText {
  text: string;
  confidence: number;
}

export interface RecognitionReport {
  plates: PlateResult[];
  plateCount: number;
  allDetectedText: DetectedText[];
  lowConfidenceIncluded: boolean;
}

export type PatternMode = "replace" | "extend";

export interface RecognizeConfig {
  confidenceThreshold?: number;
  includeLowConfidence?: boolean;
  lowConfidenceThreshold?: number;
  customPattern?: string;
  patternMode?: PatternMode;
  allowedPrefixes?: readonly string[];
  includeUnverified?: boolean;
  mergeWindow?: number;
}
