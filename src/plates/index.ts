export type * from "./types";
export * from "./errors";
export { cleanRawText } from "./normalize";
export { correct } from "./confusables";
export { filter, isNoise, stripJunkPrefixes } from "./noise-filter";
export {
  PATTERN_LIBRARY,
  defineTemplate,
  describeTemplate,
  match,
  matchTemplate,
  parseTemplate,
} from "./patterns";
export { mergeCandidates } from "./fragment-merger";
export { extractOverlay } from "./overlay";
export { jurisdictionOf, STATE_CODES, validate } from "./validator";
export {
  DEFAULT_CONFIDENCE_THRESHOLD,
  DEFAULT_LOW_CONFIDENCE_THRESHOLD,
  countPlates,
  extractPlates,
  recognize,
  resolveConfig,
} from "./recognizer";
