import type { PatternTemplate, PlateCandidate, TextFragment } from "./types";
import { match, PATTERN_LIBRARY } from "./patterns";
import { buildCandidate } from "./candidate";

export const DEFAULT_MERGE_WINDOW = 1;

export function byReadingOrder(fragments: readonly TextFragment[]): TextFragment[] {
  return [...fragments].sort((a, b) => a.order - b.order);
}

/**
 * Joins fragments that failed to match on their own with their neighbours,
 * for plates the OCR returned as two lines (`NL01A` / `J0044`).
 *
 * Each fragment is paired with the fragments up to `window` places before
 * and after it in reading order, earlier text first; pairs are tried once.
 */
export function mergeCandidates(
  fragments: readonly TextFragment[],
  window: number = DEFAULT_MERGE_WINDOW,
  templates: readonly PatternTemplate[] = PATTERN_LIBRARY
): PlateCandidate[] {
  const ordered = byReadingOrder(fragments);
  const tried = new Set<string>();
  const candidates: PlateCandidate[] = [];

  const tryPair = (first: number, second: number) => {
    const key = `${first}:${second}`;
    if (tried.has(key)) return;
    tried.add(key);

    const a = ordered[first];
    const b = ordered[second];
    const rawText = `${a.text.trim()} ${b.text.trim()}`;
    const matched = match(rawText, templates);
    if (!matched) return;

    candidates.push(
      buildCandidate(
        rawText,
        matched,
        (a.confidence + b.confidence) / 2,
        Math.min(a.order, b.order),
        "MERGED"
      )
    );
  };

  ordered.forEach((fragment, index) => {
    if (match(fragment.text, templates)) return;

    for (let offset = 1; offset <= window; offset++) {
      if (index + offset < ordered.length) tryPair(index, index + offset);
      if (index - offset >= 0) tryPair(index - offset, index);
    }
  });

  return candidates;
}
