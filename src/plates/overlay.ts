import type { PatternTemplate, PlateCandidate, TextFragment } from "./types";
import { match, PATTERN_LIBRARY } from "./patterns";
import { buildCandidate } from "./candidate";
import { byReadingOrder } from "./fragment-merger";

// Burn-in text from speed cameras: "Plate: TS13EB4370  Speed: 62 km/h"
const OVERLAY_LABEL = /Plate:\s*([A-Z0-9 ]{6,15})/i;

/**
 * The text after the label, then the same text with trailing words dropped
 * one by one, since the capture can run into the next overlay field.
 */
export function overlayValues(text: string): string[] {
  const value = OVERLAY_LABEL.exec(text)?.[1].trim();
  if (!value) return [];

  const words = value.split(/\s+/);
  return words.map((_, i) => words.slice(0, words.length - i).join(" "));
}

/**
 * Reads the plate from a camera overlay line. This path runs alongside the
 * direct and merged matches; overlay values never appear as lines of their
 * own.
 */
export function extractOverlay(
  fragments: readonly TextFragment[],
  templates: readonly PatternTemplate[] = PATTERN_LIBRARY
): PlateCandidate | undefined {
  for (const fragment of byReadingOrder(fragments)) {
    for (const value of overlayValues(fragment.text)) {
      const matched = match(value, templates);
      if (!matched) continue;
      return buildCandidate(
        fragment.text,
        matched,
        fragment.confidence,
        fragment.order,
        "OVERLAY"
      );
    }
  }
  return undefined;
}
