import type { Jurisdiction, PlateCandidate } from "./types";
import { compact } from "./normalize";
import jurisdictions from "./data/jurisdictions.json";

const JURISDICTIONS: ReadonlyMap<string, Jurisdiction> = new Map(
  jurisdictions.map((j) => [j.code, Object.freeze({ code: j.code, name: j.name })])
);

export const STATE_CODES: ReadonlySet<string> = new Set(JURISDICTIONS.keys());

function leadingLetters(text: string): string {
  return /^[A-Z]*/.exec(compact(text).toUpperCase())?.[0] ?? "";
}

/**
 * Checks the candidate's 1–2 letter jurisdiction prefix against the
 * allow-list. A two-letter prefix is preferred when both are listed.
 */
export function validate(
  candidate: Pick<PlateCandidate, "normalizedText">,
  allowedPrefixes: ReadonlySet<string> = STATE_CODES
): boolean {
  const letters = leadingLetters(candidate.normalizedText);
  if (letters.length >= 2 && allowedPrefixes.has(letters.slice(0, 2))) {
    return true;
  }
  return letters.length >= 1 && allowedPrefixes.has(letters.slice(0, 1));
}

export function jurisdictionOf(text: string): Jurisdiction | null {
  return JURISDICTIONS.get(leadingLetters(text).slice(0, 2)) ?? null;
}
