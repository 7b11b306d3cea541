import type { TextFragment } from "./types";
import noise from "./data/noise.json";

const JUNK_PREFIXES: readonly string[] = Object.freeze([...noise.junkPrefixes]);
const BRANDS: ReadonlySet<string> = new Set(noise.brands);
const NOISE_WORDS: ReadonlySet<string> = new Set([
  ...noise.words,
  ...noise.brands,
]);

const NOISE_SHAPES: readonly RegExp[] = [
  /^\d{1,2}:\d{2}(:\d{2})?$/, // 14:05, 14:05:33
  /^\d{4}-\d{2}-\d{2}/, // 2024-03-18 ...
  /^\d{1,2}[/-]\d{1,2}[/-]\d{2,4}$/, // 18/03/2024
  /^\d+\s*KM\/H$/,
  /^[\d+]*\s*RHS$/,
  /^[\d+]*\s*LHS$/,
];

function startsWithLetterAt(text: string, index: number): boolean {
  return /[A-Z]/i.test(text.charAt(index));
}

/**
 * Removes the country-code and label prefixes plates are often printed
 * behind (`IND TS08FW3131`, `INDTS08FW3131`, `No. TS08FW3131`) and leading
 * brand names (`TATA TS08FW3131`).
 */
export function stripJunkPrefixes(text: string): string {
  let result = text.trim();

  for (const prefix of JUNK_PREFIXES) {
    const upper = result.toUpperCase();
    if (!upper.startsWith(prefix)) continue;
    const next = result.charAt(prefix.length);
    if (/[\s.:]/.test(next) || startsWithLetterAt(result, prefix.length)) {
      result = result
        .slice(prefix.length)
        .replace(/^[.:]+/, "")
        .trim();
    }
  }

  const words = result.split(/\s+/);
  while (words.length > 1 && BRANDS.has(words[0].toUpperCase())) {
    words.shift();
  }
  return words.join(" ");
}

export function isNoise(text: string): boolean {
  const t = text
    .trim()
    .toUpperCase()
    .replace(/[.\-:,;!?]+$/, "");

  if (t.length <= 1) return true;
  if (NOISE_WORDS.has(t)) return true;
  if (t.includes("@") || t.includes("GMAIL")) return true;
  if (NOISE_SHAPES.some((shape) => shape.test(t))) return true;

  const words = t.split(/\s+/).map((w) => w.replace(/[.\-:,;!?]+$/, ""));
  return words.every((w) => w === "" || NOISE_WORDS.has(w));
}

/**
 * Drops fragments that are overlay labels, brand names, timestamps and the
 * like, and returns the rest with junk prefixes stripped. Confidence is not
 * looked at here.
 */
export function filter(fragments: readonly TextFragment[]): TextFragment[] {
  const kept: TextFragment[] = [];
  for (const fragment of fragments) {
    if (isNoise(fragment.text)) continue;
    const text = stripJunkPrefixes(fragment.text);
    if (!text || isNoise(text)) continue;
    kept.push({ ...fragment, text });
  }
  return kept;
}
