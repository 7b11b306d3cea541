const EDGE_JUNK = /^["'()[\]{}.,;:!?*#\s]+|["'()[\]{}.,;:!?*#\s]+$/g;
const EDGE_HYPHENS = /^-+|-+$/g;
const EMBEDDED_HYPHEN = /(?<=[A-Za-z0-9])-(?=[A-Za-z0-9])/g;

/**
 * Normalizes one OCR line for plate matching.
 *
 * `TN.52 L.0083` becomes `TN52 L0083`, `ts12 u-d 3371` becomes `TS12 UD 3371`.
 */
export function cleanRawText(text: string): string {
  if (!text) return "";

  return text
    .trim()
    .replace(EDGE_JUNK, "")
    .replace(EDGE_HYPHENS, "")
    .replace(/\./g, "")
    .replace(EMBEDDED_HYPHEN, "")
    .replace(/\s+/g, " ")
    .trim()
    .toUpperCase();
}

/** Drops every separator: `TS12 UD 3371` -> `TS12UD3371`. */
export function compact(text: string): string {
  return text.replace(/[\s-]/g, "");
}

export function isLetter(char: string): boolean {
  return /^[A-Z]$/.test(char);
}

export function isDigit(char: string): boolean {
  return /^[0-9]$/.test(char);
}
