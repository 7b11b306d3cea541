import type { CharClass, PatternTemplate } from "./types";
import { isDigit, isLetter } from "./normalize";

// Letters OCR engines return where the plate has a digit, and the reverse.
const DIGIT_FOR_LETTER: Readonly<Record<string, string>> = Object.freeze({
  O: "0",
  Q: "0",
  D: "0",
  I: "1",
  L: "1",
  Z: "2",
  S: "5",
  G: "6",
  B: "8",
});

const LETTER_FOR_DIGIT: Readonly<Record<string, string>> = Object.freeze({
  "0": "O",
  "1": "I",
  "2": "Z",
  "5": "S",
  "6": "G",
  "8": "B",
});

const SEPARATOR = /[\s-]/;

function fits(char: string, charClass: CharClass): boolean {
  switch (charClass) {
    case "ALPHA":
      return isLetter(char);
    case "DIGIT":
      return isDigit(char);
    case "ALPHA_OR_DIGIT":
      return isLetter(char) || isDigit(char);
  }
}

function substitute(char: string, charClass: CharClass): string | undefined {
  if (charClass === "ALPHA") return LETTER_FOR_DIGIT[char];
  if (charClass === "DIGIT") return DIGIT_FOR_LETTER[char];
  return undefined;
}

interface Cost {
  unfixable: number;
  fixes: number;
}

interface Step {
  size: number;
  next: number;
  claimed: number;
  cost: Cost;
}

const FREE: Cost = { unfixable: 0, fixes: 0 };

function add(a: Cost, b: Cost): Cost {
  return { unfixable: a.unfixable + b.unfixable, fixes: a.fixes + b.fixes };
}

function cheaper(a: Cost, b: Cost): boolean {
  return a.unfixable !== b.unfixable
    ? a.unfixable < b.unfixable
    : a.fixes < b.fixes;
}

function sameCost(a: Cost, b: Cost): boolean {
  return a.unfixable === b.unfixable && a.fixes === b.fixes;
}

function charCost(char: string, charClass: CharClass): Cost {
  if (fits(char, charClass)) return FREE;
  return substitute(char, charClass) === undefined
    ? { unfixable: 1, fixes: 0 }
    : { unfixable: 0, fixes: 1 };
}

/**
 * Splits `text` into its plate characters and, for every gap between them
 * (including both ends), the number of separators found there.
 */
function splitSeparators(text: string): { chars: string[]; gaps: number[] } {
  const chars: string[] = [];
  const gaps: number[] = [0];
  for (const char of text) {
    if (SEPARATOR.test(char)) {
      gaps[chars.length]++;
    } else {
      chars.push(char);
      gaps.push(0);
    }
  }
  return { chars, gaps };
}

/**
 * The class each plate character of `text` would have under `template`,
 * choosing the split with the fewest unfixable mismatches, then the fewest
 * substitutions, then the shortest leading segments.
 *
 * Separators stay where they are: they may only sit on a segment boundary
 * whose join allows one, and every "required" join needs its own. Returns
 * `undefined` when no split fits.
 */
export function alignLayout(
  text: string,
  template: PatternTemplate
): CharClass[] | undefined {
  const { chars, gaps } = splitSeparators(text);
  const { segments, joins } = template;
  const length = chars.length;
  if (length < template.minLength || length > template.maxLength) {
    return undefined;
  }

  // `claimed` separators at gap `pos` are already taken by earlier joins.
  const steps = (index: number, pos: number, claimed: number): Step[] => {
    const segment = segments[index];
    const join = index === 0 ? "none" : joins[index - 1];
    const takes = join === "required" ? [1] : join === "optional" ? [0, 1] : [0];
    const result: Step[] = [];

    for (let size = segment.min; size <= segment.max; size++) {
      if (pos + size > length) break;
      if (gaps.slice(pos + 1, pos + size).some((count) => count > 0)) break;

      for (const take of takes) {
        const atGap = claimed + take;
        if (atGap > gaps[pos]) continue;
        if (size > 0 && atGap !== gaps[pos]) continue;

        let cost = FREE;
        for (let i = pos; i < pos + size; i++) {
          cost = add(cost, charCost(chars[i], segment.charClass));
        }
        result.push({
          size,
          next: pos + size,
          claimed: size > 0 ? 0 : atGap,
          cost,
        });
      }
    }
    return result;
  };

  const memo = new Map<string, Cost | null>();
  const best = (index: number, pos: number, claimed: number): Cost | null => {
    if (index === segments.length) {
      return pos === length && claimed === gaps[pos] ? FREE : null;
    }
    const key = `${index}:${pos}:${claimed}`;
    const cached = memo.get(key);
    if (cached !== undefined) return cached;

    let found: Cost | null = null;
    for (const step of steps(index, pos, claimed)) {
      const tail = best(index + 1, step.next, step.claimed);
      if (!tail) continue;
      const total = add(step.cost, tail);
      if (!found || cheaper(total, found)) found = total;
    }
    memo.set(key, found);
    return found;
  };

  let target = best(0, 0, 0);
  if (!target) return undefined;

  const layout: CharClass[] = [];
  let pos = 0;
  let claimed = 0;
  for (let index = 0; index < segments.length; index++) {
    for (const step of steps(index, pos, claimed)) {
      const tail = best(index + 1, step.next, step.claimed);
      if (!tail || !sameCost(add(step.cost, tail), target)) continue;

      for (let i = 0; i < step.size; i++) layout.push(segments[index].charClass);
      pos = step.next;
      claimed = step.claimed;
      target = tail;
      break;
    }
  }
  return layout;
}

/**
 * Rewrites letter/digit lookalikes at the positions where `template` expects
 * the other class. Separators are left alone and the result is not
 * re-checked against the template.
 */
export function correct(text: string, template: PatternTemplate): string {
  const layout = alignLayout(text, template);
  if (!layout) return text;

  let position = 0;
  return [...text]
    .map((char) => {
      if (SEPARATOR.test(char)) return char;
      const charClass = layout[position++];
      if (fits(char, charClass)) return char;
      return substitute(char, charClass) ?? char;
    })
    .join("");
}
