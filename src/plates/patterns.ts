import type {
  CharClass,
  Join,
  PatternTemplate,
  TemplateSegment,
} from "./types";
import { cleanRawText, compact } from "./normalize";
import { correct } from "./confusables";
import { InvalidPatternConfigError } from "./errors";

export interface TemplateMatch {
  template: PatternTemplate;
  text: string;
  corrected: boolean;
}

const SPACE: ReadonlySet<string> = new Set([" "]);

const MAX_TEMPLATE_LENGTH = 20;

const alpha = (min: number, max = min): TemplateSegment => ({
  charClass: "ALPHA",
  min,
  max,
});
const digit = (min: number, max = min): TemplateSegment => ({
  charClass: "DIGIT",
  min,
  max,
});

export function defineTemplate(
  name: string,
  segments: TemplateSegment[],
  joins: Join[],
  allowedSeparators: ReadonlySet<string> = SPACE
): PatternTemplate {
  return Object.freeze({
    name,
    segments: Object.freeze(segments.map((s) => Object.freeze({ ...s }))),
    joins: Object.freeze([...joins]),
    allowedSeparators,
    minLength: segments.reduce((sum, s) => sum + s.min, 0),
    maxLength: segments.reduce((sum, s) => sum + s.max, 0),
  });
}

/**
 * Indian registration shapes, strictest first. `match` stops at the first
 * template that accepts a string, so reordering this list changes results.
 */
export const PATTERN_LIBRARY: readonly PatternTemplate[] = Object.freeze([
  // TS08FW3131
  defineTemplate("compact", [alpha(2), digit(2), alpha(1, 3), digit(3, 4)], [
    "none",
    "none",
    "none",
  ]),
  // TS 08 FW 3131, TG 08 D 8599
  defineTemplate("spaced", [alpha(2), digit(2), alpha(1, 3), digit(3, 5)], [
    "required",
    "required",
    "required",
  ]),
  // NL01A J0044, HR73B 9259, AP 16 F J6249
  defineTemplate(
    "single-letter-series",
    [alpha(2), digit(2), alpha(1), alpha(0, 1), digit(3, 5)],
    ["optional", "optional", "required", "none"]
  ),
  // TS12 UD 3371, TN52 L0083
  defineTemplate(
    "mixed-spacing",
    [alpha(2), digit(2), alpha(1, 3), digit(3, 4)],
    ["optional", "required", "optional"]
  ),
  // TS08FM 1206, AP 10BA4575
  defineTemplate(
    "series-attached",
    [alpha(2), digit(2), alpha(1, 3), digit(3, 4)],
    ["optional", "none", "optional"]
  ),
  // DL3CAB1234
  defineTemplate("generic", [alpha(2), digit(1, 2), alpha(0, 3), digit(4)], [
    "optional",
    "optional",
    "optional",
  ]),
]);

const CLASS_SOURCE: Record<CharClass, string> = {
  ALPHA: "[A-Z]",
  DIGIT: "[0-9]",
  ALPHA_OR_DIGIT: "[A-Z0-9]",
};

function escapeForClass(char: string): string {
  return char.replace(/[\\\]^-]/g, "\\$&");
}

export function templateRegExp(template: PatternTemplate): RegExp {
  const separator = `[${[...template.allowedSeparators]
    .map(escapeForClass)
    .join("")}]`;

  const source = template.segments
    .map((segment, index) => {
      const quantifier =
        segment.min === segment.max
          ? `{${segment.min}}`
          : `{${segment.min},${segment.max}}`;
      const join = index === 0 ? "none" : template.joins[index - 1];
      const prefix =
        join === "required" ? separator : join === "optional" ? `${separator}?` : "";
      return `${prefix}${CLASS_SOURCE[segment.charClass]}${quantifier}`;
    })
    .join("");

  return new RegExp(`^${source}$`);
}

/** Checks an already-normalized string against one template. */
export function matchTemplate(text: string, template: PatternTemplate): boolean {
  const length = compact(text).length;
  if (length < template.minLength || length > template.maxLength) return false;
  return templateRegExp(template).test(text);
}

/**
 * Normalizes `text` and returns the first template that accepts it.
 *
 * Templates are tried as written first. Only when none accepts the text is
 * each template retried, in the same order, on a copy with letter/digit
 * lookalikes swapped at the positions it constrains.
 */
export function match(
  text: string,
  templates: readonly PatternTemplate[] = PATTERN_LIBRARY
): TemplateMatch | undefined {
  const normalized = cleanRawText(text);
  if (!normalized) return undefined;

  for (const template of templates) {
    if (matchTemplate(normalized, template)) {
      return { template, text: normalized, corrected: false };
    }
  }

  for (const template of templates) {
    const corrected = correct(normalized, template);
    if (corrected !== normalized && matchTemplate(corrected, template)) {
      return { template, text: corrected, corrected: true };
    }
  }

  return undefined;
}

const TOKEN = /^([AX9])(?:\{(\d+)(?:,(\d+))?\})?/;

const CLASS_FOR_TOKEN: Record<string, CharClass> = {
  A: "ALPHA",
  "9": "DIGIT",
  X: "ALPHA_OR_DIGIT",
};

/**
 * Parses the template notation used for caller-supplied patterns:
 * `A` letter, `9` digit, `X` either, each with an optional `{n}` or `{n,m}`.
 * A space between tokens requires a separator, `?` allows one.
 *
 * @example parseTemplate("AA 99 A{1,3} 9{4}")
 */
export function parseTemplate(
  source: string,
  name = "custom"
): PatternTemplate {
  const fail = (reason: string): never => {
    throw new InvalidPatternConfigError(source, reason);
  };

  if (typeof source !== "string" || source.trim() === "") {
    fail("template is empty");
  }

  const segments: TemplateSegment[] = [];
  const joins: Join[] = [];
  let pendingJoin: Join | null = null;
  let rest = source.toUpperCase();

  while (rest.length > 0) {
    const head = rest[0];

    if (head === " " || head === "?") {
      if (segments.length === 0) fail("template starts with a separator");
      if (pendingJoin !== null) fail("two separators in a row");
      pendingJoin = head === " " ? "required" : "optional";
      rest = rest.slice(1);
      continue;
    }

    const token = TOKEN.exec(rest);
    if (!token) {
      fail(`unexpected "${head}" at position ${source.length - rest.length}`);
      break;
    }

    const min = token[2] === undefined ? 1 : Number(token[2]);
    const max = token[3] === undefined ? min : Number(token[3]);
    if (min > max) fail(`quantifier {${min},${max}} has min above max`);

    if (segments.length > 0) joins.push(pendingJoin ?? "none");
    segments.push({ charClass: CLASS_FOR_TOKEN[token[1]], min, max });
    pendingJoin = null;
    rest = rest.slice(token[0].length);
  }

  if (pendingJoin !== null) fail("template ends with a separator");

  const template = defineTemplate(name, segments, joins);
  if (template.maxLength === 0) fail("template cannot match any character");
  if (template.maxLength > MAX_TEMPLATE_LENGTH) {
    fail(`template allows more than ${MAX_TEMPLATE_LENGTH} characters`);
  }
  return template;
}

export function describeTemplate(template: PatternTemplate): string {
  const letters: Record<CharClass, string> = {
    ALPHA: "A",
    DIGIT: "9",
    ALPHA_OR_DIGIT: "X",
  };
  return template.segments
    .map((segment, index) => {
      const join = index === 0 ? "none" : template.joins[index - 1];
      const prefix = join === "required" ? " " : join === "optional" ? "?" : "";
      const quantifier =
        segment.min === segment.max
          ? segment.min === 1
            ? ""
            : `{${segment.min}}`
          : `{${segment.min},${segment.max}}`;
      return `${prefix}${letters[segment.charClass]}${quantifier}`;
    })
    .join("");
}
