import {
  describeTemplate,
  match,
  matchTemplate,
  parseTemplate,
  PATTERN_LIBRARY,
} from "../patterns";
import { InvalidPatternConfigError } from "../errors";

function template(name: string) {
  const found = PATTERN_LIBRARY.find((t) => t.name === name);
  if (!found) throw new Error(`no template named ${name}`);
  return found;
}

describe("Pattern library", () => {
  it("should keep templates in priority order", () => {
    expect(PATTERN_LIBRARY.map((t) => t.name)).toEqual([
      "compact",
      "spaced",
      "single-letter-series",
      "mixed-spacing",
      "series-attached",
      "generic",
    ]);
  });

  it("should be frozen", () => {
    expect(Object.isFrozen(PATTERN_LIBRARY)).toBe(true);
    expect(Object.isFrozen(PATTERN_LIBRARY[0])).toBe(true);
    expect(Object.isFrozen(PATTERN_LIBRARY[0].segments)).toBe(true);
  });

  it("should derive length bounds from the segments", () => {
    expect(template("compact").minLength).toBe(8);
    expect(template("compact").maxLength).toBe(11);
  });
});

describe("match", () => {
  it.each([
    ["TS08FW3131", "compact", "TS08FW3131"],
    ["TS 08 FW 3131", "spaced", "TS 08 FW 3131"],
    ["NL01A J0044", "single-letter-series", "NL01A J0044"],
    ["AP 16 F J6249", "single-letter-series", "AP 16 F J6249"],
    ["TS12 UD 3371", "mixed-spacing", "TS12 UD 3371"],
    ["tn.52 l.0083", "mixed-spacing", "TN52 L0083"],
    ["TS08FM 1206", "series-attached", "TS08FM 1206"],
    ["DL3CAB1234", "generic", "DL3CAB1234"],
  ])("should match %s with the %s template", (input, name, text) => {
    expect(match(input)).toEqual({
      template: template(name),
      text,
      corrected: false,
    });
  });

  it("should let the first matching template win", () => {
    expect(matchTemplate("TS08FW3131", template("series-attached"))).toBe(true);
    expect(matchTemplate("TS08FW3131", template("generic"))).toBe(true);
    expect(match("TS08FW3131")?.template.name).toBe("compact");
  });

  it("should retry near-misses through the confusable corrector", () => {
    expect(match("TS O8 FW 3131")).toEqual({
      template: template("spaced"),
      text: "TS 08 FW 3131",
      corrected: true,
    });
  });

  it("should return undefined when nothing matches", () => {
    expect(match("ASHOK")).toBeUndefined();
    expect(match("")).toBeUndefined();
    expect(match("12:45:09")).toBeUndefined();
  });

  it("should only use the templates it is given", () => {
    const custom = parseTemplate("AAA 9999");
    expect(match("TS08FW3131", [custom])).toBeUndefined();
    expect(match("abc 1234", [custom])?.text).toBe("ABC 1234");
  });
});

describe("parseTemplate", () => {
  it("should parse classes, quantifiers and separators", () => {
    const parsed = parseTemplate("AA 99 A{1,3} 9{4}");

    expect(parsed.name).toBe("custom");
    expect(parsed.minLength).toBe(9);
    expect(parsed.maxLength).toBe(11);
    expect(matchTemplate("KA 01 AB 1234", parsed)).toBe(true);
    expect(matchTemplate("KA01AB1234", parsed)).toBe(false);
    expect(describeTemplate(parsed)).toBe("AA 99 A{1,3} 9{4}");
  });

  it("should treat ? as an optional separator", () => {
    const parsed = parseTemplate("A{2}?9{4}");

    expect(matchTemplate("AB 1234", parsed)).toBe(true);
    expect(matchTemplate("AB1234", parsed)).toBe(true);
  });

  it("should accept letter-or-digit positions", () => {
    const parsed = parseTemplate("X{5}");

    expect(matchTemplate("A1B2C", parsed)).toBe(true);
    expect(matchTemplate("A1B2", parsed)).toBe(false);
  });

  it.each([
    ["", "template is empty"],
    [" AA", "template starts with a separator"],
    ["AA  99", "two separators in a row"],
    ["AA 99 ", "template ends with a separator"],
    ["AB", 'unexpected "B" at position 1'],
    ["A{3,1}", "quantifier {3,1} has min above max"],
    ["A{0}", "template cannot match any character"],
    ["X{21}", "template allows more than 20 characters"],
  ])("should reject %j", (source, reason) => {
    expect(() => parseTemplate(source)).toThrow(InvalidPatternConfigError);
    expect(() => parseTemplate(source)).toThrow(reason);
  });
});

describe("describeTemplate", () => {
  it("should render library templates in template notation", () => {
    expect(describeTemplate(template("compact"))).toBe("A{2}9{2}A{1,3}9{3,4}");
    expect(describeTemplate(template("single-letter-series"))).toBe(
      "A{2}?9{2}?A A{0,1}9{3,5}"
    );
  });
});
