import { alignLayout, correct } from "../confusables";
import { parseTemplate, PATTERN_LIBRARY } from "../patterns";

const [compactTemplate, spacedTemplate] = PATTERN_LIBRARY;

describe("Confusable corrector", () => {
  it("should turn a digit into a letter in the state code", () => {
    expect(correct("T508FW3131", compactTemplate)).toBe("TS08FW3131");
  });

  it("should turn a letter into a digit in the district code", () => {
    expect(correct("TS O8 FW 3131", spacedTemplate)).toBe("TS 08 FW 3131");
  });

  it("should only touch positions whose class is wrong", () => {
    // B sits in the series (a letter position) and 0 in the district
    expect(correct("T508FB3131", compactTemplate)).toBe("TS08FB3131");
  });

  it("should leave a correctly read plate unchanged", () => {
    expect(correct("TS08FW3131", compactTemplate)).toBe("TS08FW3131");
  });

  it("should return the text unchanged when no layout fits its length", () => {
    expect(correct("T5", compactTemplate)).toBe("T5");
  });

  it("should split segments where the separators are", () => {
    // FB 313 with the B read as 8: the series ends at the space
    expect(correct("TS 08 F8 313", spacedTemplate)).toBe("TS 08 FB 313");
  });

  it("should handle templates with many optional segments", () => {
    const template = parseTemplate("A{0,1}".repeat(20));

    const started = performance.now();
    expect(correct("TS08FW3131", template)).toBe("TSOBFW3I3I");
    expect(performance.now() - started).toBeLessThan(1000);
  });
});

describe("alignLayout", () => {
  it("should prefer the split with the fewest substitutions", () => {
    expect(alignLayout("TS08FW3131", compactTemplate)?.join(",")).toBe(
      "ALPHA,ALPHA,DIGIT,DIGIT,ALPHA,ALPHA,DIGIT,DIGIT,DIGIT,DIGIT"
    );
  });

  it("should keep separators on segment boundaries", () => {
    expect(alignLayout("TS 08 F8 313", spacedTemplate)?.join(",")).toBe(
      "ALPHA,ALPHA,DIGIT,DIGIT,ALPHA,ALPHA,DIGIT,DIGIT,DIGIT"
    );
  });

  it("should reject separators a template does not allow", () => {
    expect(alignLayout("TS 08 FW 3131", compactTemplate)).toBeUndefined();
    expect(alignLayout("TS08 FW 3131", spacedTemplate)).toBeUndefined();
  });

  it("should return nothing for a length the template cannot hold", () => {
    expect(alignLayout("TS08FW3131TS08FW3131", compactTemplate)).toBeUndefined();
  });
});

