import { filter, isNoise, stripJunkPrefixes } from "../noise-filter";

describe("Noise filter", () => {
  describe("isNoise", () => {
    it.each([
      "ASHOK LEYLAND",
      "TATA",
      "Goods Carrier",
      "X",
      "12:45",
      "12:45:09",
      "2024-03-18 10:22",
      "18/03/2024",
      "62 km/h",
      "420 RHS",
      "LHS",
      "camera01@gmail.com",
      "NO.",
    ])("should flag %j", (text) => {
      expect(isNoise(text)).toBe(true);
    });

    it.each(["TS12 UD 3371", "Plate: TS13EB4370", "NL01A", "CH 01 AB 1234"])(
      "should keep %j",
      (text) => {
        expect(isNoise(text)).toBe(false);
      }
    );
  });

  describe("stripJunkPrefixes", () => {
    it("should strip a country code followed by a space", () => {
      expect(stripJunkPrefixes("IND TS08FW3131")).toBe("TS08FW3131");
    });

    it("should strip a country code glued to the plate", () => {
      expect(stripJunkPrefixes("INDTS08FW3131")).toBe("TS08FW3131");
    });

    it("should strip a bracketed label", () => {
      expect(stripJunkPrefixes("(ND) AP 29 BP 2496")).toBe("AP 29 BP 2496");
    });

    it("should strip a label followed by punctuation", () => {
      expect(stripJunkPrefixes("No. TS08FW3131")).toBe("TS08FW3131");
      expect(stripJunkPrefixes("NO: AP 29 BP 2496")).toBe("AP 29 BP 2496");
    });

    it("should strip leading brand names", () => {
      expect(stripJunkPrefixes("TATA TS08FW3131")).toBe("TS08FW3131");
    });

    it("should leave plates alone", () => {
      expect(stripJunkPrefixes("NL01A")).toBe("NL01A");
      expect(stripJunkPrefixes("TS 08 FW 3131")).toBe("TS 08 FW 3131");
    });
  });

  describe("filter", () => {
    it("should drop noise and clean prefixes", () => {
      const result = filter([
        { text: "ASHOK LEYLAND", confidence: 93.8, order: 0 },
        { text: "IND TS12 UD 3371", confidence: 99.9, order: 1 },
        { text: "12:30", confidence: 80, order: 2 },
      ]);

      expect(result).toEqual([
        { text: "TS12 UD 3371", confidence: 99.9, order: 1 },
      ]);
    });

    it("should drop fragments that are only junk prefixes", () => {
      expect(filter([{ text: "IND", confidence: 90, order: 0 }])).toEqual([]);
      expect(filter([{ text: "IND NO", confidence: 90, order: 0 }])).toEqual([]);
    });

    it("should not look at confidence", () => {
      expect(filter([{ text: "TS08FW3131", confidence: 1, order: 0 }])).toEqual([
        { text: "TS08FW3131", confidence: 1, order: 0 },
      ]);
    });

    it("should not mutate its input", () => {
      const fragment = { text: "IND TS08FW3131", confidence: 90, order: 0 };
      filter([fragment]);
      expect(fragment.text).toBe("IND TS08FW3131");
    });
  });
});
