import { describe, expect, it } from "vitest";
import { cleanNumericCell, cleanNumericColumn } from "../lib/typing/numericCleaner";

describe("cleanNumericCell", () => {
  it("strips currency, thousands separators and percent signs", () => {
    expect(cleanNumericCell("$1,234.50")).toBe(1234.5);
    expect(cleanNumericCell("12%")).toBe(12);
    expect(cleanNumericCell("€ 3,000")).toBe(3000);
    expect(cleanNumericCell("  42  ")).toBe(42);
    expect(cleanNumericCell("-5.5")).toBe(-5.5);
  });

  it("treats blank strings as missing", () => {
    expect(cleanNumericCell("  ")).toBeNull();
    expect(cleanNumericCell("")).toBeNull();
    expect(cleanNumericCell("$")).toBeNull();
  });

  it("downgrades unparseable text to missing instead of throwing", () => {
    expect(cleanNumericCell("N/A")).toBeNull();
    expect(cleanNumericCell("twelve")).toBeNull();
    expect(cleanNumericCell("12 students")).toBeNull();
  });

  it("passes numbers through and drops NaN, null and dates", () => {
    expect(cleanNumericCell(7)).toBe(7);
    expect(cleanNumericCell(Number.NaN)).toBeNull();
    expect(cleanNumericCell(null)).toBeNull();
    expect(cleanNumericCell(new Date(Date.UTC(2024, 0, 1)))).toBeNull();
  });

  it("converts a whole column cell by cell", () => {
    expect(cleanNumericColumn(["1", "$2", null, "x"])).toEqual([1, 2, null, null]);
  });
});
