import { describe, expect, it } from "vitest";
import {
  EMPTY_GROUP,
  PRIVATE_SCHOOL_LABEL,
  countMissingGroupValues,
  normalizeGroupingColumn,
  normalizeGroupingValue
} from "../lib/aggregation/normalizeGrouping";

describe("normalizeGroupingValue", () => {
  it("maps missing and nan-like values to the Empty sentinel", () => {
    expect(normalizeGroupingValue(null)).toBe(EMPTY_GROUP);
    expect(normalizeGroupingValue("")).toBe(EMPTY_GROUP);
    expect(normalizeGroupingValue("   ")).toBe(EMPTY_GROUP);
    expect(normalizeGroupingValue("nan")).toBe(EMPTY_GROUP);
    expect(normalizeGroupingValue("NaN")).toBe(EMPTY_GROUP);
    expect(normalizeGroupingValue(" NAN ")).toBe(EMPTY_GROUP);
  });

  it("trims whitespace before applying the school type rewrites", () => {
    expect(normalizeGroupingValue(" Public ")).toBe("Public");
    expect(normalizeGroupingValue("PRVT")).toBe(PRIVATE_SCHOOL_LABEL);
    expect(normalizeGroupingValue(" Prvt")).toBe(PRIVATE_SCHOOL_LABEL);
    expect(normalizeGroupingValue("Charter School ")).toBe("Charter");
  });

  it("matches the rewrites case-sensitively", () => {
    expect(normalizeGroupingValue("prvt")).toBe("prvt");
    expect(normalizeGroupingValue("charter school")).toBe("charter school");
  });

  it("stringifies numeric keys", () => {
    expect(normalizeGroupingValue(2024)).toBe("2024");
  });
});

describe("normalizeGroupingColumn", () => {
  it("counts nulls and blank or nan strings separately", () => {
    expect(countMissingGroupValues([null, "nan", " ", "Public", "NaN"])).toEqual({
      nullCount: 1,
      blankOrNanCount: 3
    });
  });

  it("is idempotent", () => {
    const raw = [null, " PRVT ", "Charter School", "nan", "Public", ""];
    const once = normalizeGroupingColumn(raw);
    const twice = normalizeGroupingColumn(once.values);

    expect(once.values).toEqual([
      "Empty",
      PRIVATE_SCHOOL_LABEL,
      "Charter",
      "Empty",
      "Public",
      "Empty"
    ]);
    expect(twice.values).toEqual(once.values);
    expect(twice.missing).toEqual({ nullCount: 0, blankOrNanCount: 0 });
  });
});
