import { describe, expect, it } from "vitest";
import { defaultGpaConfig } from "@/lib/gpa/config";
import { GpaConfigError } from "@/lib/gpa/errors";
import { createGradeMapper, normalizeGradeToken, type GradeScale } from "@/lib/gpa/gradeMapper";

const scale: GradeScale = {
  scaleMax: 4,
  gradePoints: { A: 4, "B+": 3.3, B: 3, F: 0 },
  scoreBands: [
    { minScore: 50, gradePoint: 2 },
    { minScore: 75, gradePoint: 4 },
    { minScore: 0, gradePoint: 0 },
  ],
  moduleCredits: { IT2020: 3, it2021: 2 },
  defaultCreditWeight: 1,
};

describe("createGradeMapper", () => {
  it("maps letter grades and ignores case and inner spaces", () => {
    const mapper = createGradeMapper(scale);
    expect(mapper.gradePointOf("A")).toBe(4);
    expect(mapper.gradePointOf("b+")).toBe(3.3);
    expect(mapper.gradePointOf(" B + ")).toBe(3.3);
  });

  it("maps numeric scores through the bands, highest band first", () => {
    const mapper = createGradeMapper(scale);
    expect(mapper.gradePointOf("75")).toBe(4);
    expect(mapper.gradePointOf("74.5")).toBe(2);
    expect(mapper.gradePointOf("50")).toBe(2);
    expect(mapper.gradePointOf("12")).toBe(0);
  });

  it("returns null for unknown tokens and out-of-range scores", () => {
    const mapper = createGradeMapper(scale);
    expect(mapper.gradePointOf("Z")).toBeNull();
    expect(mapper.gradePointOf("")).toBeNull();
    expect(mapper.gradePointOf("101")).toBeNull();
    expect(mapper.gradePointOf("-5")).toBeNull();
  });

  it("answers the same way every time", () => {
    const mapper = createGradeMapper(scale);
    const first = ["A", "B+", "Z", "80"].map((t) => mapper.gradePointOf(t));
    const second = ["A", "B+", "Z", "80"].map((t) => mapper.gradePointOf(t));
    expect(second).toEqual(first);
    expect(Object.isFrozen(mapper)).toBe(true);
  });

  it("falls back to the default credit weight for unknown modules", () => {
    const mapper = createGradeMapper(scale);
    expect(mapper.creditWeightOf("IT2020")).toBe(3);
    expect(mapper.creditWeightOf("IT2021")).toBe(2);
    expect(mapper.hasModule("it 2021")).toBe(true);
    expect(mapper.creditWeightOf("XX9999")).toBe(1);
    expect(mapper.hasModule("XX9999")).toBe(false);
  });

  it("rejects points outside the scale", () => {
    let caught: unknown = null;
    try {
      createGradeMapper({ ...scale, gradePoints: { A: 5 } });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(GpaConfigError);
    expect(caught instanceof GpaConfigError ? caught.code : null).toBe("GPA_POINT_OUT_OF_SCALE");
    expect(caught instanceof GpaConfigError ? caught.field : null).toBe("gradePoints");
  });

  it("rejects non-positive credit weights", () => {
    expect(() => createGradeMapper({ ...scale, moduleCredits: { IT2020: 0 } })).toThrow(GpaConfigError);
    expect(() => createGradeMapper({ ...scale, defaultCreditWeight: 0 })).toThrow(GpaConfigError);
  });

  it("accepts the shipped default scale", () => {
    const mapper = createGradeMapper(defaultGpaConfig());
    expect(mapper.gradePointOf("A-")).toBe(3.7);
    expect(mapper.gradePointOf("E")).toBe(0);
    expect(mapper.creditWeightOf("IT1040")).toBe(3);
  });
});

describe("normalizeGradeToken", () => {
  it("strips whitespace and upper-cases", () => {
    expect(normalizeGradeToken(" a - ")).toBe("A-");
    expect(normalizeGradeToken(null)).toBe("");
  });
});
