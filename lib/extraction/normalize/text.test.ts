import { describe, expect, it } from "vitest";
import { countLines, normalizeWhitespace, toNumberedLines } from "@/lib/extraction/normalize/text";

describe("normalizeWhitespace", () => {
  it("collapses spaces, tabs and non-breaking spaces", () => {
    expect(normalizeWhitespace("  IT2020\t  A \r")).toBe("IT2020 A");
  });
});

describe("toNumberedLines", () => {
  it("keeps source line numbers and skips blank lines", () => {
    expect(toNumberedLines("Registration No: IT21234567\r\n\r\n  IT2020   A\n\t\nIT2030 B")).toEqual([
      { lineNumber: 1, text: "Registration No: IT21234567" },
      { lineNumber: 3, text: "IT2020 A" },
      { lineNumber: 5, text: "IT2030 B" },
    ]);
  });
});

describe("countLines", () => {
  it("counts newline-separated lines", () => {
    expect(countLines("")).toBe(0);
    expect(countLines("one")).toBe(1);
    expect(countLines("one\ntwo\n")).toBe(3);
  });
});
