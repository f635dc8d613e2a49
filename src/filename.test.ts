import { describe, expect, it } from "vitest";
import { isPdfFile, outputBasename, sanitizeFilename } from "./filename";

describe("sanitizeFilename", () => {
  it("replaces characters that are unsafe in file names", () => {
    expect(sanitizeFilename('Q1: "Plan" <draft>')).toBe("Q1_ _Plan_ _draft_");
    expect(sanitizeFilename("  ")).toBe("untitled");
  });
});

describe("outputBasename", () => {
  it("is the document's stem", () => {
    expect(outputBasename("/data/in/annual report.pdf")).toBe("annual report");
    expect(outputBasename("notes.v2.PDF")).toBe("notes.v2");
  });

  it("is cut to the length limit", () => {
    expect(outputBasename(`${"x".repeat(30)}.pdf`, 10)).toBe("x".repeat(10));
  });
});

describe("isPdfFile", () => {
  it("matches the extension case-insensitively", () => {
    expect(isPdfFile("A.PDF")).toBe(true);
    expect(isPdfFile("a.pdf.txt")).toBe(false);
    expect(isPdfFile("pdf")).toBe(false);
  });
});
