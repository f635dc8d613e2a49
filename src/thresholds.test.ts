import { describe, expect, it } from "vitest";
import { textLine } from "./__fixtures__/document";
import { DEFAULT_CONFIG } from "./config";
import { calibrateThresholds, measureSizeUsage } from "./thresholds";

const LONG = "This line is long enough to read as running body text on the page.";

describe("calibrateThresholds", () => {
  it("ranks sizes that carry short lines", () => {
    const lines = [
      textLine("Annual Review", { avgFontSize: 24 }),
      textLine("Goals", { avgFontSize: 16 }),
      textLine(LONG, { avgFontSize: 11 }),
      textLine(LONG, { avgFontSize: 11 }),
    ];
    expect(calibrateThresholds(lines, DEFAULT_CONFIG)).toEqual({ h1: 24, h2: 16, h3: 16 });
  });

  it("counts a long line as a heading size when it names a structural keyword", () => {
    const lines = [
      textLine("Goals", { avgFontSize: 16 }),
      textLine(`${LONG} See the next section.`, { avgFontSize: 11 }),
    ];
    expect(calibrateThresholds(lines, DEFAULT_CONFIG)).toEqual({ h1: 16, h2: 11, h3: 11 });
  });

  it("falls back to the page's sizes when no size looks like a heading size", () => {
    const lines = [textLine(LONG, { avgFontSize: 14 }), textLine(LONG, { avgFontSize: 10 })];
    expect(calibrateThresholds(lines, DEFAULT_CONFIG)).toEqual({ h1: 14, h2: 10, h3: 12 });
  });

  it("is null without sized lines", () => {
    expect(calibrateThresholds([], DEFAULT_CONFIG)).toBeNull();
    expect(calibrateThresholds([textLine("x", { avgFontSize: 0 })], DEFAULT_CONFIG)).toBeNull();
  });
});

describe("measureSizeUsage", () => {
  it("tallies lines, characters and keyword hits per size", () => {
    const usage = measureSizeUsage(
      [textLine("Summary", { avgFontSize: 14 }), textLine("Notes", { avgFontSize: 14 })],
      ["summary"],
    );
    expect(usage.get(14)).toEqual({ count: 2, totalChars: 12, keywordHits: 1 });
  });
});
