import { describe, expect, it } from "vitest";
import { introductionDocument, textLine } from "./__fixtures__/document";
import { extractPageCandidates, rejectionReason, scoreCandidate, scoreLine } from "./candidates";
import { DEFAULT_CONFIG } from "./config";
import { buildTextLines } from "./lines";

const thresholds = { h1: 18, h2: 14, h3: 12 };

describe("rejectionReason", () => {
  it("names the first filter that rejects a line", () => {
    expect(rejectionReason("March 3, 2024 board meeting", DEFAULT_CONFIG)).toBe("non-heading");
    expect(rejectionReason("and then more", DEFAULT_CONFIG)).toBe("content-fragment");
    expect(rejectionReason(Array(50).fill("Word").join(" "), DEFAULT_CONFIG)).toBe("too-long");
    expect(rejectionReason("Project Goals", DEFAULT_CONFIG)).toBeNull();
  });
});

describe("scoreLine", () => {
  it("adds the font band and length bonuses", () => {
    const score = scoreLine(textLine("Project Goals", { leftMargin: 100 }), thresholds, DEFAULT_CONFIG);
    expect(score.confidence).toBeCloseTo(0.4);
    expect(score.level).toBe("H3");
    expect(score.pattern).toBeUndefined();
  });

  it("lets a strong pattern set the level", () => {
    const score = scoreLine(textLine("BACKGROUND"), thresholds, DEFAULT_CONFIG);
    expect(score.pattern?.name).toBe("major-section");
    expect(score.level).toBe("H2");
    expect(score.confidence).toBe(1);
  });

  it("keeps the font level for a question", () => {
    const score = scoreLine(
      textLine("What Comes Next?", { leftMargin: 100, avgFontSize: 14 }),
      thresholds,
      DEFAULT_CONFIG,
    );
    expect(score.level).toBe("H2");
    // 0.3 band + 0.3 question + 0.2 short + 0.2 well-formed
    expect(score.confidence).toBeCloseTo(1);
  });

  it("penalizes headings that trail off", () => {
    const score = scoreLine(
      textLine("Notes on the use of", { leftMargin: 100 }),
      thresholds,
      DEFAULT_CONFIG,
    );
    expect(score.confidence).toBeCloseTo(0.1);
  });

  it("never goes below zero", () => {
    const score = scoreLine(
      textLine("Notes on the use of", { leftMargin: 100, avgFontSize: 8 }),
      thresholds,
      { ...DEFAULT_CONFIG, incompletePenalty: 1 },
    );
    expect(score.confidence).toBe(0);
  });
});

describe("scoreCandidate", () => {
  it("requires confidence above the page threshold", () => {
    expect(scoreCandidate(textLine("Project Goals", { leftMargin: 100 }), thresholds, DEFAULT_CONFIG)).toBeNull();
    const bold = scoreCandidate(
      textLine("Project Goals", { leftMargin: 100, isBold: true, yPosition: 240, page: 2 }),
      thresholds,
      DEFAULT_CONFIG,
    );
    expect(bold).toMatchObject({
      text: "Project Goals",
      level: "H3",
      page: 2,
      fontSize: 12,
      position: 240,
      source: "layout",
    });
    expect(bold?.confidence).toBeCloseTo(0.6);
  });

  it("rejects email-shaped lines whatever their size", () => {
    expect(
      scoreCandidate(textLine("contact@example.org", { avgFontSize: 24, isBold: true }), thresholds, DEFAULT_CONFIG),
    ).toBeNull();
  });
});

describe("extractPageCandidates", () => {
  it("finds the numbered heading and drops body sentences", async () => {
    const page = await introductionDocument().page(1);
    const lines = buildTextLines(page.chars, 1, page.height);
    const candidates = extractPageCandidates(lines, DEFAULT_CONFIG);
    expect(candidates).toEqual([
      {
        text: "1. Introduction",
        level: "H1",
        page: 1,
        confidence: 1,
        fontSize: 18,
        position: 92,
        source: "layout",
      },
    ]);
  });

  it("returns nothing for a page without lines", () => {
    expect(extractPageCandidates([], DEFAULT_CONFIG)).toEqual([]);
  });
});
