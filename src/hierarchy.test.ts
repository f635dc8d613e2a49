import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "./config";
import {
  HierarchyPath,
  buildHierarchy,
  isContextualDuplicate,
  sortReadingOrder,
  wordOverlap,
} from "./hierarchy";
import type { HeadingCandidate, HierarchyDecision } from "./types";

function candidate(
  text: string,
  page: number,
  position: number,
  overrides: Partial<HeadingCandidate> = {},
): HeadingCandidate {
  return {
    text,
    level: "H2",
    page,
    confidence: 0.9,
    fontSize: 14,
    position,
    source: "layout",
    ...overrides,
  };
}

describe("HierarchyPath", () => {
  it("replaces the entries at and below the accepted level", () => {
    const path = new HierarchyPath();
    path.push("H1", "Plan");
    path.push("H2", "Budget");
    path.push("H3", "Staff");
    path.push("H2", "Risks");
    expect(path.entries).toEqual(["Plan", "Risks"]);
  });

  it("does not pad missing ancestors", () => {
    const path = new HierarchyPath();
    path.push("H3", "Orphan");
    expect(path.entries).toEqual(["Orphan"]);
  });

  it("truncates labels", () => {
    const path = new HierarchyPath(4);
    path.push("H1", "Overview");
    expect(path.entries).toEqual(["Over"]);
  });
});

describe("wordOverlap", () => {
  it("is relative to the smaller word set", () => {
    expect(wordOverlap("Project Budget Plan", "budget plan")).toBe(1);
    expect(wordOverlap("Project Budget", "Budget Review")).toBe(0.5);
    expect(wordOverlap("", "Budget")).toBe(0);
  });
});

describe("isContextualDuplicate", () => {
  const accepted = ["Alpha Plan", "Beta Plan", "Gamma Plan", "Delta Plan"].map((text, i) => ({
    level: "H2" as const,
    text,
    page: 1,
    position: i * 10,
  }));

  it("only looks at the most recent headings", () => {
    expect(isContextualDuplicate("Delta Plan Notes", accepted, DEFAULT_CONFIG)).toBe(true);
    expect(isContextualDuplicate("Alpha Plan Notes", accepted, DEFAULT_CONFIG)).toBe(false);
  });
});

describe("sortReadingOrder", () => {
  it("orders by page then distance from the top", () => {
    const sorted = sortReadingOrder([
      { page: 2, position: 10 },
      { page: 1, position: 300 },
      { page: 1, position: 20 },
    ]);
    expect(sorted).toEqual([
      { page: 1, position: 20 },
      { page: 1, position: 300 },
      { page: 2, position: 10 },
    ]);
  });
});

describe("buildHierarchy", () => {
  it("keeps one entry for headings that differ only in case and padding", () => {
    const trace: HierarchyDecision[] = [];
    const outline = buildHierarchy(
      [candidate("Summary", 1, 100, { level: "H1" }), candidate("summary ", 2, 80, { level: "H1" })],
      DEFAULT_CONFIG,
      trace,
    );
    expect(outline).toEqual([{ level: "H1", text: "Summary", page: 1, position: 100 }]);
    expect(trace.map((d) => d.reason)).toEqual([undefined, "duplicate"]);
  });

  it("emits accepted headings in reading order", () => {
    const outline = buildHierarchy(
      [
        candidate("Risk Register", 3, 50),
        candidate("Project Overview", 1, 200, { level: "H1" }),
        candidate("Budget Details", 1, 400),
      ],
      DEFAULT_CONFIG,
    );
    expect(outline.map((h) => [h.text, h.page])).toEqual([
      ["Project Overview", 1],
      ["Budget Details", 1],
      ["Risk Register", 3],
    ]);
  });

  it("records why each rejected candidate was dropped", () => {
    const trace: HierarchyDecision[] = [];
    const outline = buildHierarchy(
      [
        candidate("Budget Details", 1, 10),
        candidate("Faint Heading", 1, 20, { confidence: 0.59 }),
        candidate("the rest follows", 1, 30),
        candidate("2024 - 2025", 1, 40),
        candidate("Contact: info@example.org", 1, 50),
        candidate("Budget Details Summary", 1, 60),
        candidate("Staffing Plan", 1, 70, { level: "H3" }),
      ],
      DEFAULT_CONFIG,
      trace,
    );
    expect(outline.map((h) => h.text)).toEqual(["Budget Details", "Staffing Plan"]);
    expect(trace.map((d) => [d.text, d.accepted, d.reason])).toEqual([
      ["Budget Details", true, undefined],
      ["Faint Heading", false, "low-confidence"],
      ["the rest follows", false, "fragment"],
      ["2024 - 2025", false, "breaks-path"],
      ["Contact: info@example.org", false, "not-meaningful"],
      ["Budget Details Summary", false, "contextual-duplicate"],
      ["Staffing Plan", true, undefined],
    ]);
    expect(trace[6].path).toEqual(["Budget Details", "Staffing Plan"]);
  });

  it("accepts candidates exactly at the threshold", () => {
    const outline = buildHierarchy(
      [candidate("Budget Details", 1, 10, { confidence: 0.6 })],
      DEFAULT_CONFIG,
    );
    expect(outline).toHaveLength(1);
  });

  it("truncates to the configured number of entries", () => {
    const outline = buildHierarchy(
      [
        candidate("Project Overview", 1, 10),
        candidate("Budget Details", 1, 20),
        candidate("Risk Register", 1, 30),
      ],
      { ...DEFAULT_CONFIG, maxOutlineItems: 2 },
    );
    expect(outline.map((h) => h.text)).toEqual(["Project Overview", "Budget Details"]);
  });

  it("is empty without candidates", () => {
    expect(buildHierarchy([], DEFAULT_CONFIG)).toEqual([]);
  });
});
