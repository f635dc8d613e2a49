import { describe, expect, it } from "vitest";
import { singlePagePdf, writeTempFile } from "./__fixtures__/pdf";
import { extractOutline, extractSectionContent } from "./document";
import { DocumentUnreadableError } from "./pdf";
import type { OutlineEntry } from "./types";

const heading: OutlineEntry = { level: "H1", text: "Project Overview", page: 2, position: 80 };

describe("extractOutline", () => {
  it("fails with DocumentUnreadableError for a file that cannot be opened", async () => {
    await expect(extractOutline("/nonexistent/report.pdf")).rejects.toBeInstanceOf(
      DocumentUnreadableError,
    );
  });
});

describe("extractSectionContent", () => {
  it("synthesizes a sentence for a file that cannot be opened", async () => {
    expect(await extractSectionContent("/nonexistent/report.pdf", heading, [heading])).toBe(
      "This section covers project overview and contains relevant information (from page 2).",
    );
  });

  it("reads the section body from a PDF on disk", async () => {
    const file = writeTempFile("overview.pdf", singlePagePdf("Project Overview"));
    const top: OutlineEntry = { level: "H1", text: "Project Overview", page: 1, position: 92 };
    expect(await extractSectionContent(file, top, [top])).toBe("Project Overview");
  });
});
