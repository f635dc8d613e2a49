import { describe, expect, it } from "vitest";
import { singlePagePdf, writeTempFile } from "./__fixtures__/pdf";
import { buildTextLines } from "./lines";
import { DocumentUnreadableError, openPdf, resolveFontName, splitTextRun } from "./pdf";

describe("splitTextRun", () => {
  it("spreads a run's advance evenly across its glyphs", () => {
    expect(splitTextRun("AB", 10, 700, 20, 12, "ABCDEF+Arial-BoldMT")).toEqual([
      { text: "A", x0: 10, x1: 20, y0: 700, size: 12, fontName: "ABCDEF+Arial-BoldMT" },
      { text: "B", x0: 20, x1: 30, y0: 700, size: 12, fontName: "ABCDEF+Arial-BoldMT" },
    ]);
  });

  it("keeps the font name so lines built from it are bold", () => {
    const chars = splitTextRun("Goals", 72, 700, 50, 16, "ABCDEF+Arial-BoldMT");
    expect(buildTextLines(chars, 1, 792)[0]).toMatchObject({ text: "Goals", isBold: true });
  });

  it("is empty for an empty run", () => {
    expect(splitTextRun("", 0, 0, 0, 12, "F1")).toEqual([]);
  });
});

describe("resolveFontName", () => {
  const fonts = (objects: Record<string, unknown>) => ({
    has: (id: string) => id in objects,
    get: (id: string) => objects[id],
  });

  it("prefers the loaded font's real name", () => {
    expect(resolveFontName(fonts({ g_d0_f1: { name: "ABCDEF+Arial-BoldMT" } }), "g_d0_f1", "sans-serif")).toBe(
      "ABCDEF+Arial-BoldMT",
    );
  });

  it("falls back to the family, then the id", () => {
    expect(resolveFontName(fonts({}), "g_d0_f1", "serif")).toBe("serif");
    expect(resolveFontName(fonts({ g_d0_f1: { name: 7 } }), "g_d0_f1", undefined)).toBe("g_d0_f1");
  });

  it("falls back when the lookup throws", () => {
    const failing = {
      has: () => true,
      get: (): unknown => {
        throw new Error("not resolved yet");
      },
    };
    expect(resolveFontName(failing, "g_d0_f1", "serif")).toBe("serif");
  });
});

describe("openPdf", () => {
  it("rejects a missing file as unreadable", async () => {
    const missing = "/nonexistent/dir/missing.pdf";
    await expect(openPdf(missing)).rejects.toBeInstanceOf(DocumentUnreadableError);
    await expect(openPdf(missing)).rejects.toMatchObject({ documentPath: missing });
  });

  it("reads per-glyph geometry from the page", async () => {
    const source = await openPdf(writeTempFile("hello.pdf", singlePagePdf("Hello")));
    try {
      expect(source.pageCount).toBe(1);
      const page = await source.page(1);
      expect(page).toMatchObject({ pageNumber: 1, width: 612, height: 792 });
      expect(page.chars.map((c) => c.text).join("")).toBe("Hello");
      expect(page.chars[0]).toMatchObject({ x0: 72, y0: 700, size: 24 });
    } finally {
      await source.close();
    }
  });

  it("rasterizes a page to PNG", async () => {
    const source = await openPdf(writeTempFile("hello.pdf", singlePagePdf("Hello")));
    try {
      const png = await source.rasterize(1, 72);
      expect([...png.subarray(0, 4)]).toEqual([0x89, 0x50, 0x4e, 0x47]);
    } finally {
      await source.close();
    }
  });
});
