import { createCanvas } from "@napi-rs/canvas";
import createDebug from "debug";
import * as fs from "node:fs";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import type {
  PDFDocumentProxy,
  PDFPageProxy,
  TextItem,
} from "pdfjs-dist/types/src/display/api";
import type { CharRecord, PageGeometry, PdfSource } from "./types";

const debug = createDebug("layoutoutline:pdf");

/** The one failure that propagates out of outline extraction. */
export class DocumentUnreadableError extends Error {
  constructor(
    readonly documentPath: string,
    cause: unknown,
  ) {
    super(
      `Cannot read ${documentPath}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = "DocumentUnreadableError";
  }
}

function isTextItem(item: unknown): item is TextItem {
  return typeof item === "object" && item !== null && "str" in item && "transform" in item;
}

/** Loaded font objects of a page, keyed by font id. */
export interface FontLookup {
  has(fontId: string): boolean;
  get(fontId: string): unknown;
}

/** Real font name (e.g. "ABCDEF+Arial-BoldMT") of a text item's font id, when loaded. */
export function resolveFontName(
  fonts: FontLookup,
  fontId: string,
  family: string | undefined,
): string {
  try {
    if (fonts.has(fontId)) {
      const font: unknown = fonts.get(fontId);
      if (typeof font === "object" && font !== null && "name" in font && typeof font.name === "string")
        return font.name;
    }
  } catch (err) {
    debug("font %s unresolved: %s", fontId, err);
  }
  return family ?? fontId;
}

/** Split a text run into per-glyph records, spreading its advance evenly. */
export function splitTextRun(
  str: string,
  x: number,
  y: number,
  width: number,
  size: number,
  fontName: string,
): CharRecord[] {
  const glyphs = Array.from(str);
  if (glyphs.length === 0) return [];
  const advance = width / glyphs.length;
  return glyphs.map((text, i) => ({
    text,
    x0: x + i * advance,
    x1: x + (i + 1) * advance,
    y0: y,
    size,
    fontName,
  }));
}

async function readPageGeometry(page: PDFPageProxy, pageNumber: number): Promise<PageGeometry> {
  const [left, bottom, right, top] = page.view;
  // Loads the page's fonts into commonObjs so real names can be read.
  await page.getOperatorList();
  const content = await page.getTextContent();
  const chars: CharRecord[] = [];
  for (const item of content.items) {
    if (!isTextItem(item) || item.str === "") continue;
    const [a, b, , , e, f] = item.transform;
    const size = Math.hypot(a, b);
    const fontName = resolveFontName(
      page.commonObjs,
      item.fontName,
      content.styles[item.fontName]?.fontFamily,
    );
    chars.push(...splitTextRun(item.str, e - left, f - bottom, item.width, size, fontName));
  }
  return { pageNumber, width: right - left, height: top - bottom, chars };
}

class PdfjsSource implements PdfSource {
  private readonly pages = new Map<number, Promise<PageGeometry>>();

  constructor(private readonly doc: PDFDocumentProxy) {}

  get pageCount(): number {
    return this.doc.numPages;
  }

  page(pageNumber: number): Promise<PageGeometry> {
    let cached = this.pages.get(pageNumber);
    if (!cached) {
      cached = this.doc.getPage(pageNumber).then((p) => readPageGeometry(p, pageNumber));
      this.pages.set(pageNumber, cached);
    }
    return cached;
  }

  async rasterize(pageNumber: number, resolution: number): Promise<Buffer> {
    const page = await this.doc.getPage(pageNumber);
    const viewport = page.getViewport({ scale: resolution / 72 });
    const canvas = createCanvas(Math.ceil(viewport.width), Math.ceil(viewport.height));
    const canvasContext = canvas.getContext("2d");
    await page.render({ canvas: null, canvasContext, viewport }).promise;
    debug("rasterized page %d at %d dpi", pageNumber, resolution);
    return canvas.toBuffer("image/png");
  }

  async close(): Promise<void> {
    await this.doc.destroy();
  }
}

/** Open a PDF from disk; throws DocumentUnreadableError when it cannot be parsed. */
export async function openPdf(documentPath: string): Promise<PdfSource> {
  try {
    const data = new Uint8Array(fs.readFileSync(documentPath));
    const doc = await getDocument({
      data,
      useSystemFonts: true,
      disableFontFace: true,
      isEvalSupported: false,
      verbosity: 0,
    }).promise;
    debug("opened %s: %d pages", documentPath, doc.numPages);
    return new PdfjsSource(doc);
  } catch (err) {
    throw new DocumentUnreadableError(documentPath, err);
  }
}
