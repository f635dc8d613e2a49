import type { CharRecord, PageGeometry, PdfSource, TextLine } from "../types";

export interface Row {
  text: string;
  /** Baseline distance from the page top. */
  top: number;
  size?: number;
  x?: number;
  font?: string;
}

export const PAGE_HEIGHT = 792;
export const PAGE_WIDTH = 612;

/** Glyphs of `text` laid out edge to edge from `x`; spaces are glyphs too. */
export function glyphs(
  text: string,
  { x = 72, y, size = 11, font = "Helvetica" }: { x?: number; y: number; size?: number; font?: string },
): CharRecord[] {
  const advance = size * 0.5;
  return Array.from(text).map((ch, i) => ({
    text: ch,
    x0: x + i * advance,
    x1: x + (i + 1) * advance,
    y0: y,
    size,
    fontName: font,
  }));
}

export function pageOf(pageNumber: number, rows: Row[], height = PAGE_HEIGHT): PageGeometry {
  return {
    pageNumber,
    width: PAGE_WIDTH,
    height,
    chars: rows.flatMap((r) =>
      glyphs(r.text, { x: r.x, y: height - r.top, size: r.size, font: r.font }),
    ),
  };
}

export function textLine(text: string, overrides: Partial<TextLine> = {}): TextLine {
  return {
    text,
    avgFontSize: 12,
    maxFontSize: 12,
    leftMargin: 72,
    isBold: false,
    yPosition: 100,
    page: 1,
    ...overrides,
  };
}

/** In-memory document; pages listed in `failing` throw when read. */
export class FakeSource implements PdfSource {
  closed = false;
  readonly rasterized: number[] = [];

  constructor(
    private readonly pages: PageGeometry[],
    private readonly failing: ReadonlySet<number> = new Set(),
  ) {}

  get pageCount(): number {
    return this.pages.length;
  }

  async page(pageNumber: number): Promise<PageGeometry> {
    const page = this.pages[pageNumber - 1];
    if (!page || this.failing.has(pageNumber)) throw new Error(`page ${pageNumber} unreadable`);
    return page;
  }

  async rasterize(pageNumber: number): Promise<Buffer> {
    this.rasterized.push(pageNumber);
    return Buffer.from(`page-${pageNumber}`);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** One page: "1. Introduction" at 18pt followed by 11pt body sentences. */
export function introductionDocument(): FakeSource {
  return new FakeSource([
    pageOf(1, [
      { text: "1. Introduction", top: 92, size: 18 },
      { text: "The committee reviewed every proposal submitted during the first round.", top: 120 },
      { text: "Each reviewer scored the responses against the published criteria.", top: 134 },
      { text: "Results were shared with all applicants at the end of the month.", top: 148 },
    ]),
  ]);
}
