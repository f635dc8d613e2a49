import createDebug from "debug";
import type { CharRecord, TextLine } from "./types";

const debug = createDebug("layoutoutline:lines");

/** Vertical band of a page, in distance-from-top units. `bottom` is exclusive. */
export interface CropRegion {
  top: number;
  bottom: number;
}

type LineGroup = { baseline: number; chars: CharRecord[] };

/** Top-of-page distance of a rounded baseline. */
export function topOffset(baseline: number, pageHeight: number): number {
  return pageHeight - baseline;
}

function groupByBaseline(chars: CharRecord[]): LineGroup[] {
  const keyed = new Map<number, CharRecord[]>();
  const unkeyed: LineGroup[] = [];
  for (const ch of chars) {
    if (!Number.isFinite(ch.y0)) {
      unkeyed.push({ baseline: 0, chars: [ch] });
      continue;
    }
    const y = Math.round(ch.y0);
    const group = keyed.get(y);
    if (group) group.push(ch);
    else keyed.set(y, [ch]);
  }
  const groups = [...keyed.entries()]
    .sort((a, b) => b[0] - a[0])
    .map(([baseline, members]) => ({ baseline, chars: members }));
  return [...groups, ...unkeyed];
}

function joinChars(sorted: CharRecord[], spaceGapRatio: number): string {
  let out = "";
  let prev: CharRecord | undefined;
  for (const ch of sorted) {
    if (
      prev?.x1 !== undefined &&
      out !== "" &&
      !/\s$/.test(out) &&
      ch.text.trim() !== "" &&
      ch.x0 - prev.x1 > spaceGapRatio * Math.max(prev.size, 1)
    )
      out += " ";
    out += ch.text;
    prev = ch;
  }
  return out.trim();
}

function toTextLine(
  group: LineGroup,
  page: number,
  pageHeight: number,
  spaceGapRatio: number,
): TextLine | null {
  const sorted = [...group.chars].sort((a, b) => a.x0 - b.x0);
  const text = joinChars(sorted, spaceGapRatio);
  if (!text) return null;
  const sizes = sorted.map((c) => c.size);
  return {
    text,
    avgFontSize: sizes.reduce((s, n) => s + n, 0) / sizes.length,
    maxFontSize: Math.max(...sizes),
    leftMargin: Math.min(...sorted.map((c) => c.x0)),
    isBold: sorted.some((c) => /bold/i.test(c.fontName)),
    yPosition: topOffset(group.baseline, pageHeight),
    page,
  };
}

/** Group a page's glyphs into visual lines, top of page first. */
export function buildTextLines(
  chars: CharRecord[],
  page: number,
  pageHeight: number,
  spaceGapRatio = 0.25,
): TextLine[] {
  const lines: TextLine[] = [];
  for (const group of groupByBaseline(chars)) {
    const line = toTextLine(group, page, pageHeight, spaceGapRatio);
    if (line) lines.push(line);
  }
  debug("page %d: %d chars -> %d lines", page, chars.length, lines.length);
  return lines;
}

/** Page text with one visual line per row, optionally restricted to a vertical band. */
export function pageText(
  chars: CharRecord[],
  pageHeight: number,
  crop?: CropRegion,
  spaceGapRatio = 0.25,
): string {
  return buildTextLines(chars, 0, pageHeight, spaceGapRatio)
    .filter(
      (line) => !crop || (line.yPosition >= crop.top && line.yPosition < crop.bottom),
    )
    .map((line) => line.text)
    .join("\n");
}
