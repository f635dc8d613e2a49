import createDebug from "debug";
import type { HeuristicConfig } from "./config";
import type { FontThresholds, TextLine } from "./types";

const debug = createDebug("layoutoutline:thresholds");

const DEFAULT_SIZE = 12;

export interface SizeUsage {
  count: number;
  totalChars: number;
  keywordHits: number;
}

export function measureSizeUsage(
  lines: TextLine[],
  keywords: readonly string[],
): Map<number, SizeUsage> {
  const usage = new Map<number, SizeUsage>();
  for (const line of lines) {
    const entry = usage.get(line.avgFontSize) ?? { count: 0, totalChars: 0, keywordHits: 0 };
    entry.count += 1;
    entry.totalChars += line.text.length;
    const lower = line.text.toLowerCase();
    if (keywords.some((k) => lower.includes(k))) entry.keywordHits += 1;
    usage.set(line.avgFontSize, entry);
  }
  return usage;
}

function fromRanked(sizes: number[], fill: (rank: number) => number): FontThresholds {
  return {
    h1: sizes[0] ?? fill(0),
    h2: sizes[1] ?? fill(1),
    h3: sizes[2] ?? fill(2),
  };
}

/**
 * Font-size thresholds for H1–H3 on one page. Sizes carrying short runs of
 * text (or structural keywords) are preferred; anything below h3 is H4.
 * Null when the page has no usable font sizes.
 */
export function calibrateThresholds(
  lines: TextLine[],
  config: Pick<HeuristicConfig, "headingSizeMaxAvgLength" | "headingSizeKeywords">,
): FontThresholds | null {
  const sized = lines.filter((l) => l.avgFontSize > 0);
  if (sized.length === 0) return null;

  const uniqueSizes = [...new Set(sized.map((l) => l.avgFontSize))].sort((a, b) => b - a);
  const usage = measureSizeUsage(sized, config.headingSizeKeywords);

  const headingSizes = uniqueSizes.filter((size) => {
    const u = usage.get(size);
    if (!u) return false;
    const avgLength = u.totalChars / Math.max(u.count, 1);
    return avgLength < config.headingSizeMaxAvgLength || u.keywordHits > 0;
  });

  let thresholds: FontThresholds;
  if (headingSizes.length > 0) {
    // Missing ranks repeat the smallest heading size found.
    const last = headingSizes[Math.min(headingSizes.length, 3) - 1];
    thresholds = fromRanked(headingSizes, () => last);
  } else {
    thresholds = fromRanked(uniqueSizes, () => DEFAULT_SIZE);
  }
  debug(
    "sizes=%o heading=%o -> h1=%d h2=%d h3=%d",
    uniqueSizes,
    headingSizes,
    thresholds.h1,
    thresholds.h2,
    thresholds.h3,
  );
  return thresholds;
}
