import createDebug from "debug";
import type { HeuristicConfig } from "./config";
import {
  DEFINITELY_NOT_HEADING_RULES,
  HEADING_PATTERNS,
  INCOMPLETE_RULES,
  WELL_FORMED_RULES,
  firstMatch,
  matchesAny,
} from "./rules";
import type { PatternRule } from "./rules";
import { calibrateThresholds } from "./thresholds";
import type { FontThresholds, HeadingCandidate, HeadingLevel, TextLine } from "./types";

const debug = createDebug("layoutoutline:candidates");

export interface LineScore {
  confidence: number;
  level: HeadingLevel;
  pattern?: PatternRule;
}

/** Why a line was rejected before scoring, or null when it may be scored. */
export function rejectionReason(
  text: string,
  config: Pick<HeuristicConfig, "minLineLength" | "maxLineLength">,
): string | null {
  const rule = firstMatch(DEFINITELY_NOT_HEADING_RULES, text);
  if (rule) return rule.name;
  if (text.length < config.minLineLength) return "too-short";
  if (text.length > config.maxLineLength) return "too-long";
  return null;
}

function fontBand(
  size: number,
  thresholds: FontThresholds,
  weights: HeuristicConfig["bandWeights"],
): { weight: number; level: HeadingLevel } {
  if (size >= thresholds.h1) return { weight: weights[0], level: "H1" };
  if (size >= thresholds.h2) return { weight: weights[1], level: "H2" };
  if (size >= thresholds.h3) return { weight: weights[2], level: "H3" };
  return { weight: weights[3], level: "H4" };
}

/** Additive confidence of a line that survived the rejection filters, clamped to [0, 1]. */
export function scoreLine(
  line: TextLine,
  thresholds: FontThresholds,
  config: HeuristicConfig,
): LineScore {
  const text = line.text.trim();
  const band = fontBand(line.avgFontSize, thresholds, config.bandWeights);
  let confidence = band.weight;
  let level = band.level;

  const pattern = firstMatch(HEADING_PATTERNS, text);
  if (pattern) {
    confidence += pattern.boost;
    if (pattern.level && pattern.boost > config.patternLevelCutoff) level = pattern.level;
  }

  if (line.isBold) confidence += config.boldBonus;
  if (line.leftMargin < config.leftMarginThreshold) confidence += config.leftAlignedBonus;

  if (text.length < config.shortTextLength) confidence += config.shortTextBonus;
  if (text.length < config.conciseTextLength) confidence += config.conciseTextBonus;

  if (matchesAny(WELL_FORMED_RULES, text)) confidence += config.wellFormedBonus;
  if (matchesAny(INCOMPLETE_RULES, text)) confidence -= config.incompletePenalty;

  return { confidence: Math.min(Math.max(confidence, 0), 1), level, pattern };
}

export function scoreCandidate(
  line: TextLine,
  thresholds: FontThresholds,
  config: HeuristicConfig,
): HeadingCandidate | null {
  const text = line.text.trim();
  const reason = rejectionReason(text, config);
  if (reason) return null;

  const score = scoreLine(line, thresholds, config);
  if (score.confidence <= config.candidateThreshold) return null;
  return {
    text,
    level: score.level,
    page: line.page,
    confidence: score.confidence,
    fontSize: line.avgFontSize,
    position: line.yPosition,
    source: "layout",
  };
}

/** Heading candidates of one page, in the page's line order. */
export function extractPageCandidates(
  lines: TextLine[],
  config: HeuristicConfig,
): HeadingCandidate[] {
  const thresholds = calibrateThresholds(lines, config);
  if (!thresholds) return [];
  const out: HeadingCandidate[] = [];
  for (const line of lines) {
    const candidate = scoreCandidate(line, thresholds, config);
    if (candidate) out.push(candidate);
  }
  if (lines.length > 0)
    debug("page %d: %d lines -> %d candidates", lines[0].page, lines.length, out.length);
  return out;
}
