import createDebug from "debug";
import type { HeuristicConfig } from "./config";
import { collapseWhitespace, includesAny } from "./text";

const debug = createDebug("layoutoutline:title");

type TitleConfig = Pick<
  HeuristicConfig,
  | "titleContinuationKeywords"
  | "titleOpenerKeywords"
  | "titleDomainKeywords"
  | "titleComponentKeywords"
  | "titleMaxLength"
>;

export const UNTITLED = "Untitled";

const MONTH_START =
  /^(january|february|march|april|may|june|july|august|september|october|november|december)\b/i;
const LEADING_DIGIT = /^\d+/;

const isDateLike = (line: string) => MONTH_START.test(line) || LEADING_DIGIT.test(line);

const isRfpLine = (lower: string) =>
  (lower.includes("rfp") && lower.includes("request")) || lower.includes("request for proposal");

const isProposalOpener = (lower: string) => lower.includes("to present") && lower.includes("proposal");

function fromRfpLanguage(lines: string[], config: TitleConfig): string[] {
  const found: string[] = [];
  lines.slice(0, 20).forEach((line, i) => {
    if (!isRfpLine(line.toLowerCase())) return;
    const parts: string[] = [];
    for (let j = Math.max(0, i - 3); j <= i; j++) {
      const before = lines[j];
      if (before.length > 5 && !isDateLike(before)) parts.push(before);
    }
    for (let j = i + 1; j < Math.min(i + 8, lines.length); j++) {
      const next = lines[j];
      if (
        next.length > 5 &&
        includesAny(next.toLowerCase(), config.titleContinuationKeywords) &&
        !MONTH_START.test(next)
      )
        parts.push(next);
      else if (next.length < 80 && !next.endsWith(".")) parts.push(next);
      else break;
    }
    const title = collapseWhitespace(parts.join(" "));
    if (title.length > 20) found.push(title);
  });
  return found;
}

function fromProposalOpener(lines: string[], config: TitleConfig): string[] {
  const found: string[] = [];
  lines.slice(0, 15).forEach((line, i) => {
    if (!isProposalOpener(line.toLowerCase())) return;
    const parts = [line];
    for (let j = i + 1; j < Math.min(i + 5, lines.length); j++) {
      if (!includesAny(lines[j].toLowerCase(), config.titleOpenerKeywords)) break;
      parts.push(lines[j]);
    }
    if (parts.length > 1) found.push(parts.join(" "));
  });
  return found;
}

function isBusinessPlanLine(line: string, keywords: readonly string[]): boolean {
  const lower = line.toLowerCase();
  return lower.includes("business plan") && includesAny(lower, keywords);
}

function fromBusinessPlan(lines: string[], config: TitleConfig): string[] {
  return lines
    .slice(0, 10)
    .filter((line) => line.length > 20 && isBusinessPlanLine(line, config.titleDomainKeywords));
}

function fromComponents(lines: string[], config: TitleConfig): string[] {
  let rfp: string | undefined;
  let proposal: string | undefined;
  let business: string | undefined;
  for (const line of lines.slice(0, 10)) {
    const lower = line.toLowerCase();
    if (lower.includes("rfp") || lower.includes("request for proposal")) rfp = line;
    else if (isProposalOpener(lower)) proposal = line;
    else if (isBusinessPlanLine(line, config.titleComponentKeywords)) business = line;
  }
  if (!rfp || (!proposal && !business)) return [];
  return [[rfp, proposal, business].filter((p): p is string => !!p).join(" ")];
}

const METHODS = [fromRfpLanguage, fromProposalOpener, fromBusinessPlan, fromComponents];

/** Keep the first sentence of an overlong title when that sentence is substantial. */
function shorten(title: string, maxLength: number): string {
  if (title.length <= maxLength) return title;
  const sentences = title.split(".");
  return sentences.length > 1 && sentences[0].length > 30 ? sentences[0].trim() : title;
}

/**
 * Document title from the first page's text, reconstructing multi-line titles
 * around proposal/plan language before falling back to the first line.
 */
export function extractTitle(firstPageText: string, config: TitleConfig): string {
  const lines = firstPageText
    .split("\n")
    .map((l) => l.trim())
    .filter(Boolean);

  for (const method of METHODS) {
    const candidates = method(lines, config);
    if (candidates.length === 0) continue;
    const longest = candidates.reduce((best, c) => (c.length > best.length ? c : best));
    debug("%s -> %d candidates", method.name, candidates.length);
    return shorten(collapseWhitespace(longest), config.titleMaxLength);
  }

  const keyed = lines
    .slice(0, 8)
    .find(
      (line) =>
        line.length > 15 &&
        includesAny(line.toLowerCase(), config.titleDomainKeywords) &&
        !LEADING_DIGIT.test(line),
    );
  return keyed ?? lines[0] ?? UNTITLED;
}
