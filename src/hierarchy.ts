import createDebug from "debug";
import type { HeuristicConfig } from "./config";
import { PATH_BREAK_RULES, isMeaningfulHeading, isSentenceFragment, matchesAny } from "./rules";
import type {
  HeadingCandidate,
  HeadingLevel,
  HierarchyDecision,
  OutlineEntry,
  RejectReason,
} from "./types";
import { words } from "./text";

const debug = createDebug("layoutoutline:hierarchy");

type HierarchyConfig = Pick<
  HeuristicConfig,
  | "hierarchyThreshold"
  | "duplicateOverlapRatio"
  | "recentHeadingWindow"
  | "pathTextLimit"
  | "maxOutlineItems"
>;

const LEVEL_DEPTH: Record<HeadingLevel, number> = { H1: 0, H2: 1, H3: 2, H4: 3 };

/**
 * Ancestor labels by depth (H1 = 0 … H4 = 3). Accepting a heading keeps the
 * ancestors above its depth and makes it the deepest entry.
 */
export class HierarchyPath {
  private labels: string[] = [];

  constructor(private readonly textLimit = 50) {}

  get entries(): readonly string[] {
    return this.labels;
  }

  push(level: HeadingLevel, text: string): void {
    this.labels = [...this.labels.slice(0, LEVEL_DEPTH[level]), text.slice(0, this.textLimit)];
  }
}

/** Word-set overlap relative to the smaller set. */
export function wordOverlap(a: string, b: string): number {
  const wa = new Set(words(a.toLowerCase()));
  const wb = new Set(words(b.toLowerCase()));
  if (wa.size === 0 || wb.size === 0) return 0;
  let shared = 0;
  for (const w of wa) if (wb.has(w)) shared += 1;
  return shared / Math.min(wa.size, wb.size);
}

export function isContextualDuplicate(
  text: string,
  accepted: readonly OutlineEntry[],
  config: Pick<HierarchyConfig, "duplicateOverlapRatio" | "recentHeadingWindow">,
): boolean {
  if (config.recentHeadingWindow <= 0) return false;
  const key = text.toLowerCase().trim();
  return accepted.slice(-config.recentHeadingWindow).some(
    (h) =>
      h.text.toLowerCase().trim() === key ||
      wordOverlap(text, h.text) > config.duplicateOverlapRatio,
  );
}

function qualityRejection(
  candidate: HeadingCandidate,
  accepted: readonly OutlineEntry[],
  config: HierarchyConfig,
): RejectReason | null {
  if (candidate.confidence < config.hierarchyThreshold) return "low-confidence";
  if (isSentenceFragment(candidate.text)) return "fragment";
  if (matchesAny(PATH_BREAK_RULES, candidate.text)) return "breaks-path";
  if (!isMeaningfulHeading(candidate.text)) return "not-meaningful";
  if (isContextualDuplicate(candidate.text, accepted, config)) return "contextual-duplicate";
  return null;
}

/** Reading order: page, then distance from the page top. */
export function sortReadingOrder<T extends { page: number; position: number }>(items: T[]): T[] {
  return [...items].sort((a, b) => a.page - b.page || a.position - b.position);
}

/**
 * Single sequential pass over a document's candidates producing the final
 * outline. Rejected candidates leave the path and the duplicate set untouched.
 */
export function buildHierarchy(
  candidates: HeadingCandidate[],
  config: HierarchyConfig,
  trace?: HierarchyDecision[],
): OutlineEntry[] {
  const path = new HierarchyPath(config.pathTextLimit);
  const seen = new Set<string>();
  const accepted: OutlineEntry[] = [];

  for (const candidate of sortReadingOrder(candidates)) {
    const key = candidate.text.toLowerCase().trim();
    const reason = seen.has(key)
      ? "duplicate"
      : qualityRejection(candidate, accepted, config);

    if (!reason) {
      path.push(candidate.level, candidate.text);
      seen.add(key);
      accepted.push({
        level: candidate.level,
        text: candidate.text,
        page: candidate.page,
        position: candidate.position,
      });
    } else {
      debug("reject p%d %s (%s)", candidate.page, JSON.stringify(candidate.text), reason);
    }

    trace?.push({
      text: candidate.text,
      page: candidate.page,
      level: candidate.level,
      confidence: candidate.confidence,
      accepted: !reason,
      ...(reason ? { reason } : {}),
      path: [...path.entries],
    });
  }

  debug("%d candidates -> %d headings", candidates.length, accepted.length);
  return accepted.slice(0, config.maxOutlineItems);
}
