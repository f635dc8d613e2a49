import createDebug from "debug";
import { extractPageCandidates } from "./candidates";
import type { HeuristicConfig } from "./config";
import { DEFAULT_CONFIG } from "./config";
import { buildHierarchy } from "./hierarchy";
import { buildTextLines, pageText } from "./lines";
import { ocrPageCandidates } from "./ocr";
import { UNTITLED, extractTitle } from "./title";
import type {
  DocumentOutline,
  HeadingCandidate,
  HierarchyDecision,
  OcrDeps,
  OutlineJson,
  PageGeometry,
  PdfSource,
} from "./types";

const debug = createDebug("layoutoutline:outline");

export interface OutlineOptions {
  config?: HeuristicConfig;
  /** OCR for pages without character geometry; such pages are skipped when absent. */
  ocr?: OcrDeps;
  /** Receives one decision per candidate considered by the hierarchy builder. */
  trace?: HierarchyDecision[];
}

/** A page whose geometry cannot be read contributes nothing rather than failing the document. */
async function readPage(source: PdfSource, pageNumber: number): Promise<PageGeometry | null> {
  try {
    return await source.page(pageNumber);
  } catch (err) {
    debug("page %d unreadable: %s", pageNumber, err);
    return null;
  }
}

async function documentTitle(source: PdfSource, config: HeuristicConfig): Promise<string> {
  if (source.pageCount === 0) return UNTITLED;
  const first = await readPage(source, 1);
  if (!first || first.chars.length === 0) return UNTITLED;
  return extractTitle(pageText(first.chars, first.height, undefined, config.spaceGapRatio), config);
}

async function collectCandidates(
  source: PdfSource,
  config: HeuristicConfig,
  ocr: OcrDeps | undefined,
): Promise<HeadingCandidate[]> {
  const all: HeadingCandidate[] = [];
  for (let pageNumber = 1; pageNumber <= source.pageCount; pageNumber++) {
    const page = await readPage(source, pageNumber);
    if (!page) continue;
    if (page.chars.length === 0) {
      if (ocr) all.push(...(await ocrPageCandidates(source, pageNumber, ocr, config)));
      else debug("page %d has no text and OCR is off", pageNumber);
      continue;
    }
    const lines = buildTextLines(page.chars, pageNumber, page.height, config.spaceGapRatio);
    all.push(...extractPageCandidates(lines, config));
  }
  return all;
}

/** Title and heading outline of an opened document. */
export async function extractOutlineFromSource(
  source: PdfSource,
  options: OutlineOptions = {},
): Promise<DocumentOutline> {
  const config = options.config ?? DEFAULT_CONFIG;
  const title = await documentTitle(source, config);
  const candidates = await collectCandidates(source, config, options.ocr);
  const outline = buildHierarchy(candidates, config, options.trace);
  debug("%d pages, %d candidates, %d headings", source.pageCount, candidates.length, outline.length);
  return { title, outline };
}

/** Serializable form: positions are internal and dropped. */
export function toOutlineJson(doc: DocumentOutline): OutlineJson {
  return {
    title: doc.title,
    outline: doc.outline.map(({ level, text, page }) => ({ level, text, page })),
  };
}
