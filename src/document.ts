import createDebug from "debug";
import type { HeuristicConfig } from "./config";
import { DEFAULT_CONFIG } from "./config";
import { extractOutlineFromSource } from "./outline";
import type { OutlineOptions } from "./outline";
import { openPdf } from "./pdf";
import { extractSectionFromSource, synthesizedContent } from "./section";
import type { DocumentOutline, OutlineEntry, PdfSource } from "./types";

const debug = createDebug("layoutoutline:document");

async function release(source: PdfSource, documentPath: string): Promise<void> {
  try {
    await source.close();
  } catch (err) {
    debug("failed to close %s: %s", documentPath, err);
  }
}

/**
 * Title and outline of a PDF on disk. Throws DocumentUnreadableError when the
 * file cannot be opened; a document without structure gives an empty outline.
 */
export async function extractOutline(
  documentPath: string,
  options: OutlineOptions = {},
): Promise<DocumentOutline> {
  const source = await openPdf(documentPath);
  try {
    return await extractOutlineFromSource(source, options);
  } finally {
    await release(source, documentPath);
  }
}

/** Body text under `heading`, bounded by the next entry of `allHeadings`. Never empty. */
export async function extractSectionContent(
  documentPath: string,
  heading: OutlineEntry,
  allHeadings: readonly OutlineEntry[],
  config: HeuristicConfig = DEFAULT_CONFIG,
): Promise<string> {
  let source: PdfSource;
  try {
    source = await openPdf(documentPath);
  } catch (err) {
    debug("%s: %s", documentPath, err);
    return synthesizedContent(heading);
  }
  try {
    return await extractSectionFromSource(source, heading, allHeadings, config);
  } finally {
    await release(source, documentPath);
  }
}
