import createDebug from "debug";
import * as path from "node:path";

const debug = createDebug("layoutoutline:filename");

export function sanitizeFilename(name: string): string {
  return name.replace(/[/\\:*?"<>|]/g, "_").trim() || "untitled";
}

/** Output base name for a document: its sanitized stem, cut to `maxLength`. */
export function outputBasename(documentPath: string, maxLength = 200): string {
  const stem = sanitizeFilename(path.basename(documentPath, path.extname(documentPath)));
  if (stem.length <= maxLength) return stem;
  debug("truncate basename %d -> %d: %s", stem.length, maxLength, `${stem.slice(0, 40)}...`);
  return stem.slice(0, maxLength);
}

export function isPdfFile(fileName: string): boolean {
  return path.extname(fileName).toLowerCase() === ".pdf";
}
