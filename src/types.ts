export type HeadingLevel = "H1" | "H2" | "H3" | "H4";

/** One glyph as reported by the page geometry provider. `y0` is the baseline, origin bottom-left. */
export interface CharRecord {
  text: string;
  x0: number;
  /** Right edge, when the provider knows it; used to recover word breaks. */
  x1?: number;
  y0: number;
  size: number;
  fontName: string;
}

export interface PageGeometry {
  pageNumber: number;
  width: number;
  height: number;
  chars: CharRecord[];
}

/** Renders a page to an image (PNG bytes) for OCR. */
export interface PageRasterizer {
  rasterize(pageNumber: number, resolution: number): Promise<Buffer>;
}

/** An opened document. Pages are 1-indexed. */
export interface PdfSource extends PageRasterizer {
  readonly pageCount: number;
  page(pageNumber: number): Promise<PageGeometry>;
  close(): Promise<void>;
}

/** A visual line on a page. `yPosition` is the distance from the page top to the line's baseline. */
export interface TextLine {
  text: string;
  avgFontSize: number;
  maxFontSize: number;
  leftMargin: number;
  isBold: boolean;
  yPosition: number;
  page: number;
}

export interface HeadingCandidate {
  text: string;
  level: HeadingLevel;
  page: number;
  confidence: number;
  fontSize: number;
  position: number;
  source: "layout" | "ocr";
}

/** Serialized outline entry. */
export interface OutlineItem {
  level: HeadingLevel;
  text: string;
  page: number;
}

/** Outline entry as kept in memory; `position` drives section boundaries. */
export interface OutlineEntry extends OutlineItem {
  position: number;
}

export interface DocumentOutline {
  title: string;
  outline: OutlineEntry[];
}

/** JSON shape written in single-document mode. */
export interface OutlineJson {
  title: string;
  outline: OutlineItem[];
}

export interface RankedSection extends OutlineEntry {
  document: string;
  relevanceScore: number;
}

export type FontThresholds = {
  h1: number;
  h2: number;
  h3: number;
};

export type RejectReason =
  | "duplicate"
  | "low-confidence"
  | "fragment"
  | "breaks-path"
  | "not-meaningful"
  | "contextual-duplicate";

export interface HierarchyDecision {
  text: string;
  page: number;
  level: HeadingLevel;
  confidence: number;
  accepted: boolean;
  reason?: RejectReason;
  /** Hierarchy path after this decision. */
  path: string[];
}

/** A recognized word from the OCR engine; `confidence` is 0–100. */
export interface OcrToken {
  text: string;
  confidence: number;
  height: number;
}

export interface OcrEngine {
  recognize(image: Buffer, language: string): Promise<OcrToken[]>;
  /** Plain text of the image, used to sample the language. */
  recognizeText(image: Buffer, language: string): Promise<string>;
}

export interface LanguageDetector {
  /** ISO 639-3 code; throws when the sample is empty or ambiguous. */
  detect(sample: string): string;
}

export interface OcrDeps {
  engine: OcrEngine;
  detector: LanguageDetector;
}
