import createDebug from "debug";
import { franc } from "franc";
import { createRequire } from "node:module";
import * as path from "node:path";
import { createWorker } from "tesseract.js";
import type { Page, Worker } from "tesseract.js";
import type { HeuristicConfig } from "./config";
import type {
  HeadingCandidate,
  LanguageDetector,
  OcrDeps,
  OcrEngine,
  OcrToken,
  PageRasterizer,
} from "./types";

const debug = createDebug("layoutoutline:ocr");

export const DEFAULT_OCR_LANGUAGE = "eng";

/** Detected ISO 639-3 code -> OCR traineddata name. */
const OCR_LANGUAGES: Record<string, string> = {
  eng: "eng",
  fra: "fra",
  deu: "deu",
  spa: "spa",
  jpn: "jpn",
  cmn: "chi_sim",
};

export function ocrLanguageFor(detected: string): string {
  return OCR_LANGUAGES[detected] ?? DEFAULT_OCR_LANGUAGE;
}

type OcrConfig = Pick<
  HeuristicConfig,
  "ocrResolution" | "ocrMinConfidence" | "ocrMaxConfidence" | "ocrSampleLength"
>;

async function guessLanguage(image: Buffer, deps: OcrDeps, sampleLength: number): Promise<string> {
  try {
    const sample = (await deps.engine.recognizeText(image, DEFAULT_OCR_LANGUAGE)).slice(
      0,
      sampleLength,
    );
    if (!sample.trim()) return DEFAULT_OCR_LANGUAGE;
    return ocrLanguageFor(deps.detector.detect(sample));
  } catch (err) {
    debug("language detection failed, using %s: %s", DEFAULT_OCR_LANGUAGE, err);
    return DEFAULT_OCR_LANGUAGE;
  }
}

async function recognizeTokens(image: Buffer, language: string, deps: OcrDeps): Promise<OcrToken[]> {
  try {
    return await deps.engine.recognize(image, language);
  } catch (err) {
    if (language === DEFAULT_OCR_LANGUAGE) throw err;
    debug("OCR in %s failed, retrying in %s: %s", language, DEFAULT_OCR_LANGUAGE, err);
    return await deps.engine.recognize(image, DEFAULT_OCR_LANGUAGE);
  }
}

export function tokensToCandidates(
  tokens: OcrToken[],
  pageNumber: number,
  config: Pick<HeuristicConfig, "ocrMinConfidence" | "ocrMaxConfidence">,
): HeadingCandidate[] {
  return tokens
    .filter((t) => t.confidence > config.ocrMinConfidence && t.text.trim() !== "")
    .map((t): HeadingCandidate => ({
      text: t.text.trim(),
      level: "H3",
      page: pageNumber,
      confidence: Math.min(config.ocrMaxConfidence, t.confidence / 100),
      fontSize: t.height,
      position: 0,
      source: "ocr",
    }));
}

/** Low-confidence heading candidates for a page that has no character geometry. */
export async function ocrPageCandidates(
  rasterizer: PageRasterizer,
  pageNumber: number,
  deps: OcrDeps,
  config: OcrConfig,
): Promise<HeadingCandidate[]> {
  try {
    const image = await rasterizer.rasterize(pageNumber, config.ocrResolution);
    const language = await guessLanguage(image, deps, config.ocrSampleLength);
    const tokens = await recognizeTokens(image, language, deps);
    const candidates = tokensToCandidates(tokens, pageNumber, config);
    debug("page %d (%s): %d tokens -> %d candidates", pageNumber, language, tokens.length, candidates.length);
    return candidates;
  } catch (err) {
    debug("page %d: OCR unavailable: %s", pageNumber, err);
    return [];
  }
}

/** `franc`-backed detector; `und` (undetermined) is a failure. */
export class FrancLanguageDetector implements LanguageDetector {
  detect(sample: string): string {
    const code = franc(sample, { minLength: 3 });
    if (code === "und") throw new Error("language undetermined");
    return code;
  }
}

/** Directory of the English traineddata shipped by `@tesseract.js-data/eng`. */
export function bundledLangPath(): string {
  const require = createRequire(import.meta.url);
  const pkg = require.resolve("@tesseract.js-data/eng/package.json");
  return path.join(path.dirname(pkg), "4.0.0_best_int");
}

export interface TesseractOptions {
  /** Directory or URL holding `<lang>.traineddata.gz` files. */
  langPath: string;
  /** Languages present under `langPath`; others are read as English. All when absent. */
  languages?: readonly string[];
}

/** tesseract.js workers, one per language, reused across pages. */
export class TesseractOcrEngine implements OcrEngine {
  private readonly workers = new Map<string, Promise<Worker>>();

  constructor(private readonly options: TesseractOptions) {}

  private installed(language: string): string {
    const { languages } = this.options;
    if (!languages || languages.includes(language)) return language;
    debug("no traineddata for %s, using %s", language, DEFAULT_OCR_LANGUAGE);
    return DEFAULT_OCR_LANGUAGE;
  }

  private worker(language: string): Promise<Worker> {
    let worker = this.workers.get(language);
    if (!worker) {
      worker = createWorker(language, undefined, {
        langPath: this.options.langPath,
        cacheMethod: "none",
      });
      this.workers.set(language, worker);
    }
    return worker;
  }

  private async page(image: Buffer, requested: string): Promise<Page> {
    const language = this.installed(requested);
    try {
      const worker = await this.worker(language);
      const { data } = await worker.recognize(image);
      return data;
    } catch (err) {
      // A failed load must not poison later attempts.
      this.workers.delete(language);
      throw err;
    }
  }

  async recognize(image: Buffer, language: string): Promise<OcrToken[]> {
    const page = await this.page(image, language);
    return page.words.map((w) => ({
      text: w.text,
      confidence: w.confidence,
      height: w.bbox.y1 - w.bbox.y0,
    }));
  }

  async recognizeText(image: Buffer, language: string): Promise<string> {
    return (await this.page(image, language)).text;
  }

  async terminate(): Promise<void> {
    const workers = [...this.workers.values()];
    this.workers.clear();
    const settled = await Promise.allSettled(workers);
    for (const result of settled) {
      if (result.status === "fulfilled") await result.value.terminate();
    }
  }
}

/**
 * OCR with the detector and tesseract.js. Without `langPath` only the bundled
 * English data is used, so nothing is fetched at run time.
 */
export function defaultOcrDeps(langPath?: string): OcrDeps & { engine: TesseractOcrEngine } {
  const options: TesseractOptions = langPath
    ? { langPath }
    : { langPath: bundledLangPath(), languages: [DEFAULT_OCR_LANGUAGE] };
  return { engine: new TesseractOcrEngine(options), detector: new FrancLanguageDetector() };
}
