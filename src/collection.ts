import createDebug from "debug";
import * as path from "node:path";
import { z } from "zod";
import type { HeuristicConfig } from "./config";
import { DEFAULT_CONFIG } from "./config";
import { extractOutlineFromSource } from "./outline";
import type { SectionInput, SemanticRanker } from "./relevance";
import { extractSectionFromSource } from "./section";
import type { OcrDeps, OutlineEntry, PdfSource } from "./types";

const debug = createDebug("layoutoutline:collection");

const PersonaSchema = z
  .union([z.string(), z.object({ role: z.string() }).passthrough()])
  .transform((p) => (typeof p === "string" ? p : p.role));

const TaskSchema = z
  .union([z.string(), z.object({ task: z.string() }).passthrough()])
  .transform((t) => (typeof t === "string" ? t : t.task));

const DocumentRefSchema = z
  .union([
    z.string().min(1),
    z.object({ filename: z.string().min(1), title: z.string().optional() }).passthrough(),
  ])
  .transform((d) => (typeof d === "string" ? d : d.filename));

export const CollectionJobSchema = z.object({
  persona: PersonaSchema,
  job_to_be_done: TaskSchema,
  documents: z.array(DocumentRefSchema).default([]),
  challenge_info: z.unknown().optional(),
});

export type CollectionJob = z.infer<typeof CollectionJobSchema>;

export function parseCollectionJob(raw: unknown): CollectionJob {
  const parsed = CollectionJobSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid job file: ${issues}`);
  }
  return parsed.data;
}

export interface ExtractedSection {
  document: string;
  section_title: string;
  importance_rank: number;
  page_number: number;
}

export interface SubsectionAnalysis {
  document: string;
  refined_text: string;
  page_number: number;
}

export interface CollectionOutput {
  metadata: {
    input_documents: string[];
    persona: string;
    job_to_be_done: string;
    processing_timestamp: string;
  };
  extracted_sections: ExtractedSection[];
  subsection_analysis: SubsectionAnalysis[];
}

export interface CollectionDeps {
  /** Open a listed document; null when it does not exist. */
  open: (document: string) => Promise<PdfSource | null>;
  ranker: SemanticRanker;
  config?: HeuristicConfig;
  ocr?: OcrDeps;
  topN?: number;
  now?: () => Date;
}

/** Stand-in heading for a document in which no structure was detected. */
export function overviewHeading(document: string): OutlineEntry {
  return {
    level: "H1",
    text: `Overview of ${path.basename(document, path.extname(document))}`,
    page: 1,
    position: 0,
  };
}

async function closeAll(sources: Map<string, PdfSource>): Promise<void> {
  for (const [document, source] of sources) {
    try {
      await source.close();
    } catch (err) {
      debug("failed to close %s: %s", document, err);
    }
  }
}

/**
 * Rank the headings of every document in the job against its persona and task,
 * then extract the body of the top sections.
 */
export async function analyzeCollection(
  job: CollectionJob,
  deps: CollectionDeps,
): Promise<CollectionOutput> {
  const config = deps.config ?? DEFAULT_CONFIG;
  const sources = new Map<string, PdfSource>();
  const outlines = new Map<string, OutlineEntry[]>();
  const sections: SectionInput[] = [];

  try {
    for (const document of job.documents) {
      let source: PdfSource | null;
      try {
        source = await deps.open(document);
      } catch (err) {
        console.error(`[x] ${document}:`, err instanceof Error ? err.message : err);
        continue;
      }
      if (!source) {
        console.warn(`Warning: Document ${document} not found, skipping.`);
        continue;
      }
      sources.set(document, source);
      console.log(`Extracting outline from ${document}...`);
      const { outline } = await extractOutlineFromSource(source, { config, ocr: deps.ocr });
      const headings = outline.length > 0 ? outline : [overviewHeading(document)];
      outlines.set(document, headings);
      sections.push(...headings.map((h) => ({ ...h, document })));
    }

    const ranked = await deps.ranker.rankSections(job.persona, job.job_to_be_done, sections);
    const top = ranked.slice(0, deps.topN ?? 10);
    debug("%d sections ranked, keeping %d", ranked.length, top.length);

    const extracted: ExtractedSection[] = [];
    const analysis: SubsectionAnalysis[] = [];
    for (const [i, section] of top.entries()) {
      const source = sources.get(section.document);
      const headings = outlines.get(section.document);
      if (!source || !headings) continue;
      console.log(`Extracting content for top section: '${section.text}' from ${section.document}`);
      const refined = await extractSectionFromSource(source, section, headings, config);
      extracted.push({
        document: section.document,
        section_title: section.text,
        importance_rank: i + 1,
        page_number: section.page,
      });
      analysis.push({ document: section.document, refined_text: refined, page_number: section.page });
    }

    return {
      metadata: {
        input_documents: job.documents,
        persona: job.persona,
        job_to_be_done: job.job_to_be_done,
        processing_timestamp: (deps.now ?? (() => new Date()))().toISOString(),
      },
      extracted_sections: extracted,
      subsection_analysis: analysis,
    };
  } finally {
    await closeAll(sources);
  }
}
