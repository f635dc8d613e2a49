import type { EmbeddingsInterface } from "@langchain/core/embeddings";
import { cosineSimilarity } from "@langchain/core/utils/math";
import { OllamaEmbeddings } from "@langchain/ollama";
import createDebug from "debug";
import type { OutlineEntry, RankedSection } from "./types";

const debug = createDebug("layoutoutline:relevance");

export interface RankerOptions {
  model: string;
  baseUrl?: string;
}

export const DEFAULT_RANKER_OPTIONS: RankerOptions = {
  model: "all-minilm",
  baseUrl: "http://localhost:11434",
};

export type SectionInput = OutlineEntry & { document: string };

export function buildQuery(persona: string, task: string): string {
  return `User profile: ${persona}. Task to be completed: ${task}`;
}

/**
 * Orders headings by embedding similarity to a persona + task query. A ranker
 * without a model ranks nothing.
 */
export class SemanticRanker {
  constructor(private readonly embeddings: EmbeddingsInterface | null) {}

  /** Build the Ollama client and embed a test string once; a failure gives an unavailable ranker. */
  static async load(options: RankerOptions = DEFAULT_RANKER_OPTIONS): Promise<SemanticRanker> {
    const embeddings = new OllamaEmbeddings({ model: options.model, baseUrl: options.baseUrl });
    try {
      await embeddings.embedQuery("ready");
      debug("model %s ready", options.model);
      return new SemanticRanker(embeddings);
    } catch (err) {
      console.error(`Embedding model ${options.model} unavailable:`, err);
      return new SemanticRanker(null);
    }
  }

  get available(): boolean {
    return this.embeddings !== null;
  }

  async rankSections(
    persona: string,
    task: string,
    sections: readonly SectionInput[],
  ): Promise<RankedSection[]> {
    if (!this.embeddings || sections.length === 0) return [];
    const query = buildQuery(persona, task);
    debug("embedding %d headings", sections.length);
    let vectors: number[][];
    try {
      vectors = await this.embeddings.embedDocuments([query, ...sections.map((s) => s.text)]);
    } catch (err) {
      console.error("Embedding failed, no ranking produced:", err);
      return [];
    }
    if (vectors.length !== sections.length + 1) {
      console.error(
        `Embedding model returned ${vectors.length} vectors for ${sections.length + 1} inputs`,
      );
      return [];
    }
    const [queryVector, ...headingVectors] = vectors;
    const [scores] = cosineSimilarity([queryVector], headingVectors);
    return sections
      .map((s, i) => ({ ...s, relevanceScore: Number.isFinite(scores[i]) ? scores[i] : 0 }))
      .sort((a, b) => b.relevanceScore - a.relevanceScore);
  }
}
