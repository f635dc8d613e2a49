import type { EmbeddingsInterface } from "@langchain/core/embeddings";

/** Embeddings looked up from a fixed table; unknown texts embed to `fallback`. */
export class TableEmbeddings implements EmbeddingsInterface {
  calls = 0;

  constructor(
    private readonly table: Record<string, number[]>,
    private readonly fallback: number[] = [0, 0, 1],
  ) {}

  async embedQuery(text: string): Promise<number[]> {
    return this.table[text] ?? this.fallback;
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    this.calls += 1;
    return texts.map((t) => this.table[t] ?? this.fallback);
  }
}
