import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FakeSource, introductionDocument, pageOf } from "./__fixtures__/document";
import { TableEmbeddings } from "./__fixtures__/embeddings";
import { analyzeCollection, overviewHeading, parseCollectionJob } from "./collection";
import { SemanticRanker, buildQuery } from "./relevance";

const NOW = new Date("2025-03-01T12:00:00.000Z");

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseCollectionJob", () => {
  it("accepts plain strings", () => {
    expect(
      parseCollectionJob({
        persona: "Analyst",
        job_to_be_done: "Summarize findings",
        documents: ["a.pdf"],
      }),
    ).toEqual({ persona: "Analyst", job_to_be_done: "Summarize findings", documents: ["a.pdf"] });
  });

  it("accepts nested role, task and document objects", () => {
    const job = parseCollectionJob({
      challenge_info: { id: "round-2" },
      persona: { role: "Analyst" },
      job_to_be_done: { task: "Summarize findings" },
      documents: [{ filename: "a.pdf", title: "A" }, "b.pdf"],
    });
    expect(job.persona).toBe("Analyst");
    expect(job.job_to_be_done).toBe("Summarize findings");
    expect(job.documents).toEqual(["a.pdf", "b.pdf"]);
  });

  it("defaults to no documents", () => {
    expect(parseCollectionJob({ persona: "Analyst", job_to_be_done: "Read" }).documents).toEqual([]);
  });

  it("names the invalid fields", () => {
    expect(() => parseCollectionJob({ job_to_be_done: "Read" })).toThrow(/^Invalid job file: persona: /);
  });
});

describe("overviewHeading", () => {
  it("names the document stem", () => {
    expect(overviewHeading("notes/b.pdf")).toEqual({
      level: "H1",
      text: "Overview of b",
      page: 1,
      position: 0,
    });
  });
});

describe("analyzeCollection", () => {
  const job = parseCollectionJob({
    persona: "Analyst",
    job_to_be_done: "Summarize findings",
    documents: ["a.pdf", "b.pdf", "missing.pdf"],
  });
  const query = buildQuery(job.persona, job.job_to_be_done);
  const plain = "Plain paragraphs without any structure at all in this file.";

  function sources() {
    return {
      "a.pdf": introductionDocument(),
      "b.pdf": new FakeSource([pageOf(1, [{ text: plain, top: 100 }])]),
    };
  }

  it("ranks headings across documents and extracts the top sections", async () => {
    const docs = sources();
    const ranker = new SemanticRanker(
      new TableEmbeddings({
        [query]: [1, 0, 0],
        "Overview of b": [1, 0, 0],
        "1. Introduction": [1, 1, 0],
      }),
    );
    const output = await analyzeCollection(job, {
      open: async (name) => (name === "a.pdf" || name === "b.pdf" ? docs[name] : null),
      ranker,
      now: () => NOW,
    });

    expect(output.metadata).toEqual({
      input_documents: ["a.pdf", "b.pdf", "missing.pdf"],
      persona: "Analyst",
      job_to_be_done: "Summarize findings",
      processing_timestamp: "2025-03-01T12:00:00.000Z",
    });
    expect(output.extracted_sections).toEqual([
      { document: "b.pdf", section_title: "Overview of b", importance_rank: 1, page_number: 1 },
      { document: "a.pdf", section_title: "1. Introduction", importance_rank: 2, page_number: 1 },
    ]);
    expect(output.subsection_analysis).toEqual([
      { document: "b.pdf", refined_text: plain, page_number: 1 },
      {
        document: "a.pdf",
        refined_text:
          "1. Introduction The committee reviewed every proposal submitted during the first round. " +
          "Each reviewer scored the responses against the published criteria. " +
          "Results were shared with all applicants at the end of the month.",
        page_number: 1,
      },
    ]);
    expect(console.warn).toHaveBeenCalledWith("Warning: Document missing.pdf not found, skipping.");
    expect(docs["a.pdf"].closed).toBe(true);
    expect(docs["b.pdf"].closed).toBe(true);
  });

  it("keeps only the top sections", async () => {
    const docs = sources();
    const output = await analyzeCollection(job, {
      open: async (name) => (name === "a.pdf" || name === "b.pdf" ? docs[name] : null),
      ranker: new SemanticRanker(new TableEmbeddings({ [query]: [1, 0, 0], "1. Introduction": [1, 0, 0] })),
      topN: 1,
      now: () => NOW,
    });
    expect(output.extracted_sections.map((s) => s.section_title)).toEqual(["1. Introduction"]);
  });

  it("produces empty results when ranking is unavailable", async () => {
    const docs = sources();
    const output = await analyzeCollection(job, {
      open: async (name) => (name === "a.pdf" || name === "b.pdf" ? docs[name] : null),
      ranker: new SemanticRanker(null),
      now: () => NOW,
    });
    expect(output.extracted_sections).toEqual([]);
    expect(output.subsection_analysis).toEqual([]);
    expect(docs["a.pdf"].closed).toBe(true);
  });

  it("skips documents that fail to open", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const output = await analyzeCollection(
      { ...job, documents: ["broken.pdf"] },
      {
        open: async () => {
          throw new Error("bad xref");
        },
        ranker: new SemanticRanker(new TableEmbeddings({})),
        now: () => NOW,
      },
    );
    expect(output.extracted_sections).toEqual([]);
    expect(console.error).toHaveBeenCalledWith("[x] broken.pdf:", "bad xref");
  });
});
