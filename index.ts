#!/usr/bin/env tsx
import { Command } from "commander";
import createDebug from "debug";
import * as fs from "node:fs";
import * as path from "node:path";
import { analyzeCollection, parseCollectionJob } from "./src/collection";
import { parseConfigOverrides, resolveConfig } from "./src/config";
import type { HeuristicConfig } from "./src/config";
import { extractOutline } from "./src/document";
import { isPdfFile, outputBasename } from "./src/filename";
import { defaultOcrDeps } from "./src/ocr";
import { parseCount, parseRatio, withTimeout } from "./src/options";
import { toOutlineJson } from "./src/outline";
import { openPdf } from "./src/pdf";
import { DEFAULT_RANKER_OPTIONS, SemanticRanker } from "./src/relevance";
import type { HierarchyDecision } from "./src/types";

const debug = createDebug("layoutoutline:cli");
const program = new Command();

interface HeuristicFlags {
  config?: string;
  pageThreshold?: number;
  pathThreshold?: number;
  overlapRatio?: number;
  maxItems?: number;
  ocr: boolean;
  langPath?: string;
}

interface OutlineFlags extends HeuristicFlags {
  inputDir?: string;
  output: string;
  trace?: boolean;
  timeout: number;
  force?: boolean;
}

interface RankFlags extends HeuristicFlags {
  input: string;
  docsDir?: string;
  output: string;
  top: number;
  model: string;
  ollamaUrl: string;
  force?: boolean;
}

function withHeuristicOptions(cmd: Command): Command {
  return cmd
    .option("-c, --config <path>", "JSON file overriding heuristic constants")
    .option(
      "--page-threshold <ratio>",
      "confidence a line needs to become a heading candidate (0–1)",
      parseRatio,
    )
    .option(
      "--path-threshold <ratio>",
      "confidence a candidate needs to enter the outline (0–1)",
      parseRatio,
    )
    .option(
      "--overlap-ratio <ratio>",
      "word overlap above which nearby headings count as duplicates (0–1)",
      parseRatio,
    )
    .option("--max-items <n>", "max outline entries per document", parseCount)
    .option("--no-ocr", "skip OCR for pages without extractable text")
    .option(
      "--lang-path <path>",
      "directory or URL holding <lang>.traineddata.gz files (default: bundled English only)",
    );
}

function loadConfig(flags: HeuristicFlags): HeuristicConfig {
  let fromFile: unknown = {};
  if (flags.config) {
    const configPath = path.resolve(flags.config);
    if (!fs.existsSync(configPath)) throw new Error(`Config file not found: ${configPath}`);
    fromFile = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  }
  const fromFlags = Object.fromEntries(
    Object.entries({
      candidateThreshold: flags.pageThreshold,
      hierarchyThreshold: flags.pathThreshold,
      duplicateOverlapRatio: flags.overlapRatio,
      maxOutlineItems: flags.maxItems,
    }).filter(([, v]) => v !== undefined),
  );
  const config = resolveConfig({
    ...parseConfigOverrides(fromFile),
    ...parseConfigOverrides(fromFlags),
  });
  debug("config %o", config);
  return config;
}

function assertWritable(file: string, force: boolean | undefined): void {
  if (!force && fs.existsSync(file))
    throw new Error(`output file already exists: ${file} (use --force to overwrite)`);
}

function listInputs(files: string[], inputDir: string | undefined): string[] {
  if (inputDir) {
    const dir = path.resolve(inputDir);
    if (!fs.existsSync(dir)) throw new Error(`Input directory not found: ${dir}`);
    return fs
      .readdirSync(dir)
      .filter(isPdfFile)
      .sort()
      .map((f) => path.join(dir, f));
  }
  return files.map((f) => path.resolve(f));
}

async function runOutline(files: string[], flags: OutlineFlags): Promise<void> {
  const config = loadConfig(flags);
  const inputs = listInputs(files, flags.inputDir);
  if (inputs.length === 0) {
    console.error("No PDFs found; pass files or --input-dir <dir>");
    process.exitCode = 1;
    return;
  }
  const outDir = path.resolve(flags.output);
  fs.mkdirSync(outDir, { recursive: true });
  const ocr = flags.ocr ? defaultOcrDeps(flags.langPath) : undefined;
  debug("run inputs=%d outDir=%s ocr=%s", inputs.length, outDir, !!ocr);

  try {
    for (const input of inputs) await processOneFile(input, outDir, config, flags, ocr);
  } finally {
    await ocr?.engine.terminate();
  }
}

async function processOneFile(
  input: string,
  outDir: string,
  config: HeuristicConfig,
  flags: OutlineFlags,
  ocr: ReturnType<typeof defaultOcrDeps> | undefined,
): Promise<void> {
  const name = path.basename(input);
  const base = outputBasename(input);
  const jsonPath = path.join(outDir, `${base}.json`);
  const tracePath = path.join(outDir, `${base}.trace.json`);
  const started = performance.now();
  try {
    if (!fs.existsSync(input)) throw new Error(`File not found: ${input}`);
    assertWritable(jsonPath, flags.force);
    if (flags.trace) assertWritable(tracePath, flags.force);

    const trace: HierarchyDecision[] = [];
    const outline = await withTimeout(
      extractOutline(input, { config, ocr, trace: flags.trace ? trace : undefined }),
      flags.timeout,
      name,
    );
    fs.writeFileSync(jsonPath, JSON.stringify(toOutlineJson(outline), null, 2), "utf-8");
    if (flags.trace) fs.writeFileSync(tracePath, JSON.stringify(trace, null, 2), "utf-8");

    const seconds = ((performance.now() - started) / 1000).toFixed(2);
    console.log(`[ok] ${name}  (${seconds}s)  ->  ${path.basename(jsonPath)}`);
  } catch (err) {
    console.error(`[x] ${name}:`, err instanceof Error ? err.message : err);
    debug("%s failed: %O", name, err);
    process.exitCode = 1;
  }
}

async function runRank(flags: RankFlags): Promise<void> {
  const config = loadConfig(flags);
  const jobPath = path.resolve(flags.input);
  if (!fs.existsSync(jobPath)) {
    console.error(`Input file not found: ${jobPath}`);
    process.exitCode = 1;
    return;
  }
  const job = parseCollectionJob(JSON.parse(fs.readFileSync(jobPath, "utf-8")));
  const docsDir = path.resolve(flags.docsDir ?? path.dirname(jobPath));
  const outPath = path.resolve(flags.output);
  assertWritable(outPath, flags.force);

  console.log(`Starting processing for Persona: ${job.persona}`);
  console.log(`Task: ${job.job_to_be_done}`);
  const started = performance.now();

  const ranker = await SemanticRanker.load({ model: flags.model, baseUrl: flags.ollamaUrl });
  const ocr = flags.ocr ? defaultOcrDeps(flags.langPath) : undefined;
  try {
    const output = await analyzeCollection(job, {
      open: async (document) => {
        const pdfPath = path.join(docsDir, document);
        return fs.existsSync(pdfPath) ? openPdf(pdfPath) : null;
      },
      ranker,
      config,
      ocr,
      topN: flags.top,
    });
    fs.mkdirSync(path.dirname(outPath), { recursive: true });
    fs.writeFileSync(outPath, JSON.stringify(output, null, 2), "utf-8");
  } finally {
    await ocr?.engine.terminate();
  }

  const seconds = ((performance.now() - started) / 1000).toFixed(2);
  console.log(`\n[ok] Processing complete in ${seconds}s`);
  console.log(`Output saved to ${outPath}`);
}

program
  .name("layout-outline")
  .description("Infer PDF heading outlines from text layout and rank sections by relevance");

withHeuristicOptions(
  program
    .command("outline")
    .description("write <name>.json with the title and heading outline of each PDF")
    .argument("[files...]", "PDF file(s) to process (omit when using --input-dir)")
    .option("-d, --input-dir <dir>", "process every .pdf in this directory")
    .option("-o, --output <dir>", "output directory", ".")
    .option("--trace", "also write <name>.trace.json with every hierarchy decision")
    .option("--timeout <ms>", "per-document time limit (0 = none)", parseCount, 0)
    .option("-f, --force", "overwrite existing output files"),
).action(async (files: string[], flags: OutlineFlags) => {
  await runOutline(files, flags);
});

withHeuristicOptions(
  program
    .command("rank")
    .description("rank the headings of a document collection against a persona and task")
    .requiredOption("-i, --input <path>", "job JSON: { persona, job_to_be_done, documents }")
    .option("-d, --docs-dir <dir>", "directory holding the listed PDFs (default: the job file's)")
    .option("-o, --output <path>", "output JSON file", "collection_output.json")
    .option("-n, --top <n>", "number of sections to extract", parseCount, 10)
    .option("-m, --model <name>", "Ollama embedding model", DEFAULT_RANKER_OPTIONS.model)
    .option("--ollama-url <url>", "Ollama base URL", DEFAULT_RANKER_OPTIONS.baseUrl)
    .option("-f, --force", "overwrite an existing output file"),
).action(async (flags: RankFlags) => {
  await runRank(flags);
});

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
