#!/usr/bin/env node
import "dotenv/config";
import fs from "node:fs/promises";
import path from "node:path";
import { Command, InvalidArgumentError } from "commander";
import packageJson from "../package.json";
import {
  DEFAULT_MAX_CHUNK_SIZE,
  DEFAULT_MIN_CHUNK_SIZE,
  DEFAULT_OVERLAP_SIZE,
  type LlmConfig,
  loadLlmConfig,
} from "./config";
import { ChunkEnricher } from "./enrichment/ChunkEnricher";
import { OpenRouterCompletionService } from "./enrichment/OpenRouterCompletionService";
import { OpenRouterImageToTextService } from "./enrichment/OpenRouterImageToTextService";
import { DocumentPipeline } from "./pipeline/DocumentPipeline";
import { RagQualityAnalyzer } from "./quality/RagQualityAnalyzer";
import type { NamedChunkSet } from "./quality/types";
import { ReaderRegistry } from "./reader/ReaderRegistry";
import { DocumentRefiner } from "./refiner/DocumentRefiner";
import type { RefineOptionsInput } from "./refiner/types";
import { DocumentChunker } from "./splitter/DocumentChunker";
import type { ChunkOptionsInput } from "./splitter/types";
import type { DocumentChunk, RawContent, RefinedContent, ResolvedChunkingStrategy } from "./types";
import { LogLevel, logger, parseLogLevel, setLogLevel } from "./utils/logger";

const formatOutput = (data: unknown) => JSON.stringify(data, null, 2);

const COMPARED_STRATEGIES: readonly ResolvedChunkingStrategy[] = [
  "sentence",
  "paragraph",
  "token",
  "semantic",
  "hierarchical",
];

interface RefineFlags {
  removeNoise: boolean;
  images: boolean;
}

interface ChunkFlags {
  strategy: string;
  maxSize: number;
  minSize: number;
  overlap: number;
}

const parseInteger = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
};

const toRefineOptions = (flags: RefineFlags): RefineOptionsInput => ({
  removeHeadersFooters: flags.removeNoise,
  removePageNumbers: flags.removeNoise,
  removeTocNoise: flags.removeNoise,
  processImagesToText: flags.images,
});

const toChunkOptions = (flags: ChunkFlags): ChunkOptionsInput => ({
  strategy: flags.strategy,
  maxChunkSize: flags.maxSize,
  minChunkSize: flags.minSize,
  overlapSize: flags.overlap,
});

function addRefineOptions(command: Command): Command {
  return command
    .option("--remove-noise", "Drop page numbers, running headers/footers and TOC leaders", false)
    .option("--images", "Replace images with text from the vision model", false);
}

function addChunkOptions(command: Command): Command {
  return command
    .option(
      "-s, --strategy <name>",
      "Chunking strategy: auto, sentence, paragraph, token, semantic or hierarchical",
      "auto",
    )
    .option(
      "--max-size <number>",
      "Maximum chunk size in characters",
      parseInteger,
      DEFAULT_MAX_CHUNK_SIZE,
    )
    .option(
      "--min-size <number>",
      "Minimum chunk size in characters",
      parseInteger,
      DEFAULT_MIN_CHUNK_SIZE,
    )
    .option(
      "--overlap <number>",
      "Characters shared by adjacent chunks",
      parseInteger,
      DEFAULT_OVERLAP_SIZE,
    );
}

/**
 * Writes one markdown file per chunk plus a manifest describing all of them.
 */
async function writeChunks(
  outputDir: string,
  refined: RefinedContent,
  chunks: readonly DocumentChunk[],
): Promise<void> {
  await fs.mkdir(outputDir, { recursive: true });
  const width = Math.max(3, String(chunks.length).length);
  const entries: Array<Omit<DocumentChunk, "content"> & { file: string; length: number }> = [];
  for (const chunk of chunks) {
    const fileName = `chunk-${String(chunk.index + 1).padStart(width, "0")}.md`;
    await fs.writeFile(path.join(outputDir, fileName), `${chunk.content}\n`, "utf-8");
    const { content, ...details } = chunk;
    entries.push({ file: fileName, length: content.length, ...details });
  }
  const manifest = {
    source: refined.metadata.fileName,
    title: refined.metadata.title,
    chunkCount: chunks.length,
    chunks: entries,
  };
  await fs.writeFile(path.join(outputDir, "manifest.json"), `${formatOutput(manifest)}\n`, "utf-8");
  logger.info(`✅ Wrote ${chunks.length} chunks to ${outputDir}`);
}

async function main() {
  const registry = new ReaderRegistry();
  const abortController = new AbortController();
  const { signal } = abortController;

  // The environment is only validated once a command needs a language model
  let llmConfig: LlmConfig | undefined;
  const getLlmConfig = (): LlmConfig => {
    llmConfig ??= loadLlmConfig();
    return llmConfig;
  };
  const createRefiner = (flags: RefineFlags) =>
    new DocumentRefiner(
      flags.images ? { imageToText: new OpenRouterImageToTextService(getLlmConfig()) } : {},
    );
  const readAndRefine = async (file: string, flags: RefineFlags) => {
    const raw: RawContent = await registry.read(file);
    for (const warning of raw.warnings) {
      logger.warn(`⚠️  ${warning}`);
    }
    return createRefiner(flags).refine(raw, toRefineOptions(flags), signal);
  };

  process.on("SIGINT", () => {
    abortController.abort();
  });

  try {
    const program = new Command();

    program
      .name("doc-refinery")
      .description("Refine documents into markdown, chunk them for retrieval and score the chunks")
      .version(packageJson.version)
      .option("--verbose", "Enable verbose (debug) logging", false)
      .option("--silent", "Disable all logging except errors", false);

    addRefineOptions(
      program
        .command("refine <file>")
        .description("Refine a document into normalized markdown")
        .option("--json", "Print the refined content with sections and structures as JSON", false),
    ).action(async (file: string, options: RefineFlags & { json: boolean }) => {
      const refined = await readAndRefine(file, options);
      console.log(options.json ? formatOutput(refined) : refined.text);
    });

    addChunkOptions(
      addRefineOptions(
        program
          .command("chunk <file>")
          .description("Refine and chunk a document")
          .option("-o, --output <dir>", "Write each chunk to a markdown file plus manifest.json"),
      ),
    ).action(async (file: string, options: RefineFlags & ChunkFlags & { output?: string }) => {
      const refined = await readAndRefine(file, options);
      const chunks = await new DocumentChunker().chunk(refined, toChunkOptions(options), signal);
      if (options.output) {
        await writeChunks(options.output, refined, chunks);
      } else {
        console.log(formatOutput(chunks));
      }
    });

    addChunkOptions(
      addRefineOptions(
        program
          .command("evaluate <file>")
          .description("Chunk a document and print its RAG quality report")
          .option("--compare", "Run every chunking strategy and rank the results", false),
      ),
    ).action(async (file: string, options: RefineFlags & ChunkFlags & { compare: boolean }) => {
      const refined = await readAndRefine(file, options);
      const chunker = new DocumentChunker();
      const analyzer = new RagQualityAnalyzer();

      if (!options.compare) {
        const chunks = await chunker.chunk(refined, toChunkOptions(options), signal);
        console.log(formatOutput(analyzer.analyze(chunks, refined.text)));
        return;
      }

      const sets: NamedChunkSet[] = [];
      for (const strategy of COMPARED_STRATEGIES) {
        const chunks = await chunker.chunk(
          refined,
          { ...toChunkOptions(options), strategy },
          signal,
        );
        sets.push({ name: strategy, chunks });
      }
      const ranked = analyzer.compare(sets, refined.text);
      console.log(
        formatOutput(
          ranked.map(({ name, rank, report }) => ({
            rank,
            strategy: name,
            chunks: report.totalChunks,
            compositeScore: report.compositeScore,
            recommendations: report.recommendations,
          })),
        ),
      );
    });

    addChunkOptions(
      addRefineOptions(
        program
          .command("process <file>")
          .description("Refine, chunk, optionally enrich, and evaluate a document")
          .option("--enrich", "Annotate chunks through the configured language model", false)
          .option("-o, --output <dir>", "Write each chunk to a markdown file plus manifest.json"),
      ),
    ).action(
      async (
        file: string,
        options: RefineFlags & ChunkFlags & { enrich: boolean; output?: string },
      ) => {
        const raw = await registry.read(file);
        const pipeline = new DocumentPipeline({
          refiner: createRefiner(options),
          enricher: options.enrich
            ? new ChunkEnricher(new OpenRouterCompletionService(getLlmConfig()))
            : undefined,
        });
        const result = await pipeline.process(
          raw,
          {
            refine: toRefineOptions(options),
            chunk: toChunkOptions(options),
            enrich: options.enrich,
            evaluate: true,
            onProgress: ({ fileName, stage }) => logger.debug(`${fileName}: ${stage}`),
          },
          signal,
        );
        if (options.output) {
          await writeChunks(options.output, result.refined, result.chunks);
        }
        console.log(
          formatOutput({
            document: result.refined.metadata,
            refinement: result.refined.quality,
            chunks: options.output ? result.chunks.length : result.chunks,
            report: result.report,
            warnings: [...raw.warnings, ...result.warnings],
          }),
        );
      },
    );

    // Hook to set log level after parsing global options but before executing command action
    program.hook("preAction", (thisCommand) => {
      const options = thisCommand.opts();
      if (options.silent) {
        setLogLevel(LogLevel.ERROR);
      } else if (options.verbose) {
        setLogLevel(LogLevel.DEBUG);
      } else {
        setLogLevel(parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO);
      }
    });

    await program.parseAsync();
  } catch (error) {
    logger.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
  process.exit(0);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
