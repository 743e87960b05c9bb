import { describe, expect, it, vi } from "vitest";
import { CancellationError } from "../pipeline/errors";
import type { RefinedContent } from "../types";
import { ConfigurationError } from "../utils/errors";
import { DocumentChunker } from "./DocumentChunker";
import { ChunkingError } from "./errors";

vi.mock("../utils/logger");

const THREE_SENTENCES = "This is sentence one. This is sentence two. This is sentence three.";

const GUIDE = "# Guide\n\nIntro paragraph here.\n\n## Setup\n\nInstall the package.";

const createRefined = (text: string): RefinedContent => ({
  id: "refined-1",
  rawId: "raw-1",
  text,
  sections: [
    { id: "section_0", title: "Guide", level: 1, start: 0, end: 30, content: "" },
    { id: "section_1", title: "Setup", level: 2, start: 32, end: text.length, content: "" },
  ],
  structures: [],
  metadata: {
    fileName: "guide.md",
    fileType: "MD",
    fileSize: text.length,
    title: "Guide",
    filePath: "/docs/guide.md",
  },
  quality: {
    originalLength: text.length,
    refinedLength: text.length,
    structureScore: 0.7,
    cleanupScore: 0.8,
    retentionScore: 1,
    confidenceScore: 0.75,
  },
  info: { refinerType: "DocumentRefiner", usedLlm: false, durationMs: 1, refinedAt: new Date() },
  warnings: [],
});

describe("DocumentChunker", () => {
  const chunker = new DocumentChunker();

  it("keeps a short clean paragraph in a single chunk", async () => {
    const chunks = await chunker.chunkText(THREE_SENTENCES, { maxChunkSize: 1000 });

    expect(chunks).toHaveLength(1);
    const [chunk] = chunks;
    expect(chunk).toMatchObject({
      index: 0,
      content: THREE_SENTENCES,
      startPosition: 0,
      endPosition: THREE_SENTENCES.length,
      strategy: "sentence",
      contentType: "text",
      oversized: false,
    });
    expect(chunk.qualityScore).toBeCloseTo(0.8, 10);
    expect(chunk.props.documentKeywords).toEqual(["this", "sentence", "one", "two", "three"]);
    expect(chunk.sourceInfo).toEqual({
      title: "",
      sourceType: "TEXT",
      filePath: undefined,
      chunkCount: 1,
    });
  });

  it("returns no chunks for blank text", async () => {
    expect(await chunker.chunkText("  \n\n  ")).toEqual([]);
  });

  it("stamps source information and document props from the refined content", async () => {
    const chunks = await chunker.chunk(createRefined(GUIDE), { strategy: "hierarchical" });

    expect(chunks.map((chunk) => chunk.content)).toEqual([
      "# Guide\n\nIntro paragraph here.",
      "## Setup\n\nInstall the package.",
    ]);
    expect(chunks.map((chunk) => chunk.props.headingPath)).toEqual([
      ["Guide"],
      ["Guide", "Setup"],
    ]);
    expect(chunks[1]).toMatchObject({ index: 1, startPosition: 32, contentType: "text" });
    expect(chunks[0].importance).toBeCloseTo(0.9, 10);
    expect(chunks[1].importance).toBeCloseTo(0.8, 10);
    for (const chunk of chunks) {
      expect(chunk.props.documentTopic).toBe("Guide");
      expect(chunk.sourceInfo).toEqual({
        title: "Guide",
        sourceType: "MD",
        filePath: "/docs/guide.md",
        chunkCount: 2,
      });
    }
    expect(new Set(chunks.map((chunk) => chunk.id)).size).toBe(2);
  });

  it("resolves legacy strategy names", async () => {
    const chunks = await chunker.chunkText(THREE_SENTENCES, { strategy: "Fixed_Size" });
    expect(chunks[0].strategy).toBe("token");
  });

  it("keeps chunks ordered with overlaps within the configured size", async () => {
    const paragraph =
      "Chunks are cut at sentence ends. Each one carries some context. Overlap repeats the tail of the last chunk.";
    const text = Array.from({ length: 8 }, () => paragraph).join("\n\n");
    const overlapSize = 40;

    const chunks = await chunker.chunkText(text, {
      strategy: "sentence",
      maxChunkSize: 150,
      targetChunkSize: 120,
      minChunkSize: 20,
      overlapSize,
      preserveParagraphs: false,
    });

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(chunk.content).toBe(text.slice(chunk.startPosition, chunk.endPosition));
      expect(chunk.content.length).toBeLessThanOrEqual(150);
    }
    for (let i = 1; i < chunks.length; i++) {
      expect(chunks[i].startPosition).toBeGreaterThanOrEqual(chunks[i - 1].startPosition);
      const overlap = Math.max(0, chunks[i - 1].endPosition - chunks[i].startPosition);
      expect(overlap).toBeLessThanOrEqual(overlapSize);
    }
  });

  it("flags a table larger than the maximum size as oversized", async () => {
    const rows = Array.from({ length: 10 }, (_, i) => `| row ${i} | value ${i} |`);
    const text = ["Intro text.", "", "| name | value |", "| --- | --- |", ...rows].join("\n");

    const chunks = await chunker.chunkText(text, { strategy: "paragraph", maxChunkSize: 100 });

    const table = chunks.find((chunk) => chunk.contentType === "table");
    expect(table?.oversized).toBe(true);
    expect(table?.content.startsWith("| name | value |")).toBe(true);
  });

  it("rejects invalid options", async () => {
    await expect(chunker.chunkText(THREE_SENTENCES, { maxChunkSize: -5 })).rejects.toThrow(
      ConfigurationError,
    );
  });

  it("wraps engine failures with the file name", async () => {
    const failing = new DocumentChunker(() => ({
      splitText: async () => {
        throw new Error("boom");
      },
    }));

    await expect(failing.chunkText(THREE_SENTENCES)).rejects.toThrow(
      new ChunkingError("boom", "(text)"),
    );
  });

  it("stops when the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      chunker.chunkText(THREE_SENTENCES, {}, undefined, controller.signal),
    ).rejects.toThrow(CancellationError);
  });
});
