import { describe, expect, it, vi } from "vitest";
import type { MarkdownConverter } from "../enrichment/types";
import { CancellationError } from "../pipeline/errors";
import type { RawContent } from "../types";
import { ConfigurationError } from "../utils/errors";
import { DocumentRefiner } from "./DocumentRefiner";
import { RefinementError } from "./errors";

vi.mock("../utils/logger");

const createRawContent = (text: string, overrides: Partial<RawContent> = {}): RawContent => ({
  id: "raw-1",
  text,
  tables: [],
  blocks: [],
  images: [],
  file: { name: "guide.md", extension: ".md", size: text.length, path: "/docs/guide.md" },
  warnings: [],
  ...overrides,
});

describe("DocumentRefiner", () => {
  it("should promote numbered sections to headings", async () => {
    const refiner = new DocumentRefiner();
    const raw = createRawContent(
      "3-1. Technical Requirements\nThe system must respond within two seconds.",
    );

    const refined = await refiner.refine(raw);

    expect(refined.text).toBe(
      "### 3-1. Technical Requirements\nThe system must respond within two seconds.",
    );
    expect(refined.sections).toHaveLength(1);
    expect(refined.sections[0]).toMatchObject({
      id: "section_0",
      title: "3-1. Technical Requirements",
      level: 3,
      start: 0,
      end: refined.text.length,
    });
  });

  it("should build metadata, info and quality", async () => {
    const refiner = new DocumentRefiner();
    const text = "# User Guide\n\nIntro text.\n\n- a\n- b\n- c";
    const refined = await refiner.refine(createRawContent(text));

    expect(refined.rawId).toBe("raw-1");
    expect(refined.metadata).toMatchObject({
      fileName: "guide.md",
      fileType: "MD",
      fileSize: text.length,
      title: "User Guide",
      filePath: "/docs/guide.md",
    });
    expect(refined.info).toMatchObject({ refinerType: "DocumentRefiner", usedLlm: false });
    expect(refined.quality).toMatchObject({
      originalLength: text.length,
      refinedLength: text.length,
      structureScore: 0.9,
      cleanupScore: 0.8,
      retentionScore: 1,
      confidenceScore: 0.75,
    });
    expect(refined.structures.map((element) => element.kind)).toEqual(["list"]);
  });

  it("should fall back to the file name as title", async () => {
    const refined = await new DocumentRefiner().refine(createRawContent("No headings here."));
    expect(refined.metadata.title).toBe("guide.md");
    expect(refined.sections).toEqual([]);
  });

  it("should rebuild the document from blocks and tables", async () => {
    const raw = createRawContent("ignored plain text", {
      blocks: [
        { type: "heading", content: "Overview", order: 0, headingLevel: 1 },
        { type: "paragraph", content: "Body text here.", order: 1 },
      ],
      tables: [{ cells: [["a", "b"]], hasHeader: false, confidence: 0.95, needsLlmAssist: false }],
    });

    const refined = await new DocumentRefiner().refine(raw);

    expect(refined.text).toBe(
      "# Overview\n\nBody text here.\n\n| Col1 | Col2 |\n| --- | --- |\n| a | b |",
    );
    expect(refined.structures.map((element) => element.kind)).toEqual(["table", "table"]);
    expect(refined.structures[0].location).toEqual({ start: 0, end: 0 });
    expect(refined.sections.map((section) => section.title)).toEqual(["Overview"]);
  });

  it("should use the injected converter and record LLM use", async () => {
    const markdownConverter: MarkdownConverter = {
      convert: vi.fn().mockResolvedValue({
        markdown: "# Converted",
        success: true,
        usedLlm: true,
        warnings: [],
      }),
    };
    const refined = await new DocumentRefiner({ markdownConverter }).refine(
      createRawContent("plain"),
      { useLlm: true },
    );

    expect(markdownConverter.convert).toHaveBeenCalledWith(
      expect.objectContaining({ text: "plain" }),
      { useLlm: true },
      undefined,
    );
    expect(refined.text).toBe("# Converted");
    expect(refined.info.usedLlm).toBe(true);
    expect(refined.quality.confidenceScore).toBe(0.85);
  });

  it("should keep the text and warn when the converter fails", async () => {
    const markdownConverter: MarkdownConverter = {
      convert: vi.fn().mockRejectedValue(new Error("service down")),
    };
    const refined = await new DocumentRefiner({ markdownConverter }).refine(
      createRawContent("Plain text stays."),
    );

    expect(refined.text).toBe("Plain text stays.");
    expect(refined.warnings).toEqual(["Markdown conversion failed: service down"]);
  });

  it("should skip steps that are switched off", async () => {
    const refined = await new DocumentRefiner().refine(
      createRawContent("3-1. Scope\n\n\n\nText"),
      {
        buildSections: false,
        normalizeWhitespace: false,
        cleanNoise: false,
        normalizeMarkdownStructure: false,
      },
    );
    expect(refined.text).toBe("3-1. Scope\n\n\n\nText");
    expect(refined.sections).toEqual([]);
  });

  it("should reject missing input", async () => {
    await expect(new DocumentRefiner().refine(null)).rejects.toBeInstanceOf(RefinementError);
  });

  it("should reject invalid options", async () => {
    const options = JSON.parse('{"cleanNoise":"yes"}');
    await expect(
      new DocumentRefiner().refine(createRawContent("text"), options),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("should honour an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      new DocumentRefiner().refine(createRawContent("text"), {}, controller.signal),
    ).rejects.toBeInstanceOf(CancellationError);
  });
});
