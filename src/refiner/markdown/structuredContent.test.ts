import { describe, expect, it, vi } from "vitest";
import type { ImageToTextService } from "../../enrichment/types";
import { CancellationError } from "../../pipeline/errors";
import type { ImageInfo, TableData, TextBlock } from "../../types";
import {
  type ContentItem,
  renderBlock,
  renderStructuredContent,
  sortByDocumentPosition,
} from "./structuredContent";

vi.mock("../../utils/logger");

const image: ImageInfo = {
  id: "img1",
  mimeType: "image/png",
  data: new Uint8Array([1, 2, 3]),
  caption: "Sales",
  position: 0,
  properties: {},
};

describe("sortByDocumentPosition", () => {
  it("should order by page, then top edge descending, then order", () => {
    const blocks: TextBlock[] = [
      { type: "paragraph", content: "p2", order: 0, pageNumber: 2 },
      { type: "paragraph", content: "low", order: 1, pageNumber: 1, location: { top: 100 } },
      { type: "paragraph", content: "high", order: 2, pageNumber: 1, location: { top: 700 } },
    ];
    const sorted = sortByDocumentPosition(
      blocks.map((block): ContentItem => ({ kind: "block", block })),
    );
    expect(sorted.map((item) => (item.kind === "block" ? item.block.content : ""))).toEqual([
      "high",
      "low",
      "p2",
    ]);
  });

  it("should order a page mixing tables and positioned blocks the same for any input order", () => {
    const lower: ContentItem = {
      kind: "block",
      block: { type: "paragraph", content: "lower", order: 5, pageNumber: 1, location: { top: 100 } },
    };
    const table: ContentItem = {
      kind: "table",
      table: {
        cells: [["x"]],
        hasHeader: false,
        confidence: 1,
        needsLlmAssist: false,
        order: 1,
        pageNumber: 1,
      },
    };
    const upper: ContentItem = {
      kind: "block",
      block: { type: "paragraph", content: "upper", order: 0, pageNumber: 1, location: { top: 50 } },
    };
    const label = (item: ContentItem) => (item.kind === "block" ? item.block.content : item.kind);

    const orders = [
      [lower, table, upper],
      [upper, table, lower],
      [table, lower, upper],
      [table, upper, lower],
    ].map((input) => sortByDocumentPosition(input).map(label).join(" "));

    expect(orders).toEqual([
      "upper table lower",
      "upper table lower",
      "upper table lower",
      "upper table lower",
    ]);
  });

  it("should place images by their bounds on the page", () => {
    const sorted = sortByDocumentPosition([
      {
        kind: "block",
        block: { type: "paragraph", content: "below", order: 0, location: { top: 200 } },
      },
      { kind: "image", image: { ...image, properties: { boundsBottom: 300, height: 100 } } },
    ]);
    expect(sorted.map((item) => item.kind)).toEqual(["image", "block"]);
  });
});

describe("renderBlock", () => {
  it("should render every block type", () => {
    expect(renderBlock({ type: "heading", content: "Title", order: 0, headingLevel: 9 })).toBe(
      "###### Title",
    );
    expect(
      renderBlock(
        { type: "listItem", content: "item", order: 0, listLevel: 1, isOrderedList: true },
        3,
      ),
    ).toBe("  3. item");
    expect(renderBlock({ type: "codeBlock", content: "\nx = 1\n", order: 0, language: "py" })).toBe(
      "```py\nx = 1\n```",
    );
    expect(renderBlock({ type: "quote", content: "a\nb", order: 0 })).toBe("> a\n> b");
    expect(renderBlock({ type: "footer", content: "Page 1", order: 0 })).toBe(
      "<!-- footer: Page 1 -->",
    );
    expect(renderBlock({ type: "caption", content: "Figure 1", order: 0 })).toBe("*Figure 1*");
    expect(renderBlock({ type: "note", content: "Careful", order: 0 })).toBe(
      "> **Note:** Careful",
    );
    expect(renderBlock({ type: "paragraph", content: " Plain ", order: 0 })).toBe("Plain");
  });
});

describe("renderStructuredContent", () => {
  const blocks: TextBlock[] = [
    { type: "heading", content: "Intro", order: 0, headingLevel: 1 },
    { type: "paragraph", content: "Hello world.", order: 1 },
    { type: "listItem", content: "first", order: 2, listLevel: 0, isOrderedList: true },
    { type: "listItem", content: "second", order: 3, listLevel: 0, isOrderedList: true },
    { type: "paragraph", content: "After.", order: 5 },
  ];
  const tables: TableData[] = [
    {
      cells: [["H1", "H2"], ["x", "y"]],
      hasHeader: true,
      confidence: 1,
      needsLlmAssist: false,
      order: 4,
    },
  ];

  it("should interleave blocks and tables in position order", async () => {
    const markdown = await renderStructuredContent(blocks, tables, [], { includeTables: true });
    expect(markdown).toBe(
      "# Intro\n\nHello world.\n\n1. first\n2. second\n\n| H1 | H2 |\n| --- | --- |\n| x | y |\n\nAfter.",
    );
  });

  it("should leave tables out when asked to", async () => {
    const markdown = await renderStructuredContent(blocks, tables, [], { includeTables: false });
    expect(markdown).toBe("# Intro\n\nHello world.\n\n1. first\n2. second\n\nAfter.");
  });

  it("should render images as placeholders without a service", async () => {
    const markdown = await renderStructuredContent([], [], [image], { includeTables: true });
    expect(markdown).toBe("![Sales](embedded:img1)");
  });

  it("should render extracted image text when a service is available", async () => {
    const imageToText: ImageToTextService = {
      isAvailable: () => true,
      extractText: vi.fn().mockResolvedValue({ text: "Revenue chart\nQ1", confidence: 0.9 }),
    };
    const markdown = await renderStructuredContent([], [], [image], {
      includeTables: true,
      imageToText,
    });
    expect(markdown).toBe("> **Image: Sales:** Revenue chart Q1");
  });

  it("should fall back to a placeholder and warn when extraction fails", async () => {
    const onWarning = vi.fn();
    const imageToText: ImageToTextService = {
      isAvailable: () => true,
      extractText: vi.fn().mockRejectedValue(new Error("quota exceeded")),
    };
    const markdown = await renderStructuredContent([], [], [image], {
      includeTables: true,
      imageToText,
      onWarning,
    });
    expect(markdown).toBe("![Sales](embedded:img1)");
    expect(onWarning).toHaveBeenCalledWith("Image-to-text failed for img1: quota exceeded");
  });

  it("should stop when the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      renderStructuredContent(blocks, [], [], { includeTables: true, signal: controller.signal }),
    ).rejects.toBeInstanceOf(CancellationError);
  });
});
