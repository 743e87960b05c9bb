import { gfm } from "@joplin/turndown-plugin-gfm";
import * as cheerio from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import { type Element, isTag, isText } from "domhandler";
import TurndownService from "turndown";
import { v4 as uuidv4 } from "uuid";
import type {
  ColumnAlignment,
  FileMetadata,
  ImageInfo,
  RawContent,
  TableData,
  TextBlock,
} from "../types";
import { logger } from "../utils/logger";
import type { DocumentReader } from "./types";

/** Elements whose content never belongs in a document */
const SKIPPED = new Set(["script", "style", "noscript", "template", "nav", "svg", "iframe", "form"]);

const INLINE = new Set(["a", "b", "strong", "em", "i", "span", "code", "small", "sup", "sub", "mark"]);

const HEADINGS = new Set(["h1", "h2", "h3", "h4", "h5", "h6"]);

const CODE_LANGUAGE = /(?:highlight-source-|highlight-|language-|lang-)(\w+)/;

const DATA_URL = /^data:([^;,]+);base64,(.*)$/s;

const IMAGE_TYPES: Record<string, string> = {
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  gif: "image/gif",
  webp: "image/webp",
  svg: "image/svg+xml",
  bmp: "image/bmp",
};

const collapse = (text: string): string => text.replace(/\s+/g, " ").trim();

/**
 * Mutable state of one extraction. `order` is shared by blocks, tables and
 * images so the refiner can restore the reading order.
 */
interface Extraction {
  $: CheerioAPI;
  blocks: TextBlock[];
  tables: TableData[];
  images: ImageInfo[];
  warnings: string[];
  order: number;
}

/**
 * Reads HTML files into classified text blocks, tables and images. Inline
 * formatting inside paragraphs, list items and quotes is kept as markdown;
 * the whole body converted by Turndown is the plain `text` fallback.
 */
export class HtmlDocumentReader implements DocumentReader {
  readonly extensions = [".html", ".htm"] as const;
  readonly readerType = "HtmlDocumentReader";
  private readonly turndownService: TurndownService;

  constructor() {
    this.turndownService = new TurndownService({
      headingStyle: "atx",
      hr: "---",
      bulletListMarker: "-",
      codeBlockStyle: "fenced",
      emDelimiter: "_",
      strongDelimiter: "**",
      linkStyle: "inlined",
    });
    this.turndownService.use(gfm);
    this.turndownService.remove(["script", "style", "noscript", "template"]);
  }

  parse(content: Buffer, file: FileMetadata): RawContent {
    const $ = cheerio.load(content.toString("utf-8"));
    const state: Extraction = { $, blocks: [], tables: [], images: [], warnings: [], order: 0 };

    const body = $("body");
    this.walk(body, state, 0);

    const text = this.toMarkdown(body.html() ?? "");
    if (!text && state.blocks.length === 0 && state.tables.length === 0) {
      state.warnings.push(`${file.name} contains no text`);
    }

    logger.debug(
      `Extracted ${state.blocks.length} blocks, ${state.tables.length} tables and ${state.images.length} images from ${file.name}`,
    );

    return {
      id: uuidv4(),
      text,
      tables: state.tables,
      blocks: state.blocks,
      images: state.images,
      file,
      warnings: state.warnings,
      readerType: this.readerType,
    };
  }

  private toMarkdown(html: string): string {
    return this.turndownService.turndown(html).trim();
  }

  private walk(container: Cheerio<Element>, state: Extraction, listLevel: number): void {
    const { $ } = state;
    let loose = "";

    const flushLoose = () => {
      const text = collapse(loose);
      if (text) this.addBlock(state, { type: "paragraph", content: text });
      loose = "";
    };

    for (const node of container.contents().toArray()) {
      if (isText(node)) {
        loose += node.data;
        continue;
      }
      if (!isTag(node)) continue;

      const element = $(node);
      const tag = node.tagName.toLowerCase();
      if (SKIPPED.has(tag)) continue;
      if (INLINE.has(tag)) {
        loose += element.text();
        continue;
      }
      flushLoose();

      if (HEADINGS.has(tag)) {
        const content = collapse(element.text());
        if (content) {
          this.addBlock(state, { type: "heading", content, headingLevel: Number(tag[1]) });
        }
      } else if (tag === "p") {
        this.readParagraph(element, state);
      } else if (tag === "ul" || tag === "ol") {
        this.readList(element, state, listLevel, tag === "ol");
      } else if (tag === "pre") {
        this.readCode(element, state);
      } else if (tag === "blockquote") {
        const content = this.toMarkdown(element.html() ?? "");
        if (content) this.addBlock(state, { type: "quote", content });
      } else if (tag === "table") {
        this.readTable(element, state);
      } else if (tag === "img") {
        this.readImage(element, state);
      } else if (tag === "figure") {
        this.readFigure(element, state, listLevel);
      } else if (tag === "figcaption") {
        const content = collapse(element.text());
        if (content) this.addBlock(state, { type: "caption", content });
      } else if (tag !== "hr" && tag !== "br") {
        this.walk(element, state, listLevel);
      }
    }
    flushLoose();
  }

  private addBlock(
    state: Extraction,
    block:
      | { type: "heading"; content: string; headingLevel: number }
      | { type: "listItem"; content: string; listLevel: number; isOrderedList: boolean }
      | { type: "codeBlock"; content: string; language?: string }
      | { type: "paragraph" | "quote" | "caption"; content: string },
  ): void {
    state.blocks.push({ ...block, order: state.order++ });
  }

  private readParagraph(element: Cheerio<Element>, state: Extraction): void {
    const images = element.find("img");
    if (images.length > 0 && !collapse(element.text())) {
      for (const image of images.toArray()) {
        this.readImage(state.$(image), state);
      }
      return;
    }
    const content = this.toMarkdown(element.html() ?? "");
    if (content) this.addBlock(state, { type: "paragraph", content: content.replace(/\n+/g, " ") });
  }

  private readList(
    element: Cheerio<Element>,
    state: Extraction,
    listLevel: number,
    isOrderedList: boolean,
  ): void {
    const { $ } = state;
    for (const item of element.children("li").toArray()) {
      const li = $(item);
      const own = li.clone();
      own.find("ul, ol").remove();
      const content = collapse(this.toMarkdown(own.html() ?? ""));
      if (content) {
        this.addBlock(state, { type: "listItem", content, listLevel, isOrderedList });
      }
      for (const nested of li.children("ul, ol").toArray()) {
        this.readList($(nested), state, listLevel + 1, nested.tagName.toLowerCase() === "ol");
      }
    }
  }

  private readCode(element: Cheerio<Element>, state: Extraction): void {
    const code = element.find("code").first();
    const classes = `${element.attr("class") ?? ""} ${code.attr("class") ?? ""}`;
    const language = element.attr("data-language") ?? classes.match(CODE_LANGUAGE)?.[1];
    element.find("br").replaceWith("\n");
    const content = element.text().replace(/^\n+|\n+$/g, "");
    if (content.trim()) {
      this.addBlock(state, { type: "codeBlock", content, language });
    }
  }

  private readTable(element: Cheerio<Element>, state: Extraction): void {
    const { $ } = state;
    const rows = element
      .find("tr")
      .toArray()
      .filter((row) => $(row).closest("table").is(element))
      .map((row) => $(row).children("th, td"));

    const caption = collapse(element.children("caption").text());
    if (caption) this.addBlock(state, { type: "caption", content: caption });

    if (rows.length === 0) {
      const fallback = collapse(element.text());
      if (fallback) {
        state.tables.push({
          cells: [],
          hasHeader: false,
          confidence: 0.3,
          needsLlmAssist: true,
          order: state.order++,
          plainTextFallback: fallback,
        });
      }
      return;
    }

    const [first, ...rest] = rows;
    const hasHeader =
      element.find("thead").length > 0 ||
      (first.length > 0 && first.toArray().every((cell) => cell.tagName.toLowerCase() === "th"));
    const texts = (row: Cheerio<Element>) => row.toArray().map((cell) => collapse($(cell).text()));

    const headers = hasHeader ? texts(first) : undefined;
    const cells = (hasHeader ? rest : rows).map(texts);
    const spans = element.find("[colspan], [rowspan]").length > 0;
    const width = headers?.length ?? cells[0]?.length ?? 0;
    const ragged = cells.some((row) => row.length !== width);

    state.tables.push({
      cells,
      headers,
      hasHeader,
      columnAlignments: hasHeader ? first.toArray().map((cell) => alignmentOf($(cell))) : undefined,
      confidence: spans || ragged ? 0.6 : 1,
      needsLlmAssist: false,
      order: state.order++,
    });
    if (spans) {
      state.warnings.push(`Table ${state.tables.length} uses merged cells; its layout is approximate`);
    }
  }

  private readFigure(element: Cheerio<Element>, state: Extraction, listLevel: number): void {
    const images = element.find("img");
    const caption = collapse(element.find("figcaption").first().text()) || undefined;
    if (images.length === 0) {
      this.walk(element, state, listLevel);
      return;
    }
    for (const image of images.toArray()) {
      this.readImage(state.$(image), state, caption);
    }
  }

  private readImage(element: Cheerio<Element>, state: Extraction, caption?: string): void {
    const src = element.attr("src")?.trim() ?? "";
    const alt = collapse(element.attr("alt") ?? "");
    const id = `image_${state.images.length + 1}`;
    const dataUrl = src.match(DATA_URL);
    const width = Number(element.attr("width"));
    const height = Number(element.attr("height"));

    state.images.push({
      id,
      mimeType: dataUrl ? dataUrl[1] : mimeTypeOf(src),
      data: dataUrl ? new Uint8Array(Buffer.from(dataUrl[2], "base64")) : undefined,
      source: dataUrl || !src ? undefined : src,
      caption: caption ?? (alt || undefined),
      position: state.order++,
      properties: {
        width: Number.isFinite(width) && width > 0 ? width : undefined,
        height: Number.isFinite(height) && height > 0 ? height : undefined,
      },
    });
  }
}

function mimeTypeOf(src: string): string {
  const extension = src.split(/[?#]/)[0].split(".").pop()?.toLowerCase() ?? "";
  return IMAGE_TYPES[extension] ?? "application/octet-stream";
}

function alignmentOf(cell: Cheerio<Element>): ColumnAlignment {
  const align = (
    cell.attr("align") ??
    cell.attr("style")?.match(/text-align:\s*(left|right|center|justify)/i)?.[1] ??
    "left"
  ).toLowerCase();
  return align === "right" || align === "center" || align === "justify" ? align : "left";
}
