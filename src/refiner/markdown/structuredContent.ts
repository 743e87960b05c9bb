import type { ImageToTextService } from "../../enrichment/types";
import { throwIfCancelled } from "../../pipeline/errors";
import type { ImageInfo, TableData, TextBlock } from "../../types";
import { logger } from "../../utils/logger";
import { tableToMarkdown } from "./tableToMarkdown";

/**
 * One positioned item of a document: a text block, a table or an image.
 */
export type ContentItem =
  | { kind: "block"; block: TextBlock }
  | { kind: "table"; table: TableData }
  | { kind: "image"; image: ImageInfo };

interface ItemPosition {
  page: number;
  /** Vertical position; larger is higher on the page */
  top?: number;
  order: number;
}

function positionOf(item: ContentItem): ItemPosition {
  switch (item.kind) {
    case "block":
      return {
        page: item.block.pageNumber ?? 0,
        top: item.block.location?.top,
        order: item.block.order,
      };
    case "table":
      return {
        page: item.table.pageNumber ?? 0,
        order: item.table.order ?? Number.MAX_SAFE_INTEGER,
      };
    case "image": {
      const { pageNumber, boundsBottom, height } = item.image.properties;
      return {
        page: pageNumber ?? 0,
        top: boundsBottom === undefined ? undefined : boundsBottom + (height ?? 0),
        order: item.image.position,
      };
    }
  }
}

/**
 * Sorts items into reading order: page ascending, then top edge descending,
 * then sequence order. A page on which any item lacks a top edge is ordered
 * by sequence alone, so every page is sorted by one key and the result does
 * not depend on the input order.
 */
export function sortByDocumentPosition(items: ContentItem[]): ContentItem[] {
  const positioned = items.map((item) => ({ item, position: positionOf(item) }));
  const unpositionedPages = new Set(
    positioned
      .filter(({ position }) => position.top === undefined)
      .map(({ position }) => position.page),
  );
  const topOf = (position: ItemPosition): number =>
    unpositionedPages.has(position.page) ? 0 : (position.top ?? 0);

  return positioned
    .sort((a, b) => {
      if (a.position.page !== b.position.page) {
        return a.position.page - b.position.page;
      }
      const topA = topOf(a.position);
      const topB = topOf(b.position);
      if (topA !== topB) {
        return topB - topA;
      }
      return a.position.order - b.position.order;
    })
    .map(({ item }) => item);
}

const clampHeadingLevel = (level: number): number =>
  Math.min(6, Math.max(1, Math.round(level)));

/**
 * Renders a single text block as markdown. `listNumber` is the running number
 * for ordered list items.
 */
export function renderBlock(block: TextBlock, listNumber = 1): string {
  const content = block.content.trim();
  switch (block.type) {
    case "heading":
      return `${"#".repeat(clampHeadingLevel(block.headingLevel))} ${content}`;
    case "listItem": {
      const indent = "  ".repeat(Math.max(0, block.listLevel));
      const marker = block.isOrderedList ? `${listNumber}.` : "-";
      return `${indent}${marker} ${content}`;
    }
    case "codeBlock":
      return `\`\`\`${block.language ?? ""}\n${block.content.replace(/^\n+|\n+$/g, "")}\n\`\`\``;
    case "quote":
      return content
        .split("\n")
        .map((line) => `> ${line}`)
        .join("\n");
    case "header":
    case "footer":
      return `<!-- ${block.type}: ${content.replace(/--/g, "- -")} -->`;
    case "caption":
      return `*${content}*`;
    case "note":
      return `> **Note:** ${content}`;
    case "tocEntry":
    case "paragraph":
      return content;
  }
}

export interface RenderOptions {
  includeTables: boolean;
  /** Image-to-text collaborator; images render as placeholders without it */
  imageToText?: ImageToTextService;
  signal?: AbortSignal;
  /** Receives a note for every image whose text could not be extracted */
  onWarning?: (warning: string) => void;
}

function imagePlaceholder(image: ImageInfo): string {
  const alt = (image.caption ?? image.id).replace(/[[\]]/g, "");
  return `![${alt}](${image.source ?? `embedded:${image.id}`})`;
}

async function renderImage(image: ImageInfo, options: RenderOptions): Promise<string> {
  const service = options.imageToText;
  if (!service || !image.data || !service.isAvailable()) {
    return imagePlaceholder(image);
  }
  try {
    const result = await service.extractText(image.data, image.mimeType, {}, options.signal);
    const text = result.text.trim();
    if (!text) return imagePlaceholder(image);
    const label = image.caption ? `Image: ${image.caption}` : "Image";
    return `> **${label}:** ${text.replace(/\n+/g, " ")}`;
  } catch (error) {
    const warning = `Image-to-text failed for ${image.id}: ${error instanceof Error ? error.message : String(error)}`;
    logger.warn(`⚠️  ${warning}`);
    options.onWarning?.(warning);
    return imagePlaceholder(image);
  }
}

/**
 * Walks blocks, tables and images in document position order and renders
 * them as a single markdown document. Consecutive list items are joined by
 * single line breaks; everything else is separated by a blank line.
 */
export async function renderStructuredContent(
  blocks: TextBlock[],
  tables: TableData[],
  images: ImageInfo[],
  options: RenderOptions,
): Promise<string> {
  const items = sortByDocumentPosition([
    ...blocks.map((block): ContentItem => ({ kind: "block", block })),
    ...(options.includeTables
      ? tables.map((table): ContentItem => ({ kind: "table", table }))
      : []),
    ...images.map((image): ContentItem => ({ kind: "image", image })),
  ]);

  let markdown = "";
  let previousWasListItem = false;
  // Running numbers of ordered lists, keyed by list level
  const listCounters = new Map<number, number>();

  for (const item of items) {
    throwIfCancelled(options.signal, "Markdown rendering");

    let rendered: string;
    let isListItem = false;

    if (item.kind === "block") {
      const block = item.block;
      if (!block.content.trim()) continue;
      if (block.type === "listItem") {
        isListItem = true;
        const level = Math.max(0, block.listLevel);
        for (const key of [...listCounters.keys()]) {
          if (key > level) listCounters.delete(key);
        }
        const number = block.isOrderedList ? (listCounters.get(level) ?? 0) + 1 : 1;
        listCounters.set(level, block.isOrderedList ? number : 0);
        rendered = renderBlock(block, number);
      } else {
        listCounters.clear();
        rendered = renderBlock(block);
      }
    } else if (item.kind === "table") {
      listCounters.clear();
      rendered = tableToMarkdown(item.table);
    } else {
      listCounters.clear();
      rendered = await renderImage(item.image, options);
    }

    if (!rendered) continue;

    if (markdown) {
      markdown += isListItem && previousWasListItem ? "\n" : "\n\n";
    }
    markdown += rendered;
    previousWasListItem = isListItem;
  }

  return markdown;
}
