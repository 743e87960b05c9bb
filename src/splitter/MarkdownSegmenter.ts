import type { Root, RootContent } from "mdast";
import remarkGfm from "remark-gfm";
import remarkParse from "remark-parse";
import { unified } from "unified";
import { throwIfCancelled } from "../pipeline/errors";
import { ContentSplitterError } from "./errors";
import type { DocumentSegmenter, Segment, SegmentType, TextSpan } from "./types";

/**
 * Represents the heading that opened the current section
 */
interface SectionFrame {
  level: number;
  title: string;
}

/**
 * Splits markdown into top-level segments that keep their character offsets
 * into the source: headings, paragraphs and other text blocks, individual list
 * items, fenced code and tables. Each segment carries the heading path it
 * belongs to, so later stages can tell which section a chunk came from.
 */
export class MarkdownSegmenter implements DocumentSegmenter {
  private readonly processor = unified().use(remarkParse).use(remarkGfm);

  segment(markdown: string, signal?: AbortSignal): Segment[] {
    let tree: Root;
    try {
      tree = this.processor.parse(markdown);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ContentSplitterError(`Failed to parse markdown: ${message}`);
    }

    const segments: Segment[] = [];
    const stack: SectionFrame[] = [];

    for (const node of tree.children) {
      throwIfCancelled(signal, "Segmentation");

      const span = this.spanOf(markdown, node);
      if (!span) continue;

      if (node.type === "heading") {
        const title = headingTitle(markdown.slice(span.start, span.end));
        // Pop sections from stack until we find the parent level
        while (stack.length > 0 && stack[stack.length - 1].level >= node.depth) {
          stack.pop();
        }
        stack.push({ level: node.depth, title });
        segments.push({
          ...span,
          type: "heading",
          level: node.depth,
          path: stack.map((frame) => frame.title),
        });
        continue;
      }

      const level = stack.length > 0 ? stack[stack.length - 1].level : 0;
      const path = stack.map((frame) => frame.title);

      if (node.type === "list") {
        for (const item of node.children) {
          const itemSpan = this.spanOf(markdown, item);
          if (itemSpan) {
            segments.push({ ...itemSpan, type: "list", level, path });
          }
        }
        continue;
      }

      segments.push({ ...span, type: segmentTypeOf(node), level, path });
    }

    return segments;
  }

  /**
   * Source range of a node with surrounding whitespace excluded. Nodes
   * without position information or without visible content yield null.
   */
  private spanOf(
    markdown: string,
    node: { position?: { start: { offset?: number }; end: { offset?: number } } },
  ): TextSpan | null {
    const start = node.position?.start.offset;
    const end = node.position?.end.offset;
    if (start === undefined || end === undefined) return null;
    return trimSpan(markdown, { start, end });
  }
}

function segmentTypeOf(node: RootContent): SegmentType {
  switch (node.type) {
    case "code":
      return "code";
    case "table":
      return "table";
    default:
      return "text";
  }
}

/**
 * Heading text without its markers. Handles ATX ("## Title ##") and setext
 * ("Title" underlined with "=" or "-") headings.
 */
function headingTitle(source: string): string {
  const firstLine = source.split("\n")[0];
  return firstLine
    .replace(/^[ \t]*#{1,6}[ \t]*/, "")
    .replace(/[ \t]+#+[ \t]*$/, "")
    .trim();
}

/**
 * Narrows a range so that it neither starts nor ends with whitespace. Returns
 * null when nothing but whitespace remains.
 */
export function trimSpan(text: string, span: TextSpan): TextSpan | null {
  let { start, end } = span;
  while (start < end && /\s/.test(text[start])) start++;
  while (end > start && /\s/.test(text[end - 1])) end--;
  return start < end ? { start, end } : null;
}
