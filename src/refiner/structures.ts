import type {
  CodeElement,
  ListElement,
  Section,
  StructuredElement,
  TableElement,
} from "../types";
import { findFencedCodeRanges, isInRanges } from "../utils/markdown";
import { splitTableRow } from "./markdown/MarkdownNormalizer";

const CODE_BLOCK = /```(\w+)?[ \t]*\n([\s\S]*?)```/g;
const TABLE = /^\|.+\|[ \t]*\n\|[-: \t|]+\|[ \t]*\n(?:\|.+\|[ \t]*(?:\n|$))+/gm;
const LIST = /(?:^[ \t]*(?:[-*+]|\d+\.)[ \t]+.+(?:\n|$)){3,}/gm;
const LIST_MARKER = /^(?:[-*+]|\d+\.)\s*/;
const HEADING = /^(#{1,6})[ \t]+(.+)$/gm;

/**
 * Scans markdown for fenced code blocks, pipe tables and lists of three or
 * more items. Tables and lists inside code blocks are ignored. Results are
 * grouped by kind, each group in text order.
 */
export function extractStructures(text: string): StructuredElement[] {
  const codeRanges = findFencedCodeRanges(text);

  const code: CodeElement[] = [...text.matchAll(CODE_BLOCK)].map((match) => {
    const language = match[1] ?? "text";
    const start = match.index ?? 0;
    return {
      kind: "code",
      caption: `Code block (${language})`,
      data: { language, content: match[2].replace(/\n$/, "") },
      location: { start, end: start + match[0].length },
    };
  });

  const tables: TableElement[] = [...text.matchAll(TABLE)]
    .filter((match) => !isInRanges(match.index ?? 0, codeRanges))
    .map((match) => {
      const start = match.index ?? 0;
      const lines = match[0].split("\n").filter((line) => line.trim());
      const headers = splitTableRow(lines[0]).map((header, i) => header || `Col${i + 1}`);
      const rows = lines.slice(2).map((line) => {
        const cells = splitTableRow(line);
        return Object.fromEntries(headers.map((header, i) => [header, cells[i] ?? ""]));
      });
      return {
        kind: "table",
        caption: `Table (${rows.length} rows)`,
        data: { headers, rows },
        location: { start, end: start + match[0].trimEnd().length },
      };
    });

  const lists: ListElement[] = [...text.matchAll(LIST)]
    .filter((match) => !isInRanges(match.index ?? 0, codeRanges))
    .map((match) => {
      const start = match.index ?? 0;
      const listText = match[0].trimEnd();
      const items = listText
        .split("\n")
        .map((line) => line.trim().replace(LIST_MARKER, ""))
        .filter(Boolean);
      const ordered = /^\s*\d+\./.test(listText);
      return {
        kind: "list",
        caption: `${ordered ? "Ordered" : "Unordered"} list (${items.length} items)`,
        data: { items, ordered },
        location: { start, end: start + listText.length },
      };
    });

  return [...code, ...tables, ...lists];
}

/**
 * Builds the flat section list from markdown headings. Each heading opens a
 * section that runs to the next heading or the end of the text, so sections
 * never overlap and together cover everything from the first heading on.
 * Headings inside fenced code are ignored.
 */
export function buildSections(text: string): Section[] {
  const codeRanges = findFencedCodeRanges(text);
  const headings = [...text.matchAll(HEADING)].filter(
    (match) => !isInRanges(match.index ?? 0, codeRanges),
  );

  return headings.map((match, i) => {
    const start = match.index ?? 0;
    const end = i + 1 < headings.length ? (headings[i + 1].index ?? text.length) : text.length;
    return {
      id: `section_${i}`,
      title: match[2].trim(),
      level: match[1].length,
      start,
      end,
      content: text.slice(start, end),
    };
  });
}
