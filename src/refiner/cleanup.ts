import { fencedCodeLineMask, mapProseLines } from "../utils/markdown";

/** Headings such as "## Paragraph 12" injected by naive readers */
const PARAGRAPH_HEADING = /^#{1,6}[ \t]*Paragraph[ \t]+\d+[ \t]*$/gim;

/** Placeholder lines left where a reader dropped an image */
const IMAGE_PLACEHOLDER = /^\[(?:그림|Figure|Image|이미지|사진|도표|표)\].*$/gim;

const HEADER_FOOTER_PATTERNS: RegExp[] = [
  /^Page\s+\d+\s*(of\s+\d+)?$/i,
  /^\d+\s*\/\s*\d+$/,
  /^-\s*\d+\s*-$/,
  /^\[\s*\d+\s*\]$/,
  /^페이지\s*\d+/,
  /^\d+\s*페이지$/,
  /^(CONFIDENTIAL|DRAFT|INTERNAL|PROPRIETARY|SECRET)$/i,
  /^©\s*\d{4}/,
  /^Copyright\s+/i,
  /^All rights reserved/i,
  /^(Version|Rev\.|Revision)\s*[\d.]+$/i,
  /^\d{4}[-/]\d{2}[-/]\d{2}$/,
  /^(Document|Doc)\s*(ID|#|No\.?):\s*/i,
  /^[─━═]{3,}\s*$/,
];

const TOC_LEADERS: RegExp[] = [
  /\.{3,}[ \t]*\d+[ \t]*$/gm,
  /-{3,}[ \t]*\d+[ \t]*$/gm,
  /[·•]{3,}[ \t]*\d+[ \t]*$/gm,
  /_{3,}[ \t]*\d+[ \t]*$/gm,
];

/**
 * Removes reader artifacts: artificial paragraph-number headings and image
 * placeholders. Collapses runs of blank lines to one and runs of horizontal
 * whitespace inside a line to a single space. Leading indentation and fenced
 * code are left as they are.
 */
export function cleanDocumentNoise(text: string): string {
  let result = text.replace(PARAGRAPH_HEADING, "").replace(IMAGE_PLACEHOLDER, "");
  result = result.replace(/\n{3,}/g, "\n\n");
  result = mapProseLines(result, (line) => {
    const indent = line.match(/^[ \t]*/)?.[0] ?? "";
    return indent + line.slice(indent.length).replace(/[ \t]{2,}/g, " ");
  });
  return result.trim();
}

/**
 * Drops running headers and footers such as page counters, classification
 * banners and copyright lines.
 */
export function removeHeadersFooters(text: string): string {
  return dropProseLines(text, (trimmed) =>
    HEADER_FOOTER_PATTERNS.some((pattern) => pattern.test(trimmed)),
  );
}

/**
 * Drops lines that consist of a page number only, e.g. "12" or "- 12 -".
 */
export function removePageNumbers(text: string): string {
  return dropProseLines(text, (trimmed) => /^-?\s*\d+\s*-?$/.test(trimmed));
}

/**
 * Strips table-of-contents leaders and the trailing page number.
 */
export function removeTocNoise(text: string): string {
  return TOC_LEADERS.reduce((current, pattern) => current.replace(pattern, ""), text);
}

/**
 * Collapses three or more line breaks (with optional whitespace between them)
 * to a single blank line, strips trailing whitespace per line and trims the
 * document.
 */
export function normalizeWhitespace(text: string): string {
  return text
    .replace(/\n\s*\n\s*\n/g, "\n\n")
    .replace(/[ \t]+$/gm, "")
    .trim();
}

function dropProseLines(text: string, shouldDrop: (trimmed: string) => boolean): string {
  const lines = text.split("\n");
  const mask = fencedCodeLineMask(lines);
  return lines
    .filter((line, i) => {
      const trimmed = line.trim();
      return mask[i] || trimmed.length === 0 || !shouldDrop(trimmed);
    })
    .join("\n");
}
