import { fencedCodeLineMask } from "../../utils/markdown";

export interface NormalizationOptions {
  /** Largest allowed increase in heading level between consecutive headings */
  maxHeadingLevelJump: number;
  /** Largest allowed increase in list indentation between consecutive items */
  maxListIndentJump: number;
  /** Indentation step used when an indentation jump is corrected */
  listIndentStep: number;
  /** Maximum number of consecutive blank lines */
  maxConsecutiveBlankLines: number;
}

export const DEFAULT_NORMALIZATION_OPTIONS: NormalizationOptions = {
  maxHeadingLevelJump: 1,
  maxListIndentJump: 4,
  listIndentStep: 2,
  maxConsecutiveBlankLines: 1,
};

export interface NormalizationStats {
  annotationHeadingsDemoted: number;
  emptyHeadingsRemoved: number;
  headingLevelsAdjusted: number;
  listMarkersNormalized: number;
  listIndentsAdjusted: number;
  tablesRepaired: number;
  blankLinesRemoved: number;
}

export interface NormalizationResult {
  text: string;
  /** One entry per change, e.g. "heading L4 -> L2: Scope" */
  actions: string[];
  stats: NormalizationStats;
}

const HEADING = /^(#{1,6})[ \t]+(.*?)[ \t#]*$/;
const EMPTY_HEADING = /^#{1,6}[ \t]*$/;
const BULLET = /^([ \t]*)([*+•●○■□▪▸►])[ \t]+(.*)$/;
const THEMATIC_BREAK = /^[ \t]*([*_-])(?:[ \t]*\1){2,}[ \t]*$/;
const LIST_ITEM = /^([ \t]*)(?:[-*+]|\d+[.)])[ \t]+/;
const FENCE_START = /^(```|~~~)/;

/** Heading texts that are really annotations, not section titles */
const ANNOTATION_PATTERNS: RegExp[] = [
  /^[(（].*[)）]$/,
  /^※/,
  /^\*+$/,
  /^[•·]/,
  /^\d+$/,
  /^[\p{P}\p{S}\s]+$/u,
];

interface Line {
  text: string;
  code: boolean;
}

/**
 * Format-agnostic markdown clean-up. Enforces heading hierarchy, removes
 * empty and annotation headings, unifies list markers, repairs table column
 * counts and limits blank lines. Fenced code is never touched.
 *
 * Normalizing already-normalized text returns it unchanged.
 */
export class MarkdownNormalizer {
  private readonly options: NormalizationOptions;

  constructor(options: Partial<NormalizationOptions> = {}) {
    this.options = { ...DEFAULT_NORMALIZATION_OPTIONS, ...options };
  }

  normalize(markdown: string): NormalizationResult {
    const actions: string[] = [];
    const stats: NormalizationStats = {
      annotationHeadingsDemoted: 0,
      emptyHeadingsRemoved: 0,
      headingLevelsAdjusted: 0,
      listMarkersNormalized: 0,
      listIndentsAdjusted: 0,
      tablesRepaired: 0,
      blankLinesRemoved: 0,
    };

    const rawLines = markdown.split("\n");
    const mask = fencedCodeLineMask(rawLines);
    let lines: Line[] = rawLines.map((text, i) => ({ text, code: mask[i] }));

    lines = this.demoteAnnotationHeadings(lines, actions, stats);
    lines = this.removeEmptyHeadings(lines, actions, stats);
    lines = this.fixHeadingHierarchy(lines, actions, stats);
    lines = this.normalizeLists(lines, actions, stats);
    lines = this.repairTables(lines, actions, stats);
    lines = this.normalizeBlankLines(lines, stats);

    return { text: lines.map((line) => line.text).join("\n"), actions, stats };
  }

  private demoteAnnotationHeadings(
    lines: Line[],
    actions: string[],
    stats: NormalizationStats,
  ): Line[] {
    return lines.map((line) => {
      if (line.code) return line;
      const match = line.text.match(HEADING);
      if (!match) return line;
      const title = match[2].trim();
      if (!title || !ANNOTATION_PATTERNS.some((pattern) => pattern.test(title))) {
        return line;
      }
      stats.annotationHeadingsDemoted++;
      actions.push(`demoted annotation heading: ${title}`);
      // A leftover "#" would turn the demoted text back into a heading, and a
      // bare fence would open a code block on the next pass
      const text = title.replace(/^[#\s]+/, "").replace(FENCE_START, "\\$1");
      return { text, code: false };
    });
  }

  private removeEmptyHeadings(
    lines: Line[],
    actions: string[],
    stats: NormalizationStats,
  ): Line[] {
    return lines.filter((line) => {
      if (line.code) return true;
      const heading = line.text.match(HEADING);
      const empty = EMPTY_HEADING.test(line.text) || (heading !== null && !heading[2].trim());
      if (!empty) return true;
      stats.emptyHeadingsRemoved++;
      actions.push("removed empty heading");
      return false;
    });
  }

  /**
   * Clamps every heading to at most `maxHeadingLevelJump` levels deeper than
   * the heading before it. The first heading keeps its level.
   */
  private fixHeadingHierarchy(
    lines: Line[],
    actions: string[],
    stats: NormalizationStats,
  ): Line[] {
    let lastLevel = 0;
    return lines.map((line) => {
      if (line.code) return line;
      const match = line.text.match(HEADING);
      if (!match) return line;
      const level = match[1].length;
      const title = match[2].trim();
      if (lastLevel === 0 || level <= lastLevel + this.options.maxHeadingLevelJump) {
        lastLevel = level;
        return line;
      }
      const corrected = lastLevel + this.options.maxHeadingLevelJump;
      stats.headingLevelsAdjusted++;
      actions.push(`heading L${level} -> L${corrected}: ${title}`);
      lastLevel = corrected;
      return { text: `${"#".repeat(corrected)} ${title}`, code: false };
    });
  }

  /**
   * Unifies bullet markers to "-" and pulls back list items whose indentation
   * jumps too far past the previous item.
   */
  private normalizeLists(lines: Line[], actions: string[], stats: NormalizationStats): Line[] {
    let previousIndent: number | null = null;

    return lines.map((line) => {
      if (line.code) {
        previousIndent = null;
        return line;
      }

      let text = line.text;
      const bullet = THEMATIC_BREAK.test(text) ? null : text.match(BULLET);
      if (bullet) {
        text = `${bullet[1]}- ${bullet[3]}`;
        stats.listMarkersNormalized++;
        actions.push(`list marker '${bullet[2]}' -> '-'`);
      }

      const item = text.match(LIST_ITEM);
      if (!item) {
        if (text.trim()) previousIndent = null;
        return text === line.text ? line : { text, code: false };
      }

      const indent = item[1].replace(/\t/g, "    ").length;
      let newIndent = indent;
      if (previousIndent !== null && indent > previousIndent + this.options.maxListIndentJump) {
        newIndent = previousIndent + this.options.listIndentStep;
        text = " ".repeat(newIndent) + text.slice(item[1].length);
        stats.listIndentsAdjusted++;
        actions.push(`list indent ${indent} -> ${newIndent}`);
      }
      previousIndent = newIndent;

      return text === line.text ? line : { text, code: false };
    });
  }

  /**
   * Pads short rows and inserts a missing separator row so every row of a
   * pipe table has the same number of columns.
   */
  private repairTables(lines: Line[], actions: string[], stats: NormalizationStats): Line[] {
    const result: Line[] = [];
    let i = 0;

    while (i < lines.length) {
      if (!this.isTableLine(lines[i])) {
        result.push(lines[i]);
        i++;
        continue;
      }

      const block: string[] = [];
      while (i < lines.length && this.isTableLine(lines[i])) {
        block.push(lines[i].text);
        i++;
      }

      const repaired = block.length >= 2 ? this.repairTable(block) : block;
      if (repaired !== block) {
        stats.tablesRepaired++;
        actions.push(`repaired table (${repaired.length} rows)`);
      }
      result.push(...repaired.map((text) => ({ text, code: false })));
    }

    return result;
  }

  private repairTable(block: string[]): string[] {
    const hasSeparator = isSeparatorRow(block[1]);
    const rows = block.map(splitTableRow);
    const columnCount = Math.max(...rows.map((cells) => cells.length));
    const consistent = rows.every((cells) => cells.length === columnCount);

    if (hasSeparator && consistent) {
      return block;
    }

    const formatted = block.map((text, index) => {
      const cells = rows[index];
      if (cells.length === columnCount) return text;
      if (index === 1 && hasSeparator) {
        return joinTableRow([
          ...cells,
          ...Array.from({ length: columnCount - cells.length }, () => "---"),
        ]);
      }
      return joinTableRow([
        ...cells,
        ...Array.from({ length: columnCount - cells.length }, () => ""),
      ]);
    });

    if (!hasSeparator) {
      formatted.splice(1, 0, joinTableRow(Array.from({ length: columnCount }, () => "---")));
    }

    return formatted;
  }

  private isTableLine(line: Line | undefined): boolean {
    return line !== undefined && !line.code && line.text.trim().startsWith("|");
  }

  private normalizeBlankLines(lines: Line[], stats: NormalizationStats): Line[] {
    const result: Line[] = [];
    let blankRun = 0;

    for (const line of lines) {
      if (line.code) {
        blankRun = 0;
        result.push(line);
        continue;
      }
      const text = line.text.replace(/[ \t]+$/, "");
      if (text === "") {
        blankRun++;
        if (blankRun > this.options.maxConsecutiveBlankLines) {
          stats.blankLinesRemoved++;
          continue;
        }
      } else {
        blankRun = 0;
      }
      result.push(text === line.text ? line : { text, code: false });
    }

    return result;
  }
}

/**
 * Splits a pipe-table row into trimmed cells, honouring escaped pipes.
 */
export function splitTableRow(row: string): string[] {
  let inner = row.trim();
  if (inner.startsWith("|")) inner = inner.slice(1);
  if (inner.endsWith("|") && !inner.endsWith("\\|")) inner = inner.slice(0, -1);
  return inner.split(/(?<!\\)\|/).map((cell) => cell.trim());
}

function joinTableRow(cells: string[]): string {
  return `| ${cells.join(" | ")} |`;
}

/**
 * True for a table separator row such as "| --- | :---: |".
 */
export function isSeparatorRow(row: string): boolean {
  const trimmed = row.trim();
  return trimmed.startsWith("|") && trimmed.includes("-") && /^[|\s:-]+$/.test(trimmed);
}
