import { mapProseLines } from "../utils/markdown";

/** A line that looks like an item of a numbered list */
const NUMBERED_LINE = /^\s*\d+[.)]\s/;

/** Longest line the bare "N." pass treats as a title */
const MAX_TITLE_LENGTH = 80;

interface PromotionPass {
  pattern: RegExp;
  level: number;
  /** Extra guard evaluated with the surrounding lines */
  accept?: (title: string, index: number, lines: string[]) => boolean;
}

/**
 * Ordered from the most to the least specific marker. Once a line has become a
 * heading it starts with "#" and no later pass can match it.
 */
const PASSES: PromotionPass[] = [
  { pattern: /^(\d+-\d+-\d+\.)[ \t]+(\S.*)$/, level: 4 },
  { pattern: /^(\d+-\d+\.)[ \t]+(\S.*)$/, level: 3 },
  {
    pattern: /^(\d+\.)[ \t]+(\S.*)$/,
    level: 2,
    accept: (title, index, lines) =>
      title.length <= MAX_TITLE_LENGTH &&
      !/[.,;:]$/.test(title) &&
      !isNumberedNeighbour(lines, index - 1) &&
      !isNumberedNeighbour(lines, index + 1),
  },
  { pattern: /^([①-⑳])[ \t]*(\S.*)$/, level: 3 },
  { pattern: /^(\(\d+\))[ \t]+(\S.*)$/, level: 3 },
];

/**
 * Converts bare numbered section markers at the start of a line into markdown
 * headings: "1. Intro" becomes "## 1. Intro", "3-1. Scope" becomes
 * "### 3-1. Scope", "2-1-4. Limits" becomes "#### 2-1-4. Limits", and circled
 * or parenthesised numerals become level-3 headings.
 *
 * The plain "N." form only fires on short, standalone title lines so that
 * ordered lists stay lists.
 */
export function promoteNumberedSections(text: string): string {
  let result = text;
  for (const pass of PASSES) {
    result = mapProseLines(result, (line, index, lines) => {
      const match = line.match(pass.pattern);
      if (!match) return line;
      const [, marker, title] = match;
      const trimmedTitle = title.trim();
      if (pass.accept && !pass.accept(trimmedTitle, index, lines)) return line;
      return `${"#".repeat(pass.level)} ${marker} ${trimmedTitle}`;
    });
  }
  return result;
}

function isNumberedNeighbour(lines: string[], index: number): boolean {
  const line = lines[index];
  return line !== undefined && NUMBERED_LINE.test(line);
}
