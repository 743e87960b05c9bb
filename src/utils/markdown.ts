/**
 * Line- and range-level helpers shared by the markdown transforms.
 */

export interface TextRange {
  start: number;
  end: number;
}

const FENCE = /^[ \t]*(```|~~~)/;

/**
 * Marks every line that belongs to a fenced code block, fence lines included.
 * An unterminated fence runs to the end of the text.
 */
export function fencedCodeLineMask(lines: string[]): boolean[] {
  const mask: boolean[] = [];
  let openFence: string | null = null;

  for (const line of lines) {
    const fence = line.match(FENCE)?.[1];
    if (openFence) {
      mask.push(true);
      if (fence === openFence) {
        openFence = null;
      }
    } else if (fence) {
      mask.push(true);
      openFence = fence;
    } else {
      mask.push(false);
    }
  }

  return mask;
}

/**
 * Character ranges of fenced code blocks, fences included.
 */
export function findFencedCodeRanges(text: string): TextRange[] {
  const ranges: TextRange[] = [];
  const lines = text.split("\n");
  const mask = fencedCodeLineMask(lines);
  let offset = 0;
  let current: TextRange | null = null;

  for (let i = 0; i < lines.length; i++) {
    const lineEnd = offset + lines[i].length;
    if (mask[i]) {
      if (current) {
        current.end = lineEnd;
      } else {
        current = { start: offset, end: lineEnd };
      }
    } else if (current) {
      ranges.push(current);
      current = null;
    }
    offset = lineEnd + 1;
  }
  if (current) {
    ranges.push(current);
  }

  return ranges;
}

/**
 * True when the position lies inside one of the ranges.
 */
export function isInRanges(position: number, ranges: TextRange[]): boolean {
  return ranges.some((range) => position >= range.start && position < range.end);
}

/**
 * Applies `transform` to every line outside fenced code blocks.
 */
export function mapProseLines(
  text: string,
  transform: (line: string, index: number, lines: string[]) => string,
): string {
  const lines = text.split("\n");
  const mask = fencedCodeLineMask(lines);
  return lines.map((line, i) => (mask[i] ? line : transform(line, i, lines))).join("\n");
}
