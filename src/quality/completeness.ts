import { endsWithTerminalPunctuation, startsWithCapital } from "./text";

/**
 * Per-chunk completeness in [0, 1]: 0.5 for any content, plus 0.2 for a
 * terminal punctuation mark, 0.1 for a capitalized start and 0.2 for a length
 * between 100 and 2000 characters.
 */
export function assessChunkCompleteness(content: string): number {
  const trimmed = content.trim();
  if (trimmed.length === 0) return 0;

  let score = 0.5;
  if (endsWithTerminalPunctuation(trimmed)) score += 0.2;
  if (startsWithCapital(trimmed)) score += 0.1;
  if (trimmed.length > 100 && trimmed.length < 2000) score += 0.2;
  return Math.min(1, score);
}
