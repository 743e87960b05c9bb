/**
 * Text heuristics shared by the quality metrics and the chunker.
 */

const SENTENCE_SPLIT = /(?<=[.!?])\s+(?=[A-Z])/;
const TERM_SEPARATORS = /[\s.,!?;:"'()]+/;
const WHITESPACE = /\s+/;

const STOP_WORDS = new Set([
  "the", "is", "at", "which", "on", "and", "a", "an", "as", "are",
  "was", "were", "been", "be", "have", "has", "had", "do", "does",
  "did", "will", "would", "could", "should", "may", "might", "must",
  "can", "to", "of", "in", "for", "with", "by", "from", "about",
]);

export function isStopWord(word: string): boolean {
  return STOP_WORDS.has(word.toLowerCase());
}

/**
 * Splits at whitespace that follows terminal punctuation and precedes a
 * capital letter. Blank pieces are dropped.
 */
export function splitIntoSentences(text: string): string[] {
  return text.split(SENTENCE_SPLIT).filter((sentence) => sentence.trim().length > 0);
}

/**
 * Lowercased words longer than two characters that are not stop words, in
 * order of appearance and with repetitions.
 */
export function extractTerms(text: string): string[] {
  return text
    .toLowerCase()
    .split(TERM_SEPARATORS)
    .filter((word) => word.length > 2 && !isStopWord(word));
}

export function splitWords(text: string): string[] {
  return text.split(WHITESPACE).filter((word) => word.length > 0);
}

export function isCompleteSentence(sentence: string): boolean {
  const trimmed = sentence.trim();
  return trimmed.length > 10 && /[.!?:]$/.test(trimmed);
}

/**
 * At least two sentences, all of them complete, in more than 100 characters.
 */
export function isCompleteThought(content: string): boolean {
  const sentences = splitIntoSentences(content);
  return (
    sentences.length >= 2 && sentences.every(isCompleteSentence) && content.length > 100
  );
}

export function startsWithCapital(text: string): boolean {
  return /^\p{Lu}/u.test(text);
}

export function endsWithTerminalPunctuation(text: string): boolean {
  return /[.!?]$/.test(text);
}

/**
 * Length of the longest suffix of `previous` that is also a prefix of
 * `current`, searched from `maxLength` down to `minLength`. Returns 0 when no
 * such overlap exists.
 */
export function getOverlapLength(
  previous: string,
  current: string,
  maxLength = 256,
  minLength = 1,
): number {
  const longest = Math.min(previous.length, current.length, maxLength);
  for (let size = longest; size >= Math.max(1, minLength); size--) {
    if (current.startsWith(previous.slice(previous.length - size))) {
      return size;
    }
  }
  return 0;
}

/**
 * Share of distinct terms two texts have in common (Jaccard index).
 */
export function termSimilarity(first: string, second: string): number {
  const firstTerms = new Set(extractTerms(first));
  const secondTerms = new Set(extractTerms(second));
  if (firstTerms.size === 0 || secondTerms.size === 0) return 0;

  let intersection = 0;
  for (const term of firstTerms) {
    if (secondTerms.has(term)) intersection++;
  }
  return intersection / (firstTerms.size + secondTerms.size - intersection);
}

/**
 * Terms ordered by descending frequency, ties broken by first appearance.
 */
export function topTerms(text: string, count: number): string[] {
  const frequencies = new Map<string, number>();
  for (const term of extractTerms(text)) {
    frequencies.set(term, (frequencies.get(term) ?? 0) + 1);
  }
  return [...frequencies.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, count)
    .map(([term]) => term);
}

/**
 * Clamps a score into [0, 1]; anything that is not a finite number becomes 0.
 */
export function clampScore(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function average(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}
