import { RecursiveCharacterTextSplitter } from "langchain/text_splitter";
import { trimSpan } from "../MarkdownSegmenter";
import type { TextSpan } from "../types";
import type { ContentSplitter, ContentSplitterOptions } from "./types";

export interface TextContentSplitterOptions extends ContentSplitterOptions {
  /** Split at sentence ends instead of at word boundaries */
  preserveSentences: boolean;
}

/** Terminal punctuation, optionally followed by closing quotes or brackets */
const SENTENCE_END = /[.!?。！？]+["'”’)\]]*(?=\s)/g;
const WORD = /\S+/g;

/**
 * Splits a text range into the smallest units the chunker may not cut:
 * sentences when sentences are preserved, otherwise runs of whole words no
 * longer than `maxChunkSize` (found with LangChain's recursive splitter, which
 * prefers paragraph and line breaks over spaces).
 *
 * Every returned range is trimmed and indexes into the original text.
 */
export class TextContentSplitter implements ContentSplitter {
  constructor(private options: TextContentSplitterOptions) {}

  async split(text: string, span: TextSpan): Promise<TextSpan[]> {
    if (this.options.preserveSentences) {
      return findSentenceSpans(text, span);
    }
    if (span.end - span.start <= this.options.maxChunkSize) {
      const trimmed = trimSpan(text, span);
      return trimmed ? [trimmed] : [];
    }
    return this.splitByWords(text, span);
  }

  /**
   * Uses LangChain's recursive splitter to find word runs, then maps each run
   * back onto the source by counting words, since the splitter rejoins pieces
   * with its own separators.
   */
  private async splitByWords(text: string, span: TextSpan): Promise<TextSpan[]> {
    const splitter = new RecursiveCharacterTextSplitter({
      chunkSize: this.options.maxChunkSize,
      chunkOverlap: 0,
      separators: ["\n\n", "\n", " "],
    });
    const pieces = await splitter.splitText(text.slice(span.start, span.end));
    const words = findWordSpans(text, span);

    const spans: TextSpan[] = [];
    let cursor = 0;
    for (const piece of pieces) {
      const count = piece.split(/\s+/).filter(Boolean).length;
      if (count === 0 || cursor >= words.length) continue;
      const last = Math.min(cursor + count, words.length) - 1;
      spans.push({ start: words[cursor].start, end: words[last].end });
      cursor = last + 1;
    }
    if (cursor < words.length) {
      spans.push({ start: words[cursor].start, end: words[words.length - 1].end });
    }
    return spans;
  }
}

/**
 * Sentence ranges within `span`. A sentence ends at terminal punctuation
 * followed by whitespace; trailing text without punctuation forms the last
 * sentence.
 */
export function findSentenceSpans(text: string, span: TextSpan): TextSpan[] {
  const source = text.slice(span.start, span.end);
  const spans: TextSpan[] = [];
  let sentenceStart = 0;

  const push = (start: number, end: number) => {
    const trimmed = trimSpan(text, { start: span.start + start, end: span.start + end });
    if (trimmed) spans.push(trimmed);
  };

  for (const match of source.matchAll(SENTENCE_END)) {
    const end = (match.index ?? 0) + match[0].length;
    push(sentenceStart, end);
    sentenceStart = end;
  }
  push(sentenceStart, source.length);

  return spans;
}

/**
 * Ranges of the whitespace-separated words within `span`.
 */
export function findWordSpans(text: string, span: TextSpan): TextSpan[] {
  const source = text.slice(span.start, span.end);
  return [...source.matchAll(WORD)].map((match) => {
    const start = span.start + (match.index ?? 0);
    return { start, end: start + match[0].length };
  });
}
