import { throwIfCancelled } from "../pipeline/errors";
import {
  TextContentSplitter,
  findSentenceSpans,
  findWordSpans,
} from "./splitters/TextContentSplitter";
import type {
  ChunkSpan,
  DocumentSegmenter,
  DocumentSplitter,
  EngineOptions,
  Segment,
  SegmentType,
  TextSpan,
} from "./types";

/**
 * A unit placed into a chunk, with the segment context it came from
 */
interface Piece extends TextSpan {
  type: SegmentType;
  level: number;
  path: string[];
}

interface ChunkDraft extends ChunkSpan {
  /** The chunk was opened by a heading break rather than by running out of space */
  headingBreak: boolean;
}

/**
 * Mutable state of one `splitText` run
 */
interface PackingState {
  text: string;
  segments: Segment[];
  chunks: ChunkDraft[];
  pieces: Piece[];
  /** Start of the open chunk; lies before the first piece when it opens with overlap */
  start: number;
  /** Where the next chunk should begin to overlap the one just closed */
  overlapStart: number | null;
  headingBreak: boolean;
}

const isAtomic = (type: SegmentType): boolean =>
  type === "code" || type === "table" || type === "heading";

/**
 * Takes the segments of a markdown document and greedily packs them into
 * chunks while preserving document structure and semantic boundaries.
 *
 * - Code, tables and headings are never split. Paragraphs and list items are
 *   kept whole when `preserveParagraphs` is set and they fit; otherwise they are
 *   broken into sentences (or word runs when sentences need not be preserved).
 * - A unit larger than the maximum size becomes a chunk of its own and is
 *   flagged as oversized.
 * - The `sentence` strategy closes a chunk at the target size, the others fill
 *   up to the maximum. `semantic` also breaks before H1/H2 headings once a chunk
 *   reaches the minimum size, and `hierarchical` before every heading.
 * - After a size break the next chunk starts with up to `overlapSize` characters
 *   of the previous one, beginning at a sentence (or word) boundary.
 * - A heading is never left at the end of a chunk; it moves to the next one.
 *
 * Chunk ranges index into the original markdown, so chunk content is always an
 * exact slice of it.
 */
export class GreedySplitter implements DocumentSplitter {
  private readonly unitSplitter: TextContentSplitter;

  constructor(
    private readonly segmenter: DocumentSegmenter,
    private readonly options: EngineOptions,
  ) {
    this.unitSplitter = new TextContentSplitter({
      // Leave room for the overlap in front of each word run
      maxChunkSize: Math.max(1, options.maxChunkSize - options.overlapSize),
      preserveSentences: options.preserveSentences,
    });
  }

  async splitText(markdown: string, signal?: AbortSignal): Promise<ChunkSpan[]> {
    const segments = this.segmenter.segment(markdown, signal);
    const state: PackingState = {
      text: markdown,
      segments,
      chunks: [],
      pieces: [],
      start: 0,
      overlapStart: null,
      headingBreak: false,
    };

    for (const segment of segments) {
      throwIfCancelled(signal, "Chunking");
      await this.addSegment(state, segment);
    }
    this.closeChunk(state, false);
    this.mergeTrailingChunk(state.chunks);

    return state.chunks.map(({ start, end, types, section, oversized }) => ({
      start,
      end,
      types,
      section,
      oversized,
    }));
  }

  private async addSegment(state: PackingState, segment: Segment): Promise<void> {
    if (segment.type === "heading" && this.breaksBefore(state, segment)) {
      this.closeChunk(state, false);
      state.headingBreak = true;
    }

    const length = segment.end - segment.start;
    const piece: Piece = { ...segment };

    if (isAtomic(segment.type) || this.options.preserveParagraphs) {
      if (length <= this.options.maxChunkSize) {
        this.addPiece(state, piece);
        return;
      }
      if (isAtomic(segment.type)) {
        this.emitOversized(state, piece);
        return;
      }
    }

    const units = await this.unitSplitter.split(state.text, segment);
    for (const unit of units) {
      const unitPiece: Piece = {
        ...unit,
        type: segment.type,
        level: segment.level,
        path: segment.path,
      };
      if (unit.end - unit.start > this.options.maxChunkSize) {
        this.emitOversized(state, unitPiece);
      } else {
        this.addPiece(state, unitPiece);
      }
    }
  }

  /**
   * Headings force a new chunk under the structure-driven strategies. The
   * semantic strategy only breaks at H1/H2 and not before the chunk has
   * reached the minimum size.
   */
  private breaksBefore(state: PackingState, heading: Segment): boolean {
    if (state.pieces.length === 0) return false;
    switch (this.options.strategy) {
      case "hierarchical":
        return true;
      case "semantic":
        return heading.level <= 2 && this.currentLength(state) >= this.options.minChunkSize;
      default:
        return false;
    }
  }

  private addPiece(state: PackingState, piece: Piece): void {
    if (state.pieces.length > 0 && !this.fits(state, piece)) {
      this.closeForSize(state);
      // A carried heading plus this piece may still be too large
      if (state.pieces.length > 0 && piece.end - state.start > this.options.maxChunkSize) {
        this.closeChunk(state, false);
      }
    }

    if (state.pieces.length === 0) {
      const overlapStart = state.overlapStart;
      state.start =
        overlapStart !== null && piece.end - overlapStart <= this.options.maxChunkSize
          ? overlapStart
          : piece.start;
      state.overlapStart = null;
    }
    state.pieces.push(piece);
  }

  private fits(state: PackingState, piece: Piece): boolean {
    const length = piece.end - state.start;
    if (length > this.options.maxChunkSize) return false;
    const onlyHeadings = state.pieces.every((p) => p.type === "heading");
    const limit =
      this.options.strategy === "sentence" && !onlyHeadings
        ? this.options.targetChunkSize
        : this.options.maxChunkSize;
    return length <= limit;
  }

  private currentLength(state: PackingState): number {
    const last = state.pieces[state.pieces.length - 1];
    return last ? last.end - state.start : 0;
  }

  /**
   * Closes the open chunk because the next piece does not fit. Trailing
   * headings are carried over into the next chunk.
   */
  private closeForSize(state: PackingState): void {
    let lastContent = state.pieces.length - 1;
    while (lastContent >= 0 && state.pieces[lastContent].type === "heading") {
      lastContent--;
    }

    if (lastContent < 0 || lastContent === state.pieces.length - 1) {
      this.closeChunk(state, true);
      return;
    }

    const carried = state.pieces.slice(lastContent + 1);
    state.pieces = state.pieces.slice(0, lastContent + 1);
    this.closeChunk(state, false);
    state.pieces = carried;
    state.start = carried[0].start;
    state.headingBreak = true;
  }

  private closeChunk(state: PackingState, withOverlap: boolean): void {
    const last = state.pieces[state.pieces.length - 1];
    if (!last) {
      state.overlapStart = null;
      state.headingBreak = false;
      return;
    }

    const chunk: ChunkDraft = {
      start: state.start,
      end: last.end,
      types: [...new Set(state.pieces.map((piece) => piece.type))],
      section: state.pieces.slice(1).reduce(
        (section, piece) => mergeSectionInfo(section, piece),
        { level: state.pieces[0].level, path: [...state.pieces[0].path] },
      ),
      oversized: false,
      headingBreak: state.headingBreak,
    };
    state.chunks.push(chunk);
    state.pieces = [];
    state.headingBreak = false;
    state.overlapStart =
      withOverlap && this.options.overlapSize > 0 ? this.findOverlapStart(state, chunk) : null;
  }

  private emitOversized(state: PackingState, piece: Piece): void {
    this.closeChunk(state, false);
    state.chunks.push({
      start: piece.start,
      end: piece.end,
      types: [piece.type],
      section: { level: piece.level, path: [...piece.path] },
      oversized: true,
      headingBreak: false,
    });
    state.overlapStart = null;
  }

  /**
   * Earliest unit boundary within the last `overlapSize` characters of the
   * chunk. Boundaries are segment starts plus sentence starts (word starts for
   * the token strategy or when sentences need not be preserved) inside text
   * and list segments; positions inside headings, code and tables never
   * qualify.
   */
  private findOverlapStart(state: PackingState, chunk: TextSpan): number | null {
    const windowStart = chunk.end - this.options.overlapSize;
    const byWords = this.options.strategy === "token" || !this.options.preserveSentences;

    for (const segment of state.segments) {
      if (segment.end <= windowStart || segment.start >= chunk.end) continue;

      const boundaries = isAtomic(segment.type)
        ? [segment]
        : byWords
          ? findWordSpans(state.text, segment)
          : findSentenceSpans(state.text, segment);

      const found = boundaries.find(
        ({ start }) => start >= windowStart && start > chunk.start && start < chunk.end,
      );
      if (found) return found.start;
    }
    return null;
  }

  /**
   * Folds a final chunk smaller than the minimum size into its predecessor
   * when the result still fits. Chunks opened by a heading break stay apart.
   */
  private mergeTrailingChunk(chunks: ChunkDraft[]): void {
    if (chunks.length < 2) return;
    const last = chunks[chunks.length - 1];
    const previous = chunks[chunks.length - 2];
    if (
      last.oversized ||
      previous.oversized ||
      last.headingBreak ||
      last.end - last.start >= this.options.minChunkSize ||
      last.end - previous.start > this.options.maxChunkSize
    ) {
      return;
    }

    chunks[chunks.length - 2] = {
      ...previous,
      end: last.end,
      types: [...new Set([...previous.types, ...last.types])],
      section: mergeSectionInfo(previous.section, last.section),
    };
    chunks.pop();
  }
}

/**
 * Checks if one path is a prefix of another path, indicating a parent-child relationship
 */
function isPathIncluded(parentPath: string[], childPath: string[]): boolean {
  if (parentPath.length >= childPath.length) return false;
  return parentPath.every((part, i) => part === childPath[i]);
}

/**
 * Returns longest common prefix between two paths
 */
function findCommonPrefix(path1: string[], path2: string[]): string[] {
  const common: string[] = [];
  for (let i = 0; i < Math.min(path1.length, path2.length); i++) {
    if (path1[i] === path2[i]) {
      common.push(path1[i]);
    } else {
      break;
    }
  }
  return common;
}

/**
 * Merges section metadata when content is concatenated, following these rules:
 * 1. Level: Always uses the lowest (most general) level
 * 2. Path selection:
 *    - For parent-child relationships (one path includes the other), uses the child's path
 *    - For siblings/unrelated sections, uses the common parent path
 *    - If no common path exists, uses the root path ([])
 */
export function mergeSectionInfo(
  current: ChunkSpan["section"],
  next: { level: number; path: string[] },
): ChunkSpan["section"] {
  const level = Math.min(current.level, next.level);

  if (
    current.path.length === next.path.length &&
    current.path.every((p, i) => p === next.path[i])
  ) {
    return { level, path: current.path };
  }

  if (isPathIncluded(current.path, next.path)) {
    return { level, path: next.path };
  }

  if (isPathIncluded(next.path, current.path)) {
    return { level, path: current.path };
  }

  return { level, path: findCommonPrefix(current.path, next.path) };
}
