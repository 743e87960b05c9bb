/**
 * Shared domain records passed between the refiner, chunker, quality analyzer
 * and enrichment stages. Every record is produced once by its stage and treated
 * as read-only by all later stages.
 */

/**
 * File-level metadata supplied by the reader that produced the raw content.
 */
export interface FileMetadata {
  name: string;
  /** Extension including the leading dot, e.g. ".md" */
  extension: string;
  size: number;
  path?: string;
  createdAt?: Date;
  modifiedAt?: Date;
}

export type ColumnAlignment = "left" | "right" | "center" | "justify";

/**
 * A table grid as extracted by a reader. Rows may be ragged.
 */
export interface TableData {
  cells: string[][];
  headers?: string[];
  hasHeader: boolean;
  columnAlignments?: ColumnAlignment[];
  /** Extraction certainty between 0 and 1 */
  confidence: number;
  needsLlmAssist: boolean;
  pageNumber?: number;
  /** Sequence index shared with text blocks, when the reader knows it */
  order?: number;
  /** Used when `cells` is empty */
  plainTextFallback?: string;
}

/**
 * Bounding box of a block on its page. PDF coordinates grow upwards, so a
 * larger `top` means higher on the page.
 */
export interface BoundingBox {
  top: number;
  left?: number;
  bottom?: number;
  right?: number;
}

export type BlockType =
  | "paragraph"
  | "heading"
  | "listItem"
  | "codeBlock"
  | "quote"
  | "header"
  | "footer"
  | "caption"
  | "tocEntry"
  | "note";

interface TextBlockBase {
  content: string;
  pageNumber?: number;
  /** Monotonic sequence index used for deterministic reconstruction */
  order: number;
  location?: BoundingBox;
}

export interface HeadingBlock extends TextBlockBase {
  type: "heading";
  /** 1-6; out-of-range values are clamped when rendered */
  headingLevel: number;
}

export interface ListItemBlock extends TextBlockBase {
  type: "listItem";
  listLevel: number;
  isOrderedList: boolean;
}

export interface CodeBlock extends TextBlockBase {
  type: "codeBlock";
  language?: string;
}

export interface PlainBlock extends TextBlockBase {
  type: Exclude<BlockType, "heading" | "listItem" | "codeBlock">;
}

/**
 * A classified unit of raw content.
 */
export type TextBlock = HeadingBlock | ListItemBlock | CodeBlock | PlainBlock;

export interface ImageProperties {
  pageNumber?: number;
  width?: number;
  height?: number;
  boundsBottom?: number;
}

export interface ImageInfo {
  id: string;
  mimeType: string;
  /** Raw image bytes, when the reader embedded them */
  data?: Uint8Array;
  /** External reference (URL or relative path) */
  source?: string;
  caption?: string;
  /** Ordinal position among the document's images */
  position: number;
  properties: ImageProperties;
}

/**
 * Immutable result of extracting a single input file.
 */
export interface RawContent {
  id: string;
  /** Never null, may be empty */
  text: string;
  tables: TableData[];
  blocks: TextBlock[];
  images: ImageInfo[];
  file: FileMetadata;
  warnings: string[];
  /** Identifies the reader that produced this record */
  readerType?: string;
}

export interface Section {
  id: string;
  title: string;
  /** Mirrors the markdown heading depth, 1-6 */
  level: number;
  /** Character offset into the refined text */
  start: number;
  end: number;
  content: string;
}

/**
 * Character offsets of a structured element. `{ start: 0, end: 0 }` means the
 * location could not be determined.
 */
export interface ElementLocation {
  start: number;
  end: number;
}

interface StructuredElementBase {
  caption: string;
  location: ElementLocation;
}

export interface CodeElement extends StructuredElementBase {
  kind: "code";
  data: { language: string; content: string };
}

export interface TableElement extends StructuredElementBase {
  kind: "table";
  data: { headers: string[]; rows: Record<string, string>[] };
}

export interface ListElement extends StructuredElementBase {
  kind: "list";
  data: { items: string[]; ordered: boolean };
}

export type StructuredElement = CodeElement | TableElement | ListElement;

export interface DocumentMetadata {
  fileName: string;
  /** Uppercase extension without the dot, e.g. "MD" */
  fileType: string;
  fileSize: number;
  title: string;
  filePath?: string;
  createdAt?: Date;
  modifiedAt?: Date;
}

export interface RefinementQuality {
  originalLength: number;
  refinedLength: number;
  structureScore: number;
  cleanupScore: number;
  retentionScore: number;
  confidenceScore: number;
}

export interface RefinementInfo {
  refinerType: string;
  usedLlm: boolean;
  durationMs: number;
  refinedAt: Date;
}

/**
 * Normalized markdown plus its section and structure analysis.
 */
export interface RefinedContent {
  id: string;
  /** Back-reference to the raw record this was refined from */
  rawId: string;
  text: string;
  sections: Section[];
  structures: StructuredElement[];
  metadata: DocumentMetadata;
  quality: RefinementQuality;
  info: RefinementInfo;
  warnings: string[];
}

/**
 * Concrete chunking strategies. `auto` resolves to one of the others before
 * any chunk is produced.
 */
export type ChunkingStrategy =
  | "auto"
  | "sentence"
  | "paragraph"
  | "token"
  | "semantic"
  | "hierarchical";

export type ResolvedChunkingStrategy = Exclude<ChunkingStrategy, "auto">;

export type ChunkContentType = "text" | "heading" | "list" | "code" | "table" | "mixed";

/**
 * Identical across all chunks of one document.
 */
export interface SourceInfo {
  title: string;
  sourceType: string;
  filePath?: string;
  chunkCount: number;
}

/**
 * Known annotation kinds attached to a chunk. `custom` holds open-ended
 * collaborator output that has no dedicated field.
 */
export interface ChunkProps {
  documentTopic?: string;
  documentKeywords?: string[];
  headingPath?: string[];
  summary?: string;
  keywords?: string[];
  contextualSummary?: string;
  entities?: string[];
  custom: Record<string, string>;
}

export interface DocumentChunk {
  readonly id: string;
  /** Zero-based position in the chunk sequence */
  readonly index: number;
  readonly content: string;
  readonly startPosition: number;
  readonly endPosition: number;
  readonly strategy: ResolvedChunkingStrategy;
  readonly contentType: ChunkContentType;
  /** Set when a single indivisible unit exceeded the maximum chunk size */
  readonly oversized: boolean;
  readonly qualityScore?: number;
  readonly importance: number;
  readonly relevanceScore?: number;
  readonly topicCategory?: string;
  readonly documentDomain?: string;
  readonly props: Readonly<ChunkProps>;
  readonly sourceInfo: Readonly<SourceInfo>;
}

/**
 * Generic progress callback type
 */
export type ProgressCallback<T> = (progress: T) => void | Promise<void>;
