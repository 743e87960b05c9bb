import type { RawContent } from "../types";

/**
 * A section proposed by a structure-analysis call.
 */
export interface AnalyzedSection {
  title: string;
  level: number;
  /** Character offset into the analysed text, when the service reports one */
  start?: number;
}

export interface StructureAnalysis {
  sections: AnalyzedSection[];
  confidence: number;
}

export interface SummaryResult {
  summary: string;
  keywords: string[];
}

export interface MetadataResult {
  keywords: string[];
  entities: string[];
  topic?: string;
  domain?: string;
}

export interface QualityAssessment {
  clarity: number;
  completeness: number;
  relevance: number;
  overall: number;
}

/**
 * Text-completion collaborator. Every method may reject; callers treat a
 * rejection as "skip this enrichment".
 */
export interface TextCompletionService {
  /** Capability check. An unavailable service is never called. */
  isAvailable(): boolean;
  generate(prompt: string, signal?: AbortSignal): Promise<string>;
  analyzeStructure(
    text: string,
    documentType: string,
    signal?: AbortSignal,
  ): Promise<StructureAnalysis>;
  summarize(text: string, maxLength: number, signal?: AbortSignal): Promise<SummaryResult>;
  extractMetadata(
    text: string,
    documentType: string,
    signal?: AbortSignal,
  ): Promise<MetadataResult>;
  assessQuality(text: string, signal?: AbortSignal): Promise<QualityAssessment>;
}

export interface ImageToTextOptions {
  /** Hint describing what the image likely contains, e.g. "chart" */
  imageType?: string;
  language?: string;
}

export interface ImageTextResult {
  text: string;
  confidence: number;
}

/**
 * Image-to-text collaborator with the same failure contract as
 * {@link TextCompletionService}.
 */
export interface ImageToTextService {
  isAvailable(): boolean;
  extractText(
    image: Uint8Array,
    mimeType: string,
    options?: ImageToTextOptions,
    signal?: AbortSignal,
  ): Promise<ImageTextResult>;
}

export interface MarkdownConversionOptions {
  /** Whether the converter may call a language model */
  useLlm: boolean;
}

export interface MarkdownConversionResult {
  markdown: string;
  success: boolean;
  /** True when a language model contributed to the markdown */
  usedLlm: boolean;
  warnings: string[];
}

/**
 * Converts raw content without structural hints into markdown.
 */
export interface MarkdownConverter {
  convert(
    raw: RawContent,
    options: MarkdownConversionOptions,
    signal?: AbortSignal,
  ): Promise<MarkdownConversionResult>;
}
