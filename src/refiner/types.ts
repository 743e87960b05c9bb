import { z } from "zod";
import type { ImageToTextService, MarkdownConverter } from "../enrichment/types";
import type { RawContent, Section, StructuredElement } from "../types";

/**
 * Flags controlling which refinement steps run. Every step is independently
 * toggleable.
 */
export const refineOptionsSchema = z.object({
  /** Strip artificial paragraph-number headings and image placeholders */
  cleanNoise: z.boolean().default(true),
  /** Drop page-x-of-y lines, copyright and classification banners */
  removeHeadersFooters: z.boolean().default(false),
  /** Drop lines consisting of a page number only */
  removePageNumbers: z.boolean().default(false),
  /** Drop table-of-contents leaders such as "Intro ........ 3" */
  removeTocNoise: z.boolean().default(false),
  /** Promote numbered section markers to headings and build the section list */
  buildSections: z.boolean().default(true),
  convertTablesToMarkdown: z.boolean().default(true),
  convertBlocksToMarkdown: z.boolean().default(true),
  normalizeMarkdownStructure: z.boolean().default(true),
  extractStructures: z.boolean().default(true),
  normalizeWhitespace: z.boolean().default(true),
  /** Allow the injected markdown converter to call a language model */
  useLlm: z.boolean().default(false),
  /** Replace images with text from the image-to-text service */
  processImagesToText: z.boolean().default(false),
});

export type RefineOptions = z.infer<typeof refineOptionsSchema>;
export type RefineOptionsInput = z.input<typeof refineOptionsSchema>;

/**
 * Optional collaborators used by the refiner. Absent services are skipped.
 */
export interface RefinerServices {
  markdownConverter?: MarkdownConverter;
  imageToText?: ImageToTextService;
}

/**
 * Mutable working state passed through the refinement steps. Steps replace
 * `text` with a new string; nothing outside the context is modified.
 */
export interface RefinementContext {
  text: string;
  readonly raw: RawContent;
  readonly options: RefineOptions;
  readonly services: RefinerServices;
  sections: Section[];
  structures: StructuredElement[];
  /** Human-readable notes about degraded steps */
  warnings: string[];
  /** Set when a language-model-backed converter produced the markdown */
  usedLlm: boolean;
  readonly signal?: AbortSignal;
}

/**
 * A single refinement step.
 */
export interface RefinementStep {
  /**
   * Processes the refinement context asynchronously.
   * @param context The current refinement context.
   * @param next Passes control to the next step in the pipeline.
   */
  process(context: RefinementContext, next: () => Promise<void>): Promise<void>;
}
