import { CancellationError, throwIfCancelled } from "../../pipeline/errors";
import { logger } from "../../utils/logger";
import { renderStructuredContent } from "../markdown/structuredContent";
import { tableToMarkdown } from "../markdown/tableToMarkdown";
import { promoteNumberedSections } from "../sectionPromotion";
import type { RefinementContext, RefinementStep } from "../types";
import { applyNoiseCleanup } from "./NoiseCleanupStep";

/**
 * Converts the reader's structural hints into markdown.
 *
 * - With text blocks, the whole document is rebuilt from blocks, tables and
 *   images in position order, then cleaned and promoted again since the
 *   earlier passes ran against the discarded plain text.
 * - With tables only, the rendered tables are appended to the text.
 * - Without either, the injected markdown converter is asked; when it is
 *   missing or fails the text stays as it is.
 */
export class StructuredMarkdownStep implements RefinementStep {
  async process(context: RefinementContext, next: () => Promise<void>): Promise<void> {
    const { options, raw } = context;
    const useBlocks = options.convertBlocksToMarkdown && raw.blocks.length > 0;
    const useTables = options.convertTablesToMarkdown && raw.tables.length > 0;

    if (useBlocks) {
      await this.renderBlocks(context, useTables);
    } else if (useTables) {
      const tables = raw.tables.map(tableToMarkdown).filter(Boolean);
      context.text = [context.text, ...tables].filter(Boolean).join("\n\n");
      logger.debug(`Appended ${tables.length} tables as markdown`);
    } else if (options.convertBlocksToMarkdown || options.convertTablesToMarkdown) {
      await this.convertPlainText(context);
    }

    await next();
  }

  private async renderBlocks(context: RefinementContext, includeTables: boolean): Promise<void> {
    const { options, raw, services } = context;
    const rendered = await renderStructuredContent(raw.blocks, raw.tables, raw.images, {
      includeTables,
      imageToText: options.processImagesToText ? services.imageToText : undefined,
      signal: context.signal,
      onWarning: (warning) => context.warnings.push(warning),
    });

    let text = applyNoiseCleanup(rendered, options);
    if (options.buildSections) {
      text = promoteNumberedSections(text);
    }
    context.text = text;
    logger.debug(`Rendered ${raw.blocks.length} blocks into ${text.length} characters`);
  }

  private async convertPlainText(context: RefinementContext): Promise<void> {
    const converter = context.services.markdownConverter;
    if (!converter) {
      return;
    }

    try {
      const result = await converter.convert(
        { ...context.raw, text: context.text },
        { useLlm: context.options.useLlm },
        context.signal,
      );
      context.warnings.push(...result.warnings);
      if (result.success) {
        context.text = result.markdown;
        context.usedLlm = result.usedLlm;
      } else {
        context.warnings.push("Markdown conversion was unsuccessful; raw text kept");
      }
    } catch (error) {
      if (error instanceof CancellationError) {
        throw error;
      }
      throwIfCancelled(context.signal, "Markdown conversion");
      const warning = `Markdown conversion failed: ${error instanceof Error ? error.message : String(error)}`;
      logger.warn(`⚠️  ${warning}`);
      context.warnings.push(warning);
    }
  }
}
