import { logger } from "../../utils/logger";
import { MarkdownNormalizer } from "../markdown/MarkdownNormalizer";
import type { RefinementContext, RefinementStep } from "../types";

export class MarkdownNormalizationStep implements RefinementStep {
  private readonly normalizer: MarkdownNormalizer;

  constructor(normalizer: MarkdownNormalizer = new MarkdownNormalizer()) {
    this.normalizer = normalizer;
  }

  async process(context: RefinementContext, next: () => Promise<void>): Promise<void> {
    if (context.options.normalizeMarkdownStructure) {
      const result = this.normalizer.normalize(context.text);
      if (result.actions.length > 0) {
        logger.debug(`Markdown normalization applied ${result.actions.length} changes`);
      }
      context.text = result.text;
    }
    await next();
  }
}
