import { normalizeWhitespace } from "../cleanup";
import type { RefinementContext, RefinementStep } from "../types";

export class WhitespaceNormalizationStep implements RefinementStep {
  async process(context: RefinementContext, next: () => Promise<void>): Promise<void> {
    if (context.options.normalizeWhitespace) {
      context.text = normalizeWhitespace(context.text);
    }
    await next();
  }
}
