import { promoteNumberedSections } from "../sectionPromotion";
import type { RefinementContext, RefinementStep } from "../types";

/**
 * Turns numbered section markers such as "3-1. Scope" into markdown headings.
 * Runs together with section building.
 */
export class SectionPromotionStep implements RefinementStep {
  async process(context: RefinementContext, next: () => Promise<void>): Promise<void> {
    if (context.options.buildSections) {
      context.text = promoteNumberedSections(context.text);
    }
    await next();
  }
}
