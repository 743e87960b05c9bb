import { buildSections } from "../structures";
import type { RefinementContext, RefinementStep } from "../types";

/**
 * Builds the section list from the final text. Runs last so that section
 * offsets index into the text that is returned.
 */
export class SectionBuildingStep implements RefinementStep {
  async process(context: RefinementContext, next: () => Promise<void>): Promise<void> {
    if (context.options.buildSections) {
      context.sections = buildSections(context.text);
    }
    await next();
  }
}
