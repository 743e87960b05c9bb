import { tableToElement } from "../markdown/tableToMarkdown";
import { extractStructures } from "../structures";
import type { RefinementContext, RefinementStep } from "../types";

/**
 * Records code blocks, tables and lists as typed elements. Tables supplied by
 * the reader come first, followed by everything found in the normalized text.
 */
export class StructureExtractionStep implements RefinementStep {
  async process(context: RefinementContext, next: () => Promise<void>): Promise<void> {
    if (context.options.extractStructures) {
      context.structures = [
        ...context.raw.tables.map(tableToElement),
        ...extractStructures(context.text),
      ];
    }
    await next();
  }
}
