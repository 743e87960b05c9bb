import { logger } from "../../utils/logger";
import {
  cleanDocumentNoise,
  removeHeadersFooters,
  removePageNumbers,
  removeTocNoise,
} from "../cleanup";
import type { RefinementContext, RefinementStep } from "../types";

/**
 * Strips reader artifacts from the text. The header/footer, page-number and
 * table-of-contents passes only run when explicitly enabled.
 */
export class NoiseCleanupStep implements RefinementStep {
  async process(context: RefinementContext, next: () => Promise<void>): Promise<void> {
    context.text = applyNoiseCleanup(context.text, context.options);
    await next();
  }
}

/**
 * Runs every cleanup pass enabled in the options. Shared with the markdown
 * rendering step, which cleans the text it produces from blocks.
 */
export function applyNoiseCleanup(
  text: string,
  options: RefinementContext["options"],
): string {
  const before = text.length;
  let result = text;
  if (options.removeHeadersFooters) result = removeHeadersFooters(result);
  if (options.removePageNumbers) result = removePageNumbers(result);
  if (options.removeTocNoise) result = removeTocNoise(result);
  if (options.cleanNoise) result = cleanDocumentNoise(result);
  if (result.length !== before) {
    logger.debug(`Noise cleanup removed ${before - result.length} characters`);
  }
  return result;
}
