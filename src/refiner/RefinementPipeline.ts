import { CancellationError } from "../pipeline/errors";
import { logger } from "../utils/logger";
import type { RefinementContext, RefinementStep } from "./types";

/**
 * Manages and executes a sequence of refinement steps.
 *
 * A step that throws is skipped: its error is recorded as a warning and the
 * following step runs against the text as it was before the failing step.
 * Cancellation is the exception and always propagates.
 */
export class RefinementPipeline {
  private readonly steps: RefinementStep[];

  /**
   * @param steps Step instances to execute in order.
   */
  constructor(steps: RefinementStep[]) {
    this.steps = steps;
  }

  /**
   * Executes the steps with the given initial context.
   * @returns The same context after all steps have run.
   */
  async run(initialContext: RefinementContext): Promise<RefinementContext> {
    let index = -1;

    const dispatch = async (i: number): Promise<void> => {
      if (i <= index) {
        // next() called multiple times within the same step
        throw new Error("next() called multiple times");
      }
      index = i;

      const step: RefinementStep | undefined = this.steps[i];
      if (!step) {
        return;
      }

      if (initialContext.signal?.aborted) {
        throw new CancellationError("Refinement cancelled");
      }

      const next = dispatch.bind(null, i + 1);

      try {
        await step.process(initialContext, next);
      } catch (error) {
        if (error instanceof CancellationError) {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        const warning = `${step.constructor.name} skipped: ${message}`;
        initialContext.warnings.push(warning);
        logger.warn(`⚠️  ${warning}`);

        // The step failed before handing over; continue with the rest.
        if (index === i) {
          await dispatch(i + 1);
        }
      }
    };

    await dispatch(0);

    return initialContext;
  }
}
