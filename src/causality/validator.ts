/**
 * Causality validator.
 *
 * A workflow may read its own output from an earlier timestamp; it may never
 * read its own output at the timestamp it is writing, nor anything from the
 * future. Relative bindings are checked once, when a step is registered,
 * since legality depends only on the declared shape. Absolute bindings are
 * checked against each run timestamp before the run starts.
 *
 *   output Y, input Y offset -1   legal (previous version of itself)
 *   output Y, input X offset 0    legal (another object, same run)
 *   output Y, input Y offset 0    SelfReferenceAtSameTimestampError
 *   any input with offset 1       FutureReferenceError
 */

import { EngineError } from "../errors.js";
import { describeObject, sameObject } from "../store/index.js";
import type { Timestamp } from "../timestamp/index.js";
import { isAbsolute, type WorkflowStep } from "../workflow/step.js";

export class SelfReferenceAtSameTimestampError extends EngineError {
  constructor(readonly stepId: string, readonly input: string) {
    super(
      "SELF_REFERENCE_AT_SAME_TIMESTAMP",
      `Step "${stepId}" input "${input}" reads the step's own output at the timestamp it writes; use a negative offset to read its previous version`
    );
  }
}

export class FutureReferenceError extends EngineError {
  constructor(readonly stepId: string, readonly input: string, detail: string) {
    super("FUTURE_REFERENCE", `Step "${stepId}" input "${input}" reads from the future: ${detail}`);
  }
}

export class CausalityValidator {
  /**
   * Check every relative binding of `step`.
   *
   * @throws FutureReferenceError, SelfReferenceAtSameTimestampError
   */
  validate(step: WorkflowStep): void {
    for (const [name, binding] of Object.entries(step.inputs)) {
      if (isAbsolute(binding)) {
        continue;
      }
      if (binding.offset > 0) {
        throw new FutureReferenceError(step.id, name, `offset ${binding.offset} is positive`);
      }
      if (binding.offset === 0 && sameObject(binding.object, step.output.object)) {
        throw new SelfReferenceAtSameTimestampError(step.id, name);
      }
    }
  }

  /**
   * Check every absolute binding of `step` for a run at `runTimestamp`.
   *
   * @throws FutureReferenceError, SelfReferenceAtSameTimestampError
   */
  validateAt(step: WorkflowStep, runTimestamp: Timestamp): void {
    for (const [name, binding] of Object.entries(step.inputs)) {
      if (!isAbsolute(binding)) {
        continue;
      }
      if (binding.at >= runTimestamp && sameObject(binding.object, step.output.object)) {
        throw new SelfReferenceAtSameTimestampError(step.id, name);
      }
      if (binding.at > runTimestamp) {
        throw new FutureReferenceError(
          step.id,
          name,
          `${describeObject(binding.object)} at ${binding.at} is after the run timestamp ${runTimestamp}`
        );
      }
    }
  }
}
