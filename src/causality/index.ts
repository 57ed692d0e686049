/**
 * Static temporal causality checks for workflow steps.
 */

export {
  CausalityValidator,
  SelfReferenceAtSameTimestampError,
  FutureReferenceError,
} from "./validator.js";
