/**
 * Workflow steps, registration and execution.
 */

export {
  isAbsolute,
  bindingTimestamp,
  readsRunTimestamp,
  type InputBinding,
  type RelativeBinding,
  type AbsoluteBinding,
  type OutputBinding,
  type WorkflowStep,
  type BusinessLogic,
} from "./step.js";
export {
  StepRegistry,
  DuplicateStepError,
  UnknownLogicError,
  type StepRegistryOptions,
} from "./registry.js";
export { buildRunGraph, graphTimestamps, CyclicDependencyError, type RunGraph } from "./graph.js";
export {
  WorkflowExecutor,
  UnresolvedInputError,
  summarizeRun,
  type StepOutcome,
  type StepStatus,
  type RunStatus,
  type RunReport,
  type RunOptions,
  type WorkflowExecutorOptions,
} from "./executor.js";
