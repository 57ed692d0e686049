/**
 * Sampling, projection and hub snapshots for test datasets.
 */

export {
  FirstFoundSampler,
  AnyOfFilterSampler,
  ChainSampler,
  InvalidSamplerError,
  valueList,
  type Sampler,
  type TableSet,
} from "./samplers.js";
export {
  projectObjects,
  snapshotHub,
  InvalidSnapshotError,
  type ProjectOptions,
  type ProjectionResult,
  type ProjectionStat,
  type SnapshotMode,
  type SnapshotOptions,
} from "./projector.js";
