/**
 * Forward merging of user annotations.
 */

export {
  mergeForward,
  RowKeyAmbiguityError,
  type AnnotationPolicy,
  type MergeOptions,
  type MergeResult,
  type OrphanedAnnotationWarning,
} from "./merge.js";
