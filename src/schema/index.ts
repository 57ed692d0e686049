/**
 * Schema registry: data type declarations and artifact validation.
 */

export {
  SchemaRegistry,
  SchemaViolationError,
  DuplicateTypeError,
  UnknownTypeError,
  type RegisteredDataType,
  type ColumnTypeViolation,
} from "./registry.js";
export {
  FilenamePattern,
  filenamePatternIssues,
  type ParsedFilename,
} from "./filename-pattern.js";
export { matchesColumnType } from "./column-types.js";
