/**
 * Engine configuration module.
 *
 * Provides schema-validated, immutable DataType, HubNode and WorkflowStep
 * declarations.
 *
 * Usage:
 *   import { loadEngineConfigFile } from "./config/engine/index.js";
 *
 *   const config = loadEngineConfigFile("config/engine.json");
 */

// Schema types
export type {
  ColumnSpec,
  DataTypeInput,
  DataTypeDefinition,
  HubInput,
  HubDefinition,
  StepInput,
  StepDefinition,
  EngineOptions,
  EngineConfigInput,
  EngineConfig,
} from "./schema.js";

// Schema objects
export {
  ColumnType,
  AnnotationPolicy,
  DataTypeSchema,
  HubSchema,
  StepSchema,
  InputBindingSchema,
  EngineOptionsSchema,
  EngineConfigSchema,
} from "./schema.js";

// Loader and validation
export {
  loadEngineConfig,
  loadEngineConfigFile,
  validateEngineConfig,
  deepFreeze,
  formatZodIssues,
  EngineConfigError,
  type ConfigValidationIssue,
} from "./loader.js";
