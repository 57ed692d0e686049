/**
 * Logging and observability utilities.
 */

export { generateRunId, initRunId, getRunId, workflowRunId } from "./run-id.js";
export {
  createLogger,
  isLogLevel,
  silentLogger,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
