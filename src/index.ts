/**
 * Entry point: load configuration, build the engine and index what the
 * store already holds.
 */

import {
  ConfigError,
  EngineConfigError,
  loadConfig,
  loadEngineConfigFile,
  validateConfig,
} from "./config/index.js";
import { createEngineContext, hydrateStore } from "./engine/index.js";
import { EngineError } from "./errors.js";
import { createLogger, initRunId, isLogLevel } from "./logging/index.js";
import { FileSystemTabularIO } from "./store/index.js";
import { today } from "./timestamp/index.js";

async function main(): Promise<void> {
  // Initialize run ID first
  const runId = initRunId();
  const config = loadConfig();

  const logger = createLogger({
    level: isLogLevel(config.logLevel) ? config.logLevel : "info",
    file: config.logToFile,
  });

  try {
    validateConfig(config);

    logger.info("Application starting", { runId, appName: config.appName });
    logger.info("Configuration loaded", {
      env: config.env,
      debug: config.debug,
      logLevel: config.logLevel,
      engineConfig: config.engineConfigPath,
      dataRoot: config.dataRoot,
    });

    const engineConfig = loadEngineConfigFile(config.engineConfigPath);
    const context = createEngineContext(engineConfig, {
      io: new FileSystemTabularIO(config.dataRoot),
      logger,
      ...(config.maxConcurrency > 0 ? { maxConcurrency: config.maxConcurrency } : {}),
    });

    const versions = await hydrateStore(context);
    logger.info("Engine initialized", {
      dataTypes: context.schemas.list().length,
      hubs: context.hubs.list().length,
      steps: context.steps.list().length,
      versions,
      today: today(config.forcedToday),
    });
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error("Configuration error", { message: err.message });
      process.exit(1);
    }
    if (err instanceof EngineConfigError) {
      logger.error("Engine configuration error", { message: err.format() });
      process.exit(1);
    }
    if (err instanceof EngineError) {
      logger.error("Engine error", { code: err.code, message: err.message });
      process.exit(1);
    }
    throw err;
  }
}

main().catch((err) => {
  console.error("Unexpected error:", err);
  process.exit(1);
});
