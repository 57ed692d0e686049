/**
 * Engine context.
 *
 * All registries of one engine instance, built from a validated
 * configuration and passed around explicitly. Nothing here is global, so
 * independent engines (e.g. one per test) can coexist in one process.
 */

import type { EngineConfig } from "../config/engine/index.js";
import { SchemaRegistry } from "../schema/index.js";
import { HubPathResolver, HubTaxonomy } from "../hubs/index.js";
import { TemporalObjectStore, type TabularIO } from "../store/index.js";
import { CausalityValidator } from "../causality/index.js";
import { StepRegistry, WorkflowExecutor, type BusinessLogic } from "../workflow/index.js";
import { silentLogger, type Logger } from "../logging/index.js";

export interface EngineContext {
  readonly config: Readonly<EngineConfig>;
  readonly schemas: SchemaRegistry;
  readonly hubs: HubTaxonomy;
  readonly resolver: HubPathResolver;
  readonly store: TemporalObjectStore;
  readonly validator: CausalityValidator;
  readonly steps: StepRegistry;
  readonly executor: WorkflowExecutor;
  readonly logger: Logger;
}

export interface EngineContextOptions {
  io: TabularIO;
  /** Business-logic plugins by name; omit to register steps without them */
  logic?: Readonly<Record<string, BusinessLogic>>;
  logger?: Logger;
  /** Overrides options.maxConcurrency when set */
  maxConcurrency?: number;
}

/**
 * Build every registry from `config`. Registration errors (duplicate or
 * unhosted types, causality violations, unknown logic) surface here, before
 * any run.
 */
export function createEngineContext(
  config: Readonly<EngineConfig>,
  options: EngineContextOptions
): EngineContext {
  const logger = options.logger ?? silentLogger;

  const schemas = new SchemaRegistry(config.options.timestampFormat);
  for (const dataType of config.dataTypes) {
    schemas.register(dataType);
  }

  const hubs = HubTaxonomy.create(config.hubs, schemas);
  const resolver = new HubPathResolver(hubs, schemas);
  const store = new TemporalObjectStore({ schemas, resolver, io: options.io, logger });
  const validator = new CausalityValidator();

  const steps = new StepRegistry({
    resolver,
    validator,
    ...(options.logic ? { logic: new Map(Object.entries(options.logic)) } : {}),
  });
  for (const step of config.steps) {
    steps.register(step);
  }

  const executor = new WorkflowExecutor({
    store,
    schemas,
    steps,
    validator,
    logger,
    overwrite: config.options.overwrite,
    annotationPolicy: config.options.annotationPolicy,
    maxConcurrency: options.maxConcurrency ?? config.options.maxConcurrency,
  });

  logger.debug("Engine context created", {
    dataTypes: schemas.list().length,
    hubs: hubs.list().length,
    steps: steps.list().length,
  });

  return { config, schemas, hubs, resolver, store, validator, steps, executor, logger };
}

/**
 * Rebuild the store's version index for every (hub, hosted type) pair.
 *
 * @returns total number of versions found
 */
export async function hydrateStore(context: EngineContext): Promise<number> {
  let total = 0;
  for (const hub of context.hubs.list()) {
    for (const dataType of [...context.hubs.get(hub).hosts].sort()) {
      total += await context.store.hydrate(hub, dataType);
    }
  }
  return total;
}
