/**
 * Engine wiring.
 */

export {
  createEngineContext,
  hydrateStore,
  type EngineContext,
  type EngineContextOptions,
} from "./context.js";
