/**
 * Engine Module
 */

export {
  ExemplarEngine,
  type CreateRequest,
  type CreateResult,
  type CreateStage,
  type ExemplarEngineOptions,
  type OpenEngineOptions,
  type RefineOptions,
} from "./exemplar-engine.js";
