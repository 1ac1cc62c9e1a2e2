/**
 * Pipeline Layer - Main Export
 */

export { PipelineOrchestrator, type OrchestratorDeps } from "./orchestrator.js";
export {
  SynthesisService,
  createSynthesisService,
  type OracleFactory,
  type SynthesisServiceConfig,
  type SynthesisServiceDeps,
} from "./synthesis_service.js";
export { buildSeedPool, type SeedPoolOptions } from "./seed_pool.js";
export type { InitializeOptions, OrchestratorConfig, RunOptions, SynthesisOutput } from "./types.js";
