/**
 * Services - Main Export
 *
 * Layers are namespaced so that their config and type names stay apart.
 */

// Domain tables, RNG and timestamps
export * as domain from "./domain/index.js";

// Descriptive statistics learned from the training pool
export * as statistics from "./statistics/index.js";

// Generation - schema, oracle, decomposer, scheduler
export * as generation from "./generation/index.js";

// Curation - filter, enhancer, verifiers, reweighter
export * as curation from "./curation/index.js";

// Evaluation - benchmark comparison, direct and indirect scores
export * as evaluation from "./evaluation/index.js";

// Pipeline - orchestrator and the synthesis service
export * as pipeline from "./pipeline/index.js";

export { loadConfig, DEFAULT_SEED, type SynthConfig, type OracleProvider } from "./config.js";
export * from "./errors.js";
export { initLogger, closeLogger, getLogFilePath } from "./logger.js";
