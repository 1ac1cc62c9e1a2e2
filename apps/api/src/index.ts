/**
 * Gantry Synthesis API - Main Entry Point
 *
 * Synthesizes highway toll-gantry transaction records in three stages:
 * generation (field-group decomposition with rule fallback, scheduled
 * toward a target distribution), curation (filter, label enhancement,
 * optional verifiers, reweighting) and evaluation (direct and indirect).
 *
 * This module exports:
 * - All data schemas (Zod validated)
 * - Pool loaders and the run report repository
 * - The synthesis service and every pipeline component
 */

// Re-export all schemas
export * from "./schemas/index.js";

// Re-export all storage
export * from "./storage/index.js";

// The service most callers need
export { SynthesisService, createSynthesisService, buildSeedPool } from "./services/pipeline/index.js";

// Everything else, namespaced
export * from "./services/index.js";
