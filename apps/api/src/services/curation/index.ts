/**
 * Curation Layer - Main Export
 *
 * This layer:
 * - Scores records and partitions them (filter)
 * - Derives labels and repairs time/section inconsistencies (enhancer)
 * - Runs optional auxiliary verifiers
 * - Weights, ranks and tiers the curated set (reweighter)
 *
 * This layer does NOT:
 * - Generate or regenerate records
 * - Compare the dataset with the benchmark pool
 */

export { SampleFilter } from "./sample_filter.js";
export { LabelEnhancer, deriveLabels } from "./label_enhancer.js";
export {
  VehicleConsistencyVerifier,
  FeeReasonablenessVerifier,
  StatisticalReferenceVerifier,
  ReviewCallbackVerifier,
  composeVerifiers,
  runVerifier,
  type ReviewCallback,
  type StatisticalReferenceOptions,
} from "./auxiliary_verifier.js";
export { Reweighter } from "./reweighter.js";
export { withFields, withMeta, addIssues } from "./record_utils.js";

export { FILTER_CHECKS } from "./types.js";
export type {
  FilterCheck,
  FilterConfig,
  FilterEvaluation,
  FilterResult,
  EnhancerConfig,
  AuxiliaryVerifier,
  QualityTier,
  QualityTiers,
  ReweighterConfig,
  ReweightResult,
} from "./types.js";
