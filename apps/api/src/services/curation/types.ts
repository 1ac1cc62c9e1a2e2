/**
 * Curation Layer - Type Definitions
 */

import type { SynthRecord } from "../../schemas/index.js";

// =============================================================================
// Filter
// =============================================================================

export const FILTER_CHECKS = ["completeness", "format", "temporal", "fee", "axle_weight"] as const;
export type FilterCheck = (typeof FILTER_CHECKS)[number];

export interface FilterEvaluation {
  /** Mean of the check scores, in [0, 1] */
  score: number;
  issues: string[];
  checks: Record<FilterCheck, number>;
}

export interface FilterConfig {
  /** Minimum score for acceptance (default: 0.8) */
  acceptThreshold?: number;
  /** Longest plausible entrance-to-transaction gap in hours (default: 6) */
  maxTravelHours?: number;
}

export interface FilterResult {
  accepted: SynthRecord[];
  rejected: SynthRecord[];
}

// =============================================================================
// Enhancer
// =============================================================================

export interface EnhancerConfig {
  maxTravelHours?: number;
  /** Gap used when entrance and transaction times coincide, in hours */
  minTravelHours?: number;
}

// =============================================================================
// Auxiliary verification
// =============================================================================

/**
 * Optional second opinion on curated records. May correct fields (with a
 * correction_log entry) or add validation issues; must return one record
 * per input record, in order.
 */
export interface AuxiliaryVerifier {
  readonly name: string;
  verify(records: readonly SynthRecord[]): Promise<SynthRecord[]>;
}

// =============================================================================
// Reweighting
// =============================================================================

export type QualityTier = "high" | "medium" | "low";

export interface ReweighterConfig {
  /** Similarity used when a record's category has no statistics */
  neutralSimilarity?: number;
  /** Weights strictly above this are "high" (default: 1.2) */
  highThreshold?: number;
  /** Weights below this are "low" (default: 0.8) */
  lowThreshold?: number;
  /** Quality feedback passes after the static weight; 0 turns them off (default: 0) */
  iterations?: number;
  /** Per-pass step: records above 0.7 quality gain it, below 0.5 lose it (default: 0.1) */
  learningRate?: number;
  /** Bounds applied after every feedback pass (default: [0.1, 3]) */
  weightRange?: { min: number; max: number };
}

export interface QualityTiers<T> {
  high: T[];
  medium: T[];
  low: T[];
}

export interface ReweightResult {
  /** Input order, with quality_weight set */
  samples: SynthRecord[];
  /** Descending by weight, ties in input order */
  weighted: SynthRecord[];
  weights: number[];
  tiers: QualityTiers<SynthRecord>;
}
