/**
 * Evaluation Layer - Type Definitions
 */

import type { TargetDistribution } from "../../schemas/index.js";
import type { NumericField } from "../statistics/index.js";

export const BENCHMARK_WEIGHTS = {
  distribution: 0.35,
  statistical: 0.25,
  hourly: 0.2,
  correlation: 0.2,
} as const;

export interface ComparatorConfig {
  /** Categorical fields compared by KL divergence */
  categoricalFields?: readonly CategoricalField[];
  numericFields?: readonly NumericField[];
  /** Pseudo-count added to every histogram bin */
  smoothing?: number;
}

export type CategoricalField = "vehicle_type" | "section_id" | "media_type" | "axle_count" | "gantry_id";

export interface DirectEvaluatorConfig {
  acceptThreshold?: number;
  /** Largest number of record pairs compared for dissimilarity */
  maxPairs?: number;
  seed?: string | number;
  /** Relative weights of faithfulness and diversity in `overall` */
  weights?: { faithfulness: number; diversity: number };
  /** Target whose support the coverage score measures */
  target?: TargetDistribution;
}

export interface IndirectEvaluatorConfig {
  maxTravelHours?: number;
}

export const OPEN_EVALUATION_TASKS = [
  "anomaly_detection",
  "fee_prediction",
  "vehicle_classification",
  "time_consistency",
] as const;

export type OpenEvaluationTask = (typeof OPEN_EVALUATION_TASKS)[number];
