/**
 * Reweighter
 *
 * weight = quality_score × (0.5 + mean similarity over numeric fields)
 *
 * where a field's similarity is 1 / (1 + z) and z is its distance from the
 * category mean in category standard deviations. Weights are non-negative
 * and not normalised. The same records and statistics always give the same
 * weights.
 *
 * With `iterations` set, each pass then multiplies a weight by
 * (1 + learningRate) when quality is above 0.7, by (1 - learningRate) when
 * it is below 0.5, and clips it to `weightRange`.
 *
 * Tiers: high above 1.2, medium from 0.8 up to and including 1.2, low below 0.8.
 */

import type { SynthRecord } from "../../schemas/index.js";
import { QUALITY_TIER_THRESHOLDS } from "../domain/constants.js";
import { categoryForVehicleType, toNumber } from "../domain/vehicle.js";
import { mean } from "../statistics/math.js";
import { NUMERIC_FIELDS, type LearnedStatistics } from "../statistics/index.js";
import { withMeta } from "./record_utils.js";
import type { QualityTier, QualityTiers, ReweighterConfig, ReweightResult } from "./types.js";

const DEFAULT_CONFIG: Required<ReweighterConfig> = {
  neutralSimilarity: 0.5,
  highThreshold: QUALITY_TIER_THRESHOLDS.high,
  lowThreshold: QUALITY_TIER_THRESHOLDS.low,
  iterations: 0,
  learningRate: 0.1,
  weightRange: { min: 0.1, max: 3 },
};

const BASE_WEIGHT = 0.5;
const FEEDBACK_QUALITY = { high: 0.7, low: 0.5 } as const;

export class Reweighter {
  private readonly config: Required<ReweighterConfig>;

  constructor(config: ReweighterConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  weight(records: readonly SynthRecord[], stats?: LearnedStatistics): number[] {
    return records.map((record) => {
      const quality = Math.max(0, record.meta.quality_score ?? 0);
      return this.feedback(quality * (BASE_WEIGHT + this.similarity(record, stats)), quality);
    });
  }

  private feedback(weight: number, quality: number): number {
    const { iterations, learningRate, weightRange } = this.config;
    let current = weight;
    for (let i = 0; i < iterations; i++) {
      if (quality > FEEDBACK_QUALITY.high) current *= 1 + learningRate;
      else if (quality < FEEDBACK_QUALITY.low) current *= 1 - learningRate;
      current = Math.min(weightRange.max, Math.max(weightRange.min, current));
    }
    return current;
  }

  /**
   * Mean 1/(1+z) over the numeric fields the record has; the neutral value
   * when the category has no statistics or the record has no numeric field.
   */
  similarity(record: SynthRecord, stats?: LearnedStatistics): number {
    const category = stats?.categories[categoryForVehicleType(record.fields.vehicle_type)];
    if (!category) return this.config.neutralSimilarity;

    const scores: number[] = [];
    for (const field of NUMERIC_FIELDS) {
      const value = toNumber(record.fields[field]);
      if (value === null) continue;
      const ref = category.fields[field];
      if (ref.count === 0) continue;
      const distance = Math.abs(value - ref.mean);
      const z = ref.std > 0 ? distance / ref.std : distance === 0 ? 0 : Number.POSITIVE_INFINITY;
      scores.push(1 / (1 + z));
    }
    return scores.length > 0 ? mean(scores) : this.config.neutralSimilarity;
  }

  tier(weight: number): QualityTier {
    if (weight > this.config.highThreshold) return "high";
    if (weight >= this.config.lowThreshold) return "medium";
    return "low";
  }

  /** Descending by weight; equal weights keep input order */
  rank<T>(items: readonly T[], weights: readonly number[]): T[] {
    return items
      .map((item, index) => ({ item, index, weight: weights[index] ?? 0 }))
      .sort((a, b) => b.weight - a.weight || a.index - b.index)
      .map((entry) => entry.item);
  }

  apply(records: readonly SynthRecord[], stats?: LearnedStatistics): ReweightResult {
    const weights = this.weight(records, stats);
    const samples = records.map((record, i) => withMeta(record, { quality_weight: weights[i] }));
    const weighted = this.rank(samples, weights);

    const tiers: QualityTiers<SynthRecord> = { high: [], medium: [], low: [] };
    weighted.forEach((record) => {
      tiers[this.tier(record.meta.quality_weight ?? 0)].push(record);
    });
    return { samples, weighted, weights, tiers };
  }
}
