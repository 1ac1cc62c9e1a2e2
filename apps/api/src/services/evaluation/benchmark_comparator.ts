/**
 * Benchmark Comparator
 *
 * Measures how close a record set is to the benchmark pool. Four
 * sub-scores, each in [0, 1]:
 * - distribution: 1/(1+KL) per categorical field, averaged
 * - statistical: 1 - |Δmean|/σ_ref and 1 - |Δstd|/σ_ref per numeric field,
 *   floored at 0 and averaged
 * - hourly: 1 - total variation distance of hour-of-day histograms
 * - correlation: 1 - |Δr| of fee vs. mileage per vehicle category present
 *   on both sides
 *
 * Reference summaries are computed once; the benchmark is never modified.
 */

import type { BenchmarkBreakdown, RecordFields } from "../../schemas/index.js";
import { VEHICLE_CATEGORIES } from "../domain/constants.js";
import { hourOf } from "../domain/time.js";
import { toNumber } from "../domain/vehicle.js";
import { ConfigurationError } from "../errors.js";
import {
  clamp01,
  computeLearnedStatistics,
  countBy,
  klDivergence,
  mean,
  NUMERIC_FIELDS,
  std,
  toDistribution,
  totalVariation,
  type LearnedStatistics,
  type NumericField,
} from "../statistics/index.js";
import { BENCHMARK_WEIGHTS, type CategoricalField, type ComparatorConfig } from "./types.js";

const DEFAULT_CONFIG: Required<ComparatorConfig> = {
  categoricalFields: ["vehicle_type", "section_id", "media_type"],
  numericFields: NUMERIC_FIELDS,
  smoothing: 1e-6,
};

const HOURS = Array.from({ length: 24 }, (_, h) => String(h));

export interface BenchmarkScore extends BenchmarkBreakdown {
  overall: number;
}

interface ReferenceSummary {
  categorical: Map<CategoricalField, Map<string, number>>;
  numeric: Map<NumericField, { mean: number; std: number }>;
  hours: number[];
  stats: LearnedStatistics;
}

function numericColumn(rows: readonly Readonly<RecordFields>[], field: NumericField): number[] {
  const out: number[] = [];
  for (const row of rows) {
    const v = toNumber(row[field]);
    if (v !== null) out.push(v);
  }
  return out;
}

function hourKey(row: Readonly<RecordFields>): string | undefined {
  const hour = hourOf(row.transaction_time);
  return hour === null ? undefined : String(hour);
}

function valueKey(row: Readonly<RecordFields>, field: CategoricalField): string | undefined {
  const value = row[field];
  return value === undefined ? undefined : String(value);
}

export class BenchmarkComparator {
  private readonly config: Required<ComparatorConfig>;
  private readonly reference: ReferenceSummary;

  constructor(benchmark: readonly Readonly<RecordFields>[], config: ComparatorConfig = {}) {
    if (benchmark.length === 0) {
      throw new ConfigurationError("benchmark pool is empty");
    }
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.reference = this.summarize(benchmark);
  }

  compare(rows: readonly Readonly<RecordFields>[]): BenchmarkScore {
    if (rows.length === 0) {
      return { distribution: 0, statistical: 0, hourly: 0, correlation: 0, overall: 0 };
    }

    const breakdown: BenchmarkBreakdown = {
      distribution: this.distributionSimilarity(rows),
      statistical: this.statisticalSimilarity(rows),
      hourly: this.hourlySimilarity(rows),
      correlation: this.correlationSimilarity(rows),
    };
    const overall =
      BENCHMARK_WEIGHTS.distribution * breakdown.distribution +
      BENCHMARK_WEIGHTS.statistical * breakdown.statistical +
      BENCHMARK_WEIGHTS.hourly * breakdown.hourly +
      BENCHMARK_WEIGHTS.correlation * breakdown.correlation;
    return { ...breakdown, overall: clamp01(overall) };
  }

  private summarize(benchmark: readonly Readonly<RecordFields>[]): ReferenceSummary {
    const categorical = new Map<CategoricalField, Map<string, number>>();
    for (const field of this.config.categoricalFields) {
      categorical.set(field, countBy(benchmark, (row) => valueKey(row, field)));
    }
    const numeric = new Map<NumericField, { mean: number; std: number }>();
    for (const field of this.config.numericFields) {
      const column = numericColumn(benchmark, field);
      numeric.set(field, { mean: mean(column), std: std(column) });
    }
    return {
      categorical,
      numeric,
      hours: toDistribution(countBy(benchmark, hourKey), HOURS),
      stats: computeLearnedStatistics(benchmark),
    };
  }

  private distributionSimilarity(rows: readonly Readonly<RecordFields>[]): number {
    const scores = this.config.categoricalFields.map((field) => {
      const generated = countBy(rows, (row) => valueKey(row, field));
      const reference = this.reference.categorical.get(field) ?? new Map<string, number>();
      const support = [...new Set([...generated.keys(), ...reference.keys()])].sort();
      if (support.length === 0) return 0;
      const p = toDistribution(generated, support, this.config.smoothing);
      const q = toDistribution(reference, support, this.config.smoothing);
      return 1 / (1 + klDivergence(p, q));
    });
    return clamp01(mean(scores));
  }

  private statisticalSimilarity(rows: readonly Readonly<RecordFields>[]): number {
    const scores = this.config.numericFields.map((field) => {
      const column = numericColumn(rows, field);
      const ref = this.reference.numeric.get(field);
      if (column.length === 0 || !ref) return 0;
      const scale = ref.std > 0 ? ref.std : Math.max(1, Math.abs(ref.mean));
      const meanScore = Math.max(0, 1 - Math.abs(mean(column) - ref.mean) / scale);
      const stdScore = Math.max(0, 1 - Math.abs(std(column) - ref.std) / scale);
      return (meanScore + stdScore) / 2;
    });
    return clamp01(mean(scores));
  }

  private hourlySimilarity(rows: readonly Readonly<RecordFields>[]): number {
    const generated = toDistribution(countBy(rows, hourKey), HOURS);
    if (generated.every((p) => p === 0)) return 0;
    return clamp01(1 - totalVariation(generated, this.reference.hours));
  }

  private correlationSimilarity(rows: readonly Readonly<RecordFields>[]): number {
    const generated = computeLearnedStatistics(rows);
    const scores: number[] = [];
    for (const category of VEHICLE_CATEGORIES) {
      const gen = generated.categories[category];
      const ref = this.reference.stats.categories[category];
      if (!gen || !ref || gen.sampleCount < 2) continue;
      scores.push(Math.max(0, 1 - Math.abs(gen.feeMileageCorrelation - ref.feeMileageCorrelation)));
    }
    return scores.length > 0 ? clamp01(mean(scores)) : 0;
  }
}
