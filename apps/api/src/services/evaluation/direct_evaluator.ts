/**
 * Direct Evaluator
 *
 * Scores the curated dataset on its own terms.
 *
 * faithfulness = mean(constraint pass rate, benchmark similarity)
 *   The pass rate is recomputed with a fresh filter evaluation plus the
 *   gantry→section check and, when section dates are known, the
 *   section→date check; cached filter scores are not reused.
 *
 * diversity = mean(unique-value ratio, pairwise dissimilarity, coverage)
 *   Pairwise dissimilarity looks at every pair, or at `maxPairs` seeded
 *   random pairs when there are more. Coverage is the share of the target
 *   support (values with a positive target share) that appears at all,
 *   against the run's target where one is given.
 *
 * overall = weighted mean of the two, equal weights unless configured.
 * An empty input yields zeros with `empty: true`.
 */

import type { DirectEvaluation, RecordFields, SynthRecord, TargetDistribution } from "../../schemas/index.js";
import type { GantrySectionMap } from "../domain/gantry_sections.js";
import type { SectionDateMap } from "../domain/section_dates.js";
import { deriveLabels } from "../domain/labels.js";
import { createRng } from "../domain/rng.js";
import type { SampleFilter } from "../curation/sample_filter.js";
import { DEFAULT_TARGET_DISTRIBUTION } from "../generation/scheduler.js";
import { clamp01, mean } from "../statistics/math.js";
import type { BenchmarkComparator } from "./benchmark_comparator.js";
import type { DirectEvaluatorConfig } from "./types.js";

const DEFAULT_CONFIG: Required<DirectEvaluatorConfig> = {
  acceptThreshold: 0.8,
  maxPairs: 500,
  seed: "direct-evaluator",
  weights: { faithfulness: 0.5, diversity: 0.5 },
  target: DEFAULT_TARGET_DISTRIBUTION,
};

/** Fields whose variety the diversity scores look at */
export const DIVERSITY_FIELDS = [
  "gantry_id",
  "vehicle_type",
  "axle_count",
  "total_weight",
  "media_type",
  "pay_fee",
  "fee_mileage",
  "transaction_time",
] as const satisfies readonly (keyof RecordFields)[];

export interface DirectEvaluatorDeps {
  filter: SampleFilter;
  comparator: BenchmarkComparator;
  sections: GantrySectionMap;
  sectionDates?: SectionDateMap;
}

export function emptyDirectEvaluation(): DirectEvaluation {
  return {
    faithfulness: 0,
    diversity: 0,
    overall: 0,
    empty: true,
    details: {
      constraint_pass_rate: 0,
      benchmark_similarity: 0,
      benchmark: { distribution: 0, statistical: 0, hourly: 0, correlation: 0 },
      unique_ratio: 0,
      pairwise_dissimilarity: 0,
      coverage: 0,
    },
  };
}

export class DirectEvaluator {
  private readonly config: Required<DirectEvaluatorConfig>;

  constructor(private readonly deps: DirectEvaluatorDeps, config: DirectEvaluatorConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  evaluate(records: readonly SynthRecord[], target?: TargetDistribution): DirectEvaluation {
    if (records.length === 0) return emptyDirectEvaluation();
    const rows = records.map((r) => r.fields);

    const passRate = this.constraintPassRate(rows);
    const { overall: benchmarkSimilarity, ...benchmark } = this.deps.comparator.compare(rows);
    const faithfulness = clamp01((passRate + benchmarkSimilarity) / 2);

    const uniqueRatio = this.uniqueRatio(rows);
    const dissimilarity = this.pairwiseDissimilarity(rows);
    const coverage = this.coverage(rows, target ?? this.config.target);
    const diversity = clamp01((uniqueRatio + dissimilarity + coverage) / 3);

    const { faithfulness: wf, diversity: wd } = this.config.weights;
    const overall = wf + wd > 0 ? clamp01((wf * faithfulness + wd * diversity) / (wf + wd)) : 0;

    return {
      faithfulness,
      diversity,
      overall,
      empty: false,
      details: {
        constraint_pass_rate: passRate,
        benchmark_similarity: benchmarkSimilarity,
        benchmark,
        unique_ratio: uniqueRatio,
        pairwise_dissimilarity: dissimilarity,
        coverage,
      },
    };
  }

  private constraintPassRate(rows: readonly Readonly<RecordFields>[]): number {
    const passed = rows.filter(
      (row) =>
        this.deps.filter.evaluate(row).score >= this.config.acceptThreshold &&
        this.deps.sections.isConsistent(row.gantry_id, row.section_id, row.section_name) &&
        (this.deps.sectionDates?.isConsistent(row.section_id, row.transaction_time) ?? true)
    ).length;
    return passed / rows.length;
  }

  private uniqueRatio(rows: readonly Readonly<RecordFields>[]): number {
    return clamp01(
      mean(DIVERSITY_FIELDS.map((field) => new Set(rows.map((row) => String(row[field]))).size / rows.length))
    );
  }

  private pairwiseDissimilarity(rows: readonly Readonly<RecordFields>[]): number {
    const n = rows.length;
    if (n < 2) return 0;

    const pairs: Array<[number, number]> = [];
    const total = (n * (n - 1)) / 2;
    if (total <= this.config.maxPairs) {
      for (let i = 0; i < n; i++) for (let j = i + 1; j < n; j++) pairs.push([i, j]);
    } else {
      const rng = createRng(this.config.seed);
      while (pairs.length < this.config.maxPairs) {
        const i = rng.int(0, n - 1);
        const j = rng.int(0, n - 1);
        if (i !== j) pairs.push([i, j]);
      }
    }

    const distances = pairs.map(([i, j]) => {
      const differing = DIVERSITY_FIELDS.filter((field) => rows[i][field] !== rows[j][field]).length;
      return differing / DIVERSITY_FIELDS.length;
    });
    return clamp01(mean(distances));
  }

  private coverage(rows: readonly Readonly<RecordFields>[], target: TargetDistribution): number {
    const labels = rows.map((row) => deriveLabels(row));
    const dims = [
      { shares: target.vehicle ?? DEFAULT_TARGET_DISTRIBUTION.vehicle, seen: new Set<string>(labels.map((l) => l.vehicle_category)) },
      { shares: target.time ?? DEFAULT_TARGET_DISTRIBUTION.time, seen: new Set<string>(labels.map((l) => l.time_period)) },
      { shares: target.scenario ?? DEFAULT_TARGET_DISTRIBUTION.scenario, seen: new Set<string>(labels.map((l) => l.scenario)) },
    ];
    return clamp01(
      mean(
        dims.map(({ shares, seen }) => {
          const support = Object.entries(shares)
            .filter(([, share]) => share !== undefined && share > 0)
            .map(([value]) => value);
          if (support.length === 0) return 0;
          return support.filter((value) => seen.has(value)).length / support.length;
        })
      )
    );
  }
}
