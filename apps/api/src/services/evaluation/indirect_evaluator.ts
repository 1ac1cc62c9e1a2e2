/**
 * Indirect Evaluator
 *
 * Scores the dataset as a stand-in for real data:
 * - benchmark_similarity: the comparator's overall score, reported on its own
 * - open_evaluation: proxy tasks run against each record's own fields and
 *   the static reference tables
 *     anomaly_detection       precision of a weight-over-limit detector
 *                             against the scenario label
 *     fee_prediction          1 - normalised MAE of the tariff estimator
 *     vehicle_classification  axle count and weight agree with vehicle_type
 *     time_consistency        entrance before transaction, within bound
 * - overall: mean(benchmark_similarity, mean of the task scores)
 *
 * No task needs an auxiliary verifier. Empty input yields zeros.
 */

import type { IndirectEvaluation, RecordFields, SynthRecord } from "../../schemas/index.js";
import {
  DATA_ERROR_OVERLOAD_FACTOR,
  PASSENGER_WEIGHT_RANGE,
  TRAVEL_TIME_HOURS,
} from "../domain/constants.js";
import { deriveLabels, isOverweight } from "../domain/labels.js";
import { calculateExpectedFee } from "../domain/tariff.js";
import { HOUR_MS, parseTimestamp } from "../domain/time.js";
import { categoryForVehicleType, expectedAxlesFor, toNumber, weightLimitFor } from "../domain/vehicle.js";
import { clamp01, mean } from "../statistics/math.js";
import type { BenchmarkComparator } from "./benchmark_comparator.js";
import {
  OPEN_EVALUATION_TASKS,
  type IndirectEvaluatorConfig,
  type OpenEvaluationTask,
} from "./types.js";

const DEFAULT_CONFIG: Required<IndirectEvaluatorConfig> = {
  maxTravelHours: TRAVEL_TIME_HOURS.max,
};

type Rows = readonly Readonly<RecordFields>[];

export function emptyIndirectEvaluation(): IndirectEvaluation {
  const open_evaluation: Record<string, number> = {};
  for (const task of OPEN_EVALUATION_TASKS) open_evaluation[task] = 0;
  return { benchmark_similarity: 0, open_evaluation, overall: 0, empty: true };
}

export class IndirectEvaluator {
  private readonly config: Required<IndirectEvaluatorConfig>;
  private readonly tasks: Record<OpenEvaluationTask, (rows: Rows) => number>;

  constructor(private readonly comparator: BenchmarkComparator, config: IndirectEvaluatorConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.tasks = {
      anomaly_detection: (rows) => this.anomalyDetection(rows),
      fee_prediction: (rows) => this.feePrediction(rows),
      vehicle_classification: (rows) => this.vehicleClassification(rows),
      time_consistency: (rows) => this.timeConsistency(rows),
    };
  }

  evaluate(records: readonly SynthRecord[]): IndirectEvaluation {
    if (records.length === 0) return emptyIndirectEvaluation();
    const rows = records.map((r) => r.fields);

    const benchmark_similarity = this.comparator.compare(rows).overall;
    const open_evaluation: Record<string, number> = {};
    for (const task of OPEN_EVALUATION_TASKS) {
      open_evaluation[task] = clamp01(this.tasks[task](rows));
    }
    const overall = clamp01((benchmark_similarity + mean(Object.values(open_evaluation))) / 2);
    return { benchmark_similarity, open_evaluation, overall, empty: false };
  }

  /**
   * Precision of "weight above the axle limit" as a detector for records
   * labelled overloaded or anomalous. With no positive predictions the
   * detector scores 1 if there was nothing to find and 0 otherwise.
   */
  anomalyDetection(rows: Rows): number {
    let predicted = 0;
    let truePositive = 0;
    let actual = 0;
    for (const row of rows) {
      const scenario = row.scenario ?? deriveLabels(row).scenario;
      const isAnomaly = scenario !== "normal";
      if (isAnomaly) actual++;
      if (isOverweight(row)) {
        predicted++;
        if (isAnomaly) truePositive++;
      }
    }
    if (predicted === 0) return actual === 0 ? 1 : 0;
    return truePositive / predicted;
  }

  feePrediction(rows: Rows): number {
    const errors: number[] = [];
    const expectedFees: number[] = [];
    for (const row of rows) {
      const pay = toNumber(row.pay_fee);
      const mileage = toNumber(row.fee_mileage);
      if (pay === null || mileage === null) continue;
      const expected = calculateExpectedFee(mileage, row.vehicle_type);
      errors.push(Math.abs(pay - expected));
      expectedFees.push(expected);
    }
    const scale = mean(expectedFees);
    if (errors.length === 0 || scale <= 0) return 0;
    return Math.max(0, 1 - mean(errors) / scale);
  }

  vehicleClassification(rows: Rows): number {
    const consistent = rows.filter((row) => {
      const expected = expectedAxlesFor(row.vehicle_type);
      if (expected === undefined || String(toNumber(row.axle_count)) !== expected) return false;
      const weight = toNumber(row.total_weight);
      if (weight === null) return false;
      if (categoryForVehicleType(row.vehicle_type) === "passenger") {
        return weight >= PASSENGER_WEIGHT_RANGE.min && weight <= PASSENGER_WEIGHT_RANGE.max;
      }
      return weight <= DATA_ERROR_OVERLOAD_FACTOR * weightLimitFor(expected);
    }).length;
    return consistent / rows.length;
  }

  timeConsistency(rows: Rows): number {
    const consistent = rows.filter((row) => {
      const transaction = parseTimestamp(row.transaction_time);
      const entrance = parseTimestamp(row.entrance_time);
      if (transaction === null || entrance === null) return false;
      return entrance < transaction && transaction - entrance <= this.config.maxTravelHours * HOUR_MS;
    }).length;
    return consistent / rows.length;
  }
}
