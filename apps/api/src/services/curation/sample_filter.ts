/**
 * Sample Filter
 *
 * Scores a decomposed record against the domain rules. Five independent
 * checks each yield a partial score in [0, 1] and the record's score is
 * their mean, so one minor slip costs a fraction of the score rather than
 * all of it. Rejections are ordinary results carrying their issues, never
 * exceptions.
 *
 * Checks:
 * - completeness: share of required fields present
 * - format: share of present fields whose value has the right shape
 * - temporal: entrance before transaction, within the travel-time bound
 * - fee: non-negative, discount within the fee, fee in line with mileage
 * - axle_weight: axle count matches the vehicle type, weight is believable
 *
 * This component does NOT:
 * - Repair records (the enhancer does)
 * - Retry rejected records (the orchestrator decides)
 */

import type { z } from "zod";
import {
  FIELD_SCHEMAS,
  GANTRY_FIELD_NAMES,
  type GantryFieldName,
  type RecordFields,
  type SynthRecord,
} from "../../schemas/index.js";
import {
  DATA_ERROR_OVERLOAD_FACTOR,
  DEFAULT_ACCEPT_THRESHOLD,
  PARTIAL_SCORES,
  TRAVEL_TIME_HOURS,
} from "../domain/constants.js";
import { calculateExpectedFee } from "../domain/tariff.js";
import { HOUR_MS, parseTimestamp } from "../domain/time.js";
import {
  categoryForVehicleType,
  expectedAxlesFor,
  isKnownAxleCount,
  toNumber,
  weightLimitFor,
} from "../domain/vehicle.js";
import { mean } from "../statistics/math.js";
import { predictFee, type LearnedStatistics } from "../statistics/index.js";
import { withMeta } from "./record_utils.js";
import type { FilterCheck, FilterConfig, FilterEvaluation, FilterResult } from "./types.js";

const DEFAULT_CONFIG: Required<FilterConfig> = {
  acceptThreshold: DEFAULT_ACCEPT_THRESHOLD,
  maxTravelHours: TRAVEL_TIME_HOURS.max,
};

/** Band around the regression prediction, in residual standard deviations */
const REGRESSION_BAND_SIGMAS = 3;
/** Smallest band around a prediction, as a share of the prediction */
const REGRESSION_BAND_FLOOR = 0.2;
/** Band around the closed-form tariff when no regression is available */
const TARIFF_BAND = 0.5;

const FORMATS: Readonly<Record<GantryFieldName, z.ZodTypeAny>> = FIELD_SCHEMAS;

interface CheckResult {
  score: number;
  issues: string[];
}

function isSynthRecord(value: SynthRecord | Readonly<RecordFields>): value is SynthRecord {
  return "meta" in value && "fields" in value;
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && !(typeof value === "string" && value.trim() === "");
}

export class SampleFilter {
  private readonly config: Required<FilterConfig>;

  constructor(private readonly stats?: LearnedStatistics, config: FilterConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get acceptThreshold(): number {
    return this.config.acceptThreshold;
  }

  evaluate(input: SynthRecord | Readonly<RecordFields>): FilterEvaluation {
    const fields = isSynthRecord(input) ? input.fields : input;
    const results: Record<FilterCheck, CheckResult> = {
      completeness: this.checkCompleteness(fields),
      format: this.checkFormat(fields),
      temporal: this.checkTemporal(fields),
      fee: this.checkFee(fields),
      axle_weight: this.checkAxleWeight(fields),
    };

    const checks: Record<FilterCheck, number> = {
      completeness: results.completeness.score,
      format: results.format.score,
      temporal: results.temporal.score,
      fee: results.fee.score,
      axle_weight: results.axle_weight.score,
    };
    return {
      score: mean(Object.values(checks)),
      issues: Object.values(results).flatMap((r) => r.issues),
      checks,
    };
  }

  accepts(evaluation: FilterEvaluation): boolean {
    return evaluation.score >= this.config.acceptThreshold;
  }

  /**
   * Attach a fresh score and issue list to the record's metadata.
   */
  score(record: SynthRecord): { record: SynthRecord; evaluation: FilterEvaluation } {
    const evaluation = this.evaluate(record.fields);
    return {
      record: withMeta(record, { quality_score: evaluation.score, validation_issues: evaluation.issues }),
      evaluation,
    };
  }

  filter(records: readonly SynthRecord[]): FilterResult {
    const accepted: SynthRecord[] = [];
    const rejected: SynthRecord[] = [];
    for (const original of records) {
      const { record, evaluation } = this.score(original);
      (this.accepts(evaluation) ? accepted : rejected).push(record);
    }
    return { accepted, rejected };
  }

  // ===========================================================================
  // Checks
  // ===========================================================================

  private checkCompleteness(fields: Readonly<RecordFields>): CheckResult {
    const missing = GANTRY_FIELD_NAMES.filter((name) => !isPresent(fields[name]));
    return {
      score: 1 - missing.length / GANTRY_FIELD_NAMES.length,
      issues: missing.length > 0 ? [`missing fields: ${missing.join(", ")}`] : [],
    };
  }

  private checkFormat(fields: Readonly<RecordFields>): CheckResult {
    const present = GANTRY_FIELD_NAMES.filter((name) => isPresent(fields[name]));
    if (present.length === 0) return { score: 0, issues: ["no fields to check"] };

    const invalid = present.filter((name) => !FORMATS[name].safeParse(fields[name]).success);
    return {
      score: 1 - invalid.length / present.length,
      issues: invalid.length > 0 ? [`invalid format: ${invalid.join(", ")}`] : [],
    };
  }

  private checkTemporal(fields: Readonly<RecordFields>): CheckResult {
    const transaction = parseTimestamp(fields.transaction_time);
    const entrance = parseTimestamp(fields.entrance_time);
    if (transaction === null || entrance === null) {
      return { score: PARTIAL_SCORES.timeUnparseable, issues: ["unparseable entrance or transaction time"] };
    }
    if (entrance >= transaction) {
      return { score: PARTIAL_SCORES.timeOrderError, issues: ["entrance_time is not before transaction_time"] };
    }
    const hours = (transaction - entrance) / HOUR_MS;
    if (hours > this.config.maxTravelHours) {
      return {
        score: PARTIAL_SCORES.timeTooLong,
        issues: [`travel time ${hours.toFixed(2)}h exceeds ${this.config.maxTravelHours}h`],
      };
    }
    return { score: 1, issues: [] };
  }

  private checkFee(fields: Readonly<RecordFields>): CheckResult {
    const pay = toNumber(fields.pay_fee);
    const discount = toNumber(fields.discount_fee) ?? 0;
    const mileage = toNumber(fields.fee_mileage);
    if (pay === null || mileage === null) {
      return { score: 0, issues: ["pay_fee or fee_mileage unreadable"] };
    }
    if (pay < 0 || discount < 0) {
      return { score: PARTIAL_SCORES.feeNegative, issues: ["negative fee"] };
    }

    let score = 1;
    const issues: string[] = [];
    if (discount > pay) {
      score *= PARTIAL_SCORES.discountExceedsFee;
      issues.push("discount_fee exceeds pay_fee");
    }

    const band = this.feeBand(fields, mileage);
    if (band && Math.abs(pay - band.expected) > band.tolerance) {
      score *= PARTIAL_SCORES.feeOutOfBand;
      issues.push(`pay_fee ${pay} outside ${Math.round(band.expected)}±${Math.round(band.tolerance)}`);
    }
    return { score, issues };
  }

  /**
   * Expected fee and tolerance for a mileage: the category regression when
   * one was learned, the closed-form tariff otherwise.
   */
  private feeBand(fields: Readonly<RecordFields>, mileage: number): { expected: number; tolerance: number } | null {
    const category = categoryForVehicleType(fields.vehicle_type);
    const prediction = predictFee(this.stats, category, mileage);
    if (prediction) {
      return {
        expected: prediction.predicted,
        tolerance: Math.max(
          REGRESSION_BAND_SIGMAS * prediction.residualStd,
          REGRESSION_BAND_FLOOR * Math.abs(prediction.predicted)
        ),
      };
    }
    const expected = calculateExpectedFee(mileage, fields.vehicle_type);
    return expected > 0 ? { expected, tolerance: TARIFF_BAND * expected } : null;
  }

  private checkAxleWeight(fields: Readonly<RecordFields>): CheckResult {
    if (!isKnownAxleCount(fields.axle_count)) {
      return { score: PARTIAL_SCORES.unknownAxleCount, issues: [`unknown axle count ${String(fields.axle_count)}`] };
    }

    let score = 1;
    const issues: string[] = [];
    const axles = String(toNumber(fields.axle_count));
    const category = categoryForVehicleType(fields.vehicle_type);
    const expected = expectedAxlesFor(fields.vehicle_type);

    if (category === "passenger" && axles !== "2") {
      score *= PARTIAL_SCORES.passengerAxleMismatch;
      issues.push(`passenger vehicle with ${axles} axles`);
    } else if (category !== "passenger" && expected !== undefined && axles !== expected) {
      score *= PARTIAL_SCORES.truckAxleMismatch;
      issues.push(`vehicle_type ${String(fields.vehicle_type)} expects ${expected} axles, got ${axles}`);
    }

    const weight = toNumber(fields.total_weight);
    if (weight !== null && weight > DATA_ERROR_OVERLOAD_FACTOR * weightLimitFor(axles)) {
      score *= PARTIAL_SCORES.weightDataError;
      issues.push(`total_weight ${weight} beyond ${DATA_ERROR_OVERLOAD_FACTOR}x the ${axles}-axle limit`);
    }
    return { score, issues };
  }
}
