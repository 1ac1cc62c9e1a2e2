/**
 * Learned Statistics
 *
 * Per vehicle category summaries of the numeric fields plus the fee–mileage
 * relation, computed once from the training pool and frozen. The filter,
 * the fee fallback, the reweighter and the evaluators read them; nothing
 * writes them after computation.
 */

import type { RecordFields } from "../../schemas/index.js";
import { VEHICLE_CATEGORIES, type VehicleCategory } from "../domain/constants.js";
import { categoryForVehicleType, toNumber } from "../domain/vehicle.js";
import { correlation, mean, std } from "./math.js";

export const NUMERIC_FIELDS = ["pay_fee", "fee_mileage", "total_weight"] as const;
export type NumericField = (typeof NUMERIC_FIELDS)[number];

/** Below this |r| the fee–mileage regression is not trusted */
export const MIN_USEFUL_CORRELATION = 0.3;
const MIN_REGRESSION_SAMPLES = 3;

export interface FieldStats {
  mean: number;
  std: number;
  min: number;
  max: number;
  count: number;
}

export interface FeeRegression {
  slope: number;
  intercept: number;
  residualStd: number;
}

export interface CategoryStats {
  fields: Readonly<Record<NumericField, FieldStats>>;
  feeMileageCorrelation: number;
  /** Present only when the correlation is strong enough to predict fees */
  feeRegression?: FeeRegression;
  sampleCount: number;
}

export interface LearnedStatistics {
  readonly categories: Readonly<Partial<Record<VehicleCategory, CategoryStats>>>;
  readonly sampleCount: number;
}

function summarize(values: readonly number[]): FieldStats {
  if (values.length === 0) return { mean: 0, std: 0, min: 0, max: 0, count: 0 };
  let min = values[0];
  let max = values[0];
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return { mean: mean(values), std: std(values), min, max, count: values.length };
}

function categoryStats(rows: readonly Readonly<RecordFields>[]): CategoryStats {
  const columns: Record<NumericField, number[]> = { pay_fee: [], fee_mileage: [], total_weight: [] };
  const fees: number[] = [];
  const mileages: number[] = [];

  for (const row of rows) {
    for (const field of NUMERIC_FIELDS) {
      const v = toNumber(row[field]);
      if (v !== null) columns[field].push(v);
    }
    const fee = toNumber(row.pay_fee);
    const mileage = toNumber(row.fee_mileage);
    if (fee !== null && mileage !== null) {
      fees.push(fee);
      mileages.push(mileage);
    }
  }

  const fields = {
    pay_fee: summarize(columns.pay_fee),
    fee_mileage: summarize(columns.fee_mileage),
    total_weight: summarize(columns.total_weight),
  };
  const r = correlation(mileages, fees);
  const stats: CategoryStats = { fields, feeMileageCorrelation: r, sampleCount: rows.length };

  if (Math.abs(r) > MIN_USEFUL_CORRELATION && fees.length >= MIN_REGRESSION_SAMPLES) {
    const feeStd = std(fees);
    const mileageStd = std(mileages);
    if (mileageStd > 0) {
      const slope = (r * feeStd) / mileageStd;
      stats.feeRegression = {
        slope,
        intercept: mean(fees) - slope * mean(mileages),
        residualStd: feeStd * Math.sqrt(Math.max(0, 1 - r * r)),
      };
    }
  }
  return stats;
}

/**
 * Compute frozen statistics grouped by the category implied by vehicle_type.
 */
export function computeLearnedStatistics(rows: readonly Readonly<RecordFields>[]): LearnedStatistics {
  const byCategory = new Map<VehicleCategory, Readonly<RecordFields>[]>();
  for (const row of rows) {
    const category = categoryForVehicleType(row.vehicle_type);
    const bucket = byCategory.get(category) ?? [];
    bucket.push(row);
    byCategory.set(category, bucket);
  }

  const categories: Partial<Record<VehicleCategory, CategoryStats>> = {};
  for (const category of VEHICLE_CATEGORIES) {
    const bucket = byCategory.get(category);
    if (bucket && bucket.length > 0) {
      categories[category] = deepFreeze(categoryStats(bucket));
    }
  }

  return Object.freeze({ categories: Object.freeze(categories), sampleCount: rows.length });
}

/**
 * Fee predicted from mileage by the category regression, or null when the
 * category has no trusted regression.
 */
export function predictFee(
  stats: LearnedStatistics | undefined,
  category: VehicleCategory,
  mileageMeters: number
): { predicted: number; residualStd: number } | null {
  const regression = stats?.categories[category]?.feeRegression;
  if (!regression) return null;
  return {
    predicted: regression.intercept + regression.slope * mileageMeters,
    residualStd: regression.residualStd,
  };
}

function deepFreeze<T extends object>(value: T): T {
  for (const inner of Object.values(value)) {
    if (typeof inner === "object" && inner !== null && !Object.isFrozen(inner)) {
      deepFreeze(inner);
    }
  }
  return Object.freeze(value);
}
