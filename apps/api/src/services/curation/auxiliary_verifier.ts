/**
 * Auxiliary Verifiers
 *
 * Optional second opinion on curated records. The built-ins are rule
 * stand-ins for the learned models a deployment would plug in here:
 * - VehicleConsistencyVerifier: axle count and passenger weight follow the
 *   vehicle type (classifier role)
 * - FeeReasonablenessVerifier: flags fees far from the tariff (regressor role)
 * - StatisticalReferenceVerifier: pulls numeric fields back inside the
 *   range seen in the training pool
 * - ReviewCallbackVerifier: hands records to a human-review callback
 *
 * `runVerifier` is how the pipeline calls any verifier: a verifier that
 * throws or returns the wrong number of records is ignored with a warning
 * and the unverified records are kept.
 */

import { PASSENGER_WEIGHT_RANGE } from "../domain/constants.js";
import { calculateExpectedFee } from "../domain/tariff.js";
import { categoryForVehicleType, expectedAxlesFor, toNumber } from "../domain/vehicle.js";
import { describeError } from "../errors.js";
import { NUMERIC_FIELDS, type LearnedStatistics, type NumericField } from "../statistics/index.js";
import type { CorrectionEntry, RecordFields, SynthRecord } from "../../schemas/index.js";
import { addIssues, withFields } from "./record_utils.js";
import type { AuxiliaryVerifier } from "./types.js";

export class VehicleConsistencyVerifier implements AuxiliaryVerifier {
  readonly name = "vehicle-consistency";

  async verify(records: readonly SynthRecord[]): Promise<SynthRecord[]> {
    return records.map((record) => this.check(record));
  }

  private check(record: SynthRecord): SynthRecord {
    const fields: RecordFields = { ...record.fields };
    const corrections: CorrectionEntry[] = [];

    const expected = expectedAxlesFor(fields.vehicle_type);
    if (expected !== undefined && fields.axle_count !== expected) {
      corrections.push({
        field: "axle_count",
        old: fields.axle_count ?? null,
        new: expected,
        reason: `${this.name}: vehicle_type ${String(fields.vehicle_type)} has ${expected} axles`,
      });
      fields.axle_count = expected;
    }

    const weight = toNumber(fields.total_weight);
    if (categoryForVehicleType(fields.vehicle_type) === "passenger" && weight !== null) {
      const clamped = Math.min(PASSENGER_WEIGHT_RANGE.max, Math.max(PASSENGER_WEIGHT_RANGE.min, weight));
      if (clamped !== weight) {
        corrections.push({
          field: "total_weight",
          old: fields.total_weight ?? null,
          new: String(clamped),
          reason: `${this.name}: passenger weight outside ${PASSENGER_WEIGHT_RANGE.min}-${PASSENGER_WEIGHT_RANGE.max}kg`,
        });
        fields.total_weight = String(clamped);
      }
    }

    return corrections.length > 0 ? withFields(record, fields, corrections) : record;
  }
}

export class FeeReasonablenessVerifier implements AuxiliaryVerifier {
  readonly name = "fee-reasonableness";

  /** @param tolerance allowed relative deviation from the tariff */
  constructor(private readonly tolerance = 0.5) {}

  async verify(records: readonly SynthRecord[]): Promise<SynthRecord[]> {
    return records.map((record) => {
      const pay = toNumber(record.fields.pay_fee);
      const mileage = toNumber(record.fields.fee_mileage);
      if (pay === null || mileage === null) return record;
      const expected = calculateExpectedFee(mileage, record.fields.vehicle_type);
      if (expected <= 0) return record;
      const deviation = Math.abs(pay - expected) / expected;
      if (deviation <= this.tolerance) return record;
      return addIssues(record, [
        `${this.name}: pay_fee deviates ${Math.round(deviation * 100)}% from tariff ${expected}`,
      ]);
    });
  }
}

export interface StatisticalReferenceOptions {
  fields?: readonly NumericField[];
  /** Slack beyond the observed range, in category standard deviations */
  slackSigmas?: number;
}

export class StatisticalReferenceVerifier implements AuxiliaryVerifier {
  readonly name = "statistical-reference";
  private readonly fields: readonly NumericField[];
  private readonly slackSigmas: number;

  constructor(private readonly stats: LearnedStatistics, options: StatisticalReferenceOptions = {}) {
    this.fields = options.fields ?? NUMERIC_FIELDS;
    this.slackSigmas = options.slackSigmas ?? 3;
  }

  async verify(records: readonly SynthRecord[]): Promise<SynthRecord[]> {
    return records.map((record) => this.check(record));
  }

  private check(record: SynthRecord): SynthRecord {
    const category = this.stats.categories[categoryForVehicleType(record.fields.vehicle_type)];
    if (!category) return record;

    const fields: RecordFields = { ...record.fields };
    const corrections: CorrectionEntry[] = [];
    for (const field of this.fields) {
      const value = toNumber(fields[field]);
      const ref = category.fields[field];
      if (value === null || ref.count === 0) continue;

      const low = ref.min - this.slackSigmas * ref.std;
      const high = ref.max + this.slackSigmas * ref.std;
      const clamped = Math.round(Math.min(high, Math.max(low, value)));
      if (value >= low && value <= high) continue;

      const old = fields[field] ?? null;
      if (field === "pay_fee") fields.pay_fee = clamped;
      else fields[field] = String(clamped);
      corrections.push({
        field,
        old,
        new: field === "pay_fee" ? clamped : String(clamped),
        reason: `${this.name}: outside reference range [${Math.round(low)}, ${Math.round(high)}]`,
      });
    }
    return corrections.length > 0 ? withFields(record, fields, corrections) : record;
  }
}

export type ReviewCallback = (records: readonly SynthRecord[]) => SynthRecord[] | Promise<SynthRecord[]>;

export class ReviewCallbackVerifier implements AuxiliaryVerifier {
  readonly name: string;

  constructor(private readonly callback: ReviewCallback, name = "human-review") {
    this.name = name;
  }

  async verify(records: readonly SynthRecord[]): Promise<SynthRecord[]> {
    return this.callback(records);
  }
}

/**
 * Run verifiers one after another as a single verifier.
 */
export function composeVerifiers(...verifiers: AuxiliaryVerifier[]): AuxiliaryVerifier {
  return {
    name: verifiers.map((v) => v.name).join("+") || "none",
    async verify(records) {
      let current = [...records];
      for (const verifier of verifiers) {
        current = await runVerifier(verifier, current);
      }
      return current;
    },
  };
}

export async function runVerifier(
  verifier: AuxiliaryVerifier | undefined,
  records: readonly SynthRecord[]
): Promise<SynthRecord[]> {
  if (!verifier || records.length === 0) return [...records];
  try {
    const verified = await verifier.verify(records);
    if (verified.length !== records.length) {
      console.warn(
        `[Verifier] ${verifier.name} returned ${verified.length} records for ${records.length}; keeping unverified records`
      );
      return [...records];
    }
    return verified;
  } catch (error) {
    console.warn(`[Verifier] ${verifier.name} failed, keeping unverified records: ${describeError(error)}`);
    return [...records];
  }
}
