/**
 * Rule-Based Group Generator
 *
 * Deterministic fallback used whenever the oracle cannot produce a valid
 * group. Values are drawn from the caller's seeded Rng and respect the same
 * domain rules the filter checks, so a fully rule-generated record passes
 * curation.
 *
 * This component does NOT:
 * - Call the oracle
 * - Overwrite fields that are already present in the partial record
 */

import {
  pickFields,
  type GenerationCondition,
  type RecordFields,
} from "../../schemas/index.js";
import {
  EXPECTED_AXLES,
  PASSENGER_WEIGHT_RANGE,
  PERIOD_HOURS,
  TRAVEL_TIME_HOURS,
  VEHICLE_TYPE_CODES,
} from "../domain/constants.js";
import type { GantrySectionMap } from "../domain/gantry_sections.js";
import { ABNORMAL_PASS_STATE } from "../domain/labels.js";
import type { Rng } from "../domain/rng.js";
import type { SectionDateMap } from "../domain/section_dates.js";
import { calculateExpectedFee, etcDiscount } from "../domain/tariff.js";
import {
  compactStamp,
  formatTimestamp,
  HOUR_MS,
  parseTimestamp,
  startOfDay,
} from "../domain/time.js";
import { categoryForVehicleType, toNumber, weightLimitFor } from "../domain/vehicle.js";
import { predictFee, type LearnedStatistics } from "../statistics/index.js";
import type { FieldGroup, GroupPayload } from "./types.js";

export interface RuleGeneratorDeps {
  sections: GantrySectionMap;
  stats?: LearnedStatistics;
  /** Upper bound on generated travel time in hours */
  maxTravelHours?: number;
  /** When set, transactions on a known section fall on one of its dates */
  sectionDates?: SectionDateMap;
}

type GroupRule = (condition: GenerationCondition, partial: Readonly<RecordFields>, rng: Rng) => GroupPayload;

/** Smallest fee the fallback produces, in fen */
const MIN_FEE = 10;
/** Longest trip the fallback draws, before capping by maxTravelHours */
const TYPICAL_TRAVEL_HOURS = 3;

function digits(rng: Rng, count: number): string {
  let out = "";
  for (let i = 0; i < count; i++) out += String(rng.int(0, 9));
  return out;
}

export class RuleGenerator {
  private readonly rules: ReadonlyMap<string, GroupRule>;
  private readonly maxTravelHours: number;

  constructor(private readonly deps: RuleGeneratorDeps) {
    this.maxTravelHours = deps.maxTravelHours ?? TRAVEL_TIME_HOURS.max;
    this.rules = new Map<string, GroupRule>([
      ["identity", (c, _p, rng) => this.identity(c, rng)],
      ["time", (c, p, rng) => this.time(c, p, rng)],
      ["vehicle", (c, _p, rng) => this.vehicle(c, rng)],
      ["status", (c, p, rng) => this.status(c, p, rng)],
      ["fee", (_c, p, rng) => this.fee(p, rng)],
    ]);
  }

  /**
   * Produce the group's fields. Groups with other names are served field by
   * field from whichever built-in rule covers each field.
   */
  generate(
    group: FieldGroup,
    condition: GenerationCondition,
    partial: Readonly<RecordFields>,
    rng: Rng
  ): GroupPayload {
    const rule = this.rules.get(group.name);
    if (rule) return pickFields(rule(condition, partial, rng), group.fields);

    let merged: GroupPayload = {};
    for (const [name, builtIn] of this.rules) {
      const payload = builtIn(condition, { ...partial, ...merged }, rng.fork(name));
      if (group.fields.some((f) => f in payload)) {
        merged = { ...merged, ...payload };
      }
    }
    return pickFields(merged, group.fields);
  }

  private identity(condition: GenerationCondition, rng: Rng): GroupPayload {
    const gantry_id = rng.pick(this.deps.sections.gantryIds());
    const section = this.deps.sections.sectionFor(gantry_id) ?? {
      section_id: gantry_id.slice(0, 11),
      section_name: gantry_id.slice(0, 11),
    };
    const stamp = compactStamp(parseTimestamp(condition.base_time) ?? 0);
    return {
      gantry_transaction_id: `${gantry_id}${stamp}${digits(rng, 3)}`,
      pass_id: `015301${digits(rng, 16)}${stamp}`,
      gantry_id,
      section_id: section.section_id,
      section_name: section.section_name,
    };
  }

  private time(condition: GenerationCondition, partial: Readonly<RecordFields>, rng: Rng): GroupPayload {
    const day = this.day(condition, partial, rng);
    const hour = rng.pick(PERIOD_HOURS[condition.time_period]);
    const transaction = day + hour * HOUR_MS + rng.int(0, 3599) * 1000;
    const longest = Math.min(TYPICAL_TRAVEL_HOURS, this.maxTravelHours);
    const travelSeconds = Math.round(rng.uniform(TRAVEL_TIME_HOURS.min, longest) * 3600);
    return {
      transaction_time: formatTimestamp(transaction),
      entrance_time: formatTimestamp(transaction - travelSeconds * 1000),
    };
  }

  private day(condition: GenerationCondition, partial: Readonly<RecordFields>, rng: Rng): number {
    const known = this.deps.sectionDates?.datesFor(partial.section_id) ?? [];
    const picked = known.length > 0 ? parseTimestamp(`${rng.pick(known)}T00:00:00`) : null;
    return picked ?? startOfDay(parseTimestamp(condition.base_time) ?? 0);
  }

  private vehicle(condition: GenerationCondition, rng: Rng): GroupPayload {
    const sign = rng.weighted([
      ["0x00", 0.85],
      ["0x01", 0.1],
      ["0xff", 0.05],
    ] as const);

    if (condition.vehicle_category === "passenger") {
      const vehicle_type = rng.weighted([
        ["1", 0.7],
        ["2", 0.15],
        ["3", 0.1],
        ["4", 0.05],
      ] as const);
      return {
        vehicle_type,
        axle_count: "2",
        total_weight: String(rng.int(PASSENGER_WEIGHT_RANGE.min, PASSENGER_WEIGHT_RANGE.max)),
        vehicle_sign: sign,
      };
    }

    const vehicle_type = rng.pick(VEHICLE_TYPE_CODES[condition.vehicle_category]);
    const axle_count = EXPECTED_AXLES[vehicle_type] ?? "2";
    const limit = weightLimitFor(axle_count);
    const factor = condition.scenario === "overloaded" ? rng.uniform(1.05, 1.2) : rng.uniform(0.3, 0.95);
    return {
      vehicle_type,
      axle_count,
      total_weight: String(Math.round(limit * factor)),
      vehicle_sign: sign,
    };
  }

  private status(condition: GenerationCondition, partial: Readonly<RecordFields>, rng: Rng): GroupPayload {
    const media_type = rng.weighted([
      ["1", 0.85],
      ["2", 0.15],
    ] as const);
    const flagged =
      condition.scenario === "anomalous" ||
      (condition.scenario === "overloaded" && categoryForVehicleType(partial.vehicle_type) !== "passenger");
    return {
      gantry_type: "1",
      media_type,
      transaction_type: condition.scenario === "anomalous" ? rng.pick(["05", "09"]) : "01",
      pass_state: flagged ? ABNORMAL_PASS_STATE : "1",
      cpu_card_type: media_type === "1" ? rng.pick(["22", "23"]) : "0",
    };
  }

  private fee(partial: Readonly<RecordFields>, rng: Rng): GroupPayload {
    const mileage = Math.round(rng.uniform(5, 120) * 1000);
    const category = categoryForVehicleType(partial.vehicle_type);

    let payFee: number;
    const prediction = predictFee(this.deps.stats, category, mileage);
    if (prediction) {
      const noise = Math.max(-2, Math.min(2, rng.gauss(0, 0.5))) * prediction.residualStd;
      payFee = Math.round(prediction.predicted + noise);
    } else {
      payFee = calculateExpectedFee(mileage, partial.vehicle_type ?? "1");
    }
    payFee = Math.max(MIN_FEE, payFee);

    return {
      pay_fee: payFee,
      discount_fee: etcDiscount(payFee, toNumber(partial.media_type) ?? 0),
      fee_mileage: String(mileage),
    };
  }
}
