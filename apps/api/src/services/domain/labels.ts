/**
 * Label derivation from raw gantry fields.
 *
 * Pure and idempotent: labels depend only on vehicle_type, transaction_time,
 * axle_count, total_weight and pass_state, never on previously derived labels.
 */

import type { DerivedLabels, RecordFields } from "../../schemas/index.js";
import type { Scenario, VehicleCategory } from "./constants.js";
import { hourOf, periodForHour } from "./time.js";
import { categoryForVehicleType, toNumber, weightLimitFor } from "./vehicle.js";

/** pass_state value gantries report for an abnormal passage */
export const ABNORMAL_PASS_STATE = "2";

/** Hour assumed when the transaction time cannot be read */
const UNKNOWN_HOUR = 12;

export function isOverweight(fields: Readonly<RecordFields>): boolean {
  const weight = toNumber(fields.total_weight);
  if (weight === null) return false;
  return weight > weightLimitFor(fields.axle_count);
}

export function deriveScenario(fields: Readonly<RecordFields>, category: VehicleCategory): Scenario {
  if (category !== "passenger" && isOverweight(fields)) return "overloaded";
  if (String(fields.pass_state) === ABNORMAL_PASS_STATE) return "anomalous";
  return "normal";
}

export function deriveLabels(fields: Readonly<RecordFields>): DerivedLabels {
  const vehicle_category = categoryForVehicleType(fields.vehicle_type);
  return {
    vehicle_category,
    time_period: periodForHour(hourOf(fields.transaction_time) ?? UNKNOWN_HOUR),
    scenario: deriveScenario(fields, vehicle_category),
  };
}
