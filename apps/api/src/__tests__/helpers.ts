/**
 * Shared fixtures for the test suite. Values are made up; the gantry ids
 * come from the bundled reference map so section checks resolve.
 */

import type { RecordFields, RecordMeta, SynthRecord } from "../schemas/index.js";

/** A passenger record that passes every filter check with score 1 */
export function passengerFields(overrides: Partial<RecordFields> = {}): RecordFields {
  return {
    gantry_transaction_id: "G56155301200011001020240301081500123",
    pass_id: "015301123456789012345620240301081500",
    gantry_id: "G561553012000110010",
    section_id: "G5615530120",
    section_name: "Mawen Expressway",
    transaction_time: "2024-03-01T08:15:00",
    entrance_time: "2024-03-01T07:15:00",
    vehicle_type: "1",
    axle_count: "2",
    total_weight: "3000",
    vehicle_sign: "0x00",
    gantry_type: "1",
    media_type: "1",
    transaction_type: "01",
    pass_state: "1",
    cpu_card_type: "22",
    pay_fee: 2250,
    discount_fee: 112,
    fee_mileage: "50000",
    ...overrides,
  };
}

/** A five-axle truck, within its weight limit */
export function truckFields(overrides: Partial<RecordFields> = {}): RecordFields {
  return passengerFields({
    gantry_transaction_id: "S00145300300022001020240301181000456",
    gantry_id: "S001453003000220010",
    section_id: "S0014530030",
    section_name: "Daguan-Yongshan Expressway",
    transaction_time: "2024-03-01T18:10:00",
    entrance_time: "2024-03-01T16:40:00",
    vehicle_type: "15",
    axle_count: "5",
    total_weight: "30000",
    pay_fee: 2950,
    discount_fee: 147,
    ...overrides,
  });
}

export function makeRecord(fields: RecordFields, meta: Partial<RecordMeta> = {}): SynthRecord {
  return {
    fields: Object.freeze({ ...fields }),
    meta: Object.freeze({
      validation_issues: [],
      correction_log: [],
      fallback_groups: [],
      generation_index: 0,
      ...meta,
    }),
  };
}
