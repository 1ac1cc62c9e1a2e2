/**
 * Label Enhancer
 *
 * Derives vehicle_category, time_period and scenario from raw fields and
 * repairs two kinds of inconsistency:
 * - entrance/transaction times that are swapped, identical or further apart
 *   than the travel-time bound
 * - section fields that disagree with the section implied by the gantry id
 *
 * Every repair appends to the record's correction_log. The function is
 * total: a record it cannot repair comes back unchanged apart from labels.
 * Running it twice changes nothing the second time.
 */

import type { CorrectionEntry, RecordFields, SynthRecord } from "../../schemas/index.js";
import { TRAVEL_TIME_HOURS } from "../domain/constants.js";
import type { GantrySectionMap } from "../domain/gantry_sections.js";
import { deriveLabels } from "../domain/labels.js";
import { formatTimestamp, HOUR_MS, parseTimestamp } from "../domain/time.js";
import { withFields } from "./record_utils.js";
import type { EnhancerConfig } from "./types.js";

export { deriveLabels };

const DEFAULT_CONFIG: Required<EnhancerConfig> = {
  maxTravelHours: TRAVEL_TIME_HOURS.max,
  minTravelHours: TRAVEL_TIME_HOURS.min,
};

const LABEL_KEYS = ["vehicle_category", "time_period", "scenario"] as const;

type Repair = { fields: RecordFields; corrections: CorrectionEntry[] };

export class LabelEnhancer {
  private readonly config: Required<EnhancerConfig>;

  constructor(private readonly sections: GantrySectionMap, config: EnhancerConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  enhance(record: SynthRecord): SynthRecord {
    let repair: Repair = { fields: { ...record.fields }, corrections: [] };
    repair = this.repairTimes(repair);
    repair = this.repairSection(repair);
    repair = this.applyLabels(repair);

    const unchanged =
      repair.corrections.length === 0 && LABEL_KEYS.every((key) => record.fields[key] === repair.fields[key]);
    if (unchanged) return record;
    return withFields(record, repair.fields, repair.corrections);
  }

  enhanceAll(records: readonly SynthRecord[]): SynthRecord[] {
    return records.map((record) => this.enhance(record));
  }

  private repairTimes({ fields, corrections }: Repair): Repair {
    const transaction = parseTimestamp(fields.transaction_time);
    let entrance = parseTimestamp(fields.entrance_time);
    if (transaction === null || entrance === null) return { fields, corrections };

    const next: RecordFields = { ...fields };
    const log: CorrectionEntry[] = [...corrections];
    let tx = transaction;

    if (entrance > tx) {
      next.transaction_time = formatTimestamp(entrance);
      next.entrance_time = formatTimestamp(tx);
      log.push(
        { field: "transaction_time", old: fields.transaction_time ?? null, new: next.transaction_time, reason: "swapped with entrance_time" },
        { field: "entrance_time", old: fields.entrance_time ?? null, new: next.entrance_time, reason: "swapped with transaction_time" }
      );
      [tx, entrance] = [entrance, tx];
    }

    if (entrance === tx) {
      const repaired = formatTimestamp(tx - this.config.minTravelHours * HOUR_MS);
      log.push({ field: "entrance_time", old: next.entrance_time ?? null, new: repaired, reason: "entrance equal to transaction time" });
      next.entrance_time = repaired;
    } else if (tx - entrance > this.config.maxTravelHours * HOUR_MS) {
      const repaired = formatTimestamp(tx - this.config.maxTravelHours * HOUR_MS);
      log.push({
        field: "entrance_time",
        old: next.entrance_time ?? null,
        new: repaired,
        reason: `travel time clamped to ${this.config.maxTravelHours}h`,
      });
      next.entrance_time = repaired;
    }

    return { fields: next, corrections: log };
  }

  private repairSection({ fields, corrections }: Repair): Repair {
    if (typeof fields.gantry_id !== "string") return { fields, corrections };
    const expected = this.sections.sectionFor(fields.gantry_id);
    if (!expected) return { fields, corrections };

    const next: RecordFields = { ...fields };
    const log: CorrectionEntry[] = [...corrections];
    const reason = `section implied by gantry ${fields.gantry_id}`;

    if (fields.section_id !== expected.section_id) {
      log.push({ field: "section_id", old: fields.section_id ?? null, new: expected.section_id, reason });
      next.section_id = expected.section_id;
    }
    if (fields.section_name !== expected.section_name) {
      log.push({ field: "section_name", old: fields.section_name ?? null, new: expected.section_name, reason });
      next.section_name = expected.section_name;
    }
    return { fields: next, corrections: log };
  }

  /**
   * Labels are derived, not repaired; only overwriting a different existing
   * label is logged.
   */
  private applyLabels({ fields, corrections }: Repair): Repair {
    const labels = deriveLabels(fields);
    const log: CorrectionEntry[] = [...corrections];
    for (const key of LABEL_KEYS) {
      const current = fields[key];
      if (current !== undefined && current !== labels[key]) {
        log.push({ field: key, old: current, new: labels[key], reason: "label re-derived from raw fields" });
      }
    }
    return { fields: { ...fields, ...labels }, corrections: log };
  }
}
