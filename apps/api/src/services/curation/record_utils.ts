/**
 * Immutable record updates shared by the curation stages.
 */

import type { CorrectionEntry, RecordFields, RecordMeta, SynthRecord } from "../../schemas/index.js";

export function withFields(
  record: SynthRecord,
  fields: Readonly<RecordFields>,
  corrections: readonly CorrectionEntry[] = []
): SynthRecord {
  return withMeta({ ...record, fields: Object.freeze({ ...fields }) }, {
    correction_log: [...record.meta.correction_log, ...corrections],
  });
}

export function withMeta(record: SynthRecord, patch: Partial<RecordMeta>): SynthRecord {
  return {
    fields: record.fields,
    meta: Object.freeze({ ...record.meta, ...patch }),
  };
}

export function addIssues(record: SynthRecord, issues: readonly string[]): SynthRecord {
  if (issues.length === 0) return record;
  return withMeta(record, { validation_issues: [...record.meta.validation_issues, ...issues] });
}
