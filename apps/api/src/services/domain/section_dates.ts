/**
 * Section → operating dates.
 *
 * Reference pools are collected on particular days per section, so a record
 * on a section the pool knows should fall on one of that section's days.
 * Sections with no known dates accept any date.
 */

import type { RecordFields } from "../../schemas/index.js";
import { formatTimestamp, parseTimestamp } from "./time.js";

/** YYYY-MM-DD of a timestamp, or null when it does not parse */
export function dayOf(value: unknown): string | null {
  const ms = parseTimestamp(value);
  return ms === null ? null : formatTimestamp(ms).slice(0, 10);
}

export class SectionDateMap {
  private readonly dates: ReadonlyMap<string, readonly string[]>;

  constructor(dates: Readonly<Record<string, readonly string[]>> = {}) {
    this.dates = new Map(
      Object.entries(dates)
        .filter(([, days]) => days.length > 0)
        .map(([section, days]): [string, string[]] => [section, [...new Set(days)].sort()])
    );
  }

  /** Learn each section's dates from the transaction times of a pool */
  static fromRows(rows: readonly Readonly<RecordFields>[]): SectionDateMap {
    const learned: Record<string, string[]> = {};
    for (const row of rows) {
      const day = dayOf(row.transaction_time);
      if (!row.section_id || day === null) continue;
      (learned[row.section_id] ??= []).push(day);
    }
    return new SectionDateMap(learned);
  }

  get size(): number {
    return this.dates.size;
  }

  datesFor(sectionId: string | undefined): readonly string[] {
    return sectionId === undefined ? [] : this.dates.get(sectionId) ?? [];
  }

  isConsistent(sectionId: string | undefined, transactionTime: unknown): boolean {
    const expected = this.datesFor(sectionId);
    if (expected.length === 0) return true;
    const day = dayOf(transactionTime);
    return day !== null && expected.includes(day);
  }
}
