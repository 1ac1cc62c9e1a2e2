/**
 * Reference Pool Loaders
 *
 * The training pool (statistics and demonstrations) and the benchmark pool
 * (evaluation) come through the same `PoolLoader` contract. Loaders return
 * validated, frozen copies and never write to their source. Rows that fail
 * validation are skipped with a warning.
 */

import { readFile } from "node:fs/promises";
import { PoolRowSchema, type PoolRow } from "../schemas/index.js";

export interface PoolLoader {
  readonly name: string;
  /** Up to `limit` valid rows, in source order */
  load(limit?: number): Promise<PoolRow[]>;
}

export function parsePoolRows(raw: readonly unknown[], source: string, limit = Infinity): PoolRow[] {
  const rows: PoolRow[] = [];
  let skipped = 0;

  for (const item of raw) {
    if (rows.length >= limit) break;
    const parsed = PoolRowSchema.safeParse(item);
    if (parsed.success) {
      rows.push(Object.freeze(parsed.data));
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    console.warn(`[Pool] ${source}: skipped ${skipped} invalid row(s)`);
  }
  return rows;
}

export class InMemoryPoolLoader implements PoolLoader {
  private readonly rows: readonly unknown[];

  constructor(rows: readonly unknown[], readonly name = "memory") {
    this.rows = rows;
  }

  async load(limit?: number): Promise<PoolRow[]> {
    return parsePoolRows(this.rows, this.name, limit);
  }
}

/**
 * Reads a JSON array of rows, or an object with a `records` array.
 */
export class JsonPoolLoader implements PoolLoader {
  readonly name: string;

  constructor(private readonly filePath: string) {
    this.name = filePath;
  }

  async load(limit?: number): Promise<PoolRow[]> {
    const content = await readFile(this.filePath, "utf-8");
    const data: unknown = JSON.parse(content);
    const rows = Array.isArray(data) ? data : extractRecords(data);
    if (!rows) {
      throw new Error(`${this.filePath} holds neither an array nor { records: [...] }`);
    }
    return parsePoolRows(rows, this.name, limit);
  }
}

function extractRecords(data: unknown): unknown[] | null {
  if (typeof data !== "object" || data === null || !("records" in data)) return null;
  const records: unknown = data.records;
  return Array.isArray(records) ? records : null;
}
