/**
 * Seed Pool Builder
 *
 * Produces a plausible reference pool from the rule generator alone, for
 * demos and tests that have no pool file. Rows are spread over `days`
 * consecutive days starting at `startDay` and drawn from the target
 * distribution, so every label combination the target allows shows up.
 */

import { PoolRowSchema, type GantryFields, type PoolRow, type TargetDistribution } from "../../schemas/index.js";
import { getGantrySectionMap, type GantrySectionMap } from "../domain/gantry_sections.js";
import { createRng } from "../domain/rng.js";
import { HOUR_MS, parseTimestamp } from "../domain/time.js";
import { ConfigurationError } from "../errors.js";
import { DatasetScheduler, RuleGenerator, createFieldGroupSchema } from "../generation/index.js";

export interface SeedPoolOptions {
  size: number;
  seed?: string | number;
  sections?: GantrySectionMap;
  /** First day of the pool, YYYY-MM-DDT00:00:00 (default: 2023-03-01T00:00:00) */
  startDay?: string;
  days?: number;
  target?: TargetDistribution;
}

const DAY_MS = 24 * HOUR_MS;

export function buildSeedPool(options: SeedPoolOptions): PoolRow[] {
  const { size, seed = "seed-pool", days = 28, target } = options;
  const start = parseTimestamp(options.startDay ?? "2023-03-01T00:00:00");
  if (start === null) {
    throw new ConfigurationError(`invalid seed pool start day: ${String(options.startDay)}`);
  }

  const schema = createFieldGroupSchema();
  const rules = new RuleGenerator({ sections: options.sections ?? getGantrySectionMap() });
  const rng = createRng(seed);

  let row = 0;
  const scheduler = new DatasetScheduler(target, {
    seed: `${seed}:conditions`,
    clock: () => start + (row % Math.max(1, days)) * DAY_MS,
  });

  const rows: PoolRow[] = [];
  for (; row < size; row++) {
    const condition = scheduler.sampleCondition();
    let fields: Partial<GantryFields> = {};
    for (const group of schema.order) {
      const payload = rules.generate(group, condition, fields, rng.fork(`row-${row}:${group.name}`));
      fields = { ...payload, ...fields };
    }
    rows.push(Object.freeze(PoolRowSchema.parse(fields)));
  }
  return rows;
}
