/**
 * Demonstration Selector
 *
 * Picks few-shot examples from the training pool for a generation
 * condition. Each pool row is scored once for quality (how well it obeys
 * the domain rules) and uncertainty (how hard its kind of record is to get
 * right); rows scoring below MIN_QUALITY are left out unless nothing else
 * remains. For a condition:
 *
 *   score = 0.4 × quality + 0.4 × similarity + 0.2 × uncertainty
 *
 * where similarity is the share of the condition's labels the row shares.
 * Ties go to the more recent transaction, then to a seeded random key. The
 * best 2k rows form a shortlist and k of them are taken by farthest-point
 * sampling, so the set covers different vehicle types, mileages and hours.
 *
 * In multi-candidate mode the first set starts from the best row and every
 * other set from a score-weighted seeded draw; `vote()` keeps the set the
 * others agree with most.
 */

import type { DerivedLabels, GenerationCondition, RecordFields } from "../../schemas/index.js";
import { TRAVEL_TIME_HOURS } from "../domain/constants.js";
import { ABNORMAL_PASS_STATE, deriveLabels } from "../domain/labels.js";
import { createRng, type Rng } from "../domain/rng.js";
import { calculateExpectedFee } from "../domain/tariff.js";
import { HOUR_MS, hourOf, parseTimestamp } from "../domain/time.js";
import { categoryForVehicleType, toNumber, weightLimitFor } from "../domain/vehicle.js";
import { clamp01 } from "../statistics/math.js";
import type { DemonstrationSelectorConfig, DemonstrationSet } from "./types.js";

const DEFAULT_CONFIG: Required<DemonstrationSelectorConfig> = {
  seed: "demonstrations",
  candidateSets: 3,
};

const SCORE_WEIGHTS = { quality: 0.4, similarity: 0.4, uncertainty: 0.2 } as const;

/** Rows below this quality are only used when no other row is left */
const MIN_QUALITY = 0.5;

const QUALITY_FIELDS = [
  "gantry_id",
  "vehicle_type",
  "transaction_time",
  "entrance_time",
  "pay_fee",
  "fee_mileage",
] as const satisfies readonly (keyof RecordFields)[];

/** Normalisers for the distance between two rows */
const VEHICLE_CODE_SPAN = 26;
const MILEAGE_SPAN_METERS = 200_000;
const HOUR_SPAN = 24;

interface IndexedRow {
  row: Readonly<RecordFields>;
  labels: DerivedLabels;
  recency: number;
  quality: number;
  uncertainty: number;
  vehicleCode: number;
  mileage: number;
  hour: number;
}

interface Scored {
  entry: IndexedRow;
  score: number;
  key: number;
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && !(typeof value === "string" && value.trim() === "");
}

/**
 * Rule-based quality of a pool row in [0, 1]; each problem scales the
 * score down.
 */
export function demonstrationQuality(row: Readonly<RecordFields>): number {
  const present = QUALITY_FIELDS.filter((field) => isPresent(row[field])).length;
  let score = 0.3 * (present / QUALITY_FIELDS.length) + 0.7;

  const transaction = parseTimestamp(row.transaction_time);
  const entrance = parseTimestamp(row.entrance_time);
  if (transaction === null || entrance === null) {
    score *= 0.5;
  } else {
    const hours = (transaction - entrance) / HOUR_MS;
    if (hours <= 0) score *= 0.3;
    else if (hours < TRAVEL_TIME_HOURS.min || hours > TRAVEL_TIME_HOURS.max) score *= 0.8;
  }

  const pay = toNumber(row.pay_fee);
  const mileage = toNumber(row.fee_mileage);
  if (pay !== null && mileage !== null && mileage > 0) {
    const expected = calculateExpectedFee(mileage, row.vehicle_type);
    if (expected > 0) {
      const ratio = pay / expected;
      if (ratio < 0.7 || ratio > 1.3) score *= 0.7;
    }
  }

  const discount = toNumber(row.discount_fee);
  if (pay !== null && discount !== null && discount > pay) score *= 0.4;

  if (categoryForVehicleType(row.vehicle_type) === "passenger" && isPresent(row.axle_count) && row.axle_count !== "2") {
    score *= 0.6;
  }
  return clamp01(score);
}

/**
 * How hard a row's kind of record is to generate correctly, in [0, 1].
 * Heavier vehicles, loads near the limit and irregular passages rate higher.
 */
export function demonstrationUncertainty(row: Readonly<RecordFields>): number {
  let uncertainty = 0.5;
  const category = categoryForVehicleType(row.vehicle_type);
  if (category === "truck") uncertainty += 0.15;
  if (category === "special") uncertainty += 0.25;

  const weight = toNumber(row.total_weight);
  if (weight !== null) {
    const ratio = weight / weightLimitFor(row.axle_count);
    if (ratio >= 0.85 && ratio <= 1.15) uncertainty += 0.2;
  }
  if (row.pass_state === ABNORMAL_PASS_STATE) uncertainty += 0.15;
  if (isPresent(row.transaction_type) && row.transaction_type !== "01") uncertainty += 0.1;
  return clamp01(uncertainty);
}

function index(row: Readonly<RecordFields>): IndexedRow {
  return {
    row,
    labels: deriveLabels(row),
    recency: parseTimestamp(row.transaction_time) ?? Number.NEGATIVE_INFINITY,
    quality: demonstrationQuality(row),
    uncertainty: demonstrationUncertainty(row),
    vehicleCode: toNumber(row.vehicle_type) ?? 0,
    mileage: toNumber(row.fee_mileage) ?? 0,
    hour: hourOf(row.transaction_time) ?? 12,
  };
}

function distance(a: IndexedRow, b: IndexedRow): number {
  return (
    (Math.abs(a.vehicleCode - b.vehicleCode) / VEHICLE_CODE_SPAN +
      Math.min(Math.abs(a.mileage - b.mileage) / MILEAGE_SPAN_METERS, 1) +
      Math.min(Math.abs(a.hour - b.hour) / HOUR_SPAN, 1)) /
    3
  );
}

export class DemonstrationSelector {
  private readonly config: Required<DemonstrationSelectorConfig>;
  private readonly rows: readonly IndexedRow[];
  private readonly rng: Rng;
  private draws = 0;

  constructor(pool: readonly Readonly<RecordFields>[], config: DemonstrationSelectorConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.rng = createRng(this.config.seed);
    this.rows = pool.map(index);
  }

  get poolSize(): number {
    return this.rows.length;
  }

  /** A selector over this pool plus `rows`; this one is left as it is */
  extend(rows: readonly Readonly<RecordFields>[]): DemonstrationSelector {
    const pool = [...this.rows.map((entry) => entry.row), ...rows];
    return new DemonstrationSelector(pool, {
      ...this.config,
      seed: `${this.config.seed}:pool-${pool.length}`,
    });
  }

  select(condition: GenerationCondition, k: number, multiCandidate = false): DemonstrationSet {
    if (!multiCandidate) {
      return { kind: "single", records: this.rank(condition, k, this.rng, false) };
    }
    const draw = this.draws++;
    const candidates: Readonly<RecordFields>[][] = [];
    for (let i = 0; i < this.config.candidateSets; i++) {
      candidates.push(this.rank(condition, k, this.rng.fork(`${draw}:set-${i}`), i > 0));
    }
    return { kind: "multi", candidates };
  }

  private rank(condition: GenerationCondition, k: number, rng: Rng, explore: boolean): Readonly<RecordFields>[] {
    if (k <= 0 || this.rows.length === 0) return [];

    const confident = this.rows.filter((entry) => entry.quality >= MIN_QUALITY);
    const scored: Scored[] = (confident.length > 0 ? confident : this.rows).map((entry) => ({
      entry,
      score:
        SCORE_WEIGHTS.quality * entry.quality +
        SCORE_WEIGHTS.similarity * (matchScore(entry.labels, condition) / 3) +
        SCORE_WEIGHTS.uncertainty * entry.uncertainty,
      key: rng.next(),
    }));
    scored.sort((a, b) => b.score - a.score || b.entry.recency - a.entry.recency || a.key - b.key);

    const shortlist = scored.slice(0, 2 * k);
    if (shortlist.length <= k) return shortlist.map((s) => s.entry.row);
    return this.spread(shortlist, k, explore ? rng.weighted(shortlist.map((s, i) => [i, s.score] as const)) : 0);
  }

  /** Farthest-point sampling from `first`; ties keep shortlist order */
  private spread(shortlist: readonly Scored[], k: number, first: number): Readonly<RecordFields>[] {
    const chosen = [shortlist[first].entry];
    const remaining = shortlist.filter((_, i) => i !== first).map((s) => s.entry);

    while (chosen.length < k && remaining.length > 0) {
      let best = 0;
      let bestDistance = Number.NEGATIVE_INFINITY;
      remaining.forEach((entry, i) => {
        const nearest = Math.min(...chosen.map((c) => distance(entry, c)));
        if (nearest > bestDistance) {
          best = i;
          bestDistance = nearest;
        }
      });
      chosen.push(remaining[best]);
      remaining.splice(best, 1);
    }
    return chosen.map((entry) => entry.row);
  }
}

function matchScore(labels: DerivedLabels, condition: GenerationCondition): number {
  return (
    Number(labels.vehicle_category === condition.vehicle_category) +
    Number(labels.time_period === condition.time_period) +
    Number(labels.scenario === condition.scenario)
  );
}

function rowKey(row: Readonly<RecordFields>): string {
  return row.gantry_transaction_id ?? JSON.stringify(row);
}

/**
 * Consistency vote over candidate sets. Each set scores the mean share of
 * other sets that contain each of its records; the highest scoring set
 * wins and the earliest set wins a tie. Duplicates are dropped.
 */
export function vote(
  candidates: readonly (readonly Readonly<RecordFields>[])[]
): Readonly<RecordFields>[] {
  if (candidates.length === 0) return [];

  const keySets = candidates.map((set) => new Set(set.map(rowKey)));
  let best = 0;
  let bestScore = Number.NEGATIVE_INFINITY;

  candidates.forEach((set, i) => {
    if (set.length === 0) return;
    let agreement = 0;
    for (const row of set) {
      const key = rowKey(row);
      let others = 0;
      keySets.forEach((keys, j) => {
        if (j !== i && keys.has(key)) others++;
      });
      agreement += candidates.length > 1 ? others / (candidates.length - 1) : 1;
    }
    const score = agreement / set.length;
    if (score > bestScore) {
      best = i;
      bestScore = score;
    }
  });

  const seen = new Set<string>();
  return candidates[best].filter((row) => {
    const key = rowKey(row);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/** Flatten either demonstration form into the records to show the oracle */
export function resolveDemonstrations(
  demonstrations: DemonstrationSet | readonly Readonly<RecordFields>[]
): readonly Readonly<RecordFields>[] {
  if (!("kind" in demonstrations)) return demonstrations;
  return demonstrations.kind === "single" ? demonstrations.records : vote(demonstrations.candidates);
}
