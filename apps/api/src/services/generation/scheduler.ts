/**
 * Dataset-Wise Scheduler
 *
 * Chooses the next generation condition so that the accepted dataset moves
 * toward the target distribution. Each dimension (vehicle, time, scenario)
 * is handled on its own: the value with the largest positive gap between
 * target share and accepted share wins, ties going to the earlier value in
 * the fixed category order. When no gap is positive, a value is drawn in
 * proportion to the target.
 *
 * Two tallies are kept per dimension. `accepted` drives the gaps;
 * `observed` counts every attempt and is reported for retry diagnostics.
 * All reads and writes are synchronous, so a worker pool sharing one
 * scheduler cannot interleave an update.
 */

import {
  TargetDistributionSchema,
  type Dimension,
  type DistributionCounts,
  type GenerationCondition,
  type SynthRecord,
  type TargetDistribution,
} from "../../schemas/index.js";
import {
  SCENARIOS,
  TIME_PERIODS,
  VEHICLE_CATEGORIES,
  type Scenario,
  type TimePeriod,
  type VehicleCategory,
} from "../domain/constants.js";
import { deriveLabels } from "../domain/labels.js";
import { createRng, type Rng } from "../domain/rng.js";
import { formatTimestamp, startOfDay } from "../domain/time.js";
import { ConfigurationError } from "../errors.js";
import type { SchedulerConfig } from "./types.js";

export const DEFAULT_TARGET_DISTRIBUTION = {
  vehicle: { passenger: 0.55, truck: 0.4, special: 0.05 },
  time: { morning_peak: 0.25, evening_peak: 0.25, off_peak: 0.4, night: 0.1 },
  scenario: { normal: 0.9, overloaded: 0.06, anomalous: 0.04 },
} as const satisfies Required<TargetDistribution>;

/**
 * Target shares and tallies for one dimension.
 */
class DimensionTracker<V extends string> {
  private readonly target: ReadonlyMap<V, number>;
  private readonly accepted = new Map<V, number>();
  private readonly observed = new Map<V, number>();

  constructor(
    readonly dimension: Dimension,
    private readonly order: readonly V[],
    shares: Partial<Record<V, number>>
  ) {
    const total = order.reduce((sum, value) => sum + (shares[value] ?? 0), 0);
    if (!(total > 0)) {
      throw new ConfigurationError(`target distribution for "${dimension}" has no positive share`);
    }
    this.target = new Map(order.map((value) => [value, (shares[value] ?? 0) / total]));
    for (const value of order) {
      this.accepted.set(value, 0);
      this.observed.set(value, 0);
    }
  }

  record(value: V, accepted: boolean): void {
    this.observed.set(value, (this.observed.get(value) ?? 0) + 1);
    if (accepted) this.accepted.set(value, (this.accepted.get(value) ?? 0) + 1);
  }

  gaps(totalAccepted: number): Array<[V, number]> {
    return this.order.map((value) => {
      const actual = totalAccepted === 0 ? 0 : (this.accepted.get(value) ?? 0) / totalAccepted;
      return [value, (this.target.get(value) ?? 0) - actual];
    });
  }

  /** Largest positive gap; the first value in order wins a tie */
  largestGap(totalAccepted: number): V | undefined {
    let best: V | undefined;
    let bestGap = 0;
    for (const [value, gap] of this.gaps(totalAccepted)) {
      if (gap > bestGap) {
        best = value;
        bestGap = gap;
      }
    }
    return best;
  }

  draw(rng: Rng): V {
    return rng.weighted(this.order.map((value) => [value, this.target.get(value) ?? 0] as const));
  }

  shares(): Partial<Record<V, number>> {
    return toRecord(this.order, this.target);
  }

  acceptedCounts(): Partial<Record<V, number>> {
    return toRecord(this.order, this.accepted);
  }

  observedCounts(): Partial<Record<V, number>> {
    return toRecord(this.order, this.observed);
  }
}

function toRecord<V extends string>(order: readonly V[], values: ReadonlyMap<V, number>): Partial<Record<V, number>> {
  const out: Partial<Record<V, number>> = {};
  for (const value of order) out[value] = values.get(value) ?? 0;
  return out;
}

export interface SchedulerSnapshot {
  target: DistributionCounts;
  accepted: DistributionCounts;
  observed: DistributionCounts;
  totalAccepted: number;
  totalObserved: number;
}

export class DatasetScheduler {
  private readonly vehicle: DimensionTracker<VehicleCategory>;
  private readonly time: DimensionTracker<TimePeriod>;
  private readonly scenario: DimensionTracker<Scenario>;
  private totalAccepted = 0;
  private totalObserved = 0;
  private readonly rng: Rng;
  private readonly clock: () => number;

  constructor(target: TargetDistribution = {}, config: SchedulerConfig = {}) {
    const parsed = TargetDistributionSchema.safeParse(target);
    if (!parsed.success) {
      throw new ConfigurationError(`invalid target distribution: ${parsed.error.message}`);
    }
    const t = parsed.data;
    this.vehicle = new DimensionTracker<VehicleCategory>("vehicle", VEHICLE_CATEGORIES, t.vehicle ?? DEFAULT_TARGET_DISTRIBUTION.vehicle);
    this.time = new DimensionTracker<TimePeriod>("time", TIME_PERIODS, t.time ?? DEFAULT_TARGET_DISTRIBUTION.time);
    this.scenario = new DimensionTracker<Scenario>("scenario", SCENARIOS, t.scenario ?? DEFAULT_TARGET_DISTRIBUTION.scenario);
    this.rng = createRng(config.seed ?? "scheduler");
    this.clock = config.clock ?? Date.now;
  }

  /**
   * Condition that closes the largest gap in every dimension.
   */
  nextCondition(): GenerationCondition {
    const total = this.totalAccepted;
    return this.build(
      this.vehicle.largestGap(total) ?? this.vehicle.draw(this.rng),
      this.time.largestGap(total) ?? this.time.draw(this.rng),
      this.scenario.largestGap(total) ?? this.scenario.draw(this.rng)
    );
  }

  /**
   * Condition drawn in proportion to the target, ignoring gaps. Used when a
   * gap-selected condition keeps failing.
   */
  sampleCondition(): GenerationCondition {
    return this.build(this.vehicle.draw(this.rng), this.time.draw(this.rng), this.scenario.draw(this.rng));
  }

  /**
   * Count an attempt. Labels come from the record's own fields, not from
   * the condition it was generated for.
   */
  update(record: SynthRecord, accepted: boolean): void {
    const labels = deriveLabels(record.fields);
    this.vehicle.record(labels.vehicle_category, accepted);
    this.time.record(labels.time_period, accepted);
    this.scenario.record(labels.scenario, accepted);
    this.totalObserved += 1;
    if (accepted) this.totalAccepted += 1;
  }

  /** Target minus accepted share per value, in category order */
  gaps(dimension: Dimension): Array<[string, number]> {
    switch (dimension) {
      case "vehicle":
        return this.vehicle.gaps(this.totalAccepted);
      case "time":
        return this.time.gaps(this.totalAccepted);
      case "scenario":
        return this.scenario.gaps(this.totalAccepted);
    }
  }

  snapshot(): SchedulerSnapshot {
    return {
      target: { vehicle: this.vehicle.shares(), time: this.time.shares(), scenario: this.scenario.shares() },
      accepted: {
        vehicle: this.vehicle.acceptedCounts(),
        time: this.time.acceptedCounts(),
        scenario: this.scenario.acceptedCounts(),
      },
      observed: {
        vehicle: this.vehicle.observedCounts(),
        time: this.time.observedCounts(),
        scenario: this.scenario.observedCounts(),
      },
      totalAccepted: this.totalAccepted,
      totalObserved: this.totalObserved,
    };
  }

  private build(vehicle: VehicleCategory, period: TimePeriod, scenario: Scenario): GenerationCondition {
    return Object.freeze({
      vehicle_category: vehicle,
      time_period: period,
      scenario,
      base_time: formatTimestamp(startOfDay(this.clock())),
    });
  }
}
