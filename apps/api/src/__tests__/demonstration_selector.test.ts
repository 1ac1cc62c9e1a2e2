import { describe, it, expect } from "vitest";
import type { GenerationCondition } from "../schemas/index.js";
import {
  DemonstrationSelector,
  demonstrationQuality,
  demonstrationUncertainty,
  resolveDemonstrations,
  vote,
} from "../services/generation/demonstration_selector.js";
import { passengerFields, truckFields } from "./helpers.js";

const condition: GenerationCondition = {
  vehicle_category: "truck",
  time_period: "evening_peak",
  scenario: "normal",
  base_time: "2024-03-02T00:00:00",
};

const morningCar = passengerFields();
const lateTruck = truckFields();
const earlyTruck = truckFields({
  gantry_transaction_id: "S00145300300022001020240301171000457",
  transaction_time: "2024-03-01T17:10:00",
  entrance_time: "2024-03-01T16:00:00",
});
const noonTruck = truckFields({
  gantry_transaction_id: "S00145300300022001020240301120000458",
  transaction_time: "2024-03-01T12:00:00",
  entrance_time: "2024-03-01T11:00:00",
});

describe("DemonstrationSelector", () => {
  const pool = [morningCar, noonTruck, earlyTruck, lateTruck];

  it("starts from the best-scoring row and spreads the rest", () => {
    const selector = new DemonstrationSelector(pool);
    // Scores: lateTruck = earlyTruck 0.93 (recency decides), noonTruck 0.7967, morningCar 0.6333.
    // morningCar is farthest from lateTruck, then noonTruck from both.
    const set = selector.select(condition, 3);
    expect(set).toEqual({ kind: "single", records: [lateTruck, morningCar, noonTruck] });
  });

  it("returns nothing for k <= 0 or an empty pool", () => {
    expect(resolveDemonstrations(new DemonstrationSelector(pool).select(condition, 0))).toEqual([]);
    expect(resolveDemonstrations(new DemonstrationSelector([]).select(condition, 2))).toEqual([]);
  });

  it("leaves out rows below the quality floor while others remain", () => {
    const reversed = truckFields({ entrance_time: "2024-03-01T19:00:00" });
    expect(new DemonstrationSelector([reversed, lateTruck]).select(condition, 2)).toEqual({
      kind: "single",
      records: [lateTruck],
    });
    expect(new DemonstrationSelector([reversed]).select(condition, 1)).toEqual({
      kind: "single",
      records: [reversed],
    });
  });

  it("draws distinct candidate sets and votes for the most consistent one", () => {
    const selector = new DemonstrationSelector(pool, { candidateSets: 4 });
    const set = selector.select(condition, 2, true);
    if (set.kind !== "multi") throw new Error("expected candidate sets");
    expect(set.candidates).toEqual([
      [lateTruck, morningCar],
      [morningCar, lateTruck],
      [earlyTruck, morningCar],
      [lateTruck, morningCar],
    ]);
    expect(resolveDemonstrations(set)).toEqual([lateTruck, morningCar]);
  });

  it("extends into a new selector without touching the original", () => {
    const selector = new DemonstrationSelector([lateTruck]);
    const extended = selector.extend([earlyTruck, noonTruck]);
    expect(selector.poolSize).toBe(1);
    expect(extended.poolSize).toBe(3);
  });

  it("does not modify the pool", () => {
    const rows = [morningCar, lateTruck];
    new DemonstrationSelector(rows).select(condition, 2);
    expect(rows).toEqual([morningCar, lateTruck]);
  });
});

describe("demonstration scoring", () => {
  it("scales quality down for each rule a row breaks", () => {
    expect(demonstrationQuality(passengerFields())).toBe(1);
    expect(demonstrationQuality(truckFields({ entrance_time: "2024-03-01T19:00:00" }))).toBeCloseTo(0.3, 10);
    expect(demonstrationQuality(passengerFields({ entrance_time: "2024-03-01T08:00:00" }))).toBeCloseTo(0.8, 10);
    expect(demonstrationQuality(passengerFields({ pay_fee: 4500 }))).toBeCloseTo(0.7, 10);
    expect(demonstrationQuality(passengerFields({ discount_fee: 3000 }))).toBeCloseTo(0.4, 10);
    expect(demonstrationQuality(passengerFields({ axle_count: "3" }))).toBeCloseTo(0.6, 10);
    expect(demonstrationQuality(passengerFields({ fee_mileage: undefined }))).toBeCloseTo(0.95, 10);
  });

  it("rates heavier and irregular records as more uncertain", () => {
    expect(demonstrationUncertainty(passengerFields())).toBe(0.5);
    expect(demonstrationUncertainty(truckFields())).toBeCloseTo(0.65, 10);
    expect(demonstrationUncertainty(truckFields({ total_weight: "40000" }))).toBeCloseTo(0.85, 10);
    expect(demonstrationUncertainty(passengerFields({ pass_state: "2", transaction_type: "05" }))).toBeCloseTo(0.75, 10);
  });
});

describe("vote", () => {
  it("keeps the set the others agree with most, earliest on ties", () => {
    const first = [morningCar, noonTruck];
    const second = [morningCar, { ...lateTruck }];
    const third = [morningCar, lateTruck];
    const winner = vote([first, second, third]);
    expect(winner).toHaveLength(2);
    expect(winner[1]).toBe(second[1]);
  });

  it("drops duplicate records from the winning set", () => {
    expect(vote([[lateTruck, lateTruck, earlyTruck]])).toEqual([lateTruck, earlyTruck]);
  });

  it("returns nothing for no candidates", () => {
    expect(vote([])).toEqual([]);
  });

  it("passes plain record lists through resolveDemonstrations", () => {
    const rows = [earlyTruck];
    expect(resolveDemonstrations(rows)).toBe(rows);
  });
});
