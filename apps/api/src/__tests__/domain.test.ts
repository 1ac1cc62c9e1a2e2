import { describe, it, expect } from "vitest";
import { calculateExpectedFee, etcDiscount, ratePerKm } from "../services/domain/tariff.js";
import {
  compactStamp,
  formatTimestamp,
  hourOf,
  normalizeTimestamp,
  parseTimestamp,
  periodForHour,
} from "../services/domain/time.js";
import { createRng } from "../services/domain/rng.js";
import { getGantrySectionMap } from "../services/domain/gantry_sections.js";
import { SectionDateMap, dayOf } from "../services/domain/section_dates.js";
import { computeLearnedStatistics, predictFee } from "../services/statistics/index.js";
import { passengerFields, truckFields } from "./helpers.js";

describe("tariff", () => {
  it("uses the class rate for passenger vehicles", () => {
    expect(ratePerKm("1")).toBe(0.45);
    expect(calculateExpectedFee(50_000, "1")).toBe(2250);
    expect(calculateExpectedFee(120_000, 2)).toBe(9000);
  });

  it("uses the freight rate for trucks and truncates", () => {
    expect(calculateExpectedFee(50_000, "15")).toBe(2950);
    expect(calculateExpectedFee(12_345, "1")).toBe(555);
  });

  it("returns 0 for non-positive mileage", () => {
    expect(calculateExpectedFee(0, "1")).toBe(0);
    expect(calculateExpectedFee(Number.NaN, "1")).toBe(0);
  });

  it("discounts only OBU media", () => {
    expect(etcDiscount(2250, "1")).toBe(112);
    expect(etcDiscount(2250, "2")).toBe(0);
  });
});

describe("timestamps", () => {
  it("parses naive wall-clock times as UTC", () => {
    expect(parseTimestamp("2024-03-01T08:15:00")).toBe(Date.UTC(2024, 2, 1, 8, 15, 0));
    expect(parseTimestamp("2024-03-01 08:15")).toBe(Date.UTC(2024, 2, 1, 8, 15, 0));
  });

  it("rejects impossible dates and non-strings", () => {
    expect(parseTimestamp("2024-02-30T00:00:00")).toBeNull();
    expect(parseTimestamp("2024-03-01T24:00:00")).toBeNull();
    expect(parseTimestamp(20240301)).toBeNull();
  });

  it("formats back to the canonical form", () => {
    const ms = Date.UTC(2024, 2, 1, 8, 5, 9);
    expect(formatTimestamp(ms)).toBe("2024-03-01T08:05:09");
    expect(compactStamp(ms)).toBe("20240301080509");
    expect(normalizeTimestamp(" 2024-03-01 08:15 ")).toBe("2024-03-01T08:15:00");
    expect(normalizeTimestamp("yesterday")).toBe("yesterday");
  });

  it("maps hours to periods", () => {
    expect([7, 9, 17, 19, 23, 4, 5].map(periodForHour)).toEqual([
      "morning_peak",
      "off_peak",
      "evening_peak",
      "off_peak",
      "night",
      "night",
      "off_peak",
    ]);
    expect(hourOf("2024-03-01T18:10:00")).toBe(18);
    expect(hourOf("n/a")).toBeNull();
  });
});

describe("createRng", () => {
  it("replays the same sequence for the same seed", () => {
    const a = createRng("replay");
    const b = createRng("replay");
    expect([a.next(), a.int(1, 6), a.pick(["x", "y", "z"])]).toEqual([b.next(), b.int(1, 6), b.pick(["x", "y", "z"])]);
  });

  it("keeps forks independent of the parent's position", () => {
    const a = createRng("fork");
    const b = createRng("fork");
    b.next();
    expect(a.fork("child").next()).toBe(b.fork("child").next());
  });

  it("stays within integer bounds", () => {
    const rng = createRng(7);
    for (let i = 0; i < 200; i++) {
      const v = rng.int(2, 4);
      expect(v).toBeGreaterThanOrEqual(2);
      expect(v).toBeLessThanOrEqual(4);
    }
  });
});

describe("GantrySectionMap", () => {
  const sections = getGantrySectionMap();

  it("resolves the section of a known gantry", () => {
    expect(sections.sectionFor("G561553012000110010")).toEqual({
      section_id: "G5615530120",
      section_name: "Mawen Expressway",
    });
    expect(sections.isConsistent("G561553012000110010", "G5615530120", "Mawen Expressway")).toBe(true);
    expect(sections.isConsistent("G561553012000110010", "S0014530030", "Mawen Expressway")).toBe(false);
  });

  it("does not judge unknown gantries", () => {
    expect(sections.sectionFor("G999999999999999999")).toBeUndefined();
    expect(sections.isConsistent("G999999999999999999", "G5615530120", "x")).toBe(true);
  });
});

describe("SectionDateMap", () => {
  it("learns each section's dates from a pool", () => {
    const dates = SectionDateMap.fromRows([
      passengerFields({ transaction_time: "2024-03-02T08:15:00" }),
      passengerFields(),
      passengerFields(),
      truckFields({ transaction_time: "bad" }),
    ]);
    expect(dates.size).toBe(1);
    expect(dates.datesFor("G5615530120")).toEqual(["2024-03-01", "2024-03-02"]);
    expect(dates.datesFor("S0014530030")).toEqual([]);
  });

  it("checks the transaction day against the section's dates", () => {
    const dates = new SectionDateMap({ G5615530120: ["2024-03-01"], S0014530030: [] });
    expect(dates.isConsistent("G5615530120", "2024-03-01T23:59:59")).toBe(true);
    expect(dates.isConsistent("G5615530120", "2024-03-02T00:00:00")).toBe(false);
    expect(dates.isConsistent("G5615530120", "not a time")).toBe(false);
    expect(dates.isConsistent("S0014530030", "2024-03-02T00:00:00")).toBe(true);
    expect(dates.isConsistent(undefined, "2024-03-02T00:00:00")).toBe(true);
  });

  it("reads the day of a timestamp", () => {
    expect(dayOf("2024-03-01 08:15")).toBe("2024-03-01");
    expect(dayOf(20240301)).toBeNull();
  });
});

describe("computeLearnedStatistics", () => {
  const rows = [
    passengerFields({ pay_fee: 2000, fee_mileage: "40000" }),
    passengerFields({ pay_fee: 3000, fee_mileage: "60000" }),
    passengerFields({ pay_fee: 4000, fee_mileage: "80000" }),
  ];

  it("summarises each numeric field per category", () => {
    const stats = computeLearnedStatistics(rows);
    const passenger = stats.categories.passenger;
    expect(stats.sampleCount).toBe(3);
    expect(stats.categories.truck).toBeUndefined();
    expect(passenger?.sampleCount).toBe(3);
    expect(passenger?.fields.pay_fee).toMatchObject({ mean: 3000, min: 2000, max: 4000, count: 3 });
    expect(passenger?.feeMileageCorrelation).toBeCloseTo(1, 10);
    expect(Object.isFrozen(passenger)).toBe(true);
  });

  it("predicts fees from a strong regression", () => {
    const stats = computeLearnedStatistics(rows);
    const prediction = predictFee(stats, "passenger", 50_000);
    expect(prediction?.predicted).toBeCloseTo(2500, 6);
    expect(prediction?.residualStd).toBeCloseTo(0, 2);
    expect(predictFee(stats, "truck", 50_000)).toBeNull();
  });

  it("fits no regression on fewer than three pairs or flat fees", () => {
    expect(computeLearnedStatistics(rows.slice(0, 2)).categories.passenger?.feeRegression).toBeUndefined();
    const flat = computeLearnedStatistics([passengerFields(), passengerFields(), truckFields()]);
    expect(flat.categories.passenger?.feeRegression).toBeUndefined();
    expect(flat.categories.truck?.sampleCount).toBe(1);
  });
});
