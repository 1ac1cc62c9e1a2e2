import { describe, it, expect, vi, afterEach } from "vitest";
import {
  FeeReasonablenessVerifier,
  ReviewCallbackVerifier,
  StatisticalReferenceVerifier,
  VehicleConsistencyVerifier,
  composeVerifiers,
  runVerifier,
} from "../services/curation/index.js";
import { computeLearnedStatistics } from "../services/statistics/index.js";
import { makeRecord, passengerFields, truckFields } from "./helpers.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("VehicleConsistencyVerifier", () => {
  const verifier = new VehicleConsistencyVerifier();

  it("corrects the axle count implied by the vehicle type", async () => {
    const [verified] = await verifier.verify([makeRecord(truckFields({ axle_count: "2" }))]);
    expect(verified.fields.axle_count).toBe("5");
    expect(verified.meta.correction_log).toEqual([
      {
        field: "axle_count",
        old: "2",
        new: "5",
        reason: "vehicle-consistency: vehicle_type 15 has 5 axles",
      },
    ]);
  });

  it("clamps passenger weight into the passenger range", async () => {
    const [verified] = await verifier.verify([makeRecord(passengerFields({ total_weight: "9000" }))]);
    expect(verified.fields.total_weight).toBe("5000");
  });

  it("returns consistent records untouched", async () => {
    const record = makeRecord(passengerFields());
    const [verified] = await verifier.verify([record]);
    expect(verified).toBe(record);
  });
});

describe("FeeReasonablenessVerifier", () => {
  it("flags a fee far from the tariff without changing it", async () => {
    const [verified] = await new FeeReasonablenessVerifier().verify([
      makeRecord(passengerFields({ pay_fee: 4000 })),
    ]);
    expect(verified.fields.pay_fee).toBe(4000);
    expect(verified.meta.validation_issues).toEqual([
      "fee-reasonableness: pay_fee deviates 78% from tariff 2250",
    ]);
  });
});

describe("StatisticalReferenceVerifier", () => {
  it("clamps values outside the observed range", async () => {
    const pool = [10_000, 20_000, 30_000].map((m) => passengerFields({ fee_mileage: String(m), pay_fee: m / 20 }));
    const verifier = new StatisticalReferenceVerifier(computeLearnedStatistics(pool));

    const [verified] = await verifier.verify([makeRecord(passengerFields({ total_weight: "4000", fee_mileage: "20000", pay_fee: 1000 }))]);
    expect(verified.fields.total_weight).toBe("3000");
    expect(verified.meta.correction_log).toEqual([
      {
        field: "total_weight",
        old: "4000",
        new: "3000",
        reason: "statistical-reference: outside reference range [3000, 3000]",
      },
    ]);
  });
});

describe("runVerifier", () => {
  it("keeps unverified records when the verifier throws", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const records = [makeRecord(passengerFields())];
    const failing = new ReviewCallbackVerifier(() => {
      throw new Error("reviewer offline");
    });

    const result = await runVerifier(failing, records);
    expect(result[0]).toBe(records[0]);
    expect(warn).toHaveBeenCalledWith(
      "[Verifier] human-review failed, keeping unverified records: reviewer offline"
    );
  });

  it("keeps unverified records when the count changes", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const records = [makeRecord(passengerFields()), makeRecord(truckFields())];
    const dropping = new ReviewCallbackVerifier((input) => input.slice(0, 1), "dropper");

    const result = await runVerifier(dropping, records);
    expect(result).toHaveLength(2);
    expect(result[1]).toBe(records[1]);
  });

  it("chains composed verifiers in order", async () => {
    const composed = composeVerifiers(new VehicleConsistencyVerifier(), new FeeReasonablenessVerifier());
    expect(composed.name).toBe("vehicle-consistency+fee-reasonableness");

    const [verified] = await runVerifier(composed, [
      makeRecord(truckFields({ axle_count: "3", pay_fee: 9000 })),
    ]);
    expect(verified.fields.axle_count).toBe("5");
    expect(verified.meta.validation_issues).toEqual([
      "fee-reasonableness: pay_fee deviates 205% from tariff 2950",
    ]);
  });
});
