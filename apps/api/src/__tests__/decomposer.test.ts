import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  MockOracle,
  RuleGenerator,
  SampleDecomposer,
  createFieldGroupSchema,
  parseFieldGroupPrompt,
  type TextGenerationOracle,
} from "../services/generation/index.js";
import { SampleFilter } from "../services/curation/index.js";
import { deriveLabels } from "../services/domain/labels.js";
import { getGantrySectionMap } from "../services/domain/gantry_sections.js";
import { createRng } from "../services/domain/rng.js";
import { SectionDateMap } from "../services/domain/section_dates.js";
import { GANTRY_FIELD_NAMES, type GenerationCondition } from "../schemas/index.js";

const schema = createFieldGroupSchema();
const rules = new RuleGenerator({ sections: getGantrySectionMap() });

const OVERLOADED_NIGHT_TRUCK: GenerationCondition = {
  vehicle_category: "truck",
  time_period: "night",
  scenario: "overloaded",
  base_time: "2024-03-01T00:00:00",
};

/**
 * Answers from the mock oracle except for the groups given an override.
 */
function scriptedOracle(overrides: Record<string, (prompt: string) => Promise<unknown>>): TextGenerationOracle {
  const fallback = new MockOracle(schema, rules, { seed: "scripted" });
  return {
    name: "scripted",
    generate: (prompt, signal) => {
      const override = overrides[parseFieldGroupPrompt(prompt).group];
      return override ? override(prompt) : fallback.generate(prompt, signal);
    },
  };
}

describe("SampleDecomposer", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("fills every field and respects the condition", async () => {
    const decomposer = new SampleDecomposer({ schema, oracle: new MockOracle(schema, rules), rules });
    const record = await decomposer.decompose(OVERLOADED_NIGHT_TRUCK, [], 7);

    for (const field of GANTRY_FIELD_NAMES) {
      expect(record.fields[field]).toBeDefined();
    }
    expect(deriveLabels(record.fields)).toEqual({
      vehicle_category: "truck",
      time_period: "night",
      scenario: "overloaded",
    });
    expect(record.meta.generation_index).toBe(7);
    expect(record.meta.fallback_groups).toEqual([]);
    expect(new SampleFilter().evaluate(record).score).toBe(1);
  });

  it("falls back to rules for a failing group only", async () => {
    const oracle = new MockOracle(schema, rules, { failGroups: ["fee"] });
    const decomposer = new SampleDecomposer({ schema, oracle, rules });
    const record = await decomposer.decompose(OVERLOADED_NIGHT_TRUCK, []);

    expect(record.meta.fallback_groups).toEqual(["fee"]);
    expect(record.meta.correction_log).toEqual([
      { field: "fee", old: null, new: null, reason: 'fallback: mock oracle refuses group "fee"' },
    ]);
    expect(typeof record.fields.pay_fee).toBe("number");
    expect(record.fields.pay_fee ?? -1).toBeGreaterThanOrEqual(0);
    expect(record.fields.fee_mileage).toMatch(/^\d+$/);
    expect(console.warn).toHaveBeenCalledWith('[Decomposer] Group "fee" fell back to rules: mock oracle refuses group "fee"');
    expect(oracle.callCount).toBe(5);
  });

  it("rejects a schema-invalid reply and uses rules instead", async () => {
    const oracle = scriptedOracle({
      vehicle: async () => ({ vehicle_type: "12", axle_count: "two", total_weight: "20000", vehicle_sign: "0x00" }),
    });
    const record = await new SampleDecomposer({ schema, oracle, rules }).decompose(OVERLOADED_NIGHT_TRUCK, []);

    expect(record.meta.fallback_groups).toEqual(["vehicle"]);
    expect(record.meta.correction_log[0].reason).toMatch(/^fallback: \[ORACLE\] invalid vehicle reply: axle_count/);
    expect(record.fields.axle_count).toMatch(/^\d$/);
  });

  it("treats a reply missing requested fields as invalid", async () => {
    const oracle = scriptedOracle({ time: async () => ({ transaction_time: "2024-03-01T23:30:00" }) });
    const record = await new SampleDecomposer({ schema, oracle, rules }).decompose(OVERLOADED_NIGHT_TRUCK, []);

    expect(record.meta.fallback_groups).toEqual(["time"]);
    expect(record.meta.correction_log[0].reason).toBe("fallback: [ORACLE] invalid time reply: entrance_time Required");
  });

  it("times out a hung oracle call", async () => {
    const oracle = scriptedOracle({ status: () => new Promise<never>(() => undefined) });
    const decomposer = new SampleDecomposer({ schema, oracle, rules }, { timeoutMs: 20 });
    const record = await decomposer.decompose(OVERLOADED_NIGHT_TRUCK, []);

    expect(record.meta.fallback_groups).toEqual(["status"]);
    expect(record.meta.correction_log[0].reason).toBe(
      'fallback: [ORACLE] oracle timed out on "status" after 20ms'
    );
  });

  it("never lets a later group overwrite earlier fields", async () => {
    const oracle = scriptedOracle({
      identity: async () => ({
        gantry_transaction_id: "G56155301200011001020240301233000001",
        pass_id: "015301000000000000000120240301233000",
        gantry_id: "G561553012000110010",
        section_id: "G5615530120",
        section_name: "Mawen Expressway",
      }),
      fee: async () => ({ pay_fee: 1200, discount_fee: 60, fee_mileage: "20000", gantry_id: "S001453003000220010" }),
    });
    const record = await new SampleDecomposer({ schema, oracle, rules }).decompose(OVERLOADED_NIGHT_TRUCK, []);

    expect(record.fields.gantry_id).toBe("G561553012000110010");
    expect(record.fields.pay_fee).toBe(1200);
    expect(record.meta.fallback_groups).toEqual([]);
  });

  it("produces identical records from identical seeds", async () => {
    const make = () =>
      new SampleDecomposer(
        { schema, oracle: new MockOracle(schema, rules, { seed: 11 }), rules },
        { seed: "repeatable" }
      );
    const first = await make().decompose(OVERLOADED_NIGHT_TRUCK, [], 3);
    const second = await make().decompose(OVERLOADED_NIGHT_TRUCK, [], 3);
    expect(second).toEqual(first);
  });
});

describe("RuleGenerator", () => {
  it("dates transactions on a known section from that section's dates", () => {
    const dated = new RuleGenerator({
      sections: getGantrySectionMap(),
      sectionDates: new SectionDateMap({ G5615530120: ["2023-03-05"] }),
    });
    const time = schema.groups.get("time");
    if (!time) throw new Error("missing time group");

    const known = dated.generate(time, OVERLOADED_NIGHT_TRUCK, { section_id: "G5615530120" }, createRng("dates"));
    expect(String(known.transaction_time).slice(0, 10)).toBe("2023-03-05");

    const other = dated.generate(time, OVERLOADED_NIGHT_TRUCK, { section_id: "S0014530030" }, createRng("dates"));
    expect(String(other.transaction_time).slice(0, 10)).toBe("2024-03-01");
  });
});
