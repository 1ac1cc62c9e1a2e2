import { describe, it, expect } from "vitest";
import { createFieldGroupSchema, DEFAULT_FIELD_GROUPS } from "../services/generation/index.js";
import type { FieldGroup } from "../services/generation/index.js";
import { ConfigurationError } from "../services/errors.js";

function withGroup(name: string, patch: Partial<FieldGroup>): FieldGroup[] {
  return DEFAULT_FIELD_GROUPS.map((group) => (group.name === name ? { ...group, ...patch } : group));
}

describe("createFieldGroupSchema", () => {
  it("orders the default groups by prerequisite, then declaration", () => {
    const schema = createFieldGroupSchema();
    expect(schema.order.map((g) => g.name)).toEqual(["identity", "time", "vehicle", "status", "fee"]);
  });

  it("places every group after all of its prerequisites", () => {
    const schema = createFieldGroupSchema();
    const position = new Map(schema.order.map((g, i) => [g.name, i]));
    for (const group of schema.order) {
      for (const req of group.requires) {
        expect(position.get(req)).toBeLessThan(position.get(group.name) ?? -1);
      }
    }
  });

  it("moves a group behind a prerequisite declared later", () => {
    const reordered = [
      DEFAULT_FIELD_GROUPS[4],
      DEFAULT_FIELD_GROUPS[3],
      DEFAULT_FIELD_GROUPS[2],
      DEFAULT_FIELD_GROUPS[1],
      DEFAULT_FIELD_GROUPS[0],
    ];
    const schema = createFieldGroupSchema(reordered);
    expect(schema.order.map((g) => g.name)).toEqual(["vehicle", "status", "fee", "identity", "time"]);
  });

  it("rejects a dependency cycle", () => {
    const groups = withGroup("identity", { requires: ["time"] });
    expect(() => createFieldGroupSchema(groups)).toThrow(ConfigurationError);
    expect(() => createFieldGroupSchema(groups)).toThrow("field groups form a cycle: identity -> time");
  });

  it("rejects an unknown prerequisite", () => {
    const groups = withGroup("fee", { requires: ["vehicle", "tariff"] });
    expect(() => createFieldGroupSchema(groups)).toThrow('field group "fee" requires unknown group "tariff"');
  });

  it("rejects a field owned by two groups", () => {
    const groups = withGroup("status", {
      fields: ["gantry_type", "media_type", "transaction_type", "pass_state", "cpu_card_type", "vehicle_sign"],
    });
    expect(() => createFieldGroupSchema(groups)).toThrow(
      'field "vehicle_sign" is owned by both "vehicle" and "status"'
    );
  });

  it("rejects a schema that leaves a record field unproduced", () => {
    const groups = withGroup("fee", { fields: ["pay_fee", "discount_fee"] });
    expect(() => createFieldGroupSchema(groups)).toThrow("no field group produces: fee_mileage");
  });

  it("rejects a group declared twice", () => {
    expect(() => createFieldGroupSchema([...DEFAULT_FIELD_GROUPS, DEFAULT_FIELD_GROUPS[0]])).toThrow(
      'field group "identity" is declared twice'
    );
  });
});
