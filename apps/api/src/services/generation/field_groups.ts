/**
 * Field-Group Schema
 *
 * Static declaration of the field groups a record is generated in and the
 * order they must run in. The order is a topological sort of the
 * `requires` edges, computed once when the schema is created; ties go to
 * the group declared first.
 *
 * Any of these is a configuration error and fails before generation starts:
 * - a group requiring an unknown group
 * - a dependency cycle
 * - two groups owning the same field
 * - a required record field owned by no group
 */

import {
  FeeGroupSchema,
  GANTRY_FIELD_NAMES,
  IdentityGroupSchema,
  StatusGroupSchema,
  TimeGroupSchema,
  VehicleGroupSchema,
  type GantryFieldName,
} from "../../schemas/index.js";
import { ConfigurationError } from "../errors.js";
import type { FieldGroup, FieldGroupSchema } from "./types.js";

export const DEFAULT_FIELD_GROUPS: readonly FieldGroup[] = [
  {
    name: "identity",
    fields: ["gantry_transaction_id", "pass_id", "gantry_id", "section_id", "section_name"],
    requires: [],
    payload: IdentityGroupSchema,
  },
  {
    name: "time",
    fields: ["transaction_time", "entrance_time"],
    requires: ["identity"],
    payload: TimeGroupSchema,
  },
  {
    name: "vehicle",
    fields: ["vehicle_type", "axle_count", "total_weight", "vehicle_sign"],
    requires: [],
    payload: VehicleGroupSchema,
  },
  {
    name: "status",
    fields: ["gantry_type", "media_type", "transaction_type", "pass_state", "cpu_card_type"],
    requires: ["vehicle"],
    payload: StatusGroupSchema,
  },
  {
    name: "fee",
    fields: ["pay_fee", "discount_fee", "fee_mileage"],
    requires: ["vehicle", "status"],
    payload: FeeGroupSchema,
  },
];

export function createFieldGroupSchema(
  groups: readonly FieldGroup[] = DEFAULT_FIELD_GROUPS,
  requiredFields: readonly GantryFieldName[] = GANTRY_FIELD_NAMES
): FieldGroupSchema {
  const byName = new Map<string, FieldGroup>();
  for (const group of groups) {
    if (byName.has(group.name)) {
      throw new ConfigurationError(`field group "${group.name}" is declared twice`);
    }
    byName.set(group.name, group);
  }

  const owner = new Map<GantryFieldName, string>();
  for (const group of groups) {
    for (const req of group.requires) {
      if (!byName.has(req)) {
        throw new ConfigurationError(`field group "${group.name}" requires unknown group "${req}"`);
      }
    }
    for (const field of group.fields) {
      const existing = owner.get(field);
      if (existing !== undefined) {
        throw new ConfigurationError(
          `field "${field}" is owned by both "${existing}" and "${group.name}"`
        );
      }
      owner.set(field, group.name);
    }
  }

  const missing = requiredFields.filter((field) => !owner.has(field));
  if (missing.length > 0) {
    throw new ConfigurationError(`no field group produces: ${missing.join(", ")}`);
  }

  return Object.freeze({ groups: byName, order: Object.freeze(topologicalOrder(groups)) });
}

/**
 * Kahn's algorithm. Among ready groups the earliest declared runs first.
 */
function topologicalOrder(groups: readonly FieldGroup[]): FieldGroup[] {
  const pending = new Map<string, number>();
  for (const group of groups) pending.set(group.name, new Set(group.requires).size);

  const order: FieldGroup[] = [];
  const done = new Set<string>();

  while (order.length < groups.length) {
    const next = groups.find((g) => !done.has(g.name) && pending.get(g.name) === 0);
    if (!next) {
      const stuck = groups.filter((g) => !done.has(g.name)).map((g) => g.name);
      throw new ConfigurationError(`field groups form a cycle: ${stuck.join(" -> ")}`);
    }
    order.push(next);
    done.add(next.name);
    for (const group of groups) {
      if (!done.has(group.name) && group.requires.includes(next.name)) {
        pending.set(group.name, (pending.get(group.name) ?? 0) - 1);
      }
    }
  }
  return order;
}
