/**
 * Vehicle classification rules.
 *
 * Maps vehicle type codes to categories, expected axle counts and gross
 * weight limits. Codes outside the known ranges classify as passenger so
 * that labelling stays a total function.
 */

import {
  AXLE_WEIGHT_LIMITS,
  DEFAULT_WEIGHT_LIMIT,
  EXPECTED_AXLES,
  type VehicleCategory,
} from "./constants.js";

function toCode(value: unknown): number | null {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    return Number(value.trim());
  }
  return null;
}

export function categoryForVehicleType(vehicleType: unknown): VehicleCategory {
  const code = toCode(vehicleType);
  if (code === null) return "passenger";
  if (code >= 11 && code <= 16) return "truck";
  if (code >= 21 && code <= 26) return "special";
  return "passenger";
}

export function expectedAxlesFor(vehicleType: unknown): string | undefined {
  const code = toCode(vehicleType);
  return code === null ? undefined : EXPECTED_AXLES[String(code)];
}

export function isKnownAxleCount(axleCount: unknown): boolean {
  const code = toCode(axleCount);
  return code !== null && String(code) in AXLE_WEIGHT_LIMITS;
}

/**
 * Gross weight limit for an axle count; unknown counts get the six-axle limit.
 */
export function weightLimitFor(axleCount: unknown): number {
  const code = toCode(axleCount);
  if (code === null) return DEFAULT_WEIGHT_LIMIT;
  return AXLE_WEIGHT_LIMITS[String(code)] ?? DEFAULT_WEIGHT_LIMIT;
}

/** Parse a digit-string or numeric field; null when it is neither */
export function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}
