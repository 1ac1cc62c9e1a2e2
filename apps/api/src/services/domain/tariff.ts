/**
 * Closed-form toll estimator (Yunnan provincial tariff).
 *
 * Passenger classes pay a per-class rate. Trucks and special-purpose
 * vehicles pay the freight rate, a blend of ordinary and bridge/tunnel
 * segments. Results are in fen and truncated like the tariff tables.
 */

import { ETC_DISCOUNT_RATE, FREIGHT_RATE, PASSENGER_RATES } from "./constants.js";
import { toNumber } from "./vehicle.js";

export function ratePerKm(vehicleType: unknown): number {
  const code = String(toNumber(vehicleType) ?? "");
  return PASSENGER_RATES[code] ?? FREIGHT_RATE;
}

/**
 * Expected pay fee (fen) for a mileage in metres.
 */
export function calculateExpectedFee(mileageMeters: number, vehicleType: unknown): number {
  if (!Number.isFinite(mileageMeters) || mileageMeters <= 0) return 0;
  return Math.trunc((mileageMeters / 1000) * ratePerKm(vehicleType) * 100);
}

/** ETC discount for a payable fee; only OBU media (media_type 1) qualifies */
export function etcDiscount(payFee: number, mediaType: unknown): number {
  return String(mediaType) === "1" ? Math.floor(payFee * ETC_DISCOUNT_RATE) : 0;
}
