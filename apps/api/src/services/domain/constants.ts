/**
 * Domain Constants
 *
 * Static reference tables for toll-gantry transactions: axle weight limits,
 * vehicle type codes, time-of-day periods, travel-time bounds, toll rates
 * and the partial scores used when a sample breaks a rule.
 *
 * Nothing here is mutable at runtime.
 */

// =============================================================================
// Label Vocabularies
// =============================================================================

export const VEHICLE_CATEGORIES = ["passenger", "truck", "special"] as const;
export const TIME_PERIODS = ["morning_peak", "evening_peak", "off_peak", "night"] as const;
export const SCENARIOS = ["normal", "overloaded", "anomalous"] as const;

export type VehicleCategory = (typeof VEHICLE_CATEGORIES)[number];
export type TimePeriod = (typeof TIME_PERIODS)[number];
export type Scenario = (typeof SCENARIOS)[number];

// =============================================================================
// Vehicles
// =============================================================================

/** Vehicle type codes: 1-4 passenger, 11-16 truck, 21-26 special-purpose */
export const VEHICLE_TYPE_CODES: Readonly<Record<VehicleCategory, readonly string[]>> = {
  passenger: ["1", "2", "3", "4"],
  truck: ["11", "12", "13", "14", "15", "16"],
  special: ["21", "22", "23", "24", "25", "26"],
};

/** Axle count implied by each vehicle type code */
export const EXPECTED_AXLES: Readonly<Record<string, string>> = {
  "1": "2", "2": "2", "3": "2", "4": "2",
  "11": "2", "12": "2", "13": "3", "14": "4", "15": "5", "16": "6",
  "21": "2", "22": "2", "23": "3", "24": "4", "25": "5", "26": "6",
};

/** Gross weight limit (kg) by axle count */
export const AXLE_WEIGHT_LIMITS: Readonly<Record<string, number>> = {
  "2": 18_000,
  "3": 25_000,
  "4": 31_000,
  "5": 43_000,
  "6": 49_000,
};

/** Limit used when the axle count is outside the table */
export const DEFAULT_WEIGHT_LIMIT = 49_000;

/** Weight beyond this multiple of the limit is treated as bad data, not overload */
export const DATA_ERROR_OVERLOAD_FACTOR = 1.5;

export const PASSENGER_WEIGHT_RANGE = { min: 2_000, max: 5_000 } as const;

// =============================================================================
// Time
// =============================================================================

export const PERIOD_BOUNDARIES = {
  morningStart: 7,
  morningEnd: 9,
  eveningStart: 17,
  eveningEnd: 19,
  nightStart: 23,
  nightEnd: 5,
} as const;

/** Hours used when a transaction time has to be produced for a period */
export const PERIOD_HOURS: Readonly<Record<TimePeriod, readonly number[]>> = {
  morning_peak: [7, 8],
  evening_peak: [17, 18],
  off_peak: [9, 10, 11, 12, 13, 14, 15, 16, 19, 20, 21, 22],
  night: [23, 0, 1, 2, 3, 4],
};

export const TRAVEL_TIME_HOURS = {
  /** Smallest gap the enhancer leaves between entrance and transaction */
  min: 0.5,
  /** Plausible upper bound for a single trip */
  max: 6,
} as const;

// =============================================================================
// Tariffs (yuan per km)
// =============================================================================

export const PASSENGER_RATES: Readonly<Record<string, number>> = {
  "1": 0.45,
  "2": 0.75,
  "3": 1.05,
  "4": 1.25,
};

/** Freight rate: 80% ordinary road, 20% bridge/tunnel */
export const FREIGHT_RATE = 0.45 * 0.8 + 1.15 * 0.2;

/** ETC (OBU) discount share of the payable fee */
export const ETC_DISCOUNT_RATE = 0.05;

// =============================================================================
// Filter partial scores
// =============================================================================

export const PARTIAL_SCORES = {
  timeOrderError: 0.3,
  timeTooLong: 0.8,
  timeUnparseable: 0,
  feeNegative: 0,
  discountExceedsFee: 0.4,
  feeOutOfBand: 0.6,
  passengerAxleMismatch: 0.6,
  truckAxleMismatch: 0.8,
  unknownAxleCount: 0.7,
  weightDataError: 0,
} as const;

export const DEFAULT_ACCEPT_THRESHOLD = 0.8;

// =============================================================================
// Reweighting tiers
// =============================================================================

export const QUALITY_TIER_THRESHOLDS = {
  high: 1.2,
  low: 0.8,
} as const;
