/**
 * Wall-clock timestamp helpers.
 *
 * Gantry timestamps carry no zone. They are parsed into UTC epoch
 * milliseconds and formatted back with UTC getters so that arithmetic never
 * depends on the host time zone.
 */

import { PERIOD_BOUNDARIES, type TimePeriod } from "./constants.js";

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?$/;

export const CANONICAL_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/;

export const HOUR_MS = 3_600_000;

/**
 * Parse a timestamp into epoch milliseconds, or null when it is not one.
 */
export function parseTimestamp(value: unknown): number | null {
  if (typeof value !== "string") return null;
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, y, mo, d, h, mi, s] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = s === undefined ? 0 : Number(s);
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const ms = Date.UTC(year, month - 1, day, hour, minute, second);
  // Reject dates such as Feb 30 that Date.UTC silently rolls over
  if (new Date(ms).getUTCDate() !== day) return null;
  return ms;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

export function formatTimestamp(ms: number): string {
  const d = new Date(ms);
  return (
    `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}` +
    `T${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`
  );
}

/** `YYYYMMDDHHmmss`, used inside transaction and pass identifiers */
export function compactStamp(ms: number): string {
  return formatTimestamp(ms).replace(/[-T:]/g, "");
}

/**
 * Canonical `YYYY-MM-DDTHH:mm:ss` form, or the trimmed input unchanged when
 * it cannot be parsed (so that downstream validation can reject it).
 */
export function normalizeTimestamp(value: string): string {
  const ms = parseTimestamp(value);
  return ms === null ? value.trim() : formatTimestamp(ms);
}

export function startOfDay(ms: number): number {
  return Math.floor(ms / (24 * HOUR_MS)) * 24 * HOUR_MS;
}

export function hourOf(value: unknown): number | null {
  const ms = parseTimestamp(value);
  return ms === null ? null : new Date(ms).getUTCHours();
}

export function periodForHour(hour: number): TimePeriod {
  const b = PERIOD_BOUNDARIES;
  if (hour >= b.morningStart && hour < b.morningEnd) return "morning_peak";
  if (hour >= b.eveningStart && hour < b.eveningEnd) return "evening_peak";
  if (hour >= b.nightStart || hour < b.nightEnd) return "night";
  return "off_peak";
}
