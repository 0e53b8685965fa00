import { DomainRangeError } from "../../lib/errors.js";

export const SECONDS_PER_DAY = 86_400;
export const UNIX_EPOCH_JULIAN_DAY = 2_440_587.5;
export const J2000_JULIAN_DAY = 2_451_545.0;
export const DAYS_PER_JULIAN_CENTURY = 36_525;
export const TROPICAL_YEAR_DAYS = 365.242189;
export const TROPICAL_YEAR_SECONDS = TROPICAL_YEAR_DAYS * SECONDS_PER_DAY;

/** 2000-03-20T07:26Z, the March equinox used to anchor mean term estimates. */
export const MARCH_EQUINOX_2000_SECONDS =
  (2_451_623.80984 - UNIX_EPOCH_JULIAN_DAY) * SECONDS_PER_DAY;

/**
 * Largest |epochSeconds| accepted: the range of a JS Date, less two years for
 * the solar-term lookups around an instant.
 */
export const MAX_ABS_EPOCH_SECONDS = 8.64e12 - 2 * TROPICAL_YEAR_SECONDS;

/**
 * An absolute point in time plus the observer's longitude
 * (degrees, east positive).
 */
export interface Instant {
  readonly epochSeconds: number;
  readonly longitude: number;
}

export function createInstant(epochSeconds: number, longitude: number): Instant {
  if (!Number.isFinite(epochSeconds)) {
    throw new DomainRangeError(
      `Timestamp must be a finite number of seconds, got ${epochSeconds}`,
      epochSeconds
    );
  }
  if (Math.abs(epochSeconds) > MAX_ABS_EPOCH_SECONDS) {
    throw new DomainRangeError(
      `Timestamp must be within ±${MAX_ABS_EPOCH_SECONDS} seconds, got ${epochSeconds}`,
      epochSeconds
    );
  }
  assertLongitude(longitude);
  return Object.freeze({ epochSeconds, longitude });
}

export function assertLongitude(longitude: number, label = "Longitude"): void {
  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    throw new DomainRangeError(
      `${label} must be within [-180, 180] degrees, got ${longitude}`,
      longitude
    );
  }
}

export function julianDayFromEpochSeconds(epochSeconds: number): number {
  return epochSeconds / SECONDS_PER_DAY + UNIX_EPOCH_JULIAN_DAY;
}

export function julianCenturiesSinceJ2000(epochSeconds: number): number {
  return (
    (julianDayFromEpochSeconds(epochSeconds) - J2000_JULIAN_DAY) /
    DAYS_PER_JULIAN_CENTURY
  );
}

export function utcYearOf(epochSeconds: number): number {
  return new Date(epochSeconds * 1000).getUTCFullYear();
}

export function toIsoString(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toISOString();
}

/**
 * Civil date (YYYY-MM-DD) of a day counted from 1970-01-01.
 */
export function civilDateOfDayNumber(dayNumber: number): string {
  const [date] = new Date(dayNumber * SECONDS_PER_DAY * 1000).toISOString().split("T");
  return date;
}

export interface CivilDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

export function civilDatePartsOfDayNumber(dayNumber: number): CivilDate {
  const d = new Date(dayNumber * SECONDS_PER_DAY * 1000);
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() };
}

export function dayNumberOfCivilDate(date: string): number {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date);
  if (!match) {
    throw new DomainRangeError("Invalid date format; expected YYYY-MM-DD", date);
  }
  const ms = Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  return Math.round(ms / (SECONDS_PER_DAY * 1000));
}

export function normalizeDegrees(value: number): number {
  let v = value % 360;
  if (v < 0) v += 360;
  // -1e-17 + 360 rounds to 360
  return v >= 360 ? 0 : v;
}

/** Signed difference wrapped into [-180, 180). */
export function wrapDegrees180(value: number): number {
  return normalizeDegrees(value + 180) - 180;
}
