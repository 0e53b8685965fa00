import {
  MARCH_EQUINOX_2000_SECONDS,
  SECONDS_PER_DAY,
  TROPICAL_YEAR_SECONDS,
  normalizeDegrees,
} from "../time/instant.js";
import type { SolarLongitudeProvider } from "./provider.js";

export interface LinearSunOptions {
  /** Instant at which the longitude is 0°. */
  zeroAtSeconds?: number;
  periodSeconds?: number;
  /** Omit rateAt so locators must bisect. */
  withoutRate?: boolean;
}

/**
 * Deterministic model: longitude = 360 · (t − t0) / period, mod 360.
 */
export function createLinearSunProvider(
  options: LinearSunOptions = {}
): SolarLongitudeProvider {
  const t0 = options.zeroAtSeconds ?? MARCH_EQUINOX_2000_SECONDS;
  const period = options.periodSeconds ?? TROPICAL_YEAR_SECONDS;
  const degreesPerDay = (360 * SECONDS_PER_DAY) / period;

  const longitudeAt = (epochSeconds: number): number =>
    normalizeDegrees((360 * (epochSeconds - t0)) / period);

  if (options.withoutRate) {
    return { name: "linear", longitudeAt };
  }
  return { name: "linear", longitudeAt, rateAt: () => degreesPerDay };
}
