/**
 * Low-order solar theories.
 *
 * Both are closed-form series in time since J2000 and need no data files.
 * Accuracy is about 0.01°, i.e. solar terms land within a quarter hour.
 */

import {
  DAYS_PER_JULIAN_CENTURY,
  J2000_JULIAN_DAY,
  julianCenturiesSinceJ2000,
  julianDayFromEpochSeconds,
  normalizeDegrees,
} from "../time/instant.js";
import type { SolarLongitudeProvider } from "./provider.js";

const RAD = Math.PI / 180;

export interface MeanSolarElements {
  /** Geometric mean longitude, degrees (unnormalized). */
  meanLongitude: number;
  /** Mean anomaly, degrees (unnormalized). */
  meanAnomaly: number;
  eccentricity: number;
  /** Mean obliquity of the ecliptic, degrees. */
  obliquity: number;
  /** Longitude of the Moon's ascending node, degrees. */
  ascendingNode: number;
}

export function meanSolarElements(T: number): MeanSolarElements {
  return {
    meanLongitude: 280.46646 + 36000.76983 * T + 0.0003032 * T * T,
    meanAnomaly: 357.52911 + 35999.05029 * T - 0.0001537 * T * T,
    eccentricity: 0.016708634 - 0.000042037 * T - 0.0000001267 * T * T,
    obliquity: 23.4392911 - 0.0130042 * T,
    ascendingNode: 125.04 - 1934.136 * T,
  };
}

function equationOfCenter(T: number, M: number): number {
  const m = M * RAD;
  return (
    (1.914602 - 0.004817 * T - 0.000014 * T * T) * Math.sin(m) +
    (0.019993 - 0.000101 * T) * Math.sin(2 * m) +
    0.000289 * Math.sin(3 * m)
  );
}

/**
 * Mean longitude + equation of center, corrected for aberration and
 * nutation in longitude.
 */
export const meeusSunProvider: SolarLongitudeProvider = {
  name: "meeus",

  longitudeAt(epochSeconds: number): number {
    const T = julianCenturiesSinceJ2000(epochSeconds);
    const el = meanSolarElements(T);
    const trueLongitude = el.meanLongitude + equationOfCenter(T, el.meanAnomaly);
    const apparent =
      trueLongitude - 0.00569 - 0.00478 * Math.sin(el.ascendingNode * RAD);
    return normalizeDegrees(apparent);
  },

  rateAt(epochSeconds: number): number {
    const T = julianCenturiesSinceJ2000(epochSeconds);
    const m = meanSolarElements(T).meanAnomaly * RAD;
    const dMdt = (35999.05029 / DAYS_PER_JULIAN_CENTURY) * RAD;
    const dCdM =
      1.914602 * Math.cos(m) +
      2 * 0.019993 * Math.cos(2 * m) +
      3 * 0.000289 * Math.cos(3 * m);
    return 36000.76983 / DAYS_PER_JULIAN_CENTURY + dCdM * dMdt;
  },
};

/**
 * Two-term almanac series: L + 1.915 sin g + 0.020 sin 2g.
 */
export const almanacSunProvider: SolarLongitudeProvider = {
  name: "almanac",

  longitudeAt(epochSeconds: number): number {
    const n = julianDayFromEpochSeconds(epochSeconds) - J2000_JULIAN_DAY;
    const L = normalizeDegrees(280.46 + 0.9856474 * n);
    const g = normalizeDegrees(357.528 + 0.9856003 * n) * RAD;
    return normalizeDegrees(L + 1.915 * Math.sin(g) + 0.02 * Math.sin(2 * g));
  },

  rateAt(epochSeconds: number): number {
    const n = julianDayFromEpochSeconds(epochSeconds) - J2000_JULIAN_DAY;
    const g = (357.528 + 0.9856003 * n) * RAD;
    const dgdn = 0.9856003 * RAD;
    return (
      0.9856474 + 1.915 * Math.cos(g) * dgdn + 2 * 0.02 * Math.cos(2 * g) * dgdn
    );
  },
};
