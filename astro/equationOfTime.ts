/**
 * Equation of Time: apparent minus mean solar time, in minutes.
 *
 * Positive when the true Sun is ahead of the mean Sun (early November,
 * about +16.4 min); negative in mid-February (about −14.2 min).
 *
 * The series works in the Sun's mean longitude L0 and mean anomaly M, both
 * continuous in time, so the result has no jump at civil year boundaries and
 * repeats with the tropical year up to slow secular drift.
 */

import { OutOfRangeError, type SearchWindow } from "../lib/errors.js";
import { meanSolarElements } from "./ephemeris/seriesSun.js";
import { sampleLongitude, type SolarLongitudeProvider } from "./ephemeris/provider.js";
import { julianCenturiesSinceJ2000, wrapDegrees180 } from "./time/instant.js";

const RAD = Math.PI / 180;
const MINUTES_PER_DEGREE = 4;
const MINUTES_PER_RADIAN = MINUTES_PER_DEGREE / RAD;

export type EquationOfTimeSeriesOrder = 1 | 2;
export type EquationOfTimeSource = "series" | "provider";

export interface EquationOfTimeOptions {
  seriesOrder: EquationOfTimeSeriesOrder;
  source: EquationOfTimeSource;
  /** Required when source is "provider". */
  provider?: SolarLongitudeProvider;
  /** Instants outside this window fail with OutOfRangeError. */
  validity?: SearchWindow;
}

/**
 * Expansion in e and y = tan²(ε/2). Order 1 keeps the linear terms; order 2
 * adds the quadratic ones, which are worth up to about a minute.
 */
export function equationOfTimeSeries(
  T: number,
  order: EquationOfTimeSeriesOrder
): number {
  const el = meanSolarElements(T);
  const L0 = el.meanLongitude * RAD;
  const M = el.meanAnomaly * RAD;
  const e = el.eccentricity;
  const y = Math.tan((el.obliquity * RAD) / 2) ** 2;

  let E = y * Math.sin(2 * L0) - 2 * e * Math.sin(M);
  if (order >= 2) {
    E +=
      4 * e * y * Math.sin(M) * Math.cos(2 * L0) -
      0.5 * y * y * Math.sin(4 * L0) -
      1.25 * e * e * Math.sin(2 * M);
  }
  return E * MINUTES_PER_RADIAN;
}

/**
 * E = L0 − 0.0057183° − α + Δψ cos ε, with the right ascension α taken from
 * the provider's apparent longitude.
 */
export function equationOfTimeFromLongitude(T: number, apparentLongitude: number): number {
  const el = meanSolarElements(T);
  const omega = el.ascendingNode * RAD;
  const nutationInLongitude = -0.00478 * Math.sin(omega);
  const epsilon = (el.obliquity + 0.00256 * Math.cos(omega)) * RAD;

  const lambda = apparentLongitude * RAD;
  const alpha =
    Math.atan2(Math.cos(epsilon) * Math.sin(lambda), Math.cos(lambda)) / RAD;

  const E =
    el.meanLongitude - 0.0057183 - alpha + nutationInLongitude * Math.cos(epsilon);
  return wrapDegrees180(E) * MINUTES_PER_DEGREE;
}

export class EquationOfTimeCorrector {
  constructor(private readonly options: EquationOfTimeOptions) {
    if (options.source === "provider" && !options.provider) {
      throw new Error('Equation of Time source "provider" needs a solar longitude provider');
    }
  }

  minutesAt(epochSeconds: number): number {
    const { validity } = this.options;
    if (
      validity &&
      (epochSeconds < validity.startSeconds || epochSeconds > validity.endSeconds)
    ) {
      throw new OutOfRangeError(epochSeconds, validity);
    }

    const T = julianCenturiesSinceJ2000(epochSeconds);
    const { provider } = this.options;
    if (this.options.source === "provider" && provider) {
      const sample = sampleLongitude(provider, epochSeconds);
      return equationOfTimeFromLongitude(T, sample.longitude);
    }
    return equationOfTimeSeries(T, this.options.seriesOrder);
  }
}
