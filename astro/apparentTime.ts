/**
 * Local apparent solar time.
 *
 * apparent = mean clock time + 4 min × (longitude − standard meridian) + EoT
 *
 * The day changes at apparent midnight, which drifts against clock midnight
 * through the year. Each day's start is resolved as an instant by fixed-point
 * iteration (the EoT term depends weakly on t), and those instants decide
 * which day an input belongs to.
 */

import { mod } from "../cyclic/sexagenaryUnit.js";
import type { EquationOfTimeCorrector } from "./equationOfTime.js";
import { solveFixedPoint } from "./rootFinding.js";
import {
  SECONDS_PER_DAY,
  assertLongitude,
  civilDateOfDayNumber,
  type Instant,
} from "./time/instant.js";

export type TimeBasis = "apparent_solar" | "mean_solar" | "standard_clock";

/**
 * midnight: the day starts at 00:00 local.
 * zi_start: the day starts with the Zi hour at 23:00 local of the previous date.
 */
export type DayBoundary = "midnight" | "zi_start";

export interface ApparentTimeOptions {
  timeBasis: TimeBasis;
  dayBoundary: DayBoundary;
  /** Convergence tolerance for day-start instants, seconds. */
  toleranceSeconds: number;
  maxIterations: number;
}

export interface ApparentSolarTime {
  epochSeconds: number;
  longitude: number;
  standardMeridian: number;
  timeBasis: TimeBasis;
  equationOfTimeMinutes: number;
  longitudeCorrectionMinutes: number;
  /** Local time minus standard clock time. */
  offsetMinutes: number;
  /** Local days since 1970-01-01. */
  dayNumber: number;
  /** Civil date the day is counted under (YYYY-MM-DD). */
  date: string;
  /** Instant at which this local day began. */
  dayStartSeconds: number;
  /** Seconds elapsed since the day began, [0, 86400). */
  secondsSinceDayStart: number;
  /** Local wall-clock time of day, [0, 86400). */
  secondsOfDay: number;
}

const ZI_START_LEAD_SECONDS = 3_600;

export class ApparentTimeConverter {
  constructor(
    private readonly corrector: EquationOfTimeCorrector,
    private readonly options: ApparentTimeOptions
  ) {}

  private boundaryShift(): number {
    return this.options.dayBoundary === "zi_start" ? ZI_START_LEAD_SECONDS : 0;
  }

  /** Seconds to add to UT to get local time under the configured basis. */
  offsetSeconds(epochSeconds: number, longitude: number, standardMeridian: number): number {
    switch (this.options.timeBasis) {
      case "standard_clock":
        return 240 * standardMeridian;
      case "mean_solar":
        return 240 * longitude;
      case "apparent_solar":
        return 240 * longitude + 60 * this.corrector.minutesAt(epochSeconds);
    }
  }

  localSeconds(epochSeconds: number, longitude: number, standardMeridian: number): number {
    return epochSeconds + this.offsetSeconds(epochSeconds, longitude, standardMeridian);
  }

  /**
   * Instant at which local day `dayNumber` begins.
   */
  dayStartOf(dayNumber: number, longitude: number, standardMeridian: number): number {
    const target = dayNumber * SECONDS_PER_DAY - this.boundaryShift();
    const { root } = solveFixedPoint(
      (t) => t + (target - this.localSeconds(t, longitude, standardMeridian)),
      target,
      {
        tolerance: this.options.toleranceSeconds,
        maxIterations: this.options.maxIterations,
        subject: `Start of local day ${dayNumber}`,
      }
    );
    return root;
  }

  convert(instant: Instant, standardMeridian: number): ApparentSolarTime {
    assertLongitude(standardMeridian, "Standard meridian");
    const { epochSeconds: t, longitude } = instant;
    const shift = this.boundaryShift();

    const equationOfTimeMinutes =
      this.options.timeBasis === "apparent_solar" ? this.corrector.minutesAt(t) : 0;
    const longitudeCorrectionMinutes =
      this.options.timeBasis === "standard_clock" ? 0 : 4 * (longitude - standardMeridian);
    const offsetMinutes = longitudeCorrectionMinutes + equationOfTimeMinutes;
    const local = t + 240 * standardMeridian + 60 * offsetMinutes;

    let dayNumber = Math.floor((local + shift) / SECONDS_PER_DAY);
    let dayStartSeconds = this.dayStartOf(dayNumber, longitude, standardMeridian);
    if (t < dayStartSeconds) {
      dayNumber -= 1;
      dayStartSeconds = this.dayStartOf(dayNumber, longitude, standardMeridian);
    } else {
      const nextStart = this.dayStartOf(dayNumber + 1, longitude, standardMeridian);
      if (t >= nextStart) {
        dayNumber += 1;
        dayStartSeconds = nextStart;
      }
    }

    const sinceStart = local + shift - dayNumber * SECONDS_PER_DAY;
    const secondsSinceDayStart = Math.min(
      Math.max(sinceStart, 0),
      SECONDS_PER_DAY - 1e-6
    );

    return Object.freeze({
      epochSeconds: t,
      longitude,
      standardMeridian,
      timeBasis: this.options.timeBasis,
      equationOfTimeMinutes,
      longitudeCorrectionMinutes,
      offsetMinutes,
      dayNumber,
      date: civilDateOfDayNumber(dayNumber),
      dayStartSeconds,
      secondsSinceDayStart,
      secondsOfDay: mod(local, SECONDS_PER_DAY),
    });
  }
}

/** Nearest multiple of 15° to the longitude. */
export function inferStandardMeridian(longitude: number): number {
  const meridian = Math.round(longitude / 15) * 15;
  // -0 from rounding small negative longitudes
  return meridian === 0 ? 0 : meridian;
}
