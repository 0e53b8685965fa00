/**
 * Temporal coordinate normalizer.
 *
 * instant → apparent solar time (day and hour pillars)
 *         → solar-term crossings (month and year pillars)
 *         → TemporalCoordinateSet
 *
 * Conversions are synchronous and independent of each other; the only
 * state shared between them is the read-mostly SolarTermCache.
 */

import {
  ApparentTimeConverter,
  inferStandardMeridian,
  type ApparentSolarTime,
} from "../astro/apparentTime.js";
import { sampleLongitude, type SolarLongitudeProvider } from "../astro/ephemeris/provider.js";
import { meeusSunProvider } from "../astro/ephemeris/seriesSun.js";
import { EquationOfTimeCorrector } from "../astro/equationOfTime.js";
import {
  MEAN_SECONDS_PER_DEGREE,
  SolarTermCache,
  SolarTermLocator,
  type SolarTermNode,
} from "../astro/solarTerms.js";
import {
  TROPICAL_YEAR_SECONDS,
  civilDatePartsOfDayNumber,
  createInstant,
  dayNumberOfCivilDate,
  normalizeDegrees,
  utcYearOf,
  type Instant,
} from "../astro/time/instant.js";
import { SexagenaryUnit, mod } from "../cyclic/sexagenaryUnit.js";
import { errorCodeOf } from "../lib/errors.js";
import { chronosLog, chronosLogHelpers, type ChronosLogger } from "../logging/chronosLog.js";
import { resolveConfig, type NormalizerConfig, type NormalizerConfigInput } from "./config.js";

const SECONDS_PER_HOUR_SLOT = 7_200;
const MONTHS_PER_YEAR = 12;
const MONTH_SPAN_DEG = 30;
const HALF_YEAR_SECONDS = TROPICAL_YEAR_SECONDS / 2;

export interface PillarBoundaries {
  /** Sectional term that opened the month. */
  month: SolarTermNode;
  /** Months since the run origin, 0..11. */
  monthOrdinal: number;
  /** Crossing that opened the year; null under a fixed-date policy. */
  year: SolarTermNode | null;
  /** Civil year holding most of the governing solar year. */
  solarYear: number;
}

export interface TemporalCoordinateSet {
  readonly year: SexagenaryUnit;
  readonly month: SexagenaryUnit;
  readonly day: SexagenaryUnit;
  readonly hour: SexagenaryUnit;
  readonly instant: Instant;
  readonly apparentTime: ApparentSolarTime;
  /**
   * Local apparent time minus standard clock time, minutes. Relative to the
   * standard meridian, which follows the longitude unless configured, so it
   * stays within about half an hour of zero.
   */
  readonly apparentOffsetMinutes: number;
  /** Local apparent time minus UT, minutes. */
  readonly utcOffsetMinutes: number;
  readonly boundaries: PillarBoundaries;
}

export type ConversionResult =
  | { ok: true; value: TemporalCoordinateSet }
  | { ok: false; error: Error };

export interface NormalizerDependencies {
  provider?: SolarLongitudeProvider;
  cache?: SolarTermCache;
  logger?: ChronosLogger;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class TemporalCoordinateNormalizer {
  readonly config: NormalizerConfig;
  readonly provider: SolarLongitudeProvider;
  readonly locator: SolarTermLocator;
  readonly converter: ApparentTimeConverter;
  private readonly referenceDayNumber: number;
  private readonly log: ReturnType<typeof chronosLogHelpers>;

  constructor(config: NormalizerConfigInput = {}, deps: NormalizerDependencies = {}) {
    this.config = resolveConfig(config);
    this.provider = deps.provider ?? meeusSunProvider;
    const logger = deps.logger ?? chronosLog;
    this.log = chronosLogHelpers(logger);

    this.locator = new SolarTermLocator(this.provider, {
      toleranceDeg: this.config.rootFindTolerance,
      maxIterations: this.config.rootFindMaxIterations,
      scanStepDays: this.config.termScanStepDays,
      marginDays: this.config.termSearchMarginDays,
      cache: deps.cache,
      logger,
    });

    const corrector = new EquationOfTimeCorrector({
      seriesOrder: this.config.equationOfTimeSeriesOrder,
      source: this.config.equationOfTimeSource,
      provider: this.provider,
      validity: this.config.equationOfTimeValidity,
    });
    this.converter = new ApparentTimeConverter(corrector, {
      timeBasis: this.config.timeBasis,
      dayBoundary: this.config.dayBoundary,
      toleranceSeconds: this.config.midnightToleranceSeconds,
      maxIterations: this.config.rootFindMaxIterations,
    });

    this.referenceDayNumber = dayNumberOfCivilDate(this.config.referenceEpoch.day.date);
  }

  convert(timestamp: number, longitude: number): TemporalCoordinateSet {
    const instant = createInstant(timestamp, longitude);
    const meridian = this.config.standardMeridian ?? inferStandardMeridian(longitude);

    const apparentTime = this.converter.convert(instant, meridian);
    const day = this.dayPillar(apparentTime.dayNumber);
    const hour = this.hourPillar(day, apparentTime.secondsSinceDayStart);
    const monthInfo = this.monthPillar(instant.epochSeconds);
    const yearInfo = this.yearPillar(instant.epochSeconds, apparentTime);

    return Object.freeze({
      year: yearInfo.unit,
      month: monthInfo.unit,
      day,
      hour,
      instant,
      apparentTime,
      apparentOffsetMinutes: apparentTime.offsetMinutes,
      utcOffsetMinutes: 4 * apparentTime.standardMeridian + apparentTime.offsetMinutes,
      boundaries: Object.freeze({
        month: monthInfo.node,
        monthOrdinal: monthInfo.ordinal,
        year: yearInfo.node,
        solarYear: yearInfo.solarYear,
      }),
    });
  }

  tryConvert(timestamp: number, longitude: number): ConversionResult {
    try {
      return { ok: true, value: this.convert(timestamp, longitude) };
    } catch (err) {
      return { ok: false, error: toError(err) };
    }
  }

  /**
   * One result per input, in input order. A failing item is reported in
   * place and does not stop the others.
   */
  convertBatch(timestamps: readonly number[], longitude: number): ConversionResult[] {
    let failed = 0;
    const results = timestamps.map((timestamp, index) => {
      const result = this.tryConvert(timestamp, longitude);
      if (!result.ok) {
        failed += 1;
        this.log.conversionFailed({
          index,
          epoch_seconds: timestamp,
          error_code: errorCodeOf(result.error),
          error_message: result.error.message,
        });
      }
      return result;
    });

    this.log.batchCompleted({ count: timestamps.length, failed });
    return results;
  }

  yearUnitFor(solarYear: number): SexagenaryUnit {
    const ref = this.config.referenceEpoch.year;
    return SexagenaryUnit.fromValue(mod(ref.value + solarYear - ref.year, 60));
  }

  private dayPillar(dayNumber: number): SexagenaryUnit {
    const ref = this.config.referenceEpoch.day;
    return SexagenaryUnit.fromValue(mod(ref.value + dayNumber - this.referenceDayNumber, 60));
  }

  /**
   * Twelve two-hour slots with Zi centered on midnight. Under the midnight
   * boundary 23:00–24:00 is the day's thirteenth slot, which carries the next
   * Zi stem.
   */
  private hourPillar(day: SexagenaryUnit, secondsSinceDayStart: number): SexagenaryUnit {
    const lead = this.config.dayBoundary === "midnight" ? 3_600 : 0;
    const ordinal = Math.floor((secondsSinceDayStart + lead) / SECONDS_PER_HOUR_SLOT);
    const start = this.config.cycleTables.hourStemStarts[day.stem % 5];
    return SexagenaryUnit.fromStemBranch(mod(start + ordinal, 10), ordinal % 12);
  }

  private monthPillar(t: number): { unit: SexagenaryUnit; node: SolarTermNode; ordinal: number } {
    const { monthOrigin, monthStemStarts } = this.config.cycleTables;
    const { longitude } = sampleLongitude(this.provider, t);

    let ordinal = Math.min(
      Math.floor(normalizeDegrees(longitude - monthOrigin.longitude) / MONTH_SPAN_DEG),
      MONTHS_PER_YEAR - 1
    );
    let target = normalizeDegrees(monthOrigin.longitude + MONTH_SPAN_DEG * ordinal);
    const approx = t - normalizeDegrees(longitude - target) * MEAN_SECONDS_PER_DEGREE;

    let node = this.locator.nearest(target, approx);
    if (node.epochSeconds > t) {
      // Longitude sits within tolerance of the boundary; the previous term governs.
      ordinal = (ordinal + MONTHS_PER_YEAR - 1) % MONTHS_PER_YEAR;
      target = normalizeDegrees(target - MONTH_SPAN_DEG);
      node = this.locator.nearest(target, approx - MONTH_SPAN_DEG * MEAN_SECONDS_PER_DEGREE);
    }

    const originNode = this.locator.nearest(
      monthOrigin.longitude,
      node.epochSeconds - ordinal * MONTH_SPAN_DEG * MEAN_SECONDS_PER_DEGREE
    );
    const yearStem = this.yearUnitFor(solarYearOf(originNode)).stem;

    const unit = SexagenaryUnit.fromStemBranch(
      mod(monthStemStarts[yearStem % 5] + ordinal, 10),
      (monthOrigin.branch + ordinal) % 12
    );
    return { unit, node, ordinal };
  }

  private yearPillar(
    t: number,
    apparentTime: ApparentSolarTime
  ): { unit: SexagenaryUnit; node: SolarTermNode | null; solarYear: number } {
    const policy = this.config.yearBoundaryPolicy;

    if (policy.kind === "fixedDate") {
      const { year, month, day } = civilDatePartsOfDayNumber(apparentTime.dayNumber);
      const reached = month > policy.month || (month === policy.month && day >= policy.day);
      const solarYear = reached ? year : year - 1;
      return { unit: this.yearUnitFor(solarYear), node: null, solarYear };
    }

    const node = this.locator.mostRecent(policy.longitude, t);
    const solarYear = solarYearOf(node);
    return { unit: this.yearUnitFor(solarYear), node, solarYear };
  }
}

/**
 * A solar year is named after the civil year holding most of it.
 */
function solarYearOf(openingNode: SolarTermNode): number {
  return utcYearOf(openingNode.epochSeconds + HALF_YEAR_SECONDS);
}

export function createNormalizer(options: {
  config?: NormalizerConfigInput;
  provider?: SolarLongitudeProvider;
  cache?: SolarTermCache;
  logger?: ChronosLogger;
} = {}): TemporalCoordinateNormalizer {
  const { config, ...deps } = options;
  return new TemporalCoordinateNormalizer(config, deps);
}

/**
 * Caches shared by the one-shot entry points, per provider and per root-find
 * settings, so repeated calls reuse resolved terms.
 */
const sharedCaches = new WeakMap<SolarLongitudeProvider, Map<string, SolarTermCache>>();

export function sharedCacheFor(
  provider: SolarLongitudeProvider,
  config: NormalizerConfig
): SolarTermCache {
  const key = [
    config.rootFindTolerance,
    config.rootFindMaxIterations,
    config.termSearchMarginDays,
    config.termScanStepDays,
  ].join("|");

  let byKey = sharedCaches.get(provider);
  if (!byKey) {
    byKey = new Map();
    sharedCaches.set(provider, byKey);
  }
  let cache = byKey.get(key);
  if (!cache) {
    cache = new SolarTermCache();
    byKey.set(key, cache);
  }
  return cache;
}

function oneShotNormalizer(
  config: NormalizerConfigInput,
  deps: NormalizerDependencies
): TemporalCoordinateNormalizer {
  const provider = deps.provider ?? meeusSunProvider;
  const cache = deps.cache ?? sharedCacheFor(provider, resolveConfig(config));
  return new TemporalCoordinateNormalizer(config, { ...deps, provider, cache });
}

export function convert(
  timestamp: number,
  longitude: number,
  config: NormalizerConfigInput = {},
  deps: NormalizerDependencies = {}
): TemporalCoordinateSet {
  return oneShotNormalizer(config, deps).convert(timestamp, longitude);
}

export function tryConvert(
  timestamp: number,
  longitude: number,
  config: NormalizerConfigInput = {},
  deps: NormalizerDependencies = {}
): ConversionResult {
  return oneShotNormalizer(config, deps).tryConvert(timestamp, longitude);
}

export function convertBatch(
  timestamps: readonly number[],
  longitude: number,
  config: NormalizerConfigInput = {},
  deps: NormalizerDependencies = {}
): ConversionResult[] {
  return oneShotNormalizer(config, deps).convertBatch(timestamps, longitude);
}
