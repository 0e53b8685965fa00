export {
  SexagenaryUnit,
  CYCLE_LENGTH,
  STEM_COUNT,
  BRANCH_COUNT,
  mod,
  type ElementKey,
  type SexagenaryUnitJson,
} from "./cyclic/sexagenaryUnit.js";

export {
  createInstant,
  toIsoString,
  TROPICAL_YEAR_SECONDS,
  type Instant,
} from "./astro/time/instant.js";

export {
  sampleLongitude,
  type SolarLongitudeProvider,
  type SolarLongitudeSample,
} from "./astro/ephemeris/provider.js";
export { meeusSunProvider, almanacSunProvider } from "./astro/ephemeris/seriesSun.js";
export { createLinearSunProvider, type LinearSunOptions } from "./astro/ephemeris/linearSun.js";
export {
  createSwissEphemerisSunProvider,
  isSwissEphemerisAvailable,
  type SwissEphemerisSunOptions,
} from "./astro/ephemeris/swisseph.js";

export {
  EquationOfTimeCorrector,
  equationOfTimeSeries,
  equationOfTimeFromLongitude,
  type EquationOfTimeSeriesOrder,
  type EquationOfTimeSource,
} from "./astro/equationOfTime.js";
export {
  ApparentTimeConverter,
  inferStandardMeridian,
  type ApparentSolarTime,
  type DayBoundary,
  type TimeBasis,
} from "./astro/apparentTime.js";
export {
  SolarTermCache,
  SolarTermLocator,
  type CacheStats,
  type SolarTermNode,
} from "./astro/solarTerms.js";

export {
  TemporalCoordinateNormalizer,
  createNormalizer,
  convert,
  tryConvert,
  convertBatch,
  type ConversionResult,
  type PillarBoundaries,
  type TemporalCoordinateSet,
} from "./pillars/temporalCoordinates.js";
export {
  NormalizerConfigSchema,
  resolveConfig,
  type NormalizerConfig,
  type NormalizerConfigInput,
} from "./pillars/config.js";
export { PILLAR_POLICY_V1, type YearBoundaryPolicy } from "./pillars/policy/pillarPolicy.v1.js";
export {
  CoordinateRecordSchema,
  toCoordinateRecord,
  type CoordinateRecord,
} from "./pillars/schema/coordinateRecord.schema.js";

export * from "./lib/errors.js";
export { chronosLog, silentLogger, type ChronosLogger, type ChronosLogData } from "./logging/chronosLog.js";
