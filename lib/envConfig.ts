import { z } from "zod";
import type { SolarLongitudeProvider } from "../astro/ephemeris/provider.js";
import { almanacSunProvider, meeusSunProvider } from "../astro/ephemeris/seriesSun.js";
import { createSwissEphemerisSunProvider } from "../astro/ephemeris/swisseph.js";
import type { NormalizerConfigInput } from "../pillars/config.js";

/**
 * Environment overrides for the command-line tools. Library callers pass
 * configuration objects directly; only the tools read the environment.
 */

const optionalNumber = z.coerce.number().optional();

const EnvSchema = z.object({
  CHRONOS_PROVIDER: z.enum(["meeus", "almanac", "swisseph"]).default("meeus"),
  CHRONOS_STANDARD_MERIDIAN: optionalNumber,
  CHRONOS_YEAR_BOUNDARY: z
    .string()
    .regex(/^(longitude:\d+(\.\d+)?|date:\d{1,2}-\d{1,2})$/, {
      message: "expected longitude:<deg> or date:<MM>-<DD>",
    })
    .optional(),
  CHRONOS_EOT_ORDER: z.enum(["1", "2"]).optional(),
  CHRONOS_EOT_SOURCE: z.enum(["series", "provider"]).optional(),
  CHRONOS_ROOT_TOLERANCE_DEG: optionalNumber,
  CHRONOS_ROOT_MAX_ITERATIONS: optionalNumber,
  CHRONOS_TIME_BASIS: z.enum(["apparent_solar", "mean_solar", "standard_clock"]).optional(),
  CHRONOS_DAY_BOUNDARY: z.enum(["midnight", "zi_start"]).optional(),
  SWISSEPH_EPHE_PATH: z.string().min(1).optional(),
});

export type ChronosEnv = z.infer<typeof EnvSchema>;

export function parseEnv(env: NodeJS.ProcessEnv = process.env): ChronosEnv {
  // Empty strings count as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  return EnvSchema.parse(present);
}

export function yearBoundaryFromEnv(
  value: string
): NonNullable<NormalizerConfigInput["yearBoundaryPolicy"]> {
  const [kind, rest] = value.split(":");
  if (kind === "longitude") {
    return { kind: "fixedLongitude", longitude: Number(rest) };
  }
  const [month, day] = rest.split("-").map(Number);
  return { kind: "fixedDate", month, day };
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): NormalizerConfigInput {
  const parsed = parseEnv(env);
  const config: NormalizerConfigInput = {};

  if (parsed.CHRONOS_STANDARD_MERIDIAN !== undefined) {
    config.standardMeridian = parsed.CHRONOS_STANDARD_MERIDIAN;
  }
  if (parsed.CHRONOS_YEAR_BOUNDARY) {
    config.yearBoundaryPolicy = yearBoundaryFromEnv(parsed.CHRONOS_YEAR_BOUNDARY);
  }
  if (parsed.CHRONOS_EOT_ORDER) {
    config.equationOfTimeSeriesOrder = parsed.CHRONOS_EOT_ORDER === "1" ? 1 : 2;
  }
  if (parsed.CHRONOS_EOT_SOURCE) {
    config.equationOfTimeSource = parsed.CHRONOS_EOT_SOURCE;
  }
  if (parsed.CHRONOS_ROOT_TOLERANCE_DEG !== undefined) {
    config.rootFindTolerance = parsed.CHRONOS_ROOT_TOLERANCE_DEG;
  }
  if (parsed.CHRONOS_ROOT_MAX_ITERATIONS !== undefined) {
    config.rootFindMaxIterations = parsed.CHRONOS_ROOT_MAX_ITERATIONS;
  }
  if (parsed.CHRONOS_TIME_BASIS) {
    config.timeBasis = parsed.CHRONOS_TIME_BASIS;
  }
  if (parsed.CHRONOS_DAY_BOUNDARY) {
    config.dayBoundary = parsed.CHRONOS_DAY_BOUNDARY;
  }
  return config;
}

export function providerFromEnv(env: NodeJS.ProcessEnv = process.env): SolarLongitudeProvider {
  const parsed = parseEnv(env);
  switch (parsed.CHRONOS_PROVIDER) {
    case "almanac":
      return almanacSunProvider;
    case "swisseph":
      return createSwissEphemerisSunProvider({ ephemerisPath: parsed.SWISSEPH_EPHE_PATH });
    case "meeus":
      return meeusSunProvider;
  }
}
