import { createRequire } from "node:module";
import fs from "node:fs";
import path from "node:path";
import { ProviderFailureError } from "../../lib/errors.js";
import { julianDayFromEpochSeconds, normalizeDegrees } from "../time/instant.js";
import type { SolarLongitudeProvider } from "./provider.js";

const require = createRequire(import.meta.url);

const PROVIDER_NAME = "swisseph";
const REQUIRED_PREFIXES = ["sepl_"];

export interface SwissEphemerisBinding {
  SE_SUN: number;
  SEFLG_SPEED: number;
  SEFLG_SWIEPH: number;
  SEFLG_MOSEPH: number;
  swe_set_ephe_path(path: string): void;
  swe_calc_ut(jd: number, body: number, flags: number): unknown;
}

function isBinding(value: unknown): value is SwissEphemerisBinding {
  if (typeof value !== "object" || value === null) return false;
  return (
    "SE_SUN" in value &&
    typeof value.SE_SUN === "number" &&
    "SEFLG_SPEED" in value &&
    typeof value.SEFLG_SPEED === "number" &&
    "SEFLG_SWIEPH" in value &&
    typeof value.SEFLG_SWIEPH === "number" &&
    "SEFLG_MOSEPH" in value &&
    typeof value.SEFLG_MOSEPH === "number" &&
    "swe_set_ephe_path" in value &&
    typeof value.swe_set_ephe_path === "function" &&
    "swe_calc_ut" in value &&
    typeof value.swe_calc_ut === "function"
  );
}

let binding: SwissEphemerisBinding | null = null;

/**
 * Loads the optional `swisseph` native addon.
 */
export function loadSwissEphemeris(): SwissEphemerisBinding {
  if (binding) return binding;

  let loaded: unknown;
  try {
    loaded = require("swisseph");
  } catch (err) {
    throw new ProviderFailureError(
      "Swiss Ephemeris binding (swisseph) is not installed or failed to build",
      PROVIDER_NAME,
      Number.NaN,
      { cause: err }
    );
  }
  if (!isBinding(loaded)) {
    throw new ProviderFailureError(
      "swisseph module does not expose the expected API",
      PROVIDER_NAME,
      Number.NaN
    );
  }
  binding = loaded;
  return binding;
}

export function isSwissEphemerisAvailable(): boolean {
  try {
    loadSwissEphemeris();
    return true;
  } catch {
    return false;
  }
}

function ensureEphePath(ephePath: string) {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(ephePath);
  } catch {
    throw new Error(
      `Swiss Ephemeris data files not found at ${ephePath}. ` +
        "Place .se1 files there or omit the path to use the Moshier theory."
    );
  }

  if (!stats.isDirectory()) {
    throw new Error(`Swiss Ephemeris path ${ephePath} is not a directory.`);
  }

  const se1Files = fs
    .readdirSync(ephePath)
    .filter((name) => name.toLowerCase().endsWith(".se1"));

  const missing = REQUIRED_PREFIXES.filter(
    (prefix) => !se1Files.some((name) => name.toLowerCase().startsWith(prefix))
  );

  if (missing.length) {
    throw new Error(
      `Swiss Ephemeris .se1 files incomplete in ${ephePath}. Missing prefixes: ${missing.join(
        ", "
      )}. Found: ${se1Files.join(", ") || "none"}.`
    );
  }
}

interface SunPosition {
  longitude: number;
  speed_deg_per_day: number;
  /** Flags the calculation actually used, when the binding reports them. */
  flags: number | undefined;
}

function numericField(result: object, key: "rc" | "rflag" | "flag"): number | undefined {
  if (!(key in result)) return undefined;
  const value: unknown = Reflect.get(result, key);
  return typeof value === "number" ? value : undefined;
}

function readSunPosition(result: unknown): SunPosition {
  if (!result || typeof result !== "object") {
    throw new Error("Swiss Ephemeris returned no result");
  }
  if ("error" in result && typeof result.error === "string" && result.error) {
    throw new Error(result.error);
  }

  const flags =
    numericField(result, "rc") ?? numericField(result, "rflag") ?? numericField(result, "flag");
  if (flags !== undefined && flags < 0) {
    const serr = "serr" in result && typeof result.serr === "string" ? result.serr : "";
    throw new Error(serr || "Swiss Ephemeris calculation failed");
  }

  if (
    "longitude" in result &&
    typeof result.longitude === "number" &&
    "longitudeSpeed" in result &&
    typeof result.longitudeSpeed === "number"
  ) {
    return { longitude: result.longitude, speed_deg_per_day: result.longitudeSpeed, flags };
  }
  if ("xx" in result && Array.isArray(result.xx)) {
    const [lon, , , speed]: unknown[] = result.xx;
    if (typeof lon === "number" && typeof speed === "number") {
      return { longitude: lon, speed_deg_per_day: speed, flags };
    }
  }
  const keys = Object.keys(result).join(", ") || "none";
  throw new Error(`Swiss Ephemeris returned invalid data (keys: ${keys}).`);
}

export interface SwissEphemerisSunOptions {
  /** Directory of .se1 files. Without it the built-in Moshier theory is used. */
  ephemerisPath?: string;
  /** Binding to call instead of the installed addon. */
  binding?: SwissEphemerisBinding;
}

export function createSwissEphemerisSunProvider(
  options: SwissEphemerisSunOptions = {}
): SolarLongitudeProvider {
  let flags: number | null = null;

  function resolveFlags(swe: SwissEphemerisBinding): number {
    if (!options.ephemerisPath) {
      return swe.SEFLG_MOSEPH | swe.SEFLG_SPEED;
    }
    const ephePath = path.resolve(options.ephemerisPath);
    ensureEphePath(ephePath);
    swe.swe_set_ephe_path(ephePath);
    return swe.SEFLG_SWIEPH | swe.SEFLG_SPEED;
  }

  function init(): { swe: SwissEphemerisBinding; flags: number } {
    const swe = options.binding ?? loadSwissEphemeris();
    const resolved = flags ?? resolveFlags(swe);
    flags = resolved;
    return { swe, flags: resolved };
  }

  function calcSun(epochSeconds: number): SunPosition {
    const { swe, flags: f } = init();
    const jd = julianDayFromEpochSeconds(epochSeconds);
    const position = readSunPosition(swe.swe_calc_ut(jd, swe.SE_SUN, f));

    // With data files requested, a Moshier result means the files do not cover jd.
    if (options.ephemerisPath && position.flags !== undefined && position.flags & swe.SEFLG_MOSEPH) {
      throw new Error(
        `Swiss Ephemeris fell back to Moshier (SEFLG_MOSEPH) at JD ${jd}; the .se1 files do not cover this date`
      );
    }
    return position;
  }

  return {
    name: PROVIDER_NAME,
    longitudeAt: (epochSeconds) => normalizeDegrees(calcSun(epochSeconds).longitude),
    rateAt: (epochSeconds) => calcSun(epochSeconds).speed_deg_per_day,
  };
}
