/**
 * Solar longitude capability.
 *
 * The pipeline never computes the Sun's position itself; it asks a provider.
 * Providers may be a full ephemeris, a truncated series or a test model.
 */

import { ProviderFailureError } from "../../lib/errors.js";
import { normalizeDegrees } from "../time/instant.js";

export interface SolarLongitudeProvider {
  readonly name: string;
  /** Apparent geocentric ecliptic longitude of the Sun, degrees in [0,360). */
  longitudeAt(epochSeconds: number): number;
  /** Rate of change in degrees per day, when the source can supply it. */
  rateAt?(epochSeconds: number): number;
}

export interface SolarLongitudeSample {
  epochSeconds: number;
  longitude: number;
}

/**
 * Calls the provider and turns any failure or non-finite answer into a
 * ProviderFailureError. A failure is terminal for the caller's lookup.
 */
export function sampleLongitude(
  provider: SolarLongitudeProvider,
  epochSeconds: number
): SolarLongitudeSample {
  let raw: number;
  try {
    raw = provider.longitudeAt(epochSeconds);
  } catch (err) {
    throw new ProviderFailureError(
      `Solar longitude provider "${provider.name}" failed at ${epochSeconds}: ${
        err instanceof Error ? err.message : String(err)
      }`,
      provider.name,
      epochSeconds,
      { cause: err }
    );
  }

  if (typeof raw !== "number" || !Number.isFinite(raw)) {
    throw new ProviderFailureError(
      `Solar longitude provider "${provider.name}" returned a non-finite longitude at ${epochSeconds}`,
      provider.name,
      epochSeconds
    );
  }

  return { epochSeconds, longitude: normalizeDegrees(raw) };
}

/**
 * Rate in degrees per day, or undefined when the provider has none or the
 * value is unusable (Newton steps then fall back to bisection).
 */
export function sampleRate(
  provider: SolarLongitudeProvider,
  epochSeconds: number
): number | undefined {
  if (!provider.rateAt) return undefined;

  let rate: number;
  try {
    rate = provider.rateAt(epochSeconds);
  } catch (err) {
    throw new ProviderFailureError(
      `Solar longitude provider "${provider.name}" failed to report a rate at ${epochSeconds}`,
      provider.name,
      epochSeconds,
      { cause: err }
    );
  }

  return Number.isFinite(rate) && rate > 0 ? rate : undefined;
}
