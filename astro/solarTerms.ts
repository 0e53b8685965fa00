/**
 * Solar terms: instants at which the Sun's apparent longitude crosses a
 * multiple of 15°. Boundaries are derived by root finding against the
 * provider, not read from tables.
 */

import {
  AmbiguousWindowError,
  DomainRangeError,
  ProviderFailureError,
  type SearchWindow,
} from "../lib/errors.js";
import { chronosLogHelpers, silentLogger, type ChronosLogger } from "../logging/chronosLog.js";
import {
  sampleLongitude,
  sampleRate,
  type SolarLongitudeProvider,
} from "./ephemeris/provider.js";
import { solveBracketed } from "./rootFinding.js";
import {
  MARCH_EQUINOX_2000_SECONDS,
  SECONDS_PER_DAY,
  TROPICAL_YEAR_SECONDS,
  normalizeDegrees,
  utcYearOf,
  wrapDegrees180,
} from "./time/instant.js";

export const TERM_SPACING_DEG = 15;
export const TERMS_PER_YEAR = 24;
export const MEAN_SECONDS_PER_DEGREE = TROPICAL_YEAR_SECONDS / 360;

/**
 * Terms from 285° (early January) to 345° (early March) are counted in the
 * civil year that ends their run up to the March equinox.
 */
const PRE_EQUINOX_FROM_DEG = 285;

const PHASE_CORRECTION_PASSES = 2;

export interface SolarTermNode {
  readonly targetLongitude: number;
  /** Key year: the civil year the crossing is counted under. */
  readonly year: number;
  readonly epochSeconds: number;
  readonly residualDeg: number;
  readonly iterations: number;
}

export interface SolarTermLocatorOptions {
  /** Angular tolerance on the residual, degrees. */
  toleranceDeg: number;
  maxIterations: number;
  /** Scan step used to bracket crossings. Must keep per-step motion under 180°. */
  scanStepDays: number;
  /** Half-width of the window around the estimated crossing in nodeFor. */
  marginDays: number;
  cache?: SolarTermCache;
  logger?: ChronosLogger;
}

export function assertTermLongitude(target: number): void {
  if (
    !Number.isFinite(target) ||
    target < 0 ||
    target >= 360 ||
    target % TERM_SPACING_DEG !== 0
  ) {
    throw new DomainRangeError(
      `Solar term longitude must be a multiple of ${TERM_SPACING_DEG} in [0,360), got ${target}`,
      target
    );
  }
}

/**
 * Mean-Sun estimate of the crossing of `target` counted under `year`.
 */
export function meanCrossingEstimate(target: number, year: number): number {
  const equinox = MARCH_EQUINOX_2000_SECONDS + (year - 2000) * TROPICAL_YEAR_SECONDS;
  const degreesFromEquinox = target >= PRE_EQUINOX_FROM_DEG ? target - 360 : target;
  return equinox + degreesFromEquinox * MEAN_SECONDS_PER_DEGREE;
}

/**
 * Key year whose mean estimate for `target` lies closest to `approxSeconds`.
 */
export function termYearNear(target: number, approxSeconds: number): number {
  const y = utcYearOf(approxSeconds);
  let best = y;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const candidate of [y - 1, y, y + 1]) {
    const distance = Math.abs(meanCrossingEstimate(target, candidate) - approxSeconds);
    if (distance < bestDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }
  return best;
}

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
}

/**
 * Read-mostly node cache keyed by (year, target). The first insertion for a
 * key wins; a duplicate computation is discarded, never merged.
 */
export class SolarTermCache {
  private readonly nodes = new Map<string, SolarTermNode>();
  private hits = 0;
  private misses = 0;

  static keyOf(target: number, year: number): string {
    return `${year}:${target}`;
  }

  get(target: number, year: number): SolarTermNode | undefined {
    return this.nodes.get(SolarTermCache.keyOf(target, year));
  }

  /** Inserts unless the key is taken; returns the stored node either way. */
  insert(node: SolarTermNode): SolarTermNode {
    const key = SolarTermCache.keyOf(node.targetLongitude, node.year);
    const existing = this.nodes.get(key);
    if (existing) return existing;

    const frozen = Object.freeze({ ...node });
    this.nodes.set(key, frozen);
    return frozen;
  }

  getOrCompute(target: number, year: number, compute: () => SolarTermNode): SolarTermNode {
    const cached = this.get(target, year);
    if (cached) {
      this.hits += 1;
      return cached;
    }
    this.misses += 1;
    return this.insert(compute());
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses, size: this.nodes.size };
  }

  clear(): void {
    this.nodes.clear();
    this.hits = 0;
    this.misses = 0;
  }
}

export interface LocatedCrossing {
  epochSeconds: number;
  residualDeg: number;
  iterations: number;
}

export class SolarTermLocator {
  readonly cache: SolarTermCache;
  private readonly log: ReturnType<typeof chronosLogHelpers>;

  constructor(
    readonly provider: SolarLongitudeProvider,
    private readonly options: SolarTermLocatorOptions
  ) {
    if (!(options.scanStepDays > 0)) {
      throw new DomainRangeError("scanStepDays must be positive", options.scanStepDays);
    }
    this.cache = options.cache ?? new SolarTermCache();
    this.log = chronosLogHelpers(options.logger ?? silentLogger);
  }

  /**
   * The single instant in [start, end) at which the longitude equals
   * `target`. Uncached.
   */
  locate(target: number, window: SearchWindow): LocatedCrossing {
    assertTermLongitude(target);
    const { startSeconds: start, endSeconds: end } = window;
    if (!Number.isFinite(start) || !Number.isFinite(end) || !(end > start)) {
      throw new DomainRangeError("Search window must satisfy start < end", window);
    }

    const step = this.options.scanStepDays * SECONDS_PER_DAY;
    const steps = Math.ceil((end - start) / step);

    let prev = sampleLongitude(this.provider, start);
    // Whole turns are counted rather than summing deltas, so rounding
    // cannot drift an unwrapped value across a target.
    let turns = 0;
    let unwrappedPrev = prev.longitude;
    let crossings = 0;
    let bracket: { lo: number; loLongitude: number; loUnwrapped: number; value: number } | null =
      null;

    for (let i = 1; i <= steps; i++) {
      const t = Math.min(start + i * step, end);
      const next = sampleLongitude(this.provider, t);
      const delta = normalizeDegrees(next.longitude - prev.longitude);
      if (delta > 180) {
        throw new ProviderFailureError(
          `Solar longitude moved backwards between ${prev.epochSeconds} and ${t}`,
          this.provider.name,
          t
        );
      }
      if (next.longitude < prev.longitude) turns += 1;
      const unwrapped = next.longitude + 360 * turns;

      // Values target + 360k inside [unwrappedPrev, unwrapped). The window is
      // half-open, so a value the end sample reaches only within tolerance
      // belongs to the next window.
      const reach = t === end ? unwrapped - this.options.toleranceDeg : unwrapped;
      const firstK = Math.ceil((unwrappedPrev - target) / 360);
      const endK = Math.ceil((reach - target) / 360);
      if (endK > firstK) {
        crossings += endK - firstK;
        if (!bracket) {
          bracket = {
            lo: prev.epochSeconds,
            loLongitude: prev.longitude,
            loUnwrapped: unwrappedPrev,
            value: target + 360 * firstK,
          };
        }
      }

      prev = next;
      unwrappedPrev = unwrapped;
    }

    if (crossings !== 1 || !bracket) {
      throw new AmbiguousWindowError(target, crossings, window);
    }

    const { lo, loLongitude, loUnwrapped, value } = bracket;
    const hi = Math.min(lo + step, end);
    const offset = loUnwrapped - value;
    const residual = (t: number): number =>
      offset + wrapDegrees180(sampleLongitude(this.provider, t).longitude - loLongitude);

    const result = solveBracketed(
      residual,
      lo,
      hi,
      {
        tolerance: this.options.toleranceDeg,
        maxIterations: this.options.maxIterations,
        subject: `Solar term ${target}°`,
      },
      this.provider.rateAt
        ? (t) => {
            const rate = sampleRate(this.provider, t);
            return rate === undefined ? undefined : rate / SECONDS_PER_DAY;
          }
        : undefined
    );

    return {
      epochSeconds: result.root,
      residualDeg: result.residual,
      iterations: result.iterations,
    };
  }

  /**
   * Crossing of `target` counted under `year`, cached.
   */
  nodeFor(target: number, year: number): SolarTermNode {
    assertTermLongitude(target);
    if (!Number.isInteger(year)) {
      throw new DomainRangeError(`Year must be an integer, got ${year}`, year);
    }

    return this.cache.getOrCompute(target, year, () => {
      const estimate = this.providerEstimate(target, year);
      const margin = this.options.marginDays * SECONDS_PER_DAY;
      const crossing = this.locate(target, {
        startSeconds: estimate - margin,
        endSeconds: estimate + margin,
      });

      this.log.termResolved({
        provider: this.provider.name,
        target_longitude: target,
        year,
        epoch_seconds: crossing.epochSeconds,
        iterations: crossing.iterations,
        residual_deg: crossing.residualDeg,
      });

      return {
        targetLongitude: target,
        year,
        epochSeconds: crossing.epochSeconds,
        residualDeg: crossing.residualDeg,
        iterations: crossing.iterations,
      };
    });
  }

  /**
   * Mean estimate moved onto the provider's own phase, so a provider that
   * runs ahead of or behind the real Sun still gets a window around its
   * crossing.
   */
  private providerEstimate(target: number, year: number): number {
    let estimate = meanCrossingEstimate(target, year);
    for (let pass = 0; pass < PHASE_CORRECTION_PASSES; pass++) {
      const { longitude } = sampleLongitude(this.provider, estimate);
      estimate -= wrapDegrees180(longitude - target) * MEAN_SECONDS_PER_DEGREE;
    }
    return estimate;
  }

  nearest(target: number, approxSeconds: number): SolarTermNode {
    return this.nodeFor(target, termYearNear(target, approxSeconds));
  }

  /**
   * Latest crossing of `target` at or before `atSeconds`.
   */
  mostRecent(target: number, atSeconds: number): SolarTermNode {
    assertTermLongitude(target);
    const { longitude } = sampleLongitude(this.provider, atSeconds);
    const approx =
      atSeconds - normalizeDegrees(longitude - target) * MEAN_SECONDS_PER_DEGREE;

    const node = this.nearest(target, approx);
    if (node.epochSeconds <= atSeconds) return node;
    return this.nodeFor(target, node.year - 1);
  }

  /** The 24 terms counted under `year`, in time order. */
  termsForYear(year: number): SolarTermNode[] {
    const nodes: SolarTermNode[] = [];
    for (let i = 0; i < TERMS_PER_YEAR; i++) {
      nodes.push(this.nodeFor(i * TERM_SPACING_DEG, year));
    }
    return nodes.sort((a, b) => a.epochSeconds - b.epochSeconds);
  }
}
