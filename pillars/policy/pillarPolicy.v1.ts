/**
 * Pillar Policy v1
 *
 * Pinned conventions for turning resolved astronomical quantities into
 * pillars. Each constant is a convention, not a derived value; configuration
 * may replace any of them.
 */

export type YearBoundaryPolicy =
  | { kind: "fixedLongitude"; longitude: number }
  | { kind: "fixedDate"; month: number; day: number };

export interface ReferenceEpoch {
  /** A local civil date and its day pillar value. */
  day: { date: string; value: number };
  /** A solar year and its year pillar value. */
  year: { year: number; value: number };
}

export interface CycleTables {
  /**
   * Stem of the first month of the run, indexed by year stem mod 5
   * (the five-tigers table).
   */
  monthStemStarts: number[];
  /**
   * Stem of the Zi hour, indexed by day stem mod 5 (the five-rats table).
   */
  hourStemStarts: number[];
  /** First sectional term of the month run and the branch it opens. */
  monthOrigin: { longitude: number; branch: number };
}

export interface PillarPolicyV1 {
  pillar_policy_version: "pillar_v1";
  yearBoundaryPolicy: YearBoundaryPolicy;
  referenceEpoch: ReferenceEpoch;
  cycleTables: CycleTables;
}

export const PILLAR_POLICY_V1: PillarPolicyV1 = {
  pillar_policy_version: "pillar_v1",

  // Beginning of spring, 315°
  yearBoundaryPolicy: { kind: "fixedLongitude", longitude: 315 },

  referenceEpoch: {
    // 1900-01-01 is a Jia-Xu day
    day: { date: "1900-01-01", value: 10 },
    // 1984 opens a cycle (Jia-Zi year)
    year: { year: 1984, value: 0 },
  },

  cycleTables: {
    monthStemStarts: [2, 4, 6, 8, 0],
    hourStemStarts: [0, 2, 4, 6, 8],
    monthOrigin: { longitude: 315, branch: 2 },
  },
};
