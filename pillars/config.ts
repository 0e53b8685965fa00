import { z } from "zod";
import { PILLAR_POLICY_V1 } from "./policy/pillarPolicy.v1.js";

/**
 * Zod schema for normalizer configuration.
 *
 * Every option has a default, so `{}` is a complete configuration.
 * The provider, cache and logger are dependencies, not configuration.
 */

const termLongitude = z
  .number()
  .min(0)
  .lt(360)
  .refine((v) => v % 15 === 0, { message: "must be a multiple of 15 degrees" });

const stemIndex = z.number().int().min(0).max(9);

// February allows the 29th; in common years that boundary falls on March 1.
const DAYS_IN_MONTH = [31, 29, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

export const YearBoundaryPolicySchema = z
  .discriminatedUnion("kind", [
    z.object({ kind: z.literal("fixedLongitude"), longitude: termLongitude }),
    z.object({
      kind: z.literal("fixedDate"),
      month: z.number().int().min(1).max(12),
      day: z.number().int().min(1).max(31),
    }),
  ])
  .superRefine((val, ctx) => {
    if (val.kind === "fixedDate" && val.day > DAYS_IN_MONTH[val.month - 1]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `month ${val.month} has no day ${val.day}`,
        path: ["day"],
      });
    }
  });

const ReferenceEpochSchema = z.object({
  day: z.object({
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    value: z.number().int().min(0).max(59),
  }),
  year: z.object({
    year: z.number().int(),
    value: z.number().int().min(0).max(59),
  }),
});

const CycleTablesSchema = z
  .object({
    monthStemStarts: z.array(stemIndex).length(5),
    hourStemStarts: z.array(stemIndex).length(5),
    monthOrigin: z.object({
      longitude: termLongitude,
      branch: z.number().int().min(0).max(11),
    }),
  })
  .superRefine((val, ctx) => {
    // A stem can only pair with a branch of the same parity.
    val.monthStemStarts.forEach((stem, i) => {
      if (stem % 2 !== val.monthOrigin.branch % 2) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "month stem start must share parity with the origin branch",
          path: ["monthStemStarts", i],
        });
      }
    });
    val.hourStemStarts.forEach((stem, i) => {
      if (stem % 2 !== 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "Zi hour stem must be even",
          path: ["hourStemStarts", i],
        });
      }
    });
  });

const ValidityWindowSchema = z
  .object({ startSeconds: z.number(), endSeconds: z.number() })
  .refine((w) => w.startSeconds < w.endSeconds, {
    message: "startSeconds must be before endSeconds",
  });

export const NormalizerConfigSchema = z.object({
  /** Defaults to the multiple of 15° nearest the longitude. */
  standardMeridian: z.number().min(-180).max(180).optional(),
  yearBoundaryPolicy: YearBoundaryPolicySchema.default(PILLAR_POLICY_V1.yearBoundaryPolicy),
  equationOfTimeSeriesOrder: z.union([z.literal(1), z.literal(2)]).default(2),
  equationOfTimeSource: z.enum(["series", "provider"]).default("series"),
  equationOfTimeValidity: ValidityWindowSchema.optional(),
  /** Degrees. */
  rootFindTolerance: z.number().positive().default(1e-6),
  rootFindMaxIterations: z.number().int().positive().default(64),
  midnightToleranceSeconds: z.number().positive().default(1e-3),
  timeBasis: z.enum(["apparent_solar", "mean_solar", "standard_clock"]).default("apparent_solar"),
  dayBoundary: z.enum(["midnight", "zi_start"]).default("midnight"),
  referenceEpoch: ReferenceEpochSchema.default(PILLAR_POLICY_V1.referenceEpoch),
  cycleTables: CycleTablesSchema.default(PILLAR_POLICY_V1.cycleTables),
  termSearchMarginDays: z.number().positive().max(120).default(20),
  termScanStepDays: z.number().positive().max(30).default(1),
});

export type NormalizerConfigInput = z.input<typeof NormalizerConfigSchema>;
export type NormalizerConfig = z.output<typeof NormalizerConfigSchema>;

export function resolveConfig(input: NormalizerConfigInput = {}): NormalizerConfig {
  return NormalizerConfigSchema.parse(input);
}
