import { z } from "zod";
import { toIsoString } from "../../astro/time/instant.js";
import type { SolarTermNode } from "../../astro/solarTerms.js";
import type { TemporalCoordinateSet } from "../temporalCoordinates.js";

/**
 * Zod schema for the serialized coordinate record.
 *
 * Stems and branches are indices; naming them is left to the consumer.
 */

// Years outside 0000-9999 are written with a sign and six digits.
const ISO_DATETIME = /^(\d{4}|[+-]\d{6})-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/;

const UnitSchema = z
  .object({
    index: z.number().int().min(0).max(59),
    stem: z.number().int().min(0).max(9),
    branch: z.number().int().min(0).max(11),
    element: z.enum(["wood", "fire", "earth", "metal", "water"]),
  })
  .superRefine((val, ctx) => {
    if (val.index % 10 !== val.stem || val.index % 12 !== val.branch) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "stem and branch must be index mod 10 and index mod 12",
        path: ["index"],
      });
    }
  });

const BoundarySchema = z.object({
  target_longitude: z.number().min(0).lt(360),
  year: z.number().int(),
  utc_datetime: z.string().regex(ISO_DATETIME),
});

export const CoordinateRecordSchema = z.object({
  schema_version: z.literal("1.0.0"),
  metadata: z.object({
    utc_datetime: z.string().regex(ISO_DATETIME),
    local_datetime: z.string().regex(ISO_DATETIME),
    time_basis: z.enum(["apparent_solar", "mean_solar", "standard_clock"]),
    local_date: z.string().regex(/^(\d{4}|[+-]\d{6})-\d{2}-\d{2}$/),
    longitude: z.number().min(-180).max(180),
    standard_meridian: z.number().min(-180).max(180),
    equation_of_time_minutes: z.number(),
    longitude_correction_minutes: z.number(),
    apparent_offset_minutes: z.number(),
    utc_offset_minutes: z.number(),
  }),
  coordinates: z.object({
    year: UnitSchema,
    month: UnitSchema,
    day: UnitSchema,
    hour: UnitSchema,
  }),
  boundaries: z.object({
    month: BoundarySchema,
    month_ordinal: z.number().int().min(0).max(11),
    year: BoundarySchema.nullable(),
    solar_year: z.number().int(),
  }),
});

export type CoordinateRecord = z.infer<typeof CoordinateRecordSchema>;

function boundaryRecord(node: SolarTermNode) {
  return {
    target_longitude: node.targetLongitude,
    year: node.year,
    utc_datetime: toIsoString(node.epochSeconds),
  };
}

export function toCoordinateRecord(set: TemporalCoordinateSet): CoordinateRecord {
  const { apparentTime: at } = set;
  return {
    schema_version: "1.0.0",
    metadata: {
      utc_datetime: toIsoString(set.instant.epochSeconds),
      local_datetime: toIsoString(set.instant.epochSeconds + 60 * set.utcOffsetMinutes),
      time_basis: at.timeBasis,
      local_date: at.date,
      longitude: set.instant.longitude,
      standard_meridian: at.standardMeridian,
      equation_of_time_minutes: at.equationOfTimeMinutes,
      longitude_correction_minutes: at.longitudeCorrectionMinutes,
      apparent_offset_minutes: set.apparentOffsetMinutes,
      utc_offset_minutes: set.utcOffsetMinutes,
    },
    coordinates: {
      year: set.year.toJSON(),
      month: set.month.toJSON(),
      day: set.day.toJSON(),
      hour: set.hour.toJSON(),
    },
    boundaries: {
      month: boundaryRecord(set.boundaries.month),
      month_ordinal: set.boundaries.monthOrdinal,
      year: set.boundaries.year ? boundaryRecord(set.boundaries.year) : null,
      solar_year: set.boundaries.solarYear,
    },
  };
}
