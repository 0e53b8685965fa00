import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import {
  TemporalCoordinateNormalizer,
  convert,
  convertBatch,
  createNormalizer,
  tryConvert,
} from "../temporalCoordinates.js";
import { toCoordinateRecord } from "../schema/coordinateRecord.schema.js";
import { SolarTermCache } from "../../astro/solarTerms.js";
import { createLinearSunProvider } from "../../astro/ephemeris/linearSun.js";
import {
  MARCH_EQUINOX_2000_SECONDS,
  SECONDS_PER_DAY,
  TROPICAL_YEAR_SECONDS,
} from "../../astro/time/instant.js";
import { DomainRangeError, OutOfRangeError } from "../../lib/errors.js";
import { silentLogger, type ChronosLogData } from "../../logging/chronosLog.js";

const utc = (iso: string) => Date.parse(iso) / 1000;
const BEIJING = 116.4;

function normalizer(config: ConstructorParameters<typeof TemporalCoordinateNormalizer>[0] = {}) {
  return createNormalizer({ config, logger: silentLogger, cache: new SolarTermCache() });
}

function values(set: ReturnType<TemporalCoordinateNormalizer["convert"]>) {
  return {
    year: set.year.value,
    month: set.month.value,
    day: set.day.value,
    hour: set.hour.value,
  };
}

describe("TemporalCoordinateNormalizer", () => {
  it("converts 1949-10-01 noon in Beijing", () => {
    const set = normalizer().convert(utc("1949-10-01T04:00:00Z"), BEIJING);

    expect(values(set)).toEqual({ year: 25, month: 9, day: 0, hour: 6 });
    expect(set.apparentTime.standardMeridian).toBe(120);
    expect(set.apparentTime.date).toBe("1949-10-01");
    expect(set.boundaries.monthOrdinal).toBe(7);
    expect(set.boundaries.month.targetLongitude).toBe(165);
    expect(set.boundaries.year?.targetLongitude).toBe(315);
    expect(set.boundaries.solarYear).toBe(1949);
  });

  it("counts days from the reference epoch", () => {
    const n = normalizer();
    expect(n.convert(utc("2000-01-07T12:00:00Z"), 0).day.value).toBe(0);
    expect(n.convert(utc("2000-01-08T12:00:00Z"), 0).day.value).toBe(1);
    expect(n.convert(utc("1900-01-01T12:00:00Z"), 0).day.value).toBe(10);
  });

  it("changes year and month at the beginning of spring", () => {
    const n = normalizer();
    const before = n.convert(utc("2024-02-04T06:00:00Z"), 0);
    const after = n.convert(utc("2024-02-04T11:00:00Z"), 0);

    expect(before.year.value).toBe(39);
    expect(before.month.value).toBe(1);
    expect(before.boundaries.monthOrdinal).toBe(11);
    expect(before.boundaries.month.targetLongitude).toBe(285);

    expect(after.year.value).toBe(40);
    expect(after.month.value).toBe(2);
    expect(after.boundaries.monthOrdinal).toBe(0);
    expect(after.boundaries.year?.year).toBe(2024);
  });

  it("supports a fixed-date year boundary", () => {
    const n = normalizer({ yearBoundaryPolicy: { kind: "fixedDate", month: 1, day: 1 } });
    const set = n.convert(utc("2024-02-04T06:00:00Z"), 0);
    expect(set.year.value).toBe(40);
    expect(set.boundaries.year).toBeNull();
    expect(set.boundaries.solarYear).toBe(2024);
  });

  it("supports another term longitude as the year boundary", () => {
    const t = utc("2023-12-25T00:00:00Z");
    expect(normalizer().convert(t, 0).year.value).toBe(39);
    expect(
      normalizer({ yearBoundaryPolicy: { kind: "fixedLongitude", longitude: 270 } }).convert(t, 0)
        .year.value
    ).toBe(40);
  });

  it("counts the late Zi hour under the next day with the zi_start boundary", () => {
    const t = utc("2024-01-01T23:30:00Z");
    const midnight = normalizer().convert(t, 0);
    const zi = normalizer({ dayBoundary: "zi_start" }).convert(t, 0);

    expect(midnight.day.value).toBe(0);
    expect(midnight.hour.value).toBe(12);
    expect(zi.day.value).toBe(1);
    expect(zi.hour.value).toBe(12);
    expect(zi.apparentTime.date).toBe("2024-01-02");
  });

  it("shifts the offset by 60 minutes for 15 degrees at a fixed meridian", () => {
    const n = normalizer({ standardMeridian: 120 });
    const t = utc("2024-06-01T04:00:00Z");
    const west = n.convert(t, 100);
    const east = n.convert(t, 115);

    expect(east.apparentOffsetMinutes - west.apparentOffsetMinutes).toBeCloseTo(60, 9);
    const slotShift = (east.hour.branch - west.hour.branch + 12) % 12;
    expect(slotShift).toBeLessThanOrEqual(1);
  });

  it("moves the offset from UT with the longitude under an inferred meridian", () => {
    const n = normalizer();
    const t = utc("2024-06-01T04:00:00Z");
    const west = n.convert(t, 100);
    const east = n.convert(t, 115);

    expect(west.apparentTime.standardMeridian).toBe(105);
    expect(east.apparentTime.standardMeridian).toBe(120);
    expect(east.apparentOffsetMinutes - west.apparentOffsetMinutes).toBeCloseTo(0, 9);
    expect(east.utcOffsetMinutes - west.utcOffsetMinutes).toBeCloseTo(60, 9);
  });

  it("gives the same result with cold and warm caches", () => {
    const t = utc("2024-03-20T12:00:00Z");
    const n = normalizer();
    const cold = toCoordinateRecord(n.convert(t, BEIJING));
    const warm = toCoordinateRecord(n.convert(t, BEIJING));
    const fresh = toCoordinateRecord(normalizer().convert(t, BEIJING));

    expect(warm).toEqual(cold);
    expect(fresh).toEqual(cold);
    expect(n.locator.cache.stats().hits).toBeGreaterThan(0);
  });

  it("rejects invalid inputs", () => {
    const n = normalizer();
    expect(() => n.convert(Number.NaN, 0)).toThrow(DomainRangeError);
    expect(() => n.convert(0, 181)).toThrow(DomainRangeError);

    expect(() => n.convert(8.64e12, 0)).toThrow(DomainRangeError);

    const beyondDates = n.tryConvert(1e13, 0);
    expect(beyondDates.ok).toBe(false);
    if (!beyondDates.ok) expect(beyondDates.error).toBeInstanceOf(DomainRangeError);

    const result = n.tryConvert(0, -200);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(DomainRangeError);
  });

  it("reports instants outside the equation of time validity window", () => {
    const n = normalizer({ equationOfTimeValidity: { startSeconds: 0, endSeconds: 1e9 } });
    expect(() => n.convert(2e9, 0)).toThrow(OutOfRangeError);
  });

  it("rejects invalid configuration when created", () => {
    expect(() =>
      normalizer({
        cycleTables: {
          monthStemStarts: [1, 4, 6, 8, 0],
          hourStemStarts: [0, 2, 4, 6, 8],
          monthOrigin: { longitude: 315, branch: 2 },
        },
      })
    ).toThrow(ZodError);
    expect(() =>
      normalizer({ yearBoundaryPolicy: { kind: "fixedLongitude", longitude: 310 } })
    ).toThrow(ZodError);
  });
});

describe("TemporalCoordinateNormalizer with a linear provider", () => {
  const june = utc("2024-06-01T00:00:00Z");

  function linearNormalizer(provider: ReturnType<typeof createLinearSunProvider>) {
    return createNormalizer({ provider, logger: silentLogger, cache: new SolarTermCache() });
  }

  it("resolves months and years with the default model", () => {
    const set = linearNormalizer(createLinearSunProvider()).convert(june, 0);

    expect(set.boundaries.monthOrdinal).toBe(3);
    expect(set.boundaries.month.targetLongitude).toBe(45);
    const expectedNode = MARCH_EQUINOX_2000_SECONDS + 24.125 * TROPICAL_YEAR_SECONDS;
    expect(Math.abs(set.boundaries.month.epochSeconds - expectedNode)).toBeLessThan(1);
    expect(set.boundaries.solarYear).toBe(2024);
    expect(set.year.value).toBe(40);
    expect(set.month.value).toBe(5);
  });

  it("resolves months and years for a model out of phase with the Sun", () => {
    const shifted = createLinearSunProvider({
      zeroAtSeconds: utc("2024-01-01T00:00:00Z"),
      periodSeconds: 365 * SECONDS_PER_DAY,
    });
    const set = linearNormalizer(shifted).convert(june, 0);

    expect(set.boundaries.monthOrdinal).toBe(6);
    expect(set.boundaries.month.targetLongitude).toBe(135);
    expect(Math.abs(set.boundaries.month.epochSeconds - utc("2024-05-16T21:00:00Z"))).toBeLessThan(1);
    expect(set.boundaries.solarYear).toBe(2024);
    expect(set.year.value).toBe(40);
    expect(set.month.value).toBe(8);
  });

  it("converts a batch item by item", () => {
    const n = linearNormalizer(createLinearSunProvider());
    const xs = [june, june + 40 * SECONDS_PER_DAY, june + 200 * SECONDS_PER_DAY];
    const results = n.convertBatch(xs, BEIJING);

    expect(results).toHaveLength(3);
    results.forEach((result, i) => {
      expect(result.ok).toBe(true);
      if (result.ok) expect(values(result.value)).toEqual(values(n.convert(xs[i], BEIJING)));
    });
  });
});

describe("convertBatch", () => {
  it("returns one result per input and isolates failures", () => {
    const events: ChronosLogData[] = [];
    const n = createNormalizer({ logger: (data) => events.push(data), cache: new SolarTermCache() });
    const xs = [utc("1949-10-01T04:00:00Z"), Number.NaN, utc("2024-02-04T11:00:00Z")];

    const results = n.convertBatch(xs, BEIJING);
    expect(results).toHaveLength(3);

    const [first, failed, third] = results;
    expect(first.ok).toBe(true);
    expect(third.ok).toBe(true);
    expect(failed.ok).toBe(false);
    if (!failed.ok) expect(failed.error).toBeInstanceOf(DomainRangeError);
    if (first.ok) expect(values(first.value)).toEqual(values(n.convert(xs[0], BEIJING)));

    const failures = events.filter((e) => e.event === "convert.failed");
    expect(failures).toHaveLength(1);
    expect(failures[0]).toMatchObject({ index: 1, error_code: "range" });

    const completed = events.filter((e) => e.event === "convert.batch.completed");
    expect(completed).toEqual([{ event: "convert.batch.completed", count: 3, failed: 1 }]);
  });

  it("returns an empty list for no input", () => {
    expect(normalizer().convertBatch([], 0)).toEqual([]);
  });
});

describe("one-shot entry points", () => {
  it("match a dedicated normalizer", () => {
    const t = utc("1949-10-01T04:00:00Z");
    expect(values(convert(t, BEIJING))).toEqual({ year: 25, month: 9, day: 0, hour: 6 });

    const tried = tryConvert(t, BEIJING, {}, { logger: silentLogger });
    expect(tried.ok).toBe(true);

    const batch = convertBatch([t], BEIJING, {}, { logger: silentLogger });
    expect(batch).toHaveLength(1);
    if (batch[0].ok) expect(values(batch[0].value)).toEqual(values(convert(t, BEIJING)));
  });
});
