import { describe, expect, it } from "vitest";
import {
  ApparentTimeConverter,
  inferStandardMeridian,
  type ApparentTimeOptions,
} from "../apparentTime.js";
import { EquationOfTimeCorrector } from "../equationOfTime.js";
import { createInstant, dayNumberOfCivilDate, SECONDS_PER_DAY } from "../time/instant.js";
import { DomainRangeError } from "../../lib/errors.js";

const corrector = new EquationOfTimeCorrector({ seriesOrder: 2, source: "series" });

function converter(overrides: Partial<ApparentTimeOptions> = {}) {
  return new ApparentTimeConverter(corrector, {
    timeBasis: "apparent_solar",
    dayBoundary: "midnight",
    toleranceSeconds: 1e-3,
    maxIterations: 64,
    ...overrides,
  });
}

describe("ApparentTimeConverter", () => {
  it("moves a late-evening clock time into the next apparent day in November", () => {
    const t = Date.UTC(2024, 10, 3, 23, 50) / 1000;
    const result = converter().convert(createInstant(t, 0), 0);

    expect(result.equationOfTimeMinutes).toBeGreaterThan(16);
    expect(result.date).toBe("2024-11-04");
    expect(result.secondsSinceDayStart).toBeGreaterThan(360);
    expect(result.secondsSinceDayStart).toBeLessThan(410);
    expect(result.dayStartSeconds).toBeLessThanOrEqual(t);
  });

  it("resolves day starts at apparent midnight", () => {
    const c = converter();
    const day = dayNumberOfCivilDate("2024-02-11");
    const start = c.dayStartOf(day, 116.4, 120);
    expect(c.localSeconds(start, 116.4, 120)).toBeCloseTo(day * SECONDS_PER_DAY, 2);
  });

  it("shifts the offset by exactly four minutes per degree at a fixed meridian", () => {
    const t = Date.UTC(2024, 5, 1, 4) / 1000;
    const c = converter();
    const west = c.convert(createInstant(t, 100), 120);
    const east = c.convert(createInstant(t, 115), 120);
    expect(east.offsetMinutes - west.offsetMinutes).toBeCloseTo(60, 9);
    expect(east.longitudeCorrectionMinutes).toBeCloseTo(-20, 9);
  });

  it("applies no correction under the standard clock basis", () => {
    const t = Date.UTC(2024, 1, 11, 12) / 1000;
    const result = converter({ timeBasis: "standard_clock" }).convert(createInstant(t, 116.4), 120);
    expect(result.offsetMinutes).toBe(0);
    expect(result.equationOfTimeMinutes).toBe(0);
    expect(result.secondsOfDay).toBe(20 * 3600);
    expect(result.date).toBe("2024-02-11");
  });

  it("uses longitude alone under the mean solar basis", () => {
    const t = Date.UTC(2024, 1, 11, 12) / 1000;
    const result = converter({ timeBasis: "mean_solar" }).convert(createInstant(t, 7.5), 0);
    expect(result.equationOfTimeMinutes).toBe(0);
    expect(result.offsetMinutes).toBe(30);
    expect(result.secondsSinceDayStart).toBe(12.5 * 3600);
  });

  it("starts the day at 23:00 under the zi_start boundary", () => {
    const t = Date.UTC(2024, 0, 1, 23, 30) / 1000;
    const midnight = converter({ timeBasis: "mean_solar" }).convert(createInstant(t, 0), 0);
    const zi = converter({ timeBasis: "mean_solar", dayBoundary: "zi_start" }).convert(
      createInstant(t, 0),
      0
    );

    expect(midnight.date).toBe("2024-01-01");
    expect(zi.date).toBe("2024-01-02");
    expect(zi.secondsSinceDayStart).toBe(1800);
    expect(zi.dayStartSeconds).toBeCloseTo(Date.UTC(2024, 0, 1, 23) / 1000, 2);
  });

  it("rejects a standard meridian outside [-180, 180]", () => {
    const t = Date.UTC(2024, 0, 1) / 1000;
    expect(() => converter().convert(createInstant(t, 0), 195)).toThrow(DomainRangeError);
  });
});

describe("inferStandardMeridian", () => {
  it("rounds to the nearest multiple of 15 degrees", () => {
    expect(inferStandardMeridian(116.4)).toBe(120);
    expect(inferStandardMeridian(-7.6)).toBe(-15);
    expect(Object.is(inferStandardMeridian(-3), 0)).toBe(true);
  });
});
