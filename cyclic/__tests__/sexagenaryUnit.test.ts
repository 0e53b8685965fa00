import { describe, expect, it } from "vitest";
import { SexagenaryUnit, mod } from "../sexagenaryUnit.js";
import { DomainRangeError, InvalidCombinationError } from "../../lib/errors.js";

const values = Array.from({ length: 60 }, (_, v) => v);

describe("SexagenaryUnit", () => {
  it("derives stem and branch from the value", () => {
    const unit = SexagenaryUnit.fromValue(25);
    expect(unit.stem).toBe(5);
    expect(unit.branch).toBe(1);
    expect(unit.element).toBe("earth");
  });

  it("advancing by a full cycle returns the same unit", () => {
    for (const v of values) {
      const unit = SexagenaryUnit.fromValue(v);
      expect(unit.advance(60)).toBe(unit);
      expect(unit.advance(1).distanceTo(unit)).toBe(59);
    }
  });

  it("wraps negative steps", () => {
    expect(SexagenaryUnit.fromValue(0).retreat(1).value).toBe(59);
    expect(SexagenaryUnit.fromValue(3).advance(-65).value).toBe(58);
  });

  it("resolves every valid stem/branch pair back to its value", () => {
    for (const v of values) {
      expect(SexagenaryUnit.fromStemBranch(v % 10, v % 12).value).toBe(v);
    }
  });

  it("rejects every pair with mismatched parity", () => {
    let rejected = 0;
    for (let stem = 0; stem < 10; stem++) {
      for (let branch = 0; branch < 12; branch++) {
        if (stem % 2 === branch % 2) continue;
        expect(() => SexagenaryUnit.fromStemBranch(stem, branch)).toThrow(
          InvalidCombinationError
        );
        rejected += 1;
      }
    }
    expect(rejected).toBe(60);
  });

  it("rejects values outside the cycle", () => {
    expect(() => SexagenaryUnit.fromValue(60)).toThrow(DomainRangeError);
    expect(() => SexagenaryUnit.fromValue(-1)).toThrow(DomainRangeError);
    expect(() => SexagenaryUnit.fromValue(1.5)).toThrow(DomainRangeError);
    expect(() => SexagenaryUnit.fromStemBranch(10, 0)).toThrow(DomainRangeError);
    expect(() => SexagenaryUnit.fromStemBranch(0, 12)).toThrow(DomainRangeError);
    expect(() => SexagenaryUnit.fromValue(0).advance(0.5)).toThrow(DomainRangeError);
  });

  it("shares one frozen instance per value", () => {
    const unit = SexagenaryUnit.fromValue(9);
    expect(SexagenaryUnit.fromStemBranch(9, 9)).toBe(unit);
    expect(Object.isFrozen(unit)).toBe(true);
    expect(unit.equals(SexagenaryUnit.fromValue(9))).toBe(true);
  });

  it("serializes to indices and element", () => {
    expect(SexagenaryUnit.fromValue(9).toJSON()).toEqual({
      index: 9,
      stem: 9,
      branch: 9,
      element: "water",
    });
    expect(String(SexagenaryUnit.fromValue(0))).toBe("SexagenaryUnit(0: stem 0, branch 0)");
  });

  it("mod is non-negative for negative inputs", () => {
    expect(mod(-1, 60)).toBe(59);
    expect(mod(120, 60)).toBe(0);
  });
});
