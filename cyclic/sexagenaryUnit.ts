/**
 * Base-60 cyclic value.
 *
 * value ∈ [0,59], stem = value mod 10, branch = value mod 12.
 * Only pairs with stem and branch of equal parity exist, so the 10×12
 * product collapses to 60 values. Instances are frozen and shared; the
 * only way in is through the validating constructors below.
 */

import { DomainRangeError, InvalidCombinationError } from "../lib/errors.js";

export const CYCLE_LENGTH = 60;
export const STEM_COUNT = 10;
export const BRANCH_COUNT = 12;

export type ElementKey = "wood" | "fire" | "earth" | "metal" | "water";

const ELEMENT_BY_STEM: readonly ElementKey[] = [
  "wood",
  "wood",
  "fire",
  "fire",
  "earth",
  "earth",
  "metal",
  "metal",
  "water",
  "water",
];

export interface SexagenaryUnitJson {
  index: number;
  stem: number;
  branch: number;
  element: ElementKey;
}

export function mod(value: number, modulus: number): number {
  const r = value % modulus;
  return r < 0 ? r + modulus : r;
}

function assertIndex(name: string, value: number, size: number): void {
  if (!Number.isInteger(value) || value < 0 || value >= size) {
    throw new DomainRangeError(
      `${name} must be an integer in [0,${size - 1}], got ${value}`,
      value
    );
  }
}

export class SexagenaryUnit {
  readonly stem: number;
  readonly branch: number;

  private constructor(readonly value: number) {
    this.stem = value % STEM_COUNT;
    this.branch = value % BRANCH_COUNT;
    Object.freeze(this);
  }

  private static readonly all: readonly SexagenaryUnit[] = Array.from(
    { length: CYCLE_LENGTH },
    (_, v) => new SexagenaryUnit(v)
  );

  static fromValue(v: number): SexagenaryUnit {
    assertIndex("Sexagenary value", v, CYCLE_LENGTH);
    return SexagenaryUnit.all[v];
  }

  /**
   * Resolves the unique value with value ≡ stem (mod 10) and
   * value ≡ branch (mod 12).
   */
  static fromStemBranch(stem: number, branch: number): SexagenaryUnit {
    assertIndex("Stem", stem, STEM_COUNT);
    assertIndex("Branch", branch, BRANCH_COUNT);
    if (stem % 2 !== branch % 2) {
      throw new InvalidCombinationError(stem, branch);
    }

    // Walk the stem's residue class; one of its six members has the branch.
    for (let v = stem; v < CYCLE_LENGTH; v += STEM_COUNT) {
      if (v % BRANCH_COUNT === branch) {
        return SexagenaryUnit.all[v];
      }
    }
    throw new InvalidCombinationError(stem, branch);
  }

  get element(): ElementKey {
    return ELEMENT_BY_STEM[this.stem];
  }

  advance(k: number): SexagenaryUnit {
    if (!Number.isInteger(k)) {
      throw new DomainRangeError(`Cycle step must be an integer, got ${k}`, k);
    }
    return SexagenaryUnit.all[mod(this.value + k, CYCLE_LENGTH)];
  }

  retreat(k: number): SexagenaryUnit {
    return this.advance(-k);
  }

  /** Forward steps from this unit to `other`, in [0,59]. */
  distanceTo(other: SexagenaryUnit): number {
    return mod(other.value - this.value, CYCLE_LENGTH);
  }

  equals(other: SexagenaryUnit): boolean {
    return this.value === other.value;
  }

  toJSON(): SexagenaryUnitJson {
    return {
      index: this.value,
      stem: this.stem,
      branch: this.branch,
      element: this.element,
    };
  }

  toString(): string {
    return `SexagenaryUnit(${this.value}: stem ${this.stem}, branch ${this.branch})`;
  }
}
