/**
 * Error model for the conversion pipeline.
 * Every failure is reported to the caller as one of these, never clamped.
 */

export type ChronosErrorCode =
  | "range"
  | "invalid_combination"
  | "convergence"
  | "ambiguous_window"
  | "out_of_range"
  | "provider_failure";

export class DomainRangeError extends RangeError {
  readonly code = "range" as const;

  constructor(message: string, public value?: unknown) {
    super(message);
    this.name = "DomainRangeError";
  }
}

export class InvalidCombinationError extends Error {
  readonly code = "invalid_combination" as const;

  constructor(public stem: number, public branch: number) {
    super(
      `Stem ${stem} and branch ${branch} differ in parity; no sexagenary value exists`
    );
    this.name = "InvalidCombinationError";
  }
}

export class ConvergenceError extends Error {
  readonly code = "convergence" as const;

  constructor(
    public subject: string,
    public iterations: number,
    public residual: number
  ) {
    super(
      `${subject} did not converge after ${iterations} iterations (residual ${residual})`
    );
    this.name = "ConvergenceError";
  }
}

export interface SearchWindow {
  startSeconds: number;
  endSeconds: number;
}

export class AmbiguousWindowError extends Error {
  readonly code = "ambiguous_window" as const;

  constructor(
    public targetLongitude: number,
    public crossings: number,
    public window: SearchWindow
  ) {
    super(
      `Expected exactly one crossing of ${targetLongitude}° in [${window.startSeconds}, ${window.endSeconds}), found ${crossings}`
    );
    this.name = "AmbiguousWindowError";
  }
}

export class OutOfRangeError extends Error {
  readonly code = "out_of_range" as const;

  constructor(public epochSeconds: number, public window: SearchWindow) {
    super(
      `Instant ${epochSeconds} is outside the validity window [${window.startSeconds}, ${window.endSeconds}]`
    );
    this.name = "OutOfRangeError";
  }
}

export class ProviderFailureError extends Error {
  readonly code = "provider_failure" as const;

  constructor(
    message: string,
    public provider: string,
    public epochSeconds: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ProviderFailureError";
  }
}

export type ChronosError =
  | DomainRangeError
  | InvalidCombinationError
  | ConvergenceError
  | AmbiguousWindowError
  | OutOfRangeError
  | ProviderFailureError;

export function isChronosError(e: unknown): e is ChronosError {
  return (
    e instanceof DomainRangeError ||
    e instanceof InvalidCombinationError ||
    e instanceof ConvergenceError ||
    e instanceof AmbiguousWindowError ||
    e instanceof OutOfRangeError ||
    e instanceof ProviderFailureError
  );
}

/**
 * Stable code for logs; anything outside the taxonomy is "internal".
 */
export function errorCodeOf(e: unknown): ChronosErrorCode | "internal" {
  return isChronosError(e) ? e.code : "internal";
}
