import type { ToleranceOptions } from "./types.js";

/**
 * Tolerance annotation on a numeric requirement.
 *
 * Values are checked when the requirement is normalized, not here, so a bad
 * annotation surfaces as a `MalformedRequirementError` with its path.
 */
export class Approx {
  readonly expected: number;
  readonly tolerance: number;
  readonly percent: number;

  constructor(expected: number, tolerance: number, percent: number) {
    this.expected = expected;
    this.tolerance = tolerance;
    this.percent = percent;
    Object.freeze(this);
  }
}

/**
 * Require a number within tolerance of `expected`.
 *
 * @example
 * approx(10, 1)                 // 9..11
 * approx(200, { percent: 0.05 }) // 190..210
 */
export function approx(expected: number, tolerance: number | ToleranceOptions = 0): Approx {
  if (typeof tolerance === "number") {
    return new Approx(expected, tolerance, 0);
  }
  return new Approx(expected, tolerance.tolerance ?? 0, tolerance.percent ?? 0);
}
