import type { ToleranceOptions } from "../requirement/types.js";
import { deviation, invalid, type Deviation, type Invalid } from "./types.js";

/**
 * Compare a numeric observation against `expected`.
 *
 * Returns `null` when `|observed - expected|` is within the absolute
 * `tolerance` or within `percent * |expected|`; a {@link Deviation} when it is
 * outside both; an {@link Invalid} when `observed` is not a number or is NaN
 * (no deviation can be computed).
 */
export function computeDeviation(
  observed: unknown,
  expected: number,
  opts: ToleranceOptions = {},
): Deviation | Invalid | null {
  if (typeof observed !== "number" || Number.isNaN(observed)) {
    return invalid(observed, expected);
  }

  const tolerance = opts.tolerance ?? 0;
  const percent = opts.percent ?? 0;

  const diff = Math.abs(observed - expected);

  // `diff === 0` also covers +/-0.
  if (diff === 0) return null;
  // Infinity - Infinity is NaN; fall back to identity.
  if (Number.isNaN(diff)) return observed === expected ? null : deviation(observed, expected);

  if (diff <= tolerance) return null;
  if (percent > 0 && diff <= percent * Math.abs(expected)) return null;

  return deviation(observed, expected);
}
