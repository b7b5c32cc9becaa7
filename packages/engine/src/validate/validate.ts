import { diff } from "../diff/differ.js";
import { normalize } from "../requirement/normalize.js";
import type { ToleranceOptions } from "../requirement/types.js";
import { ValidationError, ValidationFailure } from "./failure.js";

/**
 * Options for {@link validate}.
 *
 * A positive `tolerance` or `percent` turns every finite number literal in the
 * requirement into an approximate comparison; explicit `approx(...)`
 * annotations keep their own tolerances.
 */
export type ValidateOptions = ToleranceOptions;

export type ValidationResult = { ok: true } | { ok: false; failure: ValidationFailure };

/**
 * Validate `observed` data against a raw (or already normalized) requirement.
 *
 * Pure: never logs and never mutates its inputs. Always computes the complete
 * difference sequence.
 *
 * @throws {MalformedRequirementError} if the requirement cannot be normalized.
 * @throws {ShapeMismatchError} if requirement and data shapes are incompatible.
 */
export function validate(observed: unknown, rawRequirement: unknown, options: ValidateOptions = {}): ValidationResult {
  const requirement = normalize(rawRequirement, options);
  const differences = diff(requirement, observed);
  return differences.length === 0 ? { ok: true } : { ok: false, failure: new ValidationFailure(differences) };
}

/**
 * Like {@link validate}, but throws a {@link ValidationError} on failure.
 *
 * Intended for test suites: the error message is the rendered failure report.
 */
export function assertValid(observed: unknown, rawRequirement: unknown, options: ValidateOptions = {}): void {
  const result = validate(observed, rawRequirement, options);
  if (!result.ok) {
    throw new ValidationError(result.failure);
  }
}
