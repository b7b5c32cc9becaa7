export type {
  ApproximateRequirement,
  EqualityRequirement,
  MappingRequirement,
  Matcher,
  PredicateRequirement,
  Requirement,
  RequirementKind,
  SequenceRequirement,
  SetRequirement,
  ToleranceOptions,
} from "./requirement/types.js";
export { ABSENT } from "./requirement/types.js";
export { Approx, approx } from "./requirement/approx.js";
export { TypeDescriptor, isType, matcherFor } from "./requirement/matcher.js";
export { isRequirement, normalize } from "./requirement/normalize.js";

export type {
  Deviation,
  Difference,
  DifferenceKind,
  DifferenceLocation,
  Extra,
  Invalid,
  Missing,
} from "./difference/types.js";
export { DIFFERENCE_KINDS, deviation, extra, invalid, isDifference, missing } from "./difference/types.js";
export { computeDeviation } from "./difference/deviation.js";

export type { ObservedShape } from "./diff/shape.js";
export { shapeOf } from "./diff/shape.js";
export { diff, matchesRequirement } from "./diff/differ.js";
export { diffGroups } from "./diff/groups.js";

export type { DifferenceCounts } from "./validate/failure.js";
export { ValidationError, ValidationFailure } from "./validate/failure.js";
export type { ValidateOptions, ValidationResult } from "./validate/validate.js";
export { assertValid, validate } from "./validate/validate.js";
export {
  failureToJson,
  formatDifference,
  formatFailureJson,
  formatFailureReport,
  formatValue,
} from "./validate/report.js";

export { MalformedRequirementError, ShapeMismatchError } from "./errors.js";
