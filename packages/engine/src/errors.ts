import type { ObservedShape } from "./diff/shape.js";
import type { RequirementKind } from "./requirement/types.js";

/**
 * Error thrown when a raw requirement cannot be normalized.
 *
 * This is a usage error, distinct from a validation failure: `path` locates
 * the offending value inside the raw requirement (`$` is the root).
 */
export class MalformedRequirementError extends Error {
  override name = "MalformedRequirementError";

  readonly path: string;

  constructor(path: string, message: string) {
    super(`${message} (at ${path})`);
    this.path = path;
  }
}

/** Error thrown when a requirement is applied to data of an incompatible shape. */
export class ShapeMismatchError extends Error {
  override name = "ShapeMismatchError";

  readonly requirementKind: RequirementKind;
  readonly observedShape: ObservedShape;

  constructor(requirementKind: RequirementKind, observedShape: ObservedShape, detail?: string) {
    super(
      `${requirementKind} requirement cannot be applied to ${observedShape} data` +
        (detail ? `: ${detail}` : ""),
    );
    this.requirementKind = requirementKind;
    this.observedShape = observedShape;
  }
}
