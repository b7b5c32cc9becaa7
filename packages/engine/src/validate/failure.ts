import { DIFFERENCE_KINDS, type Difference, type DifferenceKind } from "../difference/types.js";
import { formatFailureReport } from "./report.js";

export type DifferenceCounts = Readonly<Record<DifferenceKind, number>>;

function countByKind(differences: readonly Difference[]): DifferenceCounts {
  const counts: Record<DifferenceKind, number> = { missing: 0, extra: 0, invalid: 0, deviation: 0 };
  for (const d of differences) counts[d.kind] += 1;
  return Object.freeze(counts);
}

/**
 * The "data does not conform" outcome of a validation: the complete, ordered
 * difference sequence plus per-kind counts.
 */
export class ValidationFailure {
  readonly differences: readonly Difference[];
  readonly counts: DifferenceCounts;

  constructor(differences: readonly Difference[]) {
    this.differences = Object.freeze([...differences]);
    this.counts = countByKind(this.differences);
  }

  get total(): number {
    return this.differences.length;
  }

  /** One-line summary, e.g. `2 differences (missing: 1, extra: 1)`. */
  summary(): string {
    const parts = DIFFERENCE_KINDS.filter((kind) => this.counts[kind] > 0).map(
      (kind) => `${kind}: ${this.counts[kind]}`,
    );
    const noun = this.total === 1 ? "difference" : "differences";
    return `${this.total} ${noun} (${parts.join(", ")})`;
  }

  /** Stable multi-line rendering suitable for direct display. */
  render(): string {
    return formatFailureReport(this);
  }

  toString(): string {
    return this.render();
  }
}

/** Thrown by `assertValid` when data does not satisfy its requirement. */
export class ValidationError extends Error {
  override name = "ValidationError";

  readonly failure: ValidationFailure;

  constructor(failure: ValidationFailure) {
    super(failure.render());
    this.failure = failure;
  }
}
