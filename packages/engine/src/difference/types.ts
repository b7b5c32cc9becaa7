import type { GroupKey } from "@datacheck/core";

/** Where a difference was found: a sequence position and/or a path of group keys (outermost first). */
export type DifferenceLocation = {
  index?: number;
  group?: readonly GroupKey[];
};

/** A required element is absent from the observed data. */
export type Missing = DifferenceLocation & {
  readonly kind: "missing";
  readonly expected: unknown;
};

/** An observed element is not sanctioned by any requirement. */
export type Extra = DifferenceLocation & {
  readonly kind: "extra";
  readonly observed: unknown;
};

/** An observed element is present but fails its requirement. */
export type Invalid = DifferenceLocation & {
  readonly kind: "invalid";
  readonly observed: unknown;
  readonly expected: unknown;
};

/** A numeric element is outside tolerance; `delta = observed - expected`. */
export type Deviation = DifferenceLocation & {
  readonly kind: "deviation";
  readonly observed: number;
  readonly expected: number;
  readonly delta: number;
};

export type Difference = Missing | Extra | Invalid | Deviation;

export type DifferenceKind = Difference["kind"];

export const DIFFERENCE_KINDS = ["missing", "extra", "invalid", "deviation"] as const satisfies readonly DifferenceKind[];

const differenceBrand = new WeakSet<object>();

function brand<T extends Difference>(difference: T, at: DifferenceLocation | undefined): T {
  const located: T = { ...difference };
  if (at?.index !== undefined) located.index = at.index;
  if (at?.group !== undefined && at.group.length > 0) located.group = Object.freeze([...at.group]);
  Object.freeze(located);
  differenceBrand.add(located);
  return located;
}

export function missing(expected: unknown, at?: DifferenceLocation): Missing {
  return brand<Missing>({ kind: "missing", expected }, at);
}

export function extra(observed: unknown, at?: DifferenceLocation): Extra {
  return brand<Extra>({ kind: "extra", observed }, at);
}

export function invalid(observed: unknown, expected: unknown, at?: DifferenceLocation): Invalid {
  return brand<Invalid>({ kind: "invalid", observed, expected }, at);
}

export function deviation(observed: number, expected: number, at?: DifferenceLocation): Deviation {
  return brand<Deviation>({ kind: "deviation", observed, expected, delta: observed - expected }, at);
}

/** True only for values built by the difference constructors in this module. */
export function isDifference(value: unknown): value is Difference {
  return typeof value === "object" && value !== null && differenceBrand.has(value);
}

/** Copy `difference` at a sequence position, keeping any position it already carries. */
export function atIndex<T extends Difference>(difference: T, index: number): T {
  if (difference.index !== undefined) return difference;
  return brand(difference, { index, ...(difference.group ? { group: difference.group } : {}) });
}

/** Copy `difference` nested one level deeper, under group `key`. */
export function inGroup<T extends Difference>(difference: T, key: GroupKey): T {
  return brand(difference, {
    ...(difference.index !== undefined ? { index: difference.index } : {}),
    group: [key, ...(difference.group ?? [])],
  });
}
