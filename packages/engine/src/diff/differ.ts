import { assertNever, invariant } from "@datacheck/core";

import { computeDeviation } from "../difference/deviation.js";
import { atIndex, extra, invalid, missing, type Difference } from "../difference/types.js";
import { ShapeMismatchError } from "../errors.js";
import type { Requirement, SequenceRequirement, SetRequirement } from "../requirement/types.js";
import { diffEachGroup, diffGroups } from "./groups.js";
import { collectionElements, shapeOf } from "./shape.js";

/** The value a requirement stands for, as reported in `missing`/`invalid` differences. */
export function expectedValueOf(requirement: Requirement): unknown {
  switch (requirement.kind) {
    case "equality":
      return requirement.value;
    case "approximate":
      return requirement.expected;
    case "predicate":
    case "set":
    case "sequence":
    case "mapping":
      return requirement.source;
    default:
      return assertNever(requirement);
  }
}

function isAtomic(requirement: Requirement): boolean {
  return (
    requirement.kind === "equality" ||
    requirement.kind === "predicate" ||
    requirement.kind === "approximate"
  );
}

/**
 * Whether `observed` fully satisfies `requirement`.
 *
 * Used for element comparisons inside sets and sequences, where an element of
 * the wrong shape is a non-match rather than an error.
 */
export function matchesRequirement(requirement: Requirement, observed: unknown): boolean {
  // No per-group broadcast for elements.
  if (requirement.kind !== "mapping" && shapeOf(observed) === "mapping") return false;
  try {
    return diff(requirement, observed).length === 0;
  } catch (err) {
    if (err instanceof ShapeMismatchError) return false;
    throw err;
  }
}

function consumeLiterals(requirement: SetRequirement, elements: readonly unknown[], consumed: boolean[]): boolean[] {
  const positions = new Map<unknown, number>();
  requirement.members.forEach((member, i) => {
    if (member.kind !== "equality") return;
    // NaN must stay unmatchable; Map keys would treat it as equal to itself.
    if (typeof member.value === "number" && Number.isNaN(member.value)) return;
    positions.set(member.value, i);
  });

  const taken = requirement.members.map(() => false);
  elements.forEach((element, i) => {
    const pos = positions.get(element);
    if (pos !== undefined && !taken[pos]) {
      taken[pos] = true;
      consumed[i] = true;
    }
  });
  return taken;
}

function consumeMatches(requirement: SetRequirement, elements: readonly unknown[], consumed: boolean[]): boolean[] {
  return requirement.members.map((member) => {
    // First unconsumed element wins; members are tried in declared order.
    const found = elements.findIndex((element, i) => !consumed[i] && matchesRequirement(member, element));
    if (found === -1) return false;
    consumed[found] = true;
    return true;
  });
}

function diffSet(requirement: SetRequirement, observed: unknown): Difference[] {
  const elements = collectionElements("set", observed);
  const consumed = elements.map(() => false);

  const taken = requirement.literalOnly
    ? consumeLiterals(requirement, elements, consumed)
    : consumeMatches(requirement, elements, consumed);

  const out: Difference[] = [];
  elements.forEach((element, i) => {
    if (!consumed[i]) out.push(extra(element));
  });
  requirement.members.forEach((member, i) => {
    if (!taken[i]) out.push(missing(expectedValueOf(member)));
  });
  return out;
}

/**
 * Differences for one aligned sequence position.
 *
 * An atomic item against a scalar reports its own difference (e.g. a
 * `deviation`) at `index`. Any other item is matched as a whole: a nested
 * sequence, set or mapping that does not match yields a single `invalid`
 * carrying the whole observed value, and its nested differences are not
 * reported.
 */
function diffPosition(item: Requirement, value: unknown, index: number): Difference[] {
  if (isAtomic(item) && shapeOf(value) === "scalar") {
    return diff(item, value).map((d) => atIndex(d, index));
  }
  return matchesRequirement(item, value) ? [] : [invalid(value, expectedValueOf(item), { index })];
}

function diffSequence(requirement: SequenceRequirement, observed: unknown): Difference[] {
  if (!Array.isArray(observed)) {
    throw new ShapeMismatchError(
      "sequence",
      shapeOf(observed),
      observed instanceof Set ? "a Set has no order to compare" : undefined,
    );
  }

  const items = requirement.items;
  const out: Difference[] = [];

  const n = Math.min(items.length, observed.length);
  for (let i = 0; i < n; i++) {
    const item = items[i];
    invariant(item !== undefined, `missing sequence item ${i}`);
    out.push(...diffPosition(item, observed[i], i));
  }

  for (let i = n; i < items.length; i++) {
    const item = items[i];
    invariant(item !== undefined, `missing sequence item ${i}`);
    out.push(missing(expectedValueOf(item), { index: i }));
  }

  for (let i = n; i < observed.length; i++) {
    out.push(extra(observed[i], { index: i }));
  }

  return out;
}

function expectScalar(requirement: Requirement, observed: unknown): void {
  const shape = shapeOf(observed);
  if (shape !== "scalar") {
    throw new ShapeMismatchError(requirement.kind, shape);
  }
}

/**
 * Compute every difference between `observed` and `requirement`, in
 * deterministic order.
 *
 * A non-mapping requirement against grouped (mapping) data is applied to each
 * group in turn.
 *
 * @throws {ShapeMismatchError} when the requirement and data shapes are incompatible.
 */
export function diff(requirement: Requirement, observed: unknown): Difference[] {
  if (requirement.kind !== "mapping" && shapeOf(observed) === "mapping") {
    return diffEachGroup(requirement, observed);
  }

  switch (requirement.kind) {
    case "equality":
    case "predicate": {
      expectScalar(requirement, observed);
      const d = requirement.matcher.check(observed);
      return d ? [d] : [];
    }
    case "approximate": {
      expectScalar(requirement, observed);
      const d = computeDeviation(observed, requirement.expected, requirement);
      return d ? [d] : [];
    }
    case "set":
      return diffSet(requirement, observed);
    case "sequence":
      return diffSequence(requirement, observed);
    case "mapping":
      return diffGroups(requirement, observed);
    default:
      return assertNever(requirement);
  }
}
