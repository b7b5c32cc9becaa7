import { assertNever, compareKeys, type GroupKey } from "@datacheck/core";

import { extra, inGroup, missing, type Difference } from "../difference/types.js";
import type { MappingRequirement, Requirement } from "../requirement/types.js";
import { diff, expectedValueOf } from "./differ.js";
import { collectionElements, groupEntries, shapeOf } from "./shape.js";

/** Every element `requirement` implies, reported as `missing`. */
export function impliedMissing(requirement: Requirement): Difference[] {
  switch (requirement.kind) {
    case "equality":
    case "predicate":
    case "approximate":
      return [missing(expectedValueOf(requirement))];
    case "set":
      return requirement.members.map((member) => missing(expectedValueOf(member)));
    case "sequence":
      return requirement.items.map((item, index) => missing(expectedValueOf(item), { index }));
    case "mapping":
      return requirement.entries.flatMap(([key, sub]) => impliedMissing(sub).map((d) => inGroup(d, key)));
    default:
      return assertNever(requirement);
  }
}

/** Every element of `observed`, reported as `extra`. */
export function observedExtras(observed: unknown): Difference[] {
  const shape = shapeOf(observed);
  switch (shape) {
    case "scalar":
      return [extra(observed)];
    case "sequence":
    case "set":
      return collectionElements("set", observed).map((element) => extra(element));
    case "mapping":
      return groupEntries("mapping", observed).flatMap(([key, group]) =>
        observedExtras(group).map((d) => inGroup(d, key)),
      );
    default:
      return assertNever(shape);
  }
}

/**
 * Compare grouped data against a `mapping` requirement, one group at a time.
 *
 * Keys are visited in ascending order over the union of both key sets. A key
 * only in the requirement yields `missing` for everything it implies; a key
 * only in the data yields `extra` for everything observed. Every difference
 * is tagged with its group path.
 */
export function diffGroups(requirement: MappingRequirement, observed: unknown): Difference[] {
  const required = new Map<GroupKey, Requirement>(requirement.entries);
  const actual = new Map<GroupKey, unknown>(groupEntries("mapping", observed));

  const keys = Array.from(new Set<GroupKey>([...required.keys(), ...actual.keys()])).sort(compareKeys);

  const out: Difference[] = [];
  for (const key of keys) {
    const sub = required.get(key);
    let found: Difference[];
    if (sub === undefined) {
      found = observedExtras(actual.get(key));
    } else if (!actual.has(key)) {
      found = impliedMissing(sub);
    } else {
      found = diff(sub, actual.get(key));
    }
    for (const d of found) out.push(inGroup(d, key));
  }
  return out;
}

/** Apply a non-mapping requirement to every group of `observed`. */
export function diffEachGroup(requirement: Requirement, observed: unknown): Difference[] {
  return groupEntries(requirement.kind, observed).flatMap(([key, group]) =>
    diff(requirement, group).map((d) => inGroup(d, key)),
  );
}
