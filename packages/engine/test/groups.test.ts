import { describe, expect, it } from "vitest";

import {
  ShapeMismatchError,
  approx,
  diff,
  diffGroups,
  extra,
  invalid,
  missing,
  normalize,
  type MappingRequirement,
} from "@datacheck/engine";

function mapping(raw: unknown): MappingRequirement {
  const req = normalize(raw);
  if (req.kind !== "mapping") throw new Error(`expected a mapping requirement, got ${req.kind}`);
  return req;
}

describe("diffGroups", () => {
  it("reports groups present on only one side as missing or extra", () => {
    const req = mapping({ x: new Set([1, 2]), y: new Set([3]) });
    expect(diffGroups(req, { x: [1, 2], z: [9] })).toEqual([
      missing(3, { group: ["y"] }),
      extra(9, { group: ["z"] }),
    ]);
  });

  it("visits the union of keys in ascending order", () => {
    const req = mapping({ c: "c", a: "a" });
    expect(diffGroups(req, { b: "b", c: "x", a: "y" })).toEqual([
      invalid("y", "a", { group: ["a"] }),
      extra("b", { group: ["b"] }),
      invalid("x", "c", { group: ["c"] }),
    ]);
  });

  it("orders numeric keys numerically", () => {
    const req = mapping(
      new Map([
        [10, "x"],
        [2, "y"],
      ]),
    );
    const observed = new Map([
      [2, "y"],
      [10, "z"],
    ]);
    expect(diffGroups(req, observed)).toEqual([invalid("z", "x", { group: [10] })]);
  });

  it("reports everything a requirement-only group implies", () => {
    const req = mapping({ seq: ["p", "q"], set: new Set([1, 2]), num: approx(10, 1) });
    expect(diffGroups(req, {})).toEqual([
      missing(10, { group: ["num"] }),
      missing("p", { group: ["seq"], index: 0 }),
      missing("q", { group: ["seq"], index: 1 }),
      missing(1, { group: ["set"] }),
      missing(2, { group: ["set"] }),
    ]);
  });

  it("reports every element of an observed-only group", () => {
    expect(diffGroups(mapping({}), { g: new Set(["a", "b"]), s: 4 })).toEqual([
      extra("a", { group: ["g"] }),
      extra("b", { group: ["g"] }),
      extra(4, { group: ["s"] }),
    ]);
  });

  it("tags nested groups with their full key path", () => {
    const req = mapping({ a: { b: [1] } });
    expect(diffGroups(req, { a: { c: 2 } })).toEqual([
      missing(1, { group: ["a", "b"], index: 0 }),
      extra(2, { group: ["a", "c"] }),
    ]);
  });

  it("keeps sequence positions inside matched groups", () => {
    const req = mapping({ g: ["a", "b"] });
    expect(diffGroups(req, { g: ["a", "x"] })).toEqual([invalid("x", "b", { group: ["g"], index: 1 })]);
  });

  it("is what diff delegates to for mapping requirements", () => {
    const req = mapping({ x: 1 });
    expect(diff(req, { x: 2 })).toEqual(diffGroups(req, { x: 2 }));
  });

  it("refuses data that is not grouped", () => {
    expect(() => diffGroups(mapping({ x: 1 }), [1])).toThrow(ShapeMismatchError);
  });

  it("refuses a mismatched shape inside a group", () => {
    expect(() => diffGroups(mapping({ x: [1, 2] }), { x: 5 })).toThrow(
      "sequence requirement cannot be applied to scalar data",
    );
  });
});
