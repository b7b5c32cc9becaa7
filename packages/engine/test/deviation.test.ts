import { describe, expect, it } from "vitest";

import { computeDeviation, deviation, invalid } from "@datacheck/engine";

describe("computeDeviation", () => {
  it("passes exact matches with no tolerance", () => {
    expect(computeDeviation(5, 5)).toBe(null);
    expect(computeDeviation(-0, 0)).toBe(null);
  });

  it("reports delta as observed minus expected", () => {
    expect(computeDeviation(7, 10)).toEqual(deviation(7, 10));
    expect(computeDeviation(7, 10)).toMatchObject({ kind: "deviation", delta: -3 });
  });

  it("passes within the absolute tolerance, inclusive", () => {
    expect(computeDeviation(10.5, 10, { tolerance: 0.5 })).toBe(null);
    expect(computeDeviation(10.75, 10, { tolerance: 0.5 })).toEqual(deviation(10.75, 10));
  });

  it("passes within a percentage of the expected value", () => {
    expect(computeDeviation(105, 100, { percent: 0.05 })).toBe(null);
    expect(computeDeviation(94, 100, { percent: 0.05 })).toEqual(deviation(94, 100));
  });

  it("passes when either tolerance is satisfied", () => {
    expect(computeDeviation(103, 100, { tolerance: 3, percent: 0.01 })).toBe(null);
    expect(computeDeviation(0.5, 0, { tolerance: 1, percent: 0.5 })).toBe(null);
  });

  it("cannot compute a deviation for NaN or non-numbers", () => {
    expect(computeDeviation(NaN, 1, { tolerance: Infinity })).toEqual(invalid(NaN, 1));
    expect(computeDeviation("1", 1)).toEqual(invalid("1", 1));
    expect(computeDeviation(null, 1)).toEqual(invalid(null, 1));
  });

  it("reports an infinite observation as a deviation", () => {
    expect(computeDeviation(Infinity, 1, { tolerance: 1e9 })).toEqual(deviation(Infinity, 1));
  });
});
