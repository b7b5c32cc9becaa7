import { describe, expect, it } from "vitest";

import { ABSENT, Approx } from "@datacheck/engine";

import { decodeRequirement } from "../src/dsl/decode.js";
import { SuiteError } from "../src/util/errors.js";

describe("decodeRequirement", () => {
  it("passes scalars, sequences and plain mappings through", () => {
    expect(decodeRequirement("x")).toBe("x");
    expect(decodeRequirement(null)).toBeNull();
    expect(decodeRequirement({ a: [1, "b"], c: { d: true } })).toEqual({ a: [1, "b"], c: { d: true } });
  });

  it("decodes $set into a Set", () => {
    const decoded = decodeRequirement({ $set: ["a", { $type: "number" }] });
    expect(decoded).toBeInstanceOf(Set);
    expect(decoded).toEqual(new Set(["a", Number]));
  });

  it("decodes $regex with flags", () => {
    const decoded = decodeRequirement({ $regex: "ab+", flags: "i" });
    expect(decoded).toBeInstanceOf(RegExp);
    expect(decoded).toEqual(/ab+/i);
  });

  it("decodes $approx with tolerance and percent", () => {
    const decoded = decodeRequirement({ $approx: 10, tolerance: 0.5 });
    expect(decoded).toBeInstanceOf(Approx);
    expect(decoded).toMatchObject({ expected: 10, tolerance: 0.5, percent: 0 });

    expect(decodeRequirement({ $approx: 200, percent: 0.05 })).toMatchObject({
      expected: 200,
      tolerance: 0,
      percent: 0.05
    });
  });

  it("decodes $type and $absent", () => {
    expect(decodeRequirement({ $type: "string" })).toBe(String);
    expect(decodeRequirement({ $type: "bigint" })).toBe(BigInt);
    expect(decodeRequirement({ north: { $absent: true } })).toEqual({ north: ABSENT });
  });

  it("decodes directives nested in sequences and mappings", () => {
    expect(decodeRequirement({ rows: [{ $type: "boolean" }, 3] })).toEqual({ rows: [Boolean, 3] });
  });

  it("rejects mixed, unknown and over-specified directives", () => {
    expect(() => decodeRequirement({ $set: [1], $regex: "a" })).toThrowError(
      "require mixes directives: $set, $regex"
    );
    expect(() => decodeRequirement({ $oneOf: [1] })).toThrowError(
      "require.$oneOf: unknown directive (known: $set, $regex, $approx, $type, $absent)"
    );
    expect(() => decodeRequirement({ $set: [], flags: "i" })).toThrowError(
      "require: $set does not accept key(s): flags"
    );
  });

  it("rejects bad directive arguments with their path", () => {
    expect(() => decodeRequirement({ a: [{ $absent: false }] })).toThrowError(
      "require.a[0].$absent must be true (got false)"
    );
    expect(() => decodeRequirement({ $type: "date" })).toThrowError(
      'require.$type must be one of: string, number, boolean, bigint (got "date")'
    );
    expect(() => decodeRequirement({ $approx: 1, tolerance: "x" })).toThrowError(
      'require.tolerance must be a number (got "x")'
    );
    expect(() => decodeRequirement({ $set: "ab" })).toThrowError('require.$set must be an array (got "ab")');
    expect(() => decodeRequirement({ $regex: "(" })).toThrowError(/require\.\$regex is not a valid regular expression/);
  });

  it("throws SuiteError", () => {
    expect(() => decodeRequirement({ $absent: 1 }, "checks[2].require")).toThrowError(SuiteError);
  });
});
