import { describe, expect, it } from "vitest";

import { ABSENT, MalformedRequirementError, invalid, isType, matcherFor, missing } from "@datacheck/engine";

class Widget {
  readonly id = 1;
}

describe("matcherFor", () => {
  it("requires a full match for patterns", () => {
    const m = matcherFor(/ab+/);
    expect(m.matches("abb")).toBe(true);
    expect(m.matches("xabb")).toBe(false);
    expect(m.matches("abbx")).toBe(false);
  });

  it("matches patterns against the string form of non-strings", () => {
    const m = matcherFor(/\d{3}/);
    expect(m.matches(123)).toBe(true);
    expect(m.matches(1234)).toBe(false);
    expect(m.matches(ABSENT)).toBe(false);
  });

  it("keeps case-insensitivity but drops stateful flags", () => {
    const m = matcherFor(/abc/gi);
    expect(m.matches("ABC")).toBe(true);
    // A global regex would alternate true/false on repeated `test` calls.
    expect(m.matches("ABC")).toBe(true);
  });

  it("anchors multiline patterns to the whole string", () => {
    const m = matcherFor(/abc/m);
    expect(m.matches("abc")).toBe(true);
    expect(m.matches("abc\nzzz")).toBe(false);
    expect(m.matches("zzz\nabc")).toBe(false);
    expect(matcherFor(/a.c/ms).matches("a\nc")).toBe(true);
  });

  it("checks primitive types with typeof", () => {
    expect(matcherFor(String).matches("x")).toBe(true);
    expect(matcherFor(String).matches(1)).toBe(false);
    expect(matcherFor(Number).matches(1.5)).toBe(true);
    expect(matcherFor(Number).matches("1.5")).toBe(false);
    expect(matcherFor(BigInt).matches(5n)).toBe(true);
  });

  it("never lets NaN satisfy Number", () => {
    expect(matcherFor(Number).matches(NaN)).toBe(false);
  });

  it("checks classes with instanceof", () => {
    expect(matcherFor(Widget).matches(new Widget())).toBe(true);
    expect(matcherFor(Widget).matches({ id: 1 })).toBe(false);
    expect(matcherFor(Date).matches(new Date(0))).toBe(true);
  });

  it("accepts explicit type descriptors", () => {
    const m = matcherFor(isType(Widget));
    expect(m.matches(new Widget())).toBe(true);
    expect(m.matches({ id: 1 })).toBe(false);
  });

  it("matches literals with strict equality", () => {
    expect(matcherFor("a").matches("a")).toBe(true);
    expect(matcherFor(1).matches("1")).toBe(false);
    expect(matcherFor(null).matches(undefined)).toBe(false);
    expect(matcherFor(NaN).matches(NaN)).toBe(false);
  });

  it("matches dates by timestamp", () => {
    expect(matcherFor(new Date(1000)).matches(new Date(1000))).toBe(true);
    expect(matcherFor(new Date(1000)).matches(1000)).toBe(false);
    expect(matcherFor(new Date(NaN)).matches(new Date(NaN))).toBe(false);
  });

  it("lets only the absence marker match ABSENT", () => {
    const m = matcherFor(ABSENT);
    expect(m.matches(ABSENT)).toBe(true);
    expect(m.matches(null)).toBe(false);
    expect(m.matches(undefined)).toBe(false);
    expect(m.matches(0)).toBe(false);
    expect(m.matches("")).toBe(false);
    expect(matcherFor(null).matches(ABSENT)).toBe(false);
  });

  it("uses user functions as boolean tests", () => {
    const isEven = (v: unknown): boolean => typeof v === "number" && v % 2 === 0;
    const m = matcherFor(isEven);
    expect(m.matches(4)).toBe(true);
    expect(m.check(4)).toBe(null);
    expect(m.check(3)).toEqual(invalid(3, isEven));
  });

  it("counts a throwing test as a failed match", () => {
    const explode = (): boolean => {
      throw new Error("boom");
    };
    expect(matcherFor(explode).matches(1)).toBe(false);
    expect(matcherFor(explode).check(1)).toEqual(invalid(1, explode));
  });

  it("reports a difference returned by the test in place of the default", () => {
    const m = matcherFor((v: unknown) => v !== "" || missing("a value"));
    expect(m.check("")).toEqual(missing("a value"));
    expect(m.matches("")).toBe(false);
    expect(m.matches("x")).toBe(true);
  });

  it("rejects tests that return neither a boolean nor a difference", () => {
    const sloppy = (v: unknown): unknown => v;
    expect(() => matcherFor(sloppy).check(3)).toThrow(MalformedRequirementError);
    expect(() => matcherFor(sloppy).check(3)).toThrow(
      "predicate sloppy returned 3; expected true, false or a difference (at sloppy())",
    );
  });

  it("describes itself", () => {
    function isEven(n: unknown): boolean {
      return typeof n === "number" && n % 2 === 0;
    }
    expect(matcherFor(/a+/i).describe()).toBe("/a+/i");
    expect(matcherFor(String).describe()).toBe("type String");
    expect(matcherFor(Widget).describe()).toBe("type Widget");
    expect(matcherFor(isEven).describe()).toBe("predicate isEven()");
    expect(matcherFor("x").describe()).toBe('"x"');
    expect(matcherFor(ABSENT).describe()).toBe("ABSENT");
  });
});
