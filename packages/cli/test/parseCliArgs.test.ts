import { describe, expect, it } from "vitest";

import { parseCliArgs } from "../src/cli.js";

describe("parseCliArgs", () => {
  it("parses defaults", () => {
    expect(parseCliArgs([])).toEqual({
      kind: "run",
      options: {
        suitePath: "datacheck.yml",
        format: "pretty"
      }
    });
  });

  it("supports --suite, --format json and --check", () => {
    expect(parseCliArgs(["--suite", "checks/orders.yml", "--format", "json", "--check", "totals"])).toEqual({
      kind: "run",
      options: {
        suitePath: "checks/orders.yml",
        format: "json",
        checkId: "totals"
      }
    });
  });

  it("returns help for -h and --help", () => {
    expect(parseCliArgs(["-h"])).toEqual({ kind: "help" });
    expect(parseCliArgs(["--format", "json", "--help"])).toEqual({ kind: "help" });
  });

  it("allows a trailing -- (end of options)", () => {
    expect(parseCliArgs(["--"])).toEqual({
      kind: "run",
      options: {
        suitePath: "datacheck.yml",
        format: "pretty"
      }
    });
  });

  it("treats args after -- as positional (and errors)", () => {
    expect(() => parseCliArgs(["--", "--check", "totals"]))
      .toThrowError(/unexpected positional arguments: --check totals/);
  });

  it("rejects flags missing their value", () => {
    expect(() => parseCliArgs(["--suite"])).toThrowError("--suite requires a <path>");
    expect(() => parseCliArgs(["--check", "--format", "json"])).toThrowError("--check requires a <id>");
  });

  it("rejects unknown formats, flags and positionals", () => {
    expect(() => parseCliArgs(["--format", "xml"])).toThrowError("--format must be one of: pretty, json");
    expect(() => parseCliArgs(["--verbose"])).toThrowError("unknown flag: --verbose");
    expect(() => parseCliArgs(["orders.yml"])).toThrowError("unexpected positional argument: orders.yml");
  });
});
