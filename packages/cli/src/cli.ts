import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";

import { formatJsonReport } from "./reporting/formatJson.js";
import { formatPrettyReport } from "./reporting/formatPretty.js";
import { loadSuite } from "./suite/load.js";
import { exitCodeFor, runSuite } from "./suite/run.js";
import { SuiteError, UsageError } from "./util/errors.js";

type OutputFormat = "pretty" | "json";

/** Options parsed from CLI flags (after validation). */
export interface CliOptions {
  suitePath: string;
  format: OutputFormat;
  checkId?: string;
}

export type ParseResult =
  | {
      kind: "help";
    }
  | {
      kind: "run";
      options: CliOptions;
    };

/**
 * Returns a help/usage string for the `datacheck` CLI.
 */
export function usage(): string {
  return [
    "datacheck: validate data against declarative requirements",
    "",
    "Usage:",
    "  datacheck [--suite <path>] [--format pretty|json] [--check <id>]",
    "",
    "Flags:",
    "  --suite <path>         Path to the suite file (default: datacheck.yml)",
    "  --format pretty|json   Output format (default: pretty)",
    "  --check <id>           Run only a single check",
    "",
    "Exit codes:",
    "  0 = every check passed",
    "  1 = data did not satisfy a requirement",
    "  2 = suite/usage error, or a malformed requirement"
  ].join("\n");
}

function flagValue(argv: string[], i: number, flag: string, what: string): string {
  const next = argv[i + 1];
  if (!next || next.startsWith("-")) {
    throw new UsageError(`${flag} requires a <${what}>`);
  }
  return next;
}

/**
 * Parses raw CLI argv into a strongly-typed run or help request.
 */
export function parseCliArgs(rawArgv: string[]): ParseResult {
  const argv: string[] = [];
  const positionals: string[] = [];
  let parsingFlags = true;

  for (const arg of rawArgv) {
    if (parsingFlags && arg === "--") {
      parsingFlags = false;
      continue;
    }

    if (parsingFlags) {
      argv.push(arg);
    } else {
      positionals.push(arg);
    }
  }

  let suitePath = "datacheck.yml";
  let format: OutputFormat = "pretty";
  let checkId: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg) continue;

    if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    }

    if (arg === "--suite") {
      suitePath = flagValue(argv, i, "--suite", "path");
      i++;
      continue;
    }

    if (arg === "--format") {
      const next = argv[i + 1];
      if (next !== "pretty" && next !== "json") {
        throw new UsageError("--format must be one of: pretty, json");
      }
      format = next;
      i++;
      continue;
    }

    if (arg === "--check") {
      checkId = flagValue(argv, i, "--check", "id");
      i++;
      continue;
    }

    if (arg.startsWith("-")) {
      throw new UsageError(`unknown flag: ${arg}`);
    }

    throw new UsageError(`unexpected positional argument: ${arg}`);
  }

  if (positionals.length > 0) {
    throw new UsageError(`unexpected positional arguments: ${positionals.join(" ")}`);
  }

  return {
    kind: "run",
    options: {
      suitePath,
      format,
      ...(checkId ? { checkId } : {})
    }
  };
}

/** IO dependencies for {@link main} (abstracted for testing). */
export interface MainIo {
  cwd: string;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

/**
 * CLI entrypoint: loads a suite, validates each check, and writes a formatted report.
 */
export async function main(rawArgv: string[], io: MainIo): Promise<number> {
  try {
    const parsed = parseCliArgs(rawArgv);

    if (parsed.kind === "help") {
      io.stdout.write(`${usage()}\n`);
      return 0;
    }

    const suite = await loadSuite({
      cwd: io.cwd,
      suitePath: parsed.options.suitePath,
      onWarning: (message) => {
        io.stderr.write(`warning: ${message}\n`);
      }
    });

    const report = runSuite(suite, parsed.options.checkId ? { onlyCheckId: parsed.options.checkId } : {});

    const out = parsed.options.format === "json" ? formatJsonReport(report) : formatPrettyReport(report);

    io.stdout.write(`${out}\n`);

    return exitCodeFor(report);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);

    if (err instanceof UsageError) {
      io.stderr.write(`error: ${message}\n\n${usage()}\n`);
      return 2;
    }

    if (err instanceof SuiteError) {
      io.stderr.write(`error: ${message}\n`);
      return 2;
    }

    io.stderr.write(`error: ${message}\n`);
    return 2;
  }
}

const isMain =
  process.argv[1] && path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url));

if (isMain) {
  void main(process.argv.slice(2), {
    cwd: process.cwd(),
    stdout: process.stdout,
    stderr: process.stderr
  }).then((code) => {
    process.exitCode = code;
  });
}
