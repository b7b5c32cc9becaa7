export { main, parseCliArgs, usage } from "./cli.js";
export type { CliOptions, MainIo, ParseResult } from "./cli.js";
export { decodeRequirement } from "./dsl/decode.js";
export { loadSuite } from "./suite/load.js";
export type { LoadSuiteOptions } from "./suite/load.js";
export { exitCodeFor, runSuite } from "./suite/run.js";
export type { RunSuiteOptions } from "./suite/run.js";
export type { CheckResult, Suite, SuiteCheck, SuiteReport } from "./suite/types.js";
export { formatJsonReport } from "./reporting/formatJson.js";
export { formatPrettyReport } from "./reporting/formatPretty.js";
export { SuiteError, UsageError } from "./util/errors.js";
