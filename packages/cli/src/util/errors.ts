/** Error used for invalid CLI usage / flag combinations. */
export class UsageError extends Error {
  override name = "UsageError";
}

/** Error used for invalid or unreadable suite files. */
export class SuiteError extends Error {
  override name = "SuiteError";
}
