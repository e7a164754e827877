/**
 * A rule table that cannot be applied. The whole table is rejected; the previous rules stay live.
 */
export class RuleConfigError extends Error {
  constructor(
    message: string,
    public readonly abbreviation?: string
  ) {
    super(message);
    this.name = "RuleConfigError";
  }
}

/** A rule file that cannot be read, parsed or validated. */
export class ConfigFileError extends Error {
  constructor(
    message: string,
    public readonly path: string | null
  ) {
    super(message);
    this.name = "ConfigFileError";
  }
}
