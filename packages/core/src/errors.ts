/**
 * Error base classes shared by the sexpr packages.
 */

/** Base class for every error thrown by sexpr. */
export class SexprError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A configuration source held a value of the wrong shape. */
export class ConfigError extends SexprError {
  /** Config key the bad value was given for. */
  readonly key: string;
  /** Where the value came from: "env", "set" or a config file path. */
  readonly source: string;

  constructor(key: string, source: string, detail: string) {
    super(`Invalid value for "${key}" from ${source}: ${detail}`);
    this.key = key;
    this.source = source;
  }
}
