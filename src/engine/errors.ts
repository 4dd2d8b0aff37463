/**
 * Errors raised by the ladder engine and calculators.
 * Both kinds are caller errors and map to HTTP 400 in the API.
 */

export class LadderError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "LadderError";
    this.issues = issues;
  }
}

/** Malformed or out-of-range portfolio parameters. */
export class InvalidInputError extends LadderError {
  constructor(message: string, issues: string[] = []) {
    super(message, issues);
    this.name = "InvalidInputError";
  }
}

/** Missing or malformed yield curve or tax parameters. */
export class ConfigurationError extends LadderError {
  constructor(message: string, issues: string[] = []) {
    super(message, issues);
    this.name = "ConfigurationError";
  }
}
