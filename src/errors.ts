/**
 * Fatal setup problem: bad grid dimensions, a seed coordinate outside the
 * grid, or a malformed seed document. Raised before any engine exists.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** The seed document could not be read or did not match the expected shape. */
export class SeedError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = "SeedError";
  }
}

/** Grid and live-cell list disagree. Always a programming defect. */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolation";
  }
}
