/** Raised for invalid command-line usage (missing flag or value). */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** Raised when the env file or one of the input files is unusable. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when a health rule reads an attribute the drive output never
 * provided.
 */
export class MissingAttributeError extends Error {
  constructor(readonly attribute: string) {
    super(`Missing attribute '${attribute}'`);
    this.name = 'MissingAttributeError';
  }
}
