/**
 * Raised when a job submission cannot be decoded. Never retried.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string> = [],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Raised at construction time when the notifier is given unusable settings.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
