/**
 * Raised when the environment is missing a required variable or holds an
 * invalid one. Fatal: the server never starts.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly problems: string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when the text-generation API fails (network, timeout, quota, empty
 * completion). Reported to HTTP callers as a 500.
 */
export class ModelCallError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ModelCallError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
