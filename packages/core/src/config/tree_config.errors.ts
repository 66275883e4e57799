/**
 * Error thrown when a configuration cannot be accepted.
 * Raised before any traversal starts.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly details: readonly string[] = []
  ) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }
}
