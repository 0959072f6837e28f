/**
 * Raised when configuration files or environment variables are missing or malformed.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public source?: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
