/** Raised when an override document is malformed or names unknown rules or bad params. */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly source: string | null = null,
  ) {
    super(source !== null ? `${source}: ${message}` : message);
    this.name = 'ConfigError';
  }
}
