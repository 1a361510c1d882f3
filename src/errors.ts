/**
 * Raised for invalid input that makes a scan impossible (bad repository path,
 * malformed configuration). Per-file problems never use this.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
