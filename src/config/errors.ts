/**
 * @fileoverview Configuration error type
 * @module config/errors
 */

/**
 * Raised when a configuration file cannot be read, parsed or validated.
 */
export class ConfigError extends Error {
  /** File the problem was found in, when there is one */
  readonly filePath: string | undefined;
  /** Individual validation issues, formatted as `path: message` */
  readonly issues: string[];

  constructor(message: string, options?: { filePath?: string; issues?: string[]; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ConfigError';
    this.filePath = options?.filePath;
    this.issues = options?.issues ?? [];
  }
}
