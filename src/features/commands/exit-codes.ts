/**
 * @fileoverview Process exit codes for command failures
 * @module features/commands/exit-codes
 */

import { ConfigError } from '../../config/errors.js';
import { CredentialError } from '../credentials/types.js';
import { AdapterError } from '../model/adapters/types.js';

export const EXIT_OK = 0;
/** Runtime failure: network, service or unexpected errors */
export const EXIT_FAILURE = 1;
/** Configuration or credential problem the user has to fix */
export const EXIT_USAGE = 2;

/**
 * Chooses the exit code for an error raised by a command.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof CredentialError) {
    return EXIT_USAGE;
  }
  if (error instanceof AdapterError && (error.code === 'INVALID_CONFIG' || error.code === 'AUTH_FAILED')) {
    return EXIT_USAGE;
  }
  return EXIT_FAILURE;
}
