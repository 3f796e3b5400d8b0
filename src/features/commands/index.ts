/**
 * @fileoverview Command handlers public API
 * @module features/commands
 */

export type { CommandContext } from './types.js';
export { runGenerate, type GenerateCommandOptions } from './handlers/generate.js';
export {
  runSecretsList,
  runSecretsSet,
  runSecretsGet,
  runSecretsDelete,
  runSecretsAccess,
} from './handlers/secrets.js';
export { runModels } from './handlers/models.js';
export { runStatus } from './handlers/status.js';
export { runSetup, runInit } from './handlers/setup.js';
export { exitCodeFor, EXIT_OK, EXIT_FAILURE, EXIT_USAGE } from './exit-codes.js';
