/**
 * @fileoverview Command system types and interfaces
 * @module features/commands/types
 */

import type { QuickstartConfig } from '../../config/schemas.js';
import type { ISecretStore } from '../credentials/types.js';
import type { ClientSettings, IGenerationClient } from '../model/adapters/types.js';
import type { RemoteModel } from '../model/adapters/rest.js';

// =============================================================================
// COMMAND INTERFACES
// =============================================================================

/**
 * Everything a command handler needs, passed in so handlers stay testable
 * without a terminal, a home directory or the network.
 */
export interface CommandContext {
  /** Merged configuration */
  config: QuickstartConfig;

  /** Global configuration directory */
  configDir: string;

  /** Directory the command runs in */
  workspaceRoot: string;

  /** Secrets manager */
  store: ISecretStore;

  /** Environment the key may be read from */
  env: NodeJS.ProcessEnv;

  /** Writes to stdout; model output and listings go here, logs do not */
  write: (text: string) => void;

  /** Creates a generation client for a transport */
  createClient: (settings: ClientSettings) => IGenerationClient;

  /** Lists the models available to a key */
  listModels: (options: {
    apiKey: string;
    baseUrl: string;
    apiVersion: string;
    timeoutMs: number;
  }) => Promise<RemoteModel[]>;

  /** Reads a secret value from stdin when one is needed */
  readSecretInput: () => Promise<string>;
}
