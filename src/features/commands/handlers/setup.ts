/**
 * @fileoverview Setup and init command handlers
 * @module features/commands/handlers/setup
 */

import { createDefaultConfig, getGlobalConfigPath } from '../../../config/loader.js';
import { logger } from '../../../shared/utils/logger.js';
import { buildSetupGuide, formatSetupGuide } from '../../guide/setup-guide.js';
import type { CommandContext } from '../types.js';

/**
 * Prints the guide for obtaining and storing an API key.
 */
export function runSetup(context: CommandContext): void {
  const { config } = context;
  const sections = buildSetupGuide({
    secretName: config.credentials.secretName,
    envVar: config.credentials.envVars[0] ?? 'GOOGLE_API_KEY',
    model: config.defaultModel,
    configDir: context.configDir,
    baseUrl: config.api.baseUrl,
    apiVersion: config.api.apiVersion,
  });
  context.write(formatSetupGuide(sections));
}

/**
 * Creates the default configuration file.
 *
 * @returns Whether a file was written
 */
export function runInit(context: Pick<CommandContext, 'configDir'>): boolean {
  const created = createDefaultConfig(context.configDir);
  const configPath = getGlobalConfigPath(context.configDir);

  if (created) {
    logger.success(`Created default configuration file ${configPath}`);
  } else {
    logger.info(`Configuration file already exists: ${configPath}`);
  }
  logger.info('Next: run "gemini-quickstart setup" to store your API key');
  return created;
}
