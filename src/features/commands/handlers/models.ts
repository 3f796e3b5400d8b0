/**
 * @fileoverview Models command handler
 * @module features/commands/handlers/models
 */

import { resolveApiKey } from '../../credentials/resolver.js';
import { MODEL_CATALOG, normalizeModelId } from '../../model/catalog.js';
import type { CommandContext } from '../types.js';
import { formatTable, formatTokenCount } from '../utils/formatting.js';

/**
 * Lists the model menu, or with `remote` the models the key can call.
 * The configured default is marked with `*`.
 */
export async function runModels(options: { remote?: boolean }, context: CommandContext): Promise<void> {
  const { config } = context;
  const defaultModel = normalizeModelId(config.defaultModel);
  const marker = (id: string): string => (id === defaultModel ? '*' : '');

  if (options.remote !== true) {
    const rows = MODEL_CATALOG.map((model) => [
      marker(model.id),
      model.id,
      model.displayName,
      formatTokenCount(model.contextLimit),
      model.description,
    ]);
    context.write(formatTable(['', 'MODEL', 'NAME', 'CONTEXT', 'DESCRIPTION'], rows));
    return;
  }

  const { apiKey } = await resolveApiKey({
    sources: config.credentials.sources,
    secretName: config.credentials.secretName,
    envVars: config.credentials.envVars,
    store: context.store,
    env: context.env,
  });

  const models = await context.listModels({
    apiKey,
    baseUrl: config.api.baseUrl,
    apiVersion: config.api.apiVersion,
    timeoutMs: config.api.timeoutMs,
  });

  const rows = models
    .filter((model) => model.supportsGenerateContent)
    .map((model) => [
      marker(model.id),
      model.id,
      model.displayName,
      model.inputTokenLimit !== undefined ? formatTokenCount(model.inputTokenLimit) : '-',
    ]);

  if (rows.length === 0) {
    context.write('No models supporting generateContent are available to this key\n');
    return;
  }
  context.write(formatTable(['', 'MODEL', 'NAME', 'CONTEXT'], rows));
}
