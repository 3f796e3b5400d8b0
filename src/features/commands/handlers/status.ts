/**
 * @fileoverview Status command handler
 * @module features/commands/handlers/status
 */

import { checkEnvFileExposure } from '../../credentials/exposure.js';
import { maskApiKey } from '../../credentials/masking.js';
import { inspectCredentials } from '../../credentials/resolver.js';
import type { AttemptOutcome } from '../../credentials/types.js';
import type { CommandContext } from '../types.js';
import { formatTable } from '../utils/formatting.js';

const OUTCOME_LABELS: Record<AttemptOutcome, string> = {
  found: 'found',
  missing: 'not set',
  empty: 'empty',
  access_denied: 'access revoked',
};

/**
 * Reports where the API key would be read from and any exposure problems.
 *
 * @returns Whether a usable key was found
 */
export async function runStatus(context: CommandContext): Promise<boolean> {
  const { config } = context;
  const inspection = await inspectCredentials({
    sources: config.credentials.sources,
    secretName: config.credentials.secretName,
    envVars: config.credentials.envVars,
    store: context.store,
    env: context.env,
  });

  const lines = [
    `Config directory: ${context.configDir}`,
    `Secrets store:    ${context.store.location}`,
    `Model:            ${config.defaultModel} (${config.transport})`,
    '',
    'Key lookup:',
  ];
  const rows = inspection.attempts.map((attempt) => [
    `  ${attempt.source}`,
    attempt.origin,
    OUTCOME_LABELS[attempt.outcome],
  ]);
  context.write(`${lines.join('\n')}\n`);
  context.write(formatTable(['  SOURCE', 'NAME', 'RESULT'], rows));

  if (inspection.resolved !== undefined) {
    const { apiKey, source, origin } = inspection.resolved;
    context.write(`\nAPI key: ${maskApiKey(apiKey)} (from ${source}:${origin})\n`);
  } else {
    context.write('\nAPI key: not found; run "gemini-quickstart setup" for instructions\n');
  }

  const warnings = [...(await context.store.checkPermissions())];
  const exposure = await checkEnvFileExposure(context.workspaceRoot);
  if (exposure !== undefined) {
    warnings.push(exposure);
  }
  for (const warning of warnings) {
    context.write(`Warning: ${warning}\n`);
  }

  return inspection.resolved !== undefined;
}
