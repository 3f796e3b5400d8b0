/**
 * @fileoverview Secrets management command handlers
 * @module features/commands/handlers/secrets
 *
 * Supports subcommands:
 * - list: Show stored secrets and their access state
 * - set <name> [value]: Store a secret (value from stdin when omitted)
 * - get <name>: Show a secret, masked unless --reveal
 * - delete <name>: Remove a secret
 * - grant / revoke <name>: Toggle whether the key may be used
 */

import { logger } from '../../../shared/utils/logger.js';
import { maskApiKey } from '../../credentials/masking.js';
import { CredentialError } from '../../credentials/types.js';
import type { CommandContext } from '../types.js';
import { formatTable } from '../utils/formatting.js';

const log = logger.child('secrets');

export async function runSecretsList(context: CommandContext): Promise<void> {
  const secrets = await context.store.list();
  if (secrets.length === 0) {
    context.write(`No secrets stored in ${context.store.location}\n`);
    return;
  }

  const rows = secrets.map((secret) => [secret.name, secret.granted ? 'granted' : 'revoked', secret.updatedAt]);
  context.write(formatTable(['NAME', 'ACCESS', 'UPDATED'], rows));
}

export async function runSecretsSet(
  name: string,
  value: string | undefined,
  options: { grant?: boolean },
  context: CommandContext
): Promise<void> {
  let secretValue = value;
  if (secretValue === undefined) {
    secretValue = await context.readSecretInput();
  } else {
    log.warn('Passing a secret as an argument leaves it in your shell history; prefer --stdin');
  }

  const stored = await context.store.set(
    name,
    secretValue,
    options.grant !== undefined ? { granted: options.grant } : {}
  );
  log.success(`Stored secret ${stored.name} (${maskApiKey(stored.value)})`);
  if (!stored.granted) {
    log.info(`Access is revoked; run "gemini-quickstart secrets grant ${stored.name}" to use it`);
  }
}

export async function runSecretsGet(
  name: string,
  options: { reveal?: boolean },
  context: CommandContext
): Promise<void> {
  const secret = await context.store.get(name);
  if (secret === undefined) {
    throw new CredentialError('SECRET_NOT_FOUND', `No secret named "${name}" in ${context.store.location}`);
  }
  const shown = options.reveal === true ? secret.value : maskApiKey(secret.value);
  context.write(`${shown}\n`);
}

export async function runSecretsDelete(name: string, context: CommandContext): Promise<void> {
  const deleted = await context.store.delete(name);
  if (!deleted) {
    throw new CredentialError('SECRET_NOT_FOUND', `No secret named "${name}" in ${context.store.location}`);
  }
  log.success(`Deleted secret ${name}`);
}

export async function runSecretsAccess(name: string, granted: boolean, context: CommandContext): Promise<void> {
  await context.store.setAccess(name, granted);
  log.success(`${granted ? 'Granted' : 'Revoked'} access to secret ${name}`);
}
