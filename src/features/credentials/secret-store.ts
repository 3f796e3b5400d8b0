/**
 * @fileoverview File-backed secrets manager
 * @module features/credentials/secret-store
 *
 * Secrets live in `secrets.yaml` inside the config directory, one entry per
 * name, readable by the owning user only. Each secret carries an access flag
 * so a stored key can be withheld from the tool without deleting it.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import { logger } from '../../shared/utils/logger.js';
import {
  CredentialError,
  SECRET_NAME_PATTERN,
  StoredSecretSchema,
  type ISecretStore,
  type SecretSummary,
  type StoredSecret,
} from './types.js';

// =============================================================================
// CONSTANTS
// =============================================================================

const SECRETS_FILE = 'secrets.yaml';

/** Owner read/write only */
const FILE_MODE = 0o600;

const SecretsFileSchema = z.object({
  version: z.literal(1).default(1),
  secrets: z.record(z.string(), StoredSecretSchema).default({}),
});
type SecretsFile = z.infer<typeof SecretsFileSchema>;

const log = logger.child('secrets');

// =============================================================================
// HELPERS
// =============================================================================

/** Names that would address the prototype of the secrets map */
const RESERVED_NAMES = new Set(['__proto__']);

/**
 * Validates a secret name.
 *
 * @throws {CredentialError} INVALID_SECRET_NAME
 */
export function assertSecretName(name: string): void {
  if (RESERVED_NAMES.has(name)) {
    throw new CredentialError('INVALID_SECRET_NAME', `Invalid secret name "${name}": the name is reserved`);
  }
  if (!SECRET_NAME_PATTERN.test(name)) {
    throw new CredentialError(
      'INVALID_SECRET_NAME',
      `Invalid secret name "${name}": use letters, digits and underscores, not starting with a digit`
    );
  }
}

/** Own entries only; names like `constructor` must not reach Object.prototype */
function findSecret(file: SecretsFile, name: string): SecretsFile['secrets'][string] | undefined {
  return Object.hasOwn(file.secrets, name) ? file.secrets[name] : undefined;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// =============================================================================
// FILE SECRET STORE
// =============================================================================

/**
 * Secrets manager persisted as a YAML file.
 *
 * @example
 * ```typescript
 * const store = new FileSecretStore(getConfigDir());
 * await store.set('GOOGLE_API_KEY', 'test-secret');
 * const secret = await store.get('GOOGLE_API_KEY');
 * ```
 */
export class FileSecretStore implements ISecretStore {
  readonly location: string;
  private readonly now: () => Date;

  constructor(configDir: string, options: { now?: () => Date } = {}) {
    this.location = path.join(configDir, SECRETS_FILE);
    this.now = options.now ?? (() => new Date());
  }

  async list(): Promise<SecretSummary[]> {
    const file = await this.load();
    return Object.entries(file.secrets)
      .map(([name, secret]) => ({ name, granted: secret.granted, updatedAt: secret.updatedAt }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async get(name: string): Promise<StoredSecret | undefined> {
    assertSecretName(name);
    const file = await this.load();
    const secret = findSecret(file, name);
    return secret === undefined ? undefined : { name, ...secret };
  }

  async set(name: string, value: string, options: { granted?: boolean } = {}): Promise<StoredSecret> {
    assertSecretName(name);
    if (value.trim() === '') {
      throw new CredentialError('EMPTY_KEY', `Refusing to store an empty value for secret "${name}"`);
    }

    const file = await this.load();
    const existing = findSecret(file, name);
    const timestamp = this.now().toISOString();
    const secret = {
      value: value.trim(),
      granted: options.granted ?? existing?.granted ?? true,
      createdAt: existing?.createdAt ?? timestamp,
      updatedAt: timestamp,
    };
    file.secrets[name] = secret;
    await this.save(file);

    log.debug(`${existing === undefined ? 'Created' : 'Updated'} secret ${name}`);
    return { name, ...secret };
  }

  async delete(name: string): Promise<boolean> {
    assertSecretName(name);
    const file = await this.load();
    if (findSecret(file, name) === undefined) {
      return false;
    }
    delete file.secrets[name];
    await this.save(file);
    log.debug(`Deleted secret ${name}`);
    return true;
  }

  async setAccess(name: string, granted: boolean): Promise<void> {
    assertSecretName(name);
    const file = await this.load();
    const secret = findSecret(file, name);
    if (secret === undefined) {
      throw new CredentialError('SECRET_NOT_FOUND', `No secret named "${name}" in ${this.location}`);
    }
    secret.granted = granted;
    secret.updatedAt = this.now().toISOString();
    await this.save(file);
    log.debug(`${granted ? 'Granted' : 'Revoked'} access to secret ${name}`);
  }

  async checkPermissions(): Promise<string[]> {
    if (process.platform === 'win32') {
      return [];
    }
    try {
      const stats = await fs.stat(this.location);
      if ((stats.mode & 0o077) !== 0) {
        const mode = (stats.mode & 0o777).toString(8);
        return [`${this.location} is readable by other users (mode ${mode}); run chmod 600 on it`];
      }
      return [];
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }
  }

  // ===========================================================================
  // PERSISTENCE
  // ===========================================================================

  private async load(): Promise<SecretsFile> {
    let content: string;
    try {
      content = await fs.readFile(this.location, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return SecretsFileSchema.parse({});
      }
      throw new CredentialError('STORE_UNREADABLE', `Cannot read ${this.location}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = parseYaml(content);
    } catch (error) {
      throw new CredentialError('STORE_UNREADABLE', `${this.location} is not valid YAML`, { cause: error });
    }

    const result = SecretsFileSchema.safeParse(parsed ?? {});
    if (!result.success) {
      const issue = result.error.issues[0];
      const detail = issue !== undefined ? `${issue.path.join('.')}: ${issue.message}` : 'unknown problem';
      throw new CredentialError('STORE_UNREADABLE', `${this.location} is malformed (${detail})`);
    }
    return result.data;
  }

  private async save(file: SecretsFile): Promise<void> {
    await fs.mkdir(path.dirname(this.location), { recursive: true, mode: 0o700 });
    await fs.writeFile(this.location, stringifyYaml(file), { encoding: 'utf-8', mode: FILE_MODE });
    // writeFile only applies the mode when it creates the file
    await fs.chmod(this.location, FILE_MODE);
  }
}

/**
 * Create a secrets store rooted in the given config directory.
 */
export function createSecretStore(configDir: string): FileSecretStore {
  return new FileSecretStore(configDir);
}
