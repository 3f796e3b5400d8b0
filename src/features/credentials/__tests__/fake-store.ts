/**
 * @fileoverview In-memory secrets store for tests
 * @module features/credentials/__tests__/fake-store
 */

import { CredentialError, type ISecretStore, type SecretSummary, type StoredSecret } from '../types.js';

const TIMESTAMP = '2024-01-01T00:00:00.000Z';

/**
 * Keeps secrets in a Map; `permissionWarnings` is returned by checkPermissions.
 */
export class InMemorySecretStore implements ISecretStore {
  readonly location = '/virtual/secrets.yaml';
  readonly secrets = new Map<string, StoredSecret>();
  permissionWarnings: string[] = [];

  constructor(initial: Record<string, string | { value: string; granted: boolean }> = {}) {
    for (const [name, entry] of Object.entries(initial)) {
      const { value, granted } = typeof entry === 'string' ? { value: entry, granted: true } : entry;
      this.secrets.set(name, { name, value, granted, createdAt: TIMESTAMP, updatedAt: TIMESTAMP });
    }
  }

  async list(): Promise<SecretSummary[]> {
    return [...this.secrets.values()]
      .map(({ name, granted, updatedAt }) => ({ name, granted, updatedAt }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async get(name: string): Promise<StoredSecret | undefined> {
    return this.secrets.get(name);
  }

  async set(name: string, value: string, options: { granted?: boolean } = {}): Promise<StoredSecret> {
    const existing = this.secrets.get(name);
    const secret: StoredSecret = {
      name,
      value: value.trim(),
      granted: options.granted ?? existing?.granted ?? true,
      createdAt: existing?.createdAt ?? TIMESTAMP,
      updatedAt: TIMESTAMP,
    };
    this.secrets.set(name, secret);
    return secret;
  }

  async delete(name: string): Promise<boolean> {
    return this.secrets.delete(name);
  }

  async setAccess(name: string, granted: boolean): Promise<void> {
    const secret = this.secrets.get(name);
    if (secret === undefined) {
      throw new CredentialError('SECRET_NOT_FOUND', `No secret named "${name}" in ${this.location}`);
    }
    secret.granted = granted;
  }

  async checkPermissions(): Promise<string[]> {
    return this.permissionWarnings;
  }
}
