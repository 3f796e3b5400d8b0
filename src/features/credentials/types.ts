/**
 * @fileoverview Credential types and the secrets store contract
 * @module features/credentials/types
 */

import { z } from 'zod';

// =============================================================================
// CREDENTIAL SOURCES
// =============================================================================

/**
 * Where an API key can be looked up.
 *
 * - `secrets`: the local secrets manager (see {@link ISecretStore})
 * - `env`: an environment variable, including values loaded from `.env`
 */
export const CredentialSourceSchema = z.enum(['secrets', 'env']);
export type CredentialSource = z.infer<typeof CredentialSourceSchema>;

/** Secret names follow environment-variable naming. */
export const SECRET_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

// =============================================================================
// STORED SECRETS
// =============================================================================

/**
 * Persisted form of a secret.
 */
export const StoredSecretSchema = z.object({
  value: z.string(),
  /** Whether this tool may read the secret; mirrors a notebook's access toggle */
  granted: z.boolean().default(true),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

export interface StoredSecret extends z.infer<typeof StoredSecretSchema> {
  name: string;
}

/**
 * Listing entry; never carries the value.
 */
export interface SecretSummary {
  name: string;
  granted: boolean;
  updatedAt: string;
}

/**
 * Secrets manager contract.
 */
export interface ISecretStore {
  /** Human-readable location of the store, for messages */
  readonly location: string;

  list(): Promise<SecretSummary[]>;

  get(name: string): Promise<StoredSecret | undefined>;

  /**
   * Creates or replaces a secret. Replacing keeps `createdAt` and, unless
   * `granted` is passed, the current access flag.
   */
  set(name: string, value: string, options?: { granted?: boolean }): Promise<StoredSecret>;

  /** @returns whether a secret was removed */
  delete(name: string): Promise<boolean>;

  /** @throws {CredentialError} SECRET_NOT_FOUND if the secret does not exist */
  setAccess(name: string, granted: boolean): Promise<void>;

  /** @returns warnings about the store's on-disk protection */
  checkPermissions(): Promise<string[]>;
}

// =============================================================================
// RESOLUTION
// =============================================================================

export type AttemptOutcome = 'found' | 'missing' | 'empty' | 'access_denied';

/**
 * One lookup performed while resolving a key.
 */
export interface ResolutionAttempt {
  source: CredentialSource;
  /** Secret name or environment variable name */
  origin: string;
  outcome: AttemptOutcome;
}

/**
 * A successfully resolved key and where it came from.
 */
export interface CredentialResolution {
  apiKey: string;
  source: CredentialSource;
  origin: string;
  attempts: ResolutionAttempt[];
}

/**
 * Inputs for key resolution.
 */
export interface ResolveOptions {
  sources: CredentialSource[];
  secretName: string;
  envVars: string[];
  store: ISecretStore;
  env: NodeJS.ProcessEnv;
}

// =============================================================================
// ERRORS
// =============================================================================

export type CredentialErrorCode =
  | 'MISSING_KEY'
  | 'EMPTY_KEY'
  | 'ACCESS_DENIED'
  | 'SECRET_NOT_FOUND'
  | 'INVALID_SECRET_NAME'
  | 'STORE_UNREADABLE';

/**
 * Raised when no usable API key is available or the secrets store fails.
 */
export class CredentialError extends Error {
  readonly code: CredentialErrorCode;
  readonly attempts: ResolutionAttempt[];

  constructor(
    code: CredentialErrorCode,
    message: string,
    options?: { attempts?: ResolutionAttempt[]; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'CredentialError';
    this.code = code;
    this.attempts = options?.attempts ?? [];
  }
}
