/**
 * @fileoverview Credentials public API
 * @module features/credentials
 */

export * from './types.js';
export { FileSecretStore, createSecretStore, assertSecretName } from './secret-store.js';
export { resolveApiKey, inspectCredentials, describeMissingKey } from './resolver.js';
export { maskApiKey, redactSecrets } from './masking.js';
export { checkEnvFileExposure, isEnvFileIgnored } from './exposure.js';
