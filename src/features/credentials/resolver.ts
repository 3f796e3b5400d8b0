/**
 * @fileoverview API key resolution across the configured credential sources
 * @module features/credentials/resolver
 */

import { logger } from '../../shared/utils/logger.js';
import {
  CredentialError,
  type CredentialResolution,
  type ResolutionAttempt,
  type ResolveOptions,
} from './types.js';

const log = logger.child('credentials');

interface Candidate {
  attempt: ResolutionAttempt;
  value?: string;
}

// =============================================================================
// SOURCE LOOKUPS
// =============================================================================

async function lookupSecret(options: ResolveOptions): Promise<Candidate> {
  const origin = options.secretName;
  const secret = await options.store.get(origin);

  if (secret === undefined) {
    return { attempt: { source: 'secrets', origin, outcome: 'missing' } };
  }
  if (!secret.granted) {
    return { attempt: { source: 'secrets', origin, outcome: 'access_denied' } };
  }
  if (secret.value.trim() === '') {
    return { attempt: { source: 'secrets', origin, outcome: 'empty' } };
  }
  return { attempt: { source: 'secrets', origin, outcome: 'found' }, value: secret.value.trim() };
}

function lookupEnv(envVar: string, env: NodeJS.ProcessEnv): Candidate {
  const value = Object.hasOwn(env, envVar) ? env[envVar] : undefined;
  if (value === undefined) {
    return { attempt: { source: 'env', origin: envVar, outcome: 'missing' } };
  }
  if (value.trim() === '') {
    return { attempt: { source: 'env', origin: envVar, outcome: 'empty' } };
  }
  return { attempt: { source: 'env', origin: envVar, outcome: 'found' }, value: value.trim() };
}

/**
 * Walks the sources in order, stopping at the first key found.
 */
async function walkSources(options: ResolveOptions): Promise<{ attempts: ResolutionAttempt[]; hit?: Candidate }> {
  const attempts: ResolutionAttempt[] = [];

  for (const source of options.sources) {
    const candidates =
      source === 'secrets'
        ? [await lookupSecret(options)]
        : options.envVars.map((envVar) => lookupEnv(envVar, options.env));

    for (const candidate of candidates) {
      attempts.push(candidate.attempt);
      log.debug(`${candidate.attempt.source}:${candidate.attempt.origin} -> ${candidate.attempt.outcome}`);
      if (candidate.value !== undefined) {
        return { attempts, hit: candidate };
      }
    }
  }

  return { attempts };
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Builds the explanation shown when no key could be resolved.
 */
export function describeMissingKey(options: Pick<ResolveOptions, 'secretName' | 'envVars'>, attempts: ResolutionAttempt[]): string {
  const lines: string[] = [];
  const denied = attempts.filter((a) => a.outcome === 'access_denied');
  const empty = attempts.filter((a) => a.outcome === 'empty');

  if (denied.length > 0) {
    lines.push(`Secret "${options.secretName}" exists but access to it is revoked.`);
    lines.push(`Grant access with: gemini-quickstart secrets grant ${options.secretName}`);
  } else {
    lines.push('No Gemini API key found.');
  }
  for (const attempt of empty) {
    lines.push(`${attempt.source === 'env' ? 'Environment variable' : 'Secret'} ${attempt.origin} is set but empty.`);
  }

  lines.push('Store a key in one of these ways:');
  lines.push(`  gemini-quickstart secrets set ${options.secretName} --stdin`);
  lines.push(`  export ${options.envVars[0] ?? 'GOOGLE_API_KEY'}=<your key>   (or add it to a .env file)`);
  lines.push('Create a key at https://aistudio.google.com/app/apikey; run "gemini-quickstart setup" for details.');
  return lines.join('\n');
}

/**
 * Resolves the API key from the configured sources.
 *
 * @throws {CredentialError} ACCESS_DENIED, EMPTY_KEY or MISSING_KEY when no source yields a key
 *
 * @example
 * ```typescript
 * const { apiKey, source, origin } = await resolveApiKey({
 *   sources: ['secrets', 'env'],
 *   secretName: 'GOOGLE_API_KEY',
 *   envVars: ['GOOGLE_API_KEY'],
 *   store,
 *   env: process.env,
 * });
 * ```
 */
export async function resolveApiKey(options: ResolveOptions): Promise<CredentialResolution> {
  const { attempts, hit } = await walkSources(options);

  if (hit?.value !== undefined) {
    log.debug(`Using API key from ${hit.attempt.source}:${hit.attempt.origin}`);
    return {
      apiKey: hit.value,
      source: hit.attempt.source,
      origin: hit.attempt.origin,
      attempts,
    };
  }

  const code = attempts.some((a) => a.outcome === 'access_denied')
    ? 'ACCESS_DENIED'
    : attempts.some((a) => a.outcome === 'empty')
      ? 'EMPTY_KEY'
      : 'MISSING_KEY';

  throw new CredentialError(code, describeMissingKey(options, attempts), { attempts });
}

/**
 * Performs the same lookups as {@link resolveApiKey} without failing.
 */
export async function inspectCredentials(
  options: ResolveOptions
): Promise<{ attempts: ResolutionAttempt[]; resolved?: Omit<CredentialResolution, 'attempts'> }> {
  const { attempts, hit } = await walkSources(options);
  if (hit?.value === undefined) {
    return { attempts };
  }
  return {
    attempts,
    resolved: { apiKey: hit.value, source: hit.attempt.source, origin: hit.attempt.origin },
  };
}
