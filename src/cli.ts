#!/usr/bin/env node
/**
 * @fileoverview CLI entry point for gemini-quickstart
 * @module cli
 *
 * Sets up Commander.js for command parsing and wires the command handlers to
 * the real secrets store, environment, stdout and Gemini clients.
 */

import * as path from 'node:path';
import { config as loadEnv } from 'dotenv';
import { Command, InvalidArgumentError } from 'commander';
import type { z } from 'zod';
import { getConfigDir, loadConfig } from './config/index.js';
import { logger, LogLevel, parseLogLevel } from './shared/utils/index.js';
import { OutputFormatSchema, TransportSchema } from './shared/types/index.js';
import { CredentialSourceSchema, createSecretStore } from './features/credentials/index.js';
import { createGenerationClient, listRemoteModels } from './features/model/index.js';
import {
  exitCodeFor,
  runGenerate,
  runInit,
  runModels,
  runSecretsAccess,
  runSecretsDelete,
  runSecretsGet,
  runSecretsList,
  runSecretsSet,
  runSetup,
  runStatus,
  EXIT_USAGE,
  type CommandContext,
  type GenerateCommandOptions,
} from './features/commands/index.js';

// =============================================================================
// VERSION
// =============================================================================

const VERSION = '0.1.0';
const DESCRIPTION = 'Authenticate against the Gemini API with an API key and send a first prompt';

// =============================================================================
// ARGUMENT PARSERS
// =============================================================================

function schemaParser<T>(schema: z.ZodType<T>, label: string): (value: string) => T {
  return (value: string): T => {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new InvalidArgumentError(`Invalid ${label} "${value}".`);
    }
    return result.data;
  };
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

// =============================================================================
// CONTEXT
// =============================================================================

async function readStdin(): Promise<string> {
  if (process.stdin.isTTY === true) {
    process.stderr.write('Paste the secret value, then press Enter and Ctrl-D: ');
  }
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8').trim();
}

const program = new Command();

function createContext(): CommandContext {
  const globalOptions = program.opts<{ verbose?: boolean; directory: string }>();
  const workspaceRoot = path.resolve(globalOptions.directory);

  // .env values never override variables already set in the shell
  loadEnv({ path: path.join(workspaceRoot, '.env') });

  const configDir = getConfigDir(process.env);
  const config = loadConfig(workspaceRoot, { configDir, env: process.env });
  logger.setLevel(globalOptions.verbose === true ? LogLevel.DEBUG : parseLogLevel(config.logLevel));
  logger.debug('Configuration loaded', { configDir, model: config.defaultModel, transport: config.transport });

  return {
    config,
    configDir,
    workspaceRoot,
    store: createSecretStore(configDir),
    env: process.env,
    write: (text) => {
      process.stdout.write(text);
    },
    createClient: createGenerationClient,
    listModels: (options) => listRemoteModels(options),
    readSecretInput: readStdin,
  };
}

/**
 * Runs a command body, logging failures once and setting the exit code.
 */
async function run(action: () => Promise<unknown> | unknown): Promise<void> {
  try {
    await action();
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    if (error instanceof Error && error.stack !== undefined) {
      logger.debug(error.stack);
    }
    process.exitCode = exitCodeFor(error);
  }
}

// =============================================================================
// CLI SETUP
// =============================================================================

program
  .name('gemini-quickstart')
  .description(DESCRIPTION)
  .version(VERSION, '-v, --version', 'Display version number')
  .option('--verbose', 'Enable debug logging')
  .option('-d, --directory <path>', 'Working directory (.env and project config)', process.cwd());

// =============================================================================
// GENERATE COMMAND
// =============================================================================

program
  .command('generate', { isDefault: true })
  .description('Send a prompt to Gemini and print the response')
  .argument('[prompt...]', 'Prompt text (defaults to the configured defaultPrompt)')
  .option('-m, --model <model>', 'Model to use, e.g. gemini-2.0-flash')
  .option('--transport <transport>', 'sdk or rest', schemaParser(TransportSchema, 'transport'))
  .option('--stream', 'Print the response as it arrives')
  .option('-f, --format <format>', 'text, markdown or json', schemaParser(OutputFormatSchema, 'format'))
  .option('--temperature <number>', 'Sampling temperature (0-2)', parseNumber)
  .option('--max-output-tokens <count>', 'Maximum tokens in the response', parseInteger)
  .option('--system <instruction>', 'System instruction')
  .option('--source <source>', 'Only read the key from secrets or env', schemaParser(CredentialSourceSchema, 'source'))
  .action(async (promptWords: string[], options: Omit<GenerateCommandOptions, 'prompt'>): Promise<void> => {
    await run(async () => {
      const prompt = promptWords.join(' ');
      await runGenerate({ ...options, ...(prompt !== '' && { prompt }) }, createContext());
    });
  });

// =============================================================================
// SECRETS COMMANDS
// =============================================================================

const secrets = program.command('secrets').description('Manage secrets in the local secrets manager');

secrets
  .command('list')
  .description('List stored secrets and whether access is granted')
  .action(async (): Promise<void> => {
    await run(() => runSecretsList(createContext()));
  });

secrets
  .command('set')
  .description('Store a secret; the value is read from stdin unless given')
  .argument('<name>', 'Secret name, e.g. GOOGLE_API_KEY')
  .argument('[value]', 'Secret value (prefer --stdin)')
  .option('--stdin', 'Read the value from stdin')
  .option('--no-grant', 'Store the secret with access revoked')
  .action(async (name: string, value: string | undefined, options: { stdin?: boolean; grant: boolean }): Promise<void> => {
    await run(async () => {
      if (options.stdin === true && value !== undefined) {
        throw new InvalidArgumentError('Pass the value either as an argument or with --stdin, not both.');
      }
      // Replacing a secret keeps its access flag unless --no-grant is given
      await runSecretsSet(name, value, options.grant ? {} : { grant: false }, createContext());
    });
  });

secrets
  .command('get')
  .description('Show a secret (masked)')
  .argument('<name>', 'Secret name')
  .option('--reveal', 'Print the full value')
  .action(async (name: string, options: { reveal?: boolean }): Promise<void> => {
    await run(() => runSecretsGet(name, options, createContext()));
  });

secrets
  .command('delete')
  .description('Delete a secret')
  .argument('<name>', 'Secret name')
  .action(async (name: string): Promise<void> => {
    await run(() => runSecretsDelete(name, createContext()));
  });

secrets
  .command('grant')
  .description('Allow gemini-quickstart to read a secret')
  .argument('<name>', 'Secret name')
  .action(async (name: string): Promise<void> => {
    await run(() => runSecretsAccess(name, true, createContext()));
  });

secrets
  .command('revoke')
  .description('Keep a secret stored but stop gemini-quickstart from reading it')
  .argument('<name>', 'Secret name')
  .action(async (name: string): Promise<void> => {
    await run(() => runSecretsAccess(name, false, createContext()));
  });

// =============================================================================
// INFORMATION COMMANDS
// =============================================================================

program
  .command('models')
  .description('List the model menu')
  .option('--remote', 'Ask the service which models the key can use')
  .action(async (options: { remote?: boolean }): Promise<void> => {
    await run(() => runModels(options, createContext()));
  });

program
  .command('status')
  .description('Show where the API key is read from')
  .action(async (): Promise<void> => {
    await run(async () => {
      const ready = await runStatus(createContext());
      if (!ready) {
        process.exitCode = EXIT_USAGE;
      }
    });
  });

program
  .command('setup')
  .description('Explain how to create and store an API key')
  .action(async (): Promise<void> => {
    await run(() => runSetup(createContext()));
  });

program
  .command('init')
  .description('Create the default configuration file')
  .action(async (): Promise<void> => {
    await run(() => {
      runInit({ configDir: getConfigDir(process.env) });
    });
  });

// =============================================================================
// PARSE & RUN
// =============================================================================

await program.parseAsync();
