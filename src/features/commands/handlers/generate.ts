/**
 * @fileoverview Generate command handler
 * @module features/commands/handlers/generate
 *
 * Resolves the API key, configures a client with it and sends one prompt.
 */

import {
  GenerateOptionsSchema,
  type GenerateOptions,
  type GenerationResult,
  type OutputFormat,
  type TokenUsage,
  type Transport,
} from '../../../shared/types/models.js';
import { logger } from '../../../shared/utils/logger.js';
import { resolveApiKey } from '../../credentials/resolver.js';
import type { CredentialSource } from '../../credentials/types.js';
import { AdapterError } from '../../model/adapters/types.js';
import { findModel, normalizeModelId } from '../../model/catalog.js';
import { renderResult } from '../../output/index.js';
import type { CommandContext } from '../types.js';

const log = logger.child('generate');

/**
 * Options accepted by `gemini-quickstart generate`.
 */
export interface GenerateCommandOptions {
  prompt?: string;
  model?: string;
  transport?: Transport;
  stream?: boolean;
  format?: OutputFormat;
  temperature?: number;
  maxOutputTokens?: number;
  system?: string;
  /** Restrict the key lookup to one source */
  source?: CredentialSource;
}

function buildGenerateOptions(options: GenerateCommandOptions, context: CommandContext): GenerateOptions {
  const parsed = GenerateOptionsSchema.safeParse({
    ...context.config.generation,
    ...(options.temperature !== undefined && { temperature: options.temperature }),
    ...(options.maxOutputTokens !== undefined && { maxOutputTokens: options.maxOutputTokens }),
    ...(options.system !== undefined && { systemInstruction: options.system }),
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new AdapterError('INVALID_CONFIG', 'gemini', `Invalid generation options (${issues.join('; ')})`);
  }
  return parsed.data;
}

/**
 * Runs a single generation and writes the rendered result.
 *
 * @returns The complete result, also when it was streamed
 */
export async function runGenerate(options: GenerateCommandOptions, context: CommandContext): Promise<GenerationResult> {
  const { config } = context;
  const model = normalizeModelId(options.model ?? config.defaultModel);
  if (findModel(model) === undefined) {
    log.warn(`Model "${model}" is not in the catalog; sending the request anyway`);
  }

  const prompt = options.prompt !== undefined && options.prompt.trim() !== '' ? options.prompt : config.defaultPrompt;
  const generateOptions = buildGenerateOptions(options, context);
  const format = options.format ?? config.output.format;
  const transport = options.transport ?? config.transport;

  const credential = await resolveApiKey({
    sources: options.source !== undefined ? [options.source] : config.credentials.sources,
    secretName: config.credentials.secretName,
    envVars: config.credentials.envVars,
    store: context.store,
    env: context.env,
  });
  log.debug(`Key from ${credential.source}:${credential.origin}, transport=${transport}, model=${model}`);

  const client = context.createClient({
    transport,
    apiKey: credential.apiKey,
    model,
    baseUrl: config.api.baseUrl,
    apiVersion: config.api.apiVersion,
    timeoutMs: config.api.timeoutMs,
  });

  if (options.stream !== true) {
    const result = await client.generate(prompt, generateOptions);
    context.write(renderResult(result, format));
    logUsage(result.usage);
    return result;
  }

  let text = '';
  let finishReason: string | undefined;
  let usage: TokenUsage | undefined;

  for await (const chunk of client.generateStream(prompt, generateOptions)) {
    if (chunk.type === 'text') {
      text += chunk.text;
      // Markdown and JSON need the whole text before rendering
      if (format === 'text') {
        context.write(chunk.text);
      }
    } else {
      finishReason = chunk.finishReason;
      usage = chunk.usage;
    }
  }

  const result: GenerationResult = {
    text,
    model,
    ...(finishReason !== undefined && { finishReason }),
    ...(usage !== undefined && { usage }),
  };

  if (format === 'text') {
    if (!text.endsWith('\n')) {
      context.write('\n');
    }
  } else {
    context.write(renderResult(result, format));
  }
  logUsage(usage);
  return result;
}

function logUsage(usage: TokenUsage | undefined): void {
  if (usage !== undefined) {
    log.debug(
      `Tokens: prompt=${usage.promptTokens} candidates=${usage.candidatesTokens} total=${usage.totalTokens}`
    );
  }
}
