/**
 * @fileoverview Configuration loader with file discovery and merging
 * @module config/loader
 *
 * Configuration is loaded from multiple sources with the following precedence:
 * 1. Environment variables (highest)
 * 2. Project config (.gemini-quickstart.yaml)
 * 3. Global config (~/.gemini-quickstart/config.yaml)
 * 4. Default values (lowest)
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { parse as parseYaml } from 'yaml';
import type { z } from 'zod';
import {
  GlobalConfigSchema,
  LogLevelNameSchema,
  ProjectConfigSchema,
  type ProjectConfig,
  type QuickstartConfig,
} from './schemas.js';
import { ConfigError } from './errors.js';

// =============================================================================
// CONSTANTS
// =============================================================================

const CONFIG_DIR_NAME = '.gemini-quickstart';
const GLOBAL_CONFIG_FILE = 'config.yaml';
const PROJECT_CONFIG_FILE = '.gemini-quickstart.yaml';

/** Overrides the global config directory */
export const HOME_ENV_VAR = 'GEMINI_QUICKSTART_HOME';
/** Overrides the model for one run */
export const MODEL_ENV_VAR = 'GEMINI_QUICKSTART_MODEL';
/** Overrides the log level for one run */
export const LOG_LEVEL_ENV_VAR = 'GEMINI_QUICKSTART_LOG_LEVEL';

// =============================================================================
// PATH UTILITIES
// =============================================================================

/**
 * Gets the global configuration directory path.
 *
 * @returns `$GEMINI_QUICKSTART_HOME` when set, otherwise `~/.gemini-quickstart`
 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[HOME_ENV_VAR];
  if (override !== undefined && override.trim() !== '') {
    return path.resolve(override);
  }
  return path.join(os.homedir(), CONFIG_DIR_NAME);
}

export function getGlobalConfigPath(configDir: string): string {
  return path.join(configDir, GLOBAL_CONFIG_FILE);
}

export function getProjectConfigPath(workspaceRoot: string): string {
  return path.join(workspaceRoot, PROJECT_CONFIG_FILE);
}

// =============================================================================
// FILE READING
// =============================================================================

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads and parses a YAML file.
 *
 * @returns Parsed document, `{}` for an empty file, or undefined if the file does not exist
 * @throws {ConfigError} If the file cannot be read or is not a YAML mapping
 */
function readYamlFile(filePath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return undefined;
    }
    throw new ConfigError(`Cannot read ${filePath}`, { filePath, cause: error });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid YAML in ${filePath}: ${reason}`, { filePath, cause: error });
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(`${filePath} must contain a YAML mapping`, { filePath });
  }
  return parsed;
}

function validate<T extends z.ZodTypeAny>(schema: T, data: unknown, filePath: string): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration in ${filePath}:\n  ${issues.join('\n  ')}`, {
      filePath,
      issues,
    });
  }
  return result.data;
}

// =============================================================================
// CONFIG LOADING
// =============================================================================

/**
 * Loads the global configuration; a missing file yields the defaults.
 */
export function loadGlobalConfig(configDir: string): QuickstartConfig {
  const configPath = getGlobalConfigPath(configDir);
  const parsed = readYamlFile(configPath) ?? {};
  return validate(GlobalConfigSchema, parsed, configPath);
}

/**
 * Loads project configuration from a directory.
 *
 * @returns Validated project configuration or undefined when there is none
 */
export function loadProjectConfig(workspaceRoot: string): ProjectConfig | undefined {
  const configPath = getProjectConfigPath(workspaceRoot);
  const parsed = readYamlFile(configPath);
  if (parsed === undefined) {
    return undefined;
  }
  return validate(ProjectConfigSchema, parsed, configPath);
}

/**
 * Loads and merges all configuration sources.
 *
 * @example
 * ```typescript
 * const config = loadConfig(process.cwd());
 * console.warn(config.defaultModel);
 * ```
 */
export function loadConfig(
  workspaceRoot: string,
  options: { configDir?: string; env?: NodeJS.ProcessEnv } = {}
): QuickstartConfig {
  const env = options.env ?? process.env;
  const configDir = options.configDir ?? getConfigDir(env);

  const global = loadGlobalConfig(configDir);
  const project = loadProjectConfig(workspaceRoot);

  const merged: QuickstartConfig = {
    ...global,
    defaultModel: project?.model ?? global.defaultModel,
    transport: project?.transport ?? global.transport,
    output: { format: project?.output?.format ?? global.output.format },
    generation: { ...global.generation, ...project?.generation },
  };

  const envModel = env[MODEL_ENV_VAR];
  if (envModel !== undefined && envModel.trim() !== '') {
    merged.defaultModel = envModel.trim();
  }

  const envLogLevel = env[LOG_LEVEL_ENV_VAR];
  if (envLogLevel !== undefined && envLogLevel !== '') {
    const level = LogLevelNameSchema.safeParse(envLogLevel.toLowerCase());
    if (!level.success) {
      throw new ConfigError(
        `${LOG_LEVEL_ENV_VAR} must be one of ${LogLevelNameSchema.options.join(', ')}; got "${envLogLevel}"`
      );
    }
    merged.logLevel = level.data;
  }

  return merged;
}

// =============================================================================
// CONFIG INITIALIZATION
// =============================================================================

/**
 * Ensures the global config directory exists.
 */
export function ensureConfigDir(configDir: string): void {
  fs.mkdirSync(configDir, { recursive: true, mode: 0o700 });
}

const DEFAULT_CONFIG_TEMPLATE = `# gemini-quickstart configuration
# Every setting is optional; the values below are the defaults.

defaultModel: gemini-2.0-flash

# sdk: @google/generative-ai client; rest: plain HTTPS with ?key=
transport: sdk

credentials:
  # Lookup order for the API key
  sources: [secrets, env]
  # Secret read from the secrets manager (gemini-quickstart secrets set GOOGLE_API_KEY)
  secretName: GOOGLE_API_KEY
  # Environment variables checked, first non-empty wins (.env files are read too)
  envVars: [GOOGLE_API_KEY, GEMINI_API_KEY]

api:
  baseUrl: https://generativelanguage.googleapis.com
  apiVersion: v1beta
  timeoutMs: 60000

# generation:
#   temperature: 0.7
#   maxOutputTokens: 1024
#   systemInstruction: You are a concise assistant.

output:
  # text, markdown or json
  format: text

defaultPrompt: Please give me python code to sort a list.

logLevel: info
`;

/**
 * Creates a default global config file if it doesn't exist.
 *
 * @returns True if file was created, false if it already existed
 */
export function createDefaultConfig(configDir: string): boolean {
  ensureConfigDir(configDir);
  const configPath = getGlobalConfigPath(configDir);

  if (fs.existsSync(configPath)) {
    return false;
  }

  fs.writeFileSync(configPath, DEFAULT_CONFIG_TEMPLATE, 'utf-8');
  return true;
}
