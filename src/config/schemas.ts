/**
 * @fileoverview Configuration schemas for application settings
 * @module config/schemas
 */

import { z } from 'zod';
import { OutputFormatSchema, TransportSchema } from '../shared/types/models.js';
import { CredentialSourceSchema, SECRET_NAME_PATTERN } from '../features/credentials/types.js';

// =============================================================================
// SECTIONS
// =============================================================================

/**
 * Where and in which order the API key is looked up.
 */
export const CredentialsConfigSchema = z.object({
  /** Lookup order */
  sources: z.array(CredentialSourceSchema).min(1).default(['secrets', 'env']),

  /** Name of the secret holding the key */
  secretName: z
    .string()
    .regex(SECRET_NAME_PATTERN, 'Secret names may contain letters, digits and underscores')
    .default('GOOGLE_API_KEY'),

  /** Environment variables checked, first non-empty wins */
  envVars: z.array(z.string().min(1)).min(1).default(['GOOGLE_API_KEY', 'GEMINI_API_KEY']),
});
export type CredentialsConfig = z.infer<typeof CredentialsConfigSchema>;

/**
 * Service endpoint settings.
 */
export const ApiConfigSchema = z.object({
  baseUrl: z.string().url().default('https://generativelanguage.googleapis.com'),
  apiVersion: z.string().min(1).default('v1beta'),
  timeoutMs: z.number().int().positive().default(60000),
});
export type ApiConfig = z.infer<typeof ApiConfigSchema>;

/**
 * Default generation parameters.
 */
export const GenerationConfigSchema = z.object({
  temperature: z.number().min(0).max(2).optional(),
  maxOutputTokens: z.number().int().positive().optional(),
  systemInstruction: z.string().min(1).optional(),
});
export type GenerationDefaults = z.infer<typeof GenerationConfigSchema>;

export const LogLevelNameSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

// =============================================================================
// GLOBAL CONFIG SCHEMA
// =============================================================================

/**
 * Global configuration schema (~/.gemini-quickstart/config.yaml).
 */
export const GlobalConfigSchema = z.object({
  /** Default model identifier */
  defaultModel: z.string().min(1).default('gemini-2.0-flash'),

  transport: TransportSchema.default('sdk'),

  credentials: CredentialsConfigSchema.default({}),

  api: ApiConfigSchema.default({}),

  generation: GenerationConfigSchema.default({}),

  output: z
    .object({
      format: OutputFormatSchema.default('text'),
    })
    .default({}),

  /** Prompt sent when none is given on the command line */
  defaultPrompt: z.string().min(1).default('Please give me python code to sort a list.'),

  logLevel: LogLevelNameSchema.default('info'),
});
export type QuickstartConfig = z.infer<typeof GlobalConfigSchema>;

// =============================================================================
// PROJECT CONFIG SCHEMA
// =============================================================================

/**
 * Project configuration schema (.gemini-quickstart.yaml in the working directory).
 */
export const ProjectConfigSchema = z.object({
  /** Override model for this project */
  model: z.string().min(1).optional(),

  transport: TransportSchema.optional(),

  output: z
    .object({
      format: OutputFormatSchema.optional(),
    })
    .optional(),

  generation: GenerationConfigSchema.optional(),
});
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
