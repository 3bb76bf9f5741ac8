/**
 * Environment-driven configuration for the research orchestrator
 */
import { z } from 'zod';
import { ConfigurationError } from './types/errors.js';
import { LogLevel } from './utils/logging.js';
import { ErrorHandlingMode } from './types/pipeline.js';

/**
 * Centralized default values. Use these instead of hardcoding defaults
 * throughout the codebase.
 */
export const DEFAULTS = {
  model: 'gpt-4o-mini',
  embeddingModel: 'text-embedding-3-small',
  maxSearchResults: 5,
  documentTopK: 5,
  stepTimeoutMs: 60000,
  errorHandling: 'continue',
  logLevel: 'info',
} as const;

// Variables set to an empty string (common in .env templates) count as unset
const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
);

function withDefault<T extends z.ZodTypeAny>(schema: T, fallback: z.input<T>) {
  return z.preprocess(
    (value) => (value === undefined || (typeof value === 'string' && value.trim() === '') ? fallback : value),
    schema
  );
}

const envSchema = z.object({
  OPENAI_API_KEY: optionalString,
  RESEARCH_MODEL: withDefault(z.string().min(1), DEFAULTS.model),
  RESEARCH_EMBEDDING_MODEL: withDefault(z.string().min(1), DEFAULTS.embeddingModel),
  GOOGLE_SEARCH_API_KEY: optionalString,
  GOOGLE_SEARCH_CX: optionalString,
  RESEARCH_MAX_SEARCH_RESULTS: withDefault(z.coerce.number().int().positive(), DEFAULTS.maxSearchResults),
  RESEARCH_DOCUMENT_TOP_K: withDefault(z.coerce.number().int().positive(), DEFAULTS.documentTopK),
  RESEARCH_STEP_TIMEOUT_MS: withDefault(z.coerce.number().int().positive(), DEFAULTS.stepTimeoutMs),
  RESEARCH_ERROR_HANDLING: withDefault(z.enum(['continue', 'stop']), DEFAULTS.errorHandling),
  LOG_LEVEL: withDefault(z.enum(['debug', 'info', 'warn', 'error']), DEFAULTS.logLevel),
});

export interface ResearchConfig {
  openaiApiKey?: string;
  model: string;
  embeddingModel: string;
  googleSearchApiKey?: string;
  googleSearchCx?: string;
  maxSearchResults: number;
  documentTopK: number;
  stepTimeoutMs: number;
  errorHandling: ErrorHandlingMode;
  logLevel: LogLevel;
}

/**
 * Reads configuration from environment variables
 *
 * @throws {ConfigurationError} listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ResearchConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError({
      message: `Invalid configuration: ${problems.join('; ')}`,
      details: { issues: parsed.error.issues },
      suggestions: ['Check the environment variables (or .env file) named above'],
    });
  }

  const values = parsed.data;
  return {
    openaiApiKey: values.OPENAI_API_KEY,
    model: values.RESEARCH_MODEL,
    embeddingModel: values.RESEARCH_EMBEDDING_MODEL,
    googleSearchApiKey: values.GOOGLE_SEARCH_API_KEY,
    googleSearchCx: values.GOOGLE_SEARCH_CX,
    maxSearchResults: values.RESEARCH_MAX_SEARCH_RESULTS,
    documentTopK: values.RESEARCH_DOCUMENT_TOP_K,
    stepTimeoutMs: values.RESEARCH_STEP_TIMEOUT_MS,
    errorHandling: values.RESEARCH_ERROR_HANDLING,
    logLevel: values.LOG_LEVEL,
  };
}

export type ProviderCredentials = ResearchConfig & {
  openaiApiKey: string;
  googleSearchApiKey: string;
  googleSearchCx: string;
};

/**
 * Ensures the keys needed by the real collaborators are present
 *
 * @throws {ConfigurationError} naming the missing variables
 */
export function assertProviderCredentials(config: ResearchConfig): asserts config is ProviderCredentials {
  const missing = [
    config.openaiApiKey ? undefined : 'OPENAI_API_KEY',
    config.googleSearchApiKey ? undefined : 'GOOGLE_SEARCH_API_KEY',
    config.googleSearchCx ? undefined : 'GOOGLE_SEARCH_CX',
  ].filter((name): name is string => name !== undefined);

  if (missing.length > 0) {
    throw new ConfigurationError({
      message: `Missing required configuration: ${missing.join(', ')}`,
      details: { missing },
      suggestions: missing.map((name) => `Set ${name} in the environment or in a .env file`),
    });
  }
}
