/**
 * Central configuration loader
 *
 * Reads everything from environment variables (the CLI loads `.env` through
 * dotenv first). Missing required settings raise a ConfigError before any
 * document is touched.
 */

import type { LLMProviderConfig } from '../llm/types.js';
import { ProviderFactory, isProviderKind } from '../llm/ProviderFactory.js';
import { DEFAULT_OLLAMA_URL } from '../llm/providers/OllamaProvider.js';
import { PROVIDER_DEFAULTS } from '../llm/providers/BaseLLMProvider.js';
import { isLogLevel, type LogLevel } from '../utils/logger.js';
import { ConfigError } from './ConfigError.js';

export { ConfigError } from './ConfigError.js';

export type Env = Record<string, string | undefined>;

export interface AppConfig {
  documentStore: {
    apiUrl: string;
    apiToken: string;
    maxDocuments: number;
    pageSize: number;
  };
  tags: {
    lowQualityTagId: number;
    highQualityTagId: number;
  };
  /** Ensemble members in configured order; the first also writes titles */
  providers: LLMProviderConfig[];
  processing: {
    renameDocuments: boolean;
    ignoreAlreadyTagged: boolean;
    skipProcessed: boolean;
    delayBetweenDocumentsMs: number;
    stateFile: string;
  };
  logLevel: LogLevel;
}

function readFlag(env: Env, name: string, fallback: boolean): boolean {
  const value = env[name]?.trim().toLowerCase();
  if (!value) return fallback;
  if (['yes', 'true', '1'].includes(value)) return true;
  if (['no', 'false', '0'].includes(value)) return false;
  throw new ConfigError(`${name} must be yes or no, got '${env[name]}'`);
}

function readInteger(env: Env, name: string, fallback?: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    if (fallback === undefined) {
      throw new ConfigError(`Missing required environment variable: ${name}`, [name]);
    }
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got '${raw}'`);
  }
  return value;
}

type ProviderOptions = NonNullable<LLMProviderConfig['options']>;

const OPTION_VARIABLES = [
  ['EVALUATION_TIMEOUT_MS', 'evaluationTimeoutMs'],
  ['TITLE_TIMEOUT_MS', 'titleTimeoutMs'],
  ['LLM_MAX_ATTEMPTS', 'maxAttempts'],
  ['LLM_RETRY_DELAY_MS', 'retryDelayMs'],
  ['CONTENT_MAX_CHARS', 'evaluationMaxChars'],
  ['TITLE_CONTENT_MAX_CHARS', 'titleMaxChars'],
] as const satisfies ReadonlyArray<readonly [string, keyof ProviderOptions]>;

/**
 * Provider options set in the environment. Variables that are not set are left out.
 */
function optionsFromEnv(env: Env): ProviderOptions {
  const options: ProviderOptions = {};
  for (const [name, key] of OPTION_VARIABLES) {
    if (env[name]?.trim()) {
      options[key] = readInteger(env, name);
    }
  }
  return options;
}

/**
 * Build provider configs from MODEL_NAME, SECOND_MODEL_NAME and THIRD_MODEL_NAME,
 * all served by the same backend
 */
function providersFromEnv(env: Env): LLMProviderConfig[] {
  const kind = env.LLM_PROVIDER?.trim().toLowerCase() || 'ollama';
  if (!isProviderKind(kind)) {
    throw new ConfigError(`LLM_PROVIDER must be ollama, openai or anthropic, got '${kind}'`);
  }

  const models = [env.MODEL_NAME, env.SECOND_MODEL_NAME, env.THIRD_MODEL_NAME]
    .map(model => model?.trim())
    .filter((model): model is string => Boolean(model))
    .slice(0, readInteger(env, 'NUM_LLM_MODELS', 3));

  const baseUrl = kind === 'ollama'
    ? env.OLLAMA_URL?.trim() || DEFAULT_OLLAMA_URL
    : env.LLM_BASE_URL?.trim() || undefined;
  const apiKey = env.LLM_API_KEY?.trim() || undefined;
  const options: ProviderOptions = {
    evaluationTimeoutMs: PROVIDER_DEFAULTS.evaluationTimeoutMs,
    titleTimeoutMs: PROVIDER_DEFAULTS.titleTimeoutMs,
    maxAttempts: PROVIDER_DEFAULTS.maxAttempts,
    retryDelayMs: PROVIDER_DEFAULTS.retryDelayMs,
    evaluationMaxChars: PROVIDER_DEFAULTS.evaluationMaxChars,
    titleMaxChars: PROVIDER_DEFAULTS.titleMaxChars,
    ...optionsFromEnv(env),
  };

  return models.map(model => ({ provider: kind, model, baseUrl, apiKey, options: { ...options } }));
}

/**
 * Load providers from a JSON file. Option variables set in the environment act
 * as defaults beneath each entry's own `options`.
 */
function providersFromFile(file: string, env: Env): LLMProviderConfig[] {
  const { providers } = ProviderFactory.loadConfigFile(file);
  const envOptions = optionsFromEnv(env);
  if (Object.keys(envOptions).length === 0) {
    return providers;
  }
  return providers.map(provider => ({ ...provider, options: { ...envOptions, ...provider.options } }));
}

/**
 * Load the complete configuration from environment variables
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  const missing = ['API_URL', 'API_TOKEN', 'LOW_QUALITY_TAG_ID', 'HIGH_QUALITY_TAG_ID'].filter(
    name => !env[name]?.trim()
  );
  const providersFile = env.LLM_PROVIDERS_CONFIG?.trim();
  if (!providersFile && !env.MODEL_NAME?.trim()) {
    missing.push('MODEL_NAME');
  }
  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(', ')}`, missing);
  }

  const providers = providersFile ? providersFromFile(providersFile, env) : providersFromEnv(env);
  if (providers.length === 0) {
    throw new ConfigError('At least one model provider must be configured', ['MODEL_NAME']);
  }

  const logLevel = env.LOG_LEVEL?.trim().toLowerCase() || 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be debug, info, warn or error, got '${logLevel}'`);
  }

  return {
    documentStore: {
      apiUrl: env.API_URL?.trim() ?? '',
      apiToken: env.API_TOKEN?.trim() ?? '',
      maxDocuments: readInteger(env, 'MAX_DOCUMENTS', 100),
      pageSize: readInteger(env, 'PAGE_SIZE', 100),
    },
    tags: {
      lowQualityTagId: readInteger(env, 'LOW_QUALITY_TAG_ID'),
      highQualityTagId: readInteger(env, 'HIGH_QUALITY_TAG_ID'),
    },
    providers,
    processing: {
      renameDocuments: readFlag(env, 'RENAME_DOCUMENTS', true),
      ignoreAlreadyTagged: readFlag(env, 'IGNORE_ALREADY_TAGGED', true),
      skipProcessed: readFlag(env, 'SKIP_PROCESSED', true),
      delayBetweenDocumentsMs: readInteger(env, 'PROCESSING_DELAY_MS', 1000),
      stateFile: env.STATE_FILE?.trim() || './processing-state.json',
    },
    logLevel,
  };
}
