/**
 * Provider Factory - Creates the quality provider for each configured model
 */

import * as fs from 'fs';
import type { LLMProviderConfig, LLMProvidersConfigFile, ProviderKind, QualityProvider } from './types.js';
import { OllamaProvider } from './providers/OllamaProvider.js';
import { OpenAIProvider } from './providers/OpenAIProvider.js';
import { AnthropicProvider } from './providers/AnthropicProvider.js';
import { ConfigError } from '../config/ConfigError.js';
import type { HttpClient } from '../utils/http.js';
import { isRecord } from '../utils/guards.js';

const PROVIDER_KINDS: readonly ProviderKind[] = ['ollama', 'openai', 'anthropic'];

const NUMERIC_OPTIONS = [
  'temperature',
  'maxTokens',
  'evaluationTimeoutMs',
  'titleTimeoutMs',
  'maxAttempts',
  'retryDelayMs',
  'evaluationMaxChars',
  'titleMaxChars',
] as const;

export function isProviderKind(value: string): value is ProviderKind {
  return PROVIDER_KINDS.some(kind => kind === value);
}

export class ProviderFactory {
  /**
   * Create a provider based on the provided config
   */
  static create(config: LLMProviderConfig, http?: HttpClient): QualityProvider {
    switch (config.provider) {
      case 'ollama':
        return new OllamaProvider(config, http);
      case 'openai':
        return new OpenAIProvider(config, http);
      case 'anthropic':
        return new AnthropicProvider(config, http);
    }
  }

  /**
   * Create the ensemble members in configured order
   */
  static createAll(configs: LLMProviderConfig[], http?: HttpClient): QualityProvider[] {
    if (configs.length === 0) {
      throw new ConfigError('At least one model provider must be configured', ['MODEL_NAME']);
    }
    return this.withDistinctIds(configs).map(config => this.create(config, http));
  }

  /**
   * Verdicts and logs are attributed by provider id, so ids must be unique.
   * Generated ids that collide (same model and backend twice) get their
   * 1-based position appended; colliding explicit ids are a configuration error.
   */
  static withDistinctIds(configs: LLMProviderConfig[]): LLMProviderConfig[] {
    const generated = configs.map(config => config.id ?? `${config.model}-${config.provider}`);
    const resolved = configs.map((config, index) => {
      const id = generated[index];
      if (config.id !== undefined || generated.filter(other => other === id).length === 1) {
        return config;
      }
      return { ...config, id: `${id}-${index + 1}` };
    });

    const seen = new Set<string>();
    for (const [index, config] of resolved.entries()) {
      const id = config.id ?? generated[index];
      if (seen.has(id)) {
        throw new ConfigError(`Provider id '${id}' is used more than once; give each provider a distinct id`);
      }
      seen.add(id);
    }
    return resolved;
  }

  /**
   * Load and validate a providers file: `{ "providers": [ ... ] }`
   */
  static loadConfigFile(filePath: string): LLMProvidersConfigFile {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(
        `Failed to read providers file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (!isRecord(parsed) || !Array.isArray(parsed.providers)) {
      throw new ConfigError(`Providers file ${filePath} must contain a "providers" array`);
    }

    return {
      providers: parsed.providers.map((entry: unknown, index: number) =>
        this.parseProviderConfig(entry, `${filePath} providers[${index}]`)
      ),
    };
  }

  static parseProviderConfig(entry: unknown, location: string): LLMProviderConfig {
    if (!isRecord(entry)) {
      throw new ConfigError(`${location}: expected an object`);
    }

    const { provider, model, baseUrl, apiKey, id, options } = entry;
    if (typeof provider !== 'string' || !isProviderKind(provider)) {
      throw new ConfigError(`${location}: provider must be one of ${PROVIDER_KINDS.join(', ')}`);
    }
    if (typeof model !== 'string' || model.trim() === '') {
      throw new ConfigError(`${location}: model is required`);
    }

    const config: LLMProviderConfig = { provider, model };
    for (const [key, value] of Object.entries({ baseUrl, apiKey, id })) {
      if (value === undefined) continue;
      if (typeof value !== 'string') {
        throw new ConfigError(`${location}: ${key} must be a string`);
      }
    }
    if (typeof baseUrl === 'string') config.baseUrl = baseUrl;
    if (typeof apiKey === 'string') config.apiKey = apiKey;
    if (typeof id === 'string') config.id = id;

    if (options !== undefined) {
      if (!isRecord(options)) {
        throw new ConfigError(`${location}: options must be an object`);
      }
      config.options = {};
      for (const key of NUMERIC_OPTIONS) {
        const value = options[key];
        if (value === undefined) continue;
        if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
          throw new ConfigError(`${location}: options.${key} must be a non-negative number`);
        }
        config.options[key] = value;
      }
    }

    return config;
  }
}
