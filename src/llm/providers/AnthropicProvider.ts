/**
 * Anthropic Provider - Messages API
 */

import type { LLMProviderConfig, ProviderKind } from '../types.js';
import { BaseLLMProvider, PROVIDER_DEFAULTS } from './BaseLLMProvider.js';
import { ConfigError } from '../../config/ConfigError.js';
import { trimTrailingSlashes, type HttpClient } from '../../utils/http.js';
import { isRecord } from '../../utils/guards.js';

export const DEFAULT_ANTHROPIC_URL = 'https://api.anthropic.com/v1';

export class AnthropicProvider extends BaseLLMProvider {
  private baseUrl: string;
  private apiKey: string;

  constructor(config: LLMProviderConfig, http?: HttpClient) {
    super(config, http);
    this.baseUrl = trimTrailingSlashes(config.baseUrl || DEFAULT_ANTHROPIC_URL);
    this.apiKey = config.apiKey ?? '';

    if (!this.apiKey) {
      throw new ConfigError(
        'Anthropic API key is required. Set LLM_API_KEY or provide apiKey in the providers file.',
        ['LLM_API_KEY']
      );
    }
  }

  protected async complete(prompt: string, timeoutMs: number): Promise<string> {
    const response = await this.http.post<unknown>(
      `${this.baseUrl}/messages`,
      {
        model: this.config.model,
        max_tokens: this.config.options?.maxTokens ?? PROVIDER_DEFAULTS.maxTokens,
        temperature: this.config.options?.temperature ?? PROVIDER_DEFAULTS.temperature,
        messages: [{ role: 'user', content: prompt }],
      },
      {
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': this.apiKey,
          'anthropic-version': '2023-06-01',
        },
        timeout: timeoutMs,
      }
    );

    const data = response.data;
    const blocks = isRecord(data) && Array.isArray(data.content) ? data.content : [];
    const textBlock: unknown = blocks.find(block => isRecord(block) && block.type === 'text');

    if (!isRecord(textBlock) || typeof textBlock.text !== 'string') {
      throw this.malformedResponse('message has no text block');
    }
    return textBlock.text;
  }

  getModelInfo(): { name: string; provider: ProviderKind } {
    return { name: this.config.model, provider: 'anthropic' };
  }
}
