/**
 * OpenAI Provider - OpenAI chat completions and compatible servers (vLLM, LM Studio)
 */

import type { LLMProviderConfig, ProviderKind } from '../types.js';
import { BaseLLMProvider, PROVIDER_DEFAULTS } from './BaseLLMProvider.js';
import { trimTrailingSlashes, type HttpClient } from '../../utils/http.js';
import { isRecord } from '../../utils/guards.js';

export const DEFAULT_OPENAI_URL = 'https://api.openai.com/v1';

export class OpenAIProvider extends BaseLLMProvider {
  private baseUrl: string;

  constructor(config: LLMProviderConfig, http?: HttpClient) {
    super(config, http);
    this.baseUrl = trimTrailingSlashes(config.baseUrl || DEFAULT_OPENAI_URL);
  }

  protected async complete(prompt: string, timeoutMs: number): Promise<string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }

    const response = await this.http.post<unknown>(
      `${this.baseUrl}/chat/completions`,
      {
        model: this.config.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: this.config.options?.temperature ?? PROVIDER_DEFAULTS.temperature,
        max_tokens: this.config.options?.maxTokens ?? PROVIDER_DEFAULTS.maxTokens,
      },
      { headers, timeout: timeoutMs }
    );

    const data = response.data;
    const choices = isRecord(data) && Array.isArray(data.choices) ? data.choices : [];
    const first: unknown = choices[0];
    const message = isRecord(first) ? first.message : undefined;

    if (!isRecord(message) || typeof message.content !== 'string') {
      throw this.malformedResponse('chat completion has no message content');
    }
    return message.content;
  }

  getModelInfo(): { name: string; provider: ProviderKind } {
    return { name: this.config.model, provider: 'openai' };
  }
}
