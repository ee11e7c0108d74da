/**
 * Ollama Provider - locally hosted models (Llama, Mistral, Qwen, Gemma...)
 */

import type { LLMProviderConfig, ProviderKind } from '../types.js';
import { BaseLLMProvider, PROVIDER_DEFAULTS } from './BaseLLMProvider.js';
import { trimTrailingSlashes, type HttpClient } from '../../utils/http.js';
import { isRecord } from '../../utils/guards.js';
import { logger } from '../../utils/logger.js';

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434';

export class OllamaProvider extends BaseLLMProvider {
  private baseUrl: string;

  constructor(config: LLMProviderConfig, http?: HttpClient) {
    super(config, http);
    this.baseUrl = trimTrailingSlashes(config.baseUrl || DEFAULT_OLLAMA_URL);
  }

  protected async complete(prompt: string, timeoutMs: number): Promise<string> {
    const response = await this.http.post<unknown>(
      `${this.baseUrl}/api/generate`,
      {
        model: this.config.model,
        prompt,
        stream: false,
        options: {
          temperature: this.config.options?.temperature ?? PROVIDER_DEFAULTS.temperature,
          num_predict: this.config.options?.maxTokens ?? PROVIDER_DEFAULTS.maxTokens,
        },
      },
      { timeout: timeoutMs }
    );

    const text = this.readGenerateBody(response.data);
    if (text === undefined) {
      throw this.malformedResponse('Ollama reply has no "response" field');
    }
    return text;
  }

  /**
   * Ollama answers with one JSON object, or with NDJSON chunks when a server
   * ignores `stream: false`. Chunks are concatenated in order.
   */
  private readGenerateBody(data: unknown): string | undefined {
    if (isRecord(data)) {
      return typeof data.response === 'string' ? data.response : undefined;
    }
    if (typeof data !== 'string') {
      return undefined;
    }

    let text: string | undefined;
    for (const line of data.split('\n')) {
      if (!line.trim()) continue;
      try {
        const chunk: unknown = JSON.parse(line);
        if (isRecord(chunk) && typeof chunk.response === 'string') {
          text = (text ?? '') + chunk.response;
        }
      } catch (error) {
        logger.debug(`${this.id}: skipping undecodable response line`, {
          line: line.substring(0, 100),
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return text;
  }

  getModelInfo(): { name: string; provider: ProviderKind } {
    return { name: this.config.model, provider: 'ollama' };
  }
}
