/**
 * Base LLM Provider
 *
 * Shared functionality for the quality model providers:
 * - Content truncation (separate limits for evaluation and titles)
 * - Per-request timeouts
 * - Fixed-delay retry of transient failures
 * - Degrading every failure to an unparseable verdict or an empty title
 */

import type { LLMProviderConfig, ProviderKind, QualityProvider, Verdict } from '../types.js';
import { classifyResponse } from '../ResponseParser.js';
import { buildTitlePrompt } from '../prompts.js';
import { createVerdict, unparseableVerdict } from '../verdict.js';
import { createHttpClient, describeHttpFailure, sleep, type HttpClient } from '../../utils/http.js';
import { logger } from '../../utils/logger.js';

export const PROVIDER_DEFAULTS = {
  evaluationTimeoutMs: 60000,
  titleTimeoutMs: 30000,
  maxAttempts: 3,
  retryDelayMs: 2000,
  evaluationMaxChars: 4000,
  titleMaxChars: 1000,
  temperature: 0.1,
  maxTokens: 512,
} as const;

/**
 * Provider error with retry information
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly providerId: string,
    public readonly statusCode: number,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'ProviderError';
  }

  static from(error: unknown, providerId: string): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }
    const failure = describeHttpFailure(error);
    return new ProviderError(failure.message, providerId, failure.statusCode, failure.retryable);
  }
}

export function truncate(content: string, maxChars: number): string {
  return content.length > maxChars ? content.substring(0, maxChars) : content;
}

/**
 * Strip quoting and line breaks models like to wrap titles in
 */
export function cleanTitle(raw: string): string {
  return raw
    .replace(/["“”`]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^'+|'+$/g, '')
    .trim();
}

/**
 * Base class for the quality model providers (Ollama, OpenAI-compatible, Anthropic)
 */
export abstract class BaseLLMProvider implements QualityProvider {
  readonly id: string;
  protected readonly config: LLMProviderConfig;
  protected readonly http: HttpClient;
  protected readonly evaluationTimeoutMs: number;
  protected readonly titleTimeoutMs: number;
  protected readonly maxAttempts: number;
  protected readonly retryDelayMs: number;
  protected readonly evaluationMaxChars: number;
  protected readonly titleMaxChars: number;

  constructor(config: LLMProviderConfig, http?: HttpClient) {
    const options = config.options ?? {};
    this.config = config;
    this.id = config.id ?? `${config.model}-${config.provider}`;
    this.http = http ?? createHttpClient();
    this.evaluationTimeoutMs = options.evaluationTimeoutMs ?? PROVIDER_DEFAULTS.evaluationTimeoutMs;
    this.titleTimeoutMs = options.titleTimeoutMs ?? PROVIDER_DEFAULTS.titleTimeoutMs;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? PROVIDER_DEFAULTS.maxAttempts);
    this.retryDelayMs = Math.max(0, options.retryDelayMs ?? PROVIDER_DEFAULTS.retryDelayMs);
    this.evaluationMaxChars = options.evaluationMaxChars ?? PROVIDER_DEFAULTS.evaluationMaxChars;
    this.titleMaxChars = options.titleMaxChars ?? PROVIDER_DEFAULTS.titleMaxChars;
  }

  /**
   * Send one prompt and return the model's raw text - implemented by subclasses
   */
  protected abstract complete(prompt: string, timeoutMs: number): Promise<string>;

  abstract getModelInfo(): { name: string; provider: ProviderKind };

  async evaluate(content: string, promptTemplate: string, documentId: string): Promise<Verdict> {
    const startTime = Date.now();
    const prompt = `${promptTemplate}${truncate(content, this.evaluationMaxChars)}`;

    try {
      const rawText = await this.requestWithRetry(
        () => this.complete(prompt, this.evaluationTimeoutMs),
        `evaluate document ${documentId}`
      );
      const parsed = classifyResponse(rawText);
      const latencyMs = Date.now() - startTime;

      if (parsed.ambiguity) {
        logger.warn(`${this.id}: unparseable answer for document ${documentId}`, {
          reason: parsed.ambiguity,
          response: rawText.substring(0, 200),
        });
      } else {
        logger.debug(`${this.id}: document ${documentId} judged ${parsed.kind}`, { latencyMs });
      }

      return createVerdict({
        kind: parsed.kind,
        sourceProviderId: this.id,
        rawText,
        latencyMs,
        failure: parsed.ambiguity,
      });
    } catch (error) {
      const failure = ProviderError.from(error, this.id);
      logger.error(`${this.id}: evaluation failed for document ${documentId}`, {
        statusCode: failure.statusCode,
        retryable: failure.retryable,
        message: failure.message,
      });
      return unparseableVerdict(
        this.id,
        failure.retryable ? 'transient_error' : 'fatal_error',
        Date.now() - startTime
      );
    }
  }

  async generateTitle(content: string): Promise<string> {
    const excerpt = truncate(content, this.titleMaxChars);

    try {
      const rawText = await this.requestWithRetry(
        () => this.complete(buildTitlePrompt(excerpt), this.titleTimeoutMs),
        'generate title'
      );
      const title = cleanTitle(rawText);
      logger.info(`${this.id}: generated title '${title}'`);
      return title;
    } catch (error) {
      const failure = ProviderError.from(error, this.id);
      logger.error(`${this.id}: title generation failed`, {
        statusCode: failure.statusCode,
        retryable: failure.retryable,
        message: failure.message,
      });
      return '';
    }
  }

  /**
   * Run a request, retrying transient failures after a fixed delay.
   * Fatal failures are rethrown at once.
   */
  protected async requestWithRetry<T>(send: () => Promise<T>, operation: string): Promise<T> {
    let lastFailure: ProviderError | undefined;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await send();
      } catch (error) {
        const failure = ProviderError.from(error, this.id);
        if (!failure.retryable) {
          throw failure;
        }
        lastFailure = failure;

        if (attempt < this.maxAttempts) {
          logger.warn(
            `${this.id}: ${operation} failed (attempt ${attempt}/${this.maxAttempts}), retrying in ${this.retryDelayMs}ms`,
            { message: failure.message }
          );
          await sleep(this.retryDelayMs);
        }
      }
    }

    throw lastFailure ?? new ProviderError(`${operation}: no attempt made`, this.id, 0, false);
  }

  /**
   * Malformed bodies are not worth retrying
   */
  protected malformedResponse(detail: string): ProviderError {
    return new ProviderError(`Malformed response: ${detail}`, this.id, 0, false);
  }
}
